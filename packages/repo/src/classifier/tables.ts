import { lastComponent, type ExceptionMatch } from '@gitree/shared';
import knownNamesData from './known-names.json';

export const DEFAULT_KNOWN_NAMES: ReadonlySet<string> = new Set([
  ...knownNamesData.files,
  ...knownNamesData.directories,
  ...knownNamesData.gitweb,
  ...knownNamesData.repoTool,
  ...knownNamesData.leftovers,
]);

// Checkouts managed by the repo tool keep working trees here.
export const DEFAULT_NON_BARE_EXCEPTIONS: readonly string[] = ['.repo', 'manifests', 'repo'];

export function buildKnownNames(extra: readonly string[] = []): ReadonlySet<string> {
  if (extra.length === 0) return DEFAULT_KNOWN_NAMES;
  return new Set([...DEFAULT_KNOWN_NAMES, ...extra]);
}

/**
 * Directories exempt from non-bare and stray reporting.
 */
export class ExceptionTable {
  private readonly entries: ReadonlySet<string>;

  constructor(
    entries: Iterable<string> = DEFAULT_NON_BARE_EXCEPTIONS,
    readonly match: ExceptionMatch = 'basename',
  ) {
    this.entries = new Set(entries);
  }

  /**
   * The default names are basenames, so prefix matching uses `extra` alone.
   */
  static withDefaults(extra: readonly string[], match: ExceptionMatch): ExceptionTable {
    if (match === 'prefix') return new ExceptionTable(extra, match);
    return new ExceptionTable([...DEFAULT_NON_BARE_EXCEPTIONS, ...extra], match);
  }

  matches(dirPath: string): boolean {
    if (this.match === 'basename') {
      return this.entries.has(lastComponent(dirPath));
    }
    for (const entry of this.entries) {
      if (dirPath.startsWith(entry)) return true;
    }
    return false;
  }
}

export function isGitNamed(name: string): boolean {
  return name.endsWith('.git');
}

/** A bare `.git` has no repository name in front of the suffix. */
export function isDotGit(name: string): boolean {
  return name === '.git';
}
