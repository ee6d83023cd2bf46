import {
  ConsoleLogger,
  DEFAULT_MAX_ENTRIES_PER_DIRECTORY,
  joinEntry,
  lastComponent,
  type Config,
  type Logger,
} from '@gitree/shared';
import { checkLayout, checkNonBare } from './checks';
import { NodeDirectoryLister, classifyEntries, listSorted } from './lister';
import {
  DEFAULT_KNOWN_NAMES,
  ExceptionTable,
  buildKnownNames,
  isDotGit,
  isGitNamed,
} from './tables';
import type {
  AuditCounters,
  AuditMode,
  AuditOptions,
  AuditResult,
  Classification,
  DirectoryLister,
  Finding,
  FindingType,
} from './types';

export interface TreeClassifierOptions {
  lister?: DirectoryLister;
  knownNames?: ReadonlySet<string>;
  exceptions?: ExceptionTable;
  /** Per-directory cap on subdirectories and on files; 0 disables it */
  maxEntriesPerDirectory?: number;
  logger?: Logger;
}

type Check = 'layout' | 'non-bare' | 'stray';

// `parent` is unset only for the root of the walk.
interface WalkTask {
  path: string;
  parent?: string;
}

const COUNTER_FOR: Record<FindingType, keyof AuditCounters> = {
  LayoutViolation: 'layoutViolations',
  NameNotTerminated: 'unterminatedNames',
  NonBareTree: 'nonBareTrees',
  StrayFile: 'strayFiles',
};

interface AuditContext {
  mode: AuditMode;
  result: AuditResult;
  report: (finding: Finding) => void;
}

function runs(mode: AuditMode, check: Check): boolean {
  return mode === 'all' || mode === check;
}

export function emptyCounters(): AuditCounters {
  return { layoutViolations: 0, unterminatedNames: 0, nonBareTrees: 0, strayFiles: 0 };
}

/**
 * Walks a tree depth-first and classifies each directory as a Git root
 * (holds `objects/` and `refs/`) or an ordinary directory. Git roots are
 * never descended into.
 */
export class TreeClassifier {
  private readonly lister: DirectoryLister;
  private readonly knownNames: ReadonlySet<string>;
  private readonly exceptions: ExceptionTable;
  private readonly maxEntries: number;
  private readonly logger: Logger;

  constructor(options: TreeClassifierOptions = {}) {
    this.lister = options.lister ?? new NodeDirectoryLister();
    this.knownNames = options.knownNames ?? DEFAULT_KNOWN_NAMES;
    this.exceptions = options.exceptions ?? new ExceptionTable();
    this.maxEntries = options.maxEntriesPerDirectory ?? DEFAULT_MAX_ENTRIES_PER_DIRECTORY;
    this.logger = options.logger ?? new ConsoleLogger();
  }

  static fromConfig(
    config: Config,
    options: Pick<TreeClassifierOptions, 'lister' | 'logger'> = {},
  ): TreeClassifier {
    return new TreeClassifier({
      ...options,
      knownNames: buildKnownNames(config.layout.extraKnownNames),
      exceptions: ExceptionTable.withDefaults(config.exceptions.names, config.exceptions.match),
      maxEntriesPerDirectory: config.limits.maxEntriesPerDirectory,
    });
  }

  /**
   * Lists one directory and reports whether it is a Git root.
   */
  async classify(dirPath: string): Promise<Classification> {
    const entries = await listSorted(this.lister, dirPath);
    return classifyEntries(dirPath, entries, this.maxEntries);
  }

  async audit(root: string, mode: AuditMode, options: AuditOptions = {}): Promise<AuditResult> {
    const result: AuditResult = { root, mode, counters: emptyCounters(), findings: [] };
    const ctx: AuditContext = {
      mode,
      result,
      report: (finding) => {
        result.counters[COUNTER_FOR[finding.type]]++;
        result.findings.push(finding);
        options.onFinding?.(finding);
      },
    };

    const stack: WalkTask[] = [{ path: root }];
    let task: WalkTask | undefined;
    while ((task = stack.pop()) !== undefined) {
      const children = await this.visitDirectory(task, ctx);
      // Reversed so the first child is popped first.
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }

    this.logger.debug(
      `Audit of ${root} finished: ${result.findings.length} finding(s) in ${mode} mode`,
    );
    return result;
  }

  private async visitDirectory(task: WalkTask, ctx: AuditContext): Promise<WalkTask[]> {
    const dirPath = task.path;
    this.logger.debug(`Checking ${dirPath}`);
    const classification = await this.classify(dirPath);

    if (classification.isGitRoot) {
      await this.visitGitRoot(task, ctx);
      return [];
    }

    if (runs(ctx.mode, 'stray')) {
      if (this.exceptions.matches(dirPath)) {
        // A stray-only audit skips the whole exempt subtree.
        if (ctx.mode === 'stray') return [];
      } else {
        for (const file of classification.files) {
          ctx.report({ type: 'StrayFile', path: joinEntry(dirPath, file) });
        }
      }
    }

    // A `*.git` directory that is not a Git root is walked like any other.
    return classification.subdirectories.map((name) => ({
      path: joinEntry(dirPath, name),
      parent: dirPath,
    }));
  }

  private async visitGitRoot(task: WalkTask, ctx: AuditContext): Promise<void> {
    const name = lastComponent(task.path);

    if (runs(ctx.mode, 'layout')) {
      if (!isGitNamed(name)) {
        ctx.report({ type: 'NameNotTerminated', path: task.path });
      }
      await checkLayout(task.path, this.knownNames, this.lister, ctx.report);
    }
    if (isDotGit(name) && task.parent !== undefined && runs(ctx.mode, 'non-bare')) {
      checkNonBare(task.parent, this.exceptions, ctx.report);
    }
  }
}
