import { joinEntry } from '@gitree/shared';
import { listSorted } from './lister';
import type { ExceptionTable } from './tables';
import type { DirectoryLister, Finding } from './types';

export type Report = (finding: Finding) => void;

/**
 * Re-lists a repository and reports every member missing from the known-names
 * table. Kinds are not re-validated: a table name is accepted whether it is a
 * file or a directory.
 */
export async function checkLayout(
  repository: string,
  knownNames: ReadonlySet<string>,
  lister: DirectoryLister,
  report: Report,
): Promise<void> {
  const entries = await listSorted(lister, repository);
  for (const entry of entries) {
    if (knownNames.has(entry.name)) continue;
    report({
      type: 'LayoutViolation',
      repository,
      entry: entry.name,
      path: joinEntry(repository, entry.name),
    });
  }
}

/**
 * Called with the directory that holds a Git root named `.git`: that
 * directory is a working copy unless the exception table covers it.
 */
export function checkNonBare(
  containingDir: string,
  exceptions: ExceptionTable,
  report: Report,
): void {
  if (exceptions.matches(containingDir)) return;
  report({ type: 'NonBareTree', path: containingDir });
}
