export type EntryKind = 'directory' | 'file' | 'other' | 'unknown';

/**
 * One immediate member of a directory. `other` covers symlinks, sockets,
 * FIFOs and devices; `unknown` is an entry the filesystem could not type.
 */
export interface DirectoryEntry {
  name: string;
  kind: EntryKind;
}

/**
 * Lists the immediate entries of a directory, never including `.` or `..`.
 */
export interface DirectoryLister {
  list(dirPath: string): Promise<DirectoryEntry[]>;
}

export interface Classification {
  path: string;
  hasObjectsDir: boolean;
  hasRefsDir: boolean;
  isGitRoot: boolean;
  subdirectories: string[];
  files: string[];
}

/**
 * `all` runs every check in a single walk.
 */
export type AuditMode = 'layout' | 'non-bare' | 'stray' | 'all';

export type Finding =
  | { type: 'LayoutViolation'; repository: string; entry: string; path: string }
  | { type: 'NameNotTerminated'; path: string }
  | { type: 'NonBareTree'; path: string }
  | { type: 'StrayFile'; path: string };

export type FindingType = Finding['type'];

export interface AuditCounters {
  layoutViolations: number;
  unterminatedNames: number;
  nonBareTrees: number;
  strayFiles: number;
}

export interface AuditResult {
  root: string;
  mode: AuditMode;
  counters: AuditCounters;
  findings: Finding[];
}

export interface AuditOptions {
  /** Called for each finding as soon as it is produced */
  onFinding?: (finding: Finding) => void;
}
