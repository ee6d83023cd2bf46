import nodeFs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import {
  DirectoryOpenError,
  EntryLimitError,
  UnknownEntryTypeError,
  joinEntry,
} from '@gitree/shared';
import type { Classification, DirectoryEntry, DirectoryLister, EntryKind } from './types';

type Fs = Pick<typeof nodeFs, 'readdir'>;

function kindOf(dirent: Dirent): EntryKind {
  if (dirent.isDirectory()) return 'directory';
  if (dirent.isFile()) return 'file';
  if (
    dirent.isSymbolicLink() ||
    dirent.isFIFO() ||
    dirent.isSocket() ||
    dirent.isBlockDevice() ||
    dirent.isCharacterDevice()
  ) {
    return 'other';
  }
  return 'unknown';
}

export class NodeDirectoryLister implements DirectoryLister {
  private fs: Fs;

  constructor(fs: Fs = nodeFs) {
    this.fs = fs;
  }

  async list(dirPath: string): Promise<DirectoryEntry[]> {
    let dirents: Dirent[];
    try {
      dirents = await this.fs.readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      throw new DirectoryOpenError(dirPath, { cause: error });
    }
    return dirents.map((d) => ({ name: d.name, kind: kindOf(d) }));
  }
}

// Byte-wise, so the order does not depend on locale.
export function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export async function listSorted(
  lister: DirectoryLister,
  dirPath: string,
): Promise<DirectoryEntry[]> {
  const entries = await lister.list(dirPath);
  return [...entries].sort((a, b) => compareNames(a.name, b.name));
}

/**
 * Splits a listing into subdirectories and regular files and records whether
 * `objects` and `refs` subdirectories are present.
 *
 * @param maxEntries - per-kind cap, 0 for none
 */
export function classifyEntries(
  dirPath: string,
  entries: readonly DirectoryEntry[],
  maxEntries = 0,
): Classification {
  const subdirectories: string[] = [];
  const files: string[] = [];
  let hasObjectsDir = false;
  let hasRefsDir = false;

  for (const entry of entries) {
    switch (entry.kind) {
      case 'directory':
        if (entry.name === 'objects') hasObjectsDir = true;
        if (entry.name === 'refs') hasRefsDir = true;
        subdirectories.push(entry.name);
        if (maxEntries > 0 && subdirectories.length > maxEntries) {
          throw new EntryLimitError(dirPath, 'directories', maxEntries);
        }
        break;
      case 'file':
        files.push(entry.name);
        if (maxEntries > 0 && files.length > maxEntries) {
          throw new EntryLimitError(dirPath, 'files', maxEntries);
        }
        break;
      case 'unknown':
        throw new UnknownEntryTypeError(joinEntry(dirPath, entry.name));
      case 'other':
        break;
    }
  }

  return {
    path: dirPath,
    hasObjectsDir,
    hasRefsDir,
    isGitRoot: hasObjectsDir && hasRefsDir,
    subdirectories,
    files,
  };
}
