/**
 * Removes every trailing `/` from a path. A path made only of slashes
 * collapses to `/`.
 *
 * @example stripTrailingSlashes('foo///') === 'foo'
 */
export function stripTrailingSlashes(p: string): string {
  const stripped = p.replace(/\/+$/, '');
  return stripped === '' && p.startsWith('/') ? '/' : stripped;
}

/**
 * The final component of a slash-separated path, taken verbatim.
 */
export function lastComponent(p: string): string {
  const idx = p.lastIndexOf('/');
  return idx === -1 ? p : p.slice(idx + 1);
}

/**
 * Appends an entry name to a directory path without normalizing either, so
 * reported paths keep the spelling the user passed in.
 */
export function joinEntry(dir: string, entryName: string): string {
  return dir.endsWith('/') ? `${dir}${entryName}` : `${dir}/${entryName}`;
}
