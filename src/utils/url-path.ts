/**
 * Path component of a protocol URL, from the first `/` after the
 * authority onward.
 *
 * @example
 * ```typescript
 * extractUrlPath('ftp://host/dir/file'); // '/dir/file'
 * extractUrlPath('ftp://host');          // ''
 * ```
 */
export function extractUrlPath(url: string): string {
  const schemeEnd = url.indexOf('://');
  if (schemeEnd === -1) {
    return '';
  }

  const pathStart = url.indexOf('/', schemeEnd + 3);
  return pathStart === -1 ? '' : url.substring(pathStart);
}

/**
 * Final segment of a local path, after the last `/` or `\`
 */
export function basename(path: string): string {
  const lastSeparator = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\'));
  return lastSeparator === -1 ? path : path.substring(lastSeparator + 1);
}

/**
 * Append a trailing slash unless one is already present
 */
export function ensureTrailingSlash(path: string): string {
  return path.endsWith('/') ? path : `${path}/`;
}

/**
 * Percent-decode a URL path; malformed escapes are left as they are
 */
export function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    return path;
  }
}
