/**
 * One entry of a long-format (`ls -l` style) directory listing
 */
export interface ListingEntry {
  isDirectory: boolean;
  name: string;
}

/** Tokens before the name in `perms links owner group size month day time name` */
const NAME_TOKEN_INDEX = 8;

/**
 * Parse one line of a Unix-style `LIST` response.
 *
 * The name starts at the ninth whitespace-separated token and runs to the
 * end of the line, re-joined with single spaces; runs of whitespace inside
 * a filename therefore collapse to one space. Lines with fewer tokens
 * (non-standard formats) fall back to their last token.
 *
 * @example
 * ```typescript
 * parseListLine('drwxr-xr-x 2 user group 4096 Jan 1 00:00 subdir');
 * // { isDirectory: true, name: 'subdir' }
 * ```
 */
export function parseListLine(line: string): ListingEntry {
  if (!line) {
    return { isDirectory: false, name: '' };
  }

  const isDirectory = line[0] === 'd';
  const tokens = line.split(/\s+/).filter(Boolean);

  let name = '';
  if (tokens.length > NAME_TOKEN_INDEX) {
    name = tokens.slice(NAME_TOKEN_INDEX).join(' ');
  } else if (tokens.length > 0) {
    name = tokens[tokens.length - 1];
  }

  return { isDirectory, name };
}
