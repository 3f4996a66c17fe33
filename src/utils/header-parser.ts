/**
 * Incremental HTTP response-header parsing.
 *
 * The HTTP engine hands over one raw line at a time (status line first,
 * then `Key: Value` lines, then a blank separator), repeated for every
 * redirect hop. Lines are folded into a {@link HeaderTarget} in place.
 */

export interface HeaderTarget {
  status: number;
  statusText: string;
  header: Record<string, string>;
  cookies: Record<string, string>;
}

export interface StatusLine {
  protocol: string;
  status: number;
  statusText: string;
}

const STATUS_LINE = /^(HTTP\/\S*)\s+(\d+)[ \t]*(.*)$/;

/**
 * Parse `HTTP/1.1 404 Not Found`. The reason phrase is everything after
 * the code, trimmed, and may be empty or span several words.
 */
export function parseStatusLine(line: string): StatusLine | null {
  const match = STATUS_LINE.exec(line.trim());
  if (!match) {
    return null;
  }

  return {
    protocol: match[1],
    status: parseInt(match[2], 10),
    statusText: match[3].trim(),
  };
}

/**
 * Extract `name=value` from a `Set-Cookie` value, ignoring every attribute
 * after the first `;`. Returns null when the pair has no `=`.
 */
export function parseSetCookie(value: string): [string, string] | null {
  const semicolon = value.indexOf(';');
  const pair = semicolon === -1 ? value : value.substring(0, semicolon);

  const equals = pair.indexOf('=');
  if (equals === -1) {
    return null;
  }

  return [pair.substring(0, equals), pair.substring(equals + 1)];
}

/**
 * Fold one header line into `target`.
 *
 * - status lines overwrite `status`/`statusText` (the last hop wins)
 * - `Set-Cookie` lines go to `cookies`, everything else to `header`
 * - a repeated key overwrites the earlier value
 * - lines without `": "` are ignored
 *
 * @returns the number of bytes consumed, which is always the whole line
 */
export function parseHeaderLine(line: string, target: HeaderTarget): number {
  const consumed = Buffer.byteLength(line);

  if (line.startsWith('HTTP/')) {
    const status = parseStatusLine(line);
    if (status) {
      target.status = status.status;
      target.statusText = status.statusText;
    }
    return consumed;
  }

  const delimiter = line.indexOf(': ');
  if (delimiter === -1) {
    return consumed;
  }

  const key = line.substring(0, delimiter);
  let value = line.substring(delimiter + 2);

  if (value.endsWith('\n')) value = value.slice(0, -1);
  if (value.endsWith('\r')) value = value.slice(0, -1);

  if (key === 'Set-Cookie') {
    const cookie = parseSetCookie(value);
    if (cookie) {
      target.cookies[cookie[0]] = cookie[1];
    }
    return consumed;
  }

  target.header[key] = value;
  return consumed;
}

/**
 * Serialize a cookie map into a single `Cookie` header value
 */
export function formatCookieHeader(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}
