/**
 * Split a raw listing or script blob into its non-empty lines.
 *
 * Accepts LF or CRLF endings: one trailing `\r` is removed from each line.
 */
export function splitLines(data: string | Buffer): string[] {
  const text = typeof data === 'string' ? data : data.toString('utf8');
  const lines: string[] = [];

  for (const raw of text.split('\n')) {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    if (line) {
      lines.push(line);
    }
  }

  return lines;
}
