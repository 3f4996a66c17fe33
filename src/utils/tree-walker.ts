import { ensureTrailingSlash } from './url-path.js';
import type { ListingEntry } from './ftp-list.js';

/**
 * Lists one directory. A failed listing should resolve to an empty array;
 * a rejection is treated the same way.
 */
export type DirectoryLister = (path: string) => Promise<ListingEntry[]>;

export interface WalkOptions {
  /**
   * Directory levels below the base to expand; 0 lists the base only.
   * @default Infinity
   */
  maxDepth?: number;

  /**
   * Stops the walk; the paths gathered so far are returned
   */
  signal?: AbortSignal;

  /**
   * Do not descend into a directory whose listing is identical to the
   * listing of one of its ancestors. A symlink pointing back up the tree
   * yields a new path on every descent but always the same listing.
   * @default false
   */
  detectCycles?: boolean;
}

interface Frame {
  base: string;
  depth: number;
  entries: ListingEntry[];
  index: number;
  signature: string;
}

function listingSignature(entries: ListingEntry[]): string {
  return entries.map((entry) => `${entry.isDirectory ? 'd' : '-'}${entry.name}`).join('\n');
}

function frame(base: string, depth: number, entries: ListingEntry[]): Frame {
  return { base, depth, entries, index: 0, signature: listingSignature(entries) };
}

/**
 * Walk a remote tree into a flat list of full paths.
 *
 * Order is pre-order, depth-first, left to right as the server listed
 * them: a directory is emitted before its contents. `.`, `..` and empty
 * names are never emitted. Pending directories are kept on an explicit
 * stack rather than the call stack.
 *
 * @example
 * ```typescript
 * const paths = await walkTree('/', (dir) => listDetailed(dir));
 * // ['/a', '/a/b.txt']
 * ```
 */
export async function walkTree(
  base: string,
  lister: DirectoryLister,
  options: WalkOptions = {}
): Promise<string[]> {
  const maxDepth = options.maxDepth ?? Infinity;
  const paths: string[] = [];

  const stack: Frame[] = [frame(base, 0, await safeList(lister, base))];

  while (stack.length > 0) {
    if (options.signal?.aborted) break;

    const current = stack[stack.length - 1];
    if (current.index >= current.entries.length) {
      stack.pop();
      continue;
    }

    const entry = current.entries[current.index++];
    if (!entry.name || entry.name === '.' || entry.name === '..') {
      continue;
    }

    const fullPath = ensureTrailingSlash(current.base) + entry.name;
    paths.push(fullPath);

    if (!entry.isDirectory || current.depth + 1 > maxDepth) {
      continue;
    }

    const child = frame(fullPath, current.depth + 1, await safeList(lister, fullPath));
    if (options.detectCycles && child.entries.length > 0 && stack.some((f) => f.signature === child.signature)) {
      continue;
    }
    stack.push(child);
  }

  return paths;
}

async function safeList(lister: DirectoryLister, path: string): Promise<ListingEntry[]> {
  try {
    return await lister(path);
  } catch {
    // A subtree that cannot be listed contributes nothing
    return [];
  }
}
