/**
 * FTP operations of a session.
 *
 * Each call opens its own control connection, logs in, runs its
 * commands and quits. Results are {@link FtpResponse}s; failures are
 * reported through `errorMessage`, never thrown.
 */

import type { SessionContext } from '../core/context.js';
import { ConfigurationError, LocalFileError } from '../core/errors.js';
import {
  FileBody,
  FileSource,
  FtpResponseBuilder,
  emptyFtpResponse,
  type BodyTarget,
  type FtpResponse,
  type ReadSource,
} from '../core/response.js';
import type { FtpEngine, FtpRequest, PreparedFtpRequest } from '../transport/ftp.js';
import { parseListLine, type ListingEntry } from '../utils/ftp-list.js';
import { splitLines } from '../utils/lines.js';
import { walkTree, type WalkOptions } from '../utils/tree-walker.js';
import { basename, decodePath, ensureTrailingSlash, extractUrlPath } from '../utils/url-path.js';

export const FTP_INIT_FAILURE = 'Failed to initialize transport';

export interface FtpAuthOptions {
  username?: string;
  password?: string;
  /** Overall limit in ms; defaults to the session timeout */
  timeout?: number;
}

export type FtpWalkOptions = FtpAuthOptions & WalkOptions;

interface LocalResources {
  body?: () => Promise<BodyTarget>;
  source?: () => Promise<ReadSource>;
}

/**
 * Server-side path for single-argument commands (DELE, RNFR, MKD...)
 */
function commandPath(url: string): string {
  return decodePath(extractUrlPath(url));
}

/**
 * URL to list for a path the walker built under `base`. Walked names are
 * raw server names, so each segment below `base` is percent-encoded.
 */
function listingUrl(base: string, directory: string): string {
  const prefix = ensureTrailingSlash(base);
  if (!directory.startsWith(prefix)) {
    return directory;
  }
  const segments = directory.substring(prefix.length).split('/').map(encodeURIComponent);
  return prefix + segments.join('/');
}

export class FtpClient {
  constructor(
    private readonly context: SessionContext,
    private readonly engine: FtpEngine
  ) {}

  /**
   * Store `localPath` at `url`, streamed in chunks
   */
  async upload(url: string, localPath: string, options: FtpAuthOptions = {}): Promise<FtpResponse> {
    return this.run({ ...options, url, mode: 'store' }, {
      source: () => FileSource.open(localPath),
    });
  }

  async downloadFile(url: string, localPath: string, options: FtpAuthOptions = {}): Promise<FtpResponse> {
    return this.run({ ...options, url, mode: 'retrieve' }, {
      body: () => FileBody.open(localPath, 'Unable to open local file for writing'),
    });
  }

  /**
   * Retrieve a remote file into `content`
   */
  async read(url: string, options: FtpAuthOptions = {}): Promise<FtpResponse> {
    return this.run({ ...options, url, mode: 'retrieve' });
  }

  async remove(url: string, options: FtpAuthOptions = {}): Promise<FtpResponse> {
    return this.run({ ...options, url, mode: 'none', quote: [`DELE ${commandPath(url)}`] });
  }

  /**
   * Names in a directory (NLST); `list` holds one entry per non-empty line
   */
  async list(url: string, options: FtpAuthOptions = {}): Promise<FtpResponse> {
    const response = await this.run({ ...options, url, mode: 'nlst' });
    response.list = splitLines(response.content);
    return response;
  }

  /**
   * Every path below `url`, as full URLs, directories before their
   * contents. Subdirectories that cannot be listed are skipped.
   *
   * @example
   * ```typescript
   * const { list } = await session.ftp.listRecursive('ftp://host/pub');
   * // ['ftp://host/pub/a', 'ftp://host/pub/a/b.txt']
   * ```
   */
  async listRecursive(url: string, options: FtpWalkOptions = {}): Promise<FtpResponse> {
    this.context.assertOpen();
    const { maxDepth, signal, detectCycles, ...auth } = options;

    try {
      this.engine.prepare({ ...auth, url, mode: 'list' });
    } catch (error) {
      return this.initFailure(url, error);
    }

    const lister = async (directory: string): Promise<ListingEntry[]> => {
      const listing = await this.run({ ...auth, url: listingUrl(url, directory), mode: 'list' });
      return listing.errorMessage ? [] : splitLines(listing.content).map(parseListLine);
    };

    const paths = await walkTree(url, lister, { maxDepth, signal, detectCycles });
    return { ...emptyFtpResponse(), list: paths };
  }

  /**
   * Rename on the server (RNFR / RNTO); both URLs name the same server
   */
  async move(fromUrl: string, toUrl: string, options: FtpAuthOptions = {}): Promise<FtpResponse> {
    return this.run({
      ...options,
      url: fromUrl,
      mode: 'none',
      quote: [`RNFR ${commandPath(fromUrl)}`, `RNTO ${commandPath(toUrl)}`],
    });
  }

  /**
   * True when the path is a file the server can size, or a directory it
   * can enter
   */
  async exists(url: string, options: FtpAuthOptions = {}): Promise<boolean> {
    const path = commandPath(url);

    if (path && path !== '/') {
      const size = await this.run({ ...options, url, mode: 'none', quote: [`SIZE ${path}`] }, {}, false);
      if (!size.errorMessage) return true;
    }

    return this.isFolder(url, options);
  }

  /**
   * True when the long listing of `url` is one regular file of the same
   * name. A directory holding a single file lists that file instead.
   */
  async isFile(url: string, options: FtpAuthOptions = {}): Promise<boolean> {
    const info = await this.fileInfo(url, options);
    if (info.errorMessage) return false;

    const lines = splitLines(info.content);
    if (lines.length !== 1 || !lines[0].startsWith('-')) return false;
    return basename(parseListLine(lines[0]).name) === basename(commandPath(url));
  }

  async isFolder(url: string, options: FtpAuthOptions = {}): Promise<boolean> {
    const path = commandPath(url) || '/';
    const probe = await this.run({ ...options, url, mode: 'none', quote: [`CWD ${path}`] }, {}, false);
    return !probe.errorMessage;
  }

  /**
   * Create a directory (MKD)
   */
  async create(url: string, options: FtpAuthOptions = {}): Promise<FtpResponse> {
    return this.run({ ...options, url, mode: 'none', quote: [`MKD ${commandPath(url)}`] });
  }

  /**
   * Long listing line of a single file in `content`
   */
  async fileInfo(url: string, options: FtpAuthOptions = {}): Promise<FtpResponse> {
    return this.run({ ...options, url, mode: 'list' });
  }

  /**
   * Long listing of a directory in `content`, one line per entry in `list`
   */
  async folderInfo(url: string, options: FtpAuthOptions = {}): Promise<FtpResponse> {
    const response = await this.run({ ...options, url, mode: 'list' });
    response.list = splitLines(response.content);
    return response;
  }

  private async run(request: FtpRequest, local: LocalResources = {}, warn = true): Promise<FtpResponse> {
    this.context.assertOpen();
    const { logger } = this.context;

    let prepared: PreparedFtpRequest;
    try {
      prepared = this.engine.prepare(request);
    } catch (error) {
      return this.initFailure(request.url, error);
    }

    let sink: FtpResponseBuilder;
    try {
      const body = local.body ? await local.body() : undefined;
      const source = local.source ? await local.source() : undefined;
      sink = new FtpResponseBuilder({ body, source });
    } catch (error) {
      if (error instanceof LocalFileError) {
        logger.warn(`[FTP] ${request.url}: ${error.message}`);
        return { ...emptyFtpResponse(), errorMessage: error.message };
      }
      throw error;
    }

    const result = await this.engine.perform(prepared, sink);
    const response = await sink.finish(result);
    if (response.errorMessage && warn) {
      logger.warn(`[FTP] ${request.url} failed: ${response.errorMessage}`);
    }
    return response;
  }

  private initFailure(url: string, error: unknown): FtpResponse {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    this.context.logger.warn(`[FTP] ${url}: ${error.message}`);
    return { ...emptyFtpResponse(), errorMessage: FTP_INIT_FAILURE };
  }
}
