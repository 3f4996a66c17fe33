import { open, type FileHandle } from 'node:fs/promises';
import type { WriteStream } from 'node:fs';
import { parseHeaderLine, type HeaderTarget } from '../utils/header-parser.js';
import { PayloadSource } from '../utils/payload-source.js';
import { LocalFileError } from './errors.js';
import { BaseSink, type TransferResult } from './transfer.js';

export interface HttpResponse {
  /** Final status code, 0 when none was obtained */
  status: number;
  statusText: string;
  /** Empty on success */
  errorMessage: string;
  content: string;
  /** Header name as received -> value; the last occurrence wins */
  header: Record<string, string>;
  cookies: Record<string, string>;
}

export interface FtpResponse {
  /** Last server reply code, 0 when none */
  status: number;
  errorMessage: string;
  content: string;
  list: string[];
}

export interface TelnetResponse {
  errorMessage: string;
  content: string;
}

export function emptyHttpResponse(): HttpResponse {
  return { status: 0, statusText: '', errorMessage: '', content: '', header: {}, cookies: {} };
}

export function emptyFtpResponse(): FtpResponse {
  return { status: 0, errorMessage: '', content: '', list: [] };
}

/**
 * Where inbound payload ends up
 */
export interface BodyTarget {
  write(chunk: Buffer): void;
  /** Text collected in memory; file targets have none */
  text(): string;
  close(): Promise<void>;
}

/**
 * Where outbound payload comes from
 */
export interface ReadSource {
  read(size: number): Buffer | Promise<Buffer>;
  close?(): Promise<void>;
}

export class MemoryBody implements BodyTarget {
  private chunks: Buffer[] = [];

  write(chunk: Buffer): void {
    this.chunks.push(chunk);
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }

  async close(): Promise<void> {
    // nothing to release
  }
}

/**
 * Streams inbound payload into a local file. The file is opened (and
 * truncated) before any connection is made.
 */
export class FileBody implements BodyTarget {
  private readonly stream: WriteStream;
  private failure: Error | null = null;

  private constructor(readonly path: string, handle: FileHandle) {
    this.stream = handle.createWriteStream();
    this.stream.on('error', (err) => {
      this.failure = err;
    });
  }

  /**
   * @throws {LocalFileError} with `message` when the file cannot be created
   */
  static async open(path: string, message = 'Unable to open output file'): Promise<FileBody> {
    let handle: FileHandle;
    try {
      handle = await open(path, 'w');
    } catch {
      throw new LocalFileError(message, path);
    }
    return new FileBody(path, handle);
  }

  write(chunk: Buffer): void {
    if (!this.failure) {
      this.stream.write(chunk);
    }
  }

  text(): string {
    return '';
  }

  async close(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.stream.end(() => resolve());
    });

    if (this.failure) {
      throw new LocalFileError(`Unable to write output file: ${this.failure.message}`, this.path);
    }
  }
}

/**
 * Reads a local file on demand for uploads
 */
export class FileSource implements ReadSource {
  private done = false;
  private closed = false;
  private offset = 0;

  private constructor(readonly path: string, private readonly handle: FileHandle) {}

  /**
   * @throws {LocalFileError} with `message` when the file cannot be opened
   */
  static async open(path: string, message = 'Unable to open local file for reading'): Promise<FileSource> {
    let handle: FileHandle;
    try {
      handle = await open(path, 'r');
    } catch {
      throw new LocalFileError(message, path);
    }
    return new FileSource(path, handle);
  }

  get bytesRead(): number {
    return this.offset;
  }

  async read(size: number): Promise<Buffer> {
    if (this.done || size <= 0) {
      return Buffer.alloc(0);
    }

    const buffer = Buffer.alloc(size);
    const { bytesRead } = await this.handle.read(buffer, 0, size, null);
    if (bytesRead === 0) {
      this.done = true;
      return Buffer.alloc(0);
    }

    this.offset += bytesRead;
    return buffer.subarray(0, bytesRead);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

/**
 * Builds an {@link HttpResponse} from the lines and chunks an engine
 * delivers. Every redirect hop's status line passes through here; the
 * last one wins.
 */
export class HttpResponseBuilder extends BaseSink {
  private readonly target: HeaderTarget = { status: 0, statusText: '', header: {}, cookies: {} };

  constructor(private readonly body: BodyTarget = new MemoryBody()) {
    super();
  }

  override onHeaderLine(line: string): number {
    return parseHeaderLine(line, this.target);
  }

  override onBodyChunk(chunk: Buffer): number {
    this.body.write(chunk);
    return chunk.length;
  }

  /** Status parsed so far; 0 until a status line arrives */
  get status(): number {
    return this.target.status;
  }

  async finish(result: TransferResult): Promise<HttpResponse> {
    let errorMessage = result.ok ? '' : (result.error ?? 'Transfer failed');

    try {
      await this.body.close();
    } catch (error) {
      if (!errorMessage) {
        errorMessage = error instanceof Error ? error.message : 'Unable to write output file';
      }
    }

    return {
      status: this.target.status || result.status,
      statusText: this.target.statusText,
      errorMessage,
      content: result.ok ? this.body.text() : '',
      header: this.target.header,
      cookies: this.target.cookies,
    };
  }
}

/**
 * Builds an {@link FtpResponse}. Server reply lines arrive through
 * `onHeaderLine` and are kept for diagnostics only.
 */
export class FtpResponseBuilder extends BaseSink {
  private readonly body: BodyTarget;
  private readonly source?: ReadSource;
  private readonly replies: string[] = [];

  constructor(options: { body?: BodyTarget; source?: ReadSource } = {}) {
    super();
    this.body = options.body ?? new MemoryBody();
    this.source = options.source;
  }

  override onHeaderLine(line: string): number {
    this.replies.push(line);
    return Buffer.byteLength(line);
  }

  override onBodyChunk(chunk: Buffer): number {
    this.body.write(chunk);
    return chunk.length;
  }

  override onReadRequest(size: number): Buffer | Promise<Buffer> {
    return this.source ? this.source.read(size) : Buffer.alloc(0);
  }

  /** Raw reply lines seen during the transfer */
  get replyLines(): readonly string[] {
    return this.replies;
  }

  async finish(result: TransferResult): Promise<FtpResponse> {
    let errorMessage = result.ok ? '' : (result.error ?? 'Transfer failed');

    const released = await Promise.allSettled([
      this.body.close(),
      this.source?.close?.() ?? Promise.resolve(),
    ]);
    for (const outcome of released) {
      if (outcome.status === 'rejected' && !errorMessage) {
        errorMessage = outcome.reason instanceof Error ? outcome.reason.message : 'Unable to close local file';
      }
    }

    return {
      status: result.status,
      errorMessage,
      content: result.ok ? this.body.text() : '',
      list: [],
    };
  }
}

/**
 * Collects everything the remote end prints
 */
export class TelnetResponseBuilder extends BaseSink {
  private readonly body = new MemoryBody();

  override onBodyChunk(chunk: Buffer): number {
    this.body.write(chunk);
    return chunk.length;
  }

  finish(result: TransferResult): TelnetResponse {
    return {
      errorMessage: result.ok ? '' : (result.error ?? 'Transfer failed'),
      content: this.body.text(),
    };
  }
}

/**
 * Serves an assembled mail to the SMTP engine
 */
export class MailPayloadSink extends BaseSink {
  private readonly source: PayloadSource;

  constructor(payload: Buffer | string) {
    super();
    this.source = new PayloadSource(payload);
  }

  override onReadRequest(size: number): Buffer {
    return this.source.read(size);
  }

  get bytesRead(): number {
    return this.source.bytesRead;
  }

  get length(): number {
    return this.source.length;
  }
}
