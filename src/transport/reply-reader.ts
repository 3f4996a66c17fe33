import type { Socket } from 'node:net';
import { StringDecoder } from 'node:string_decoder';
import { ConnectionError, TimeoutError } from '../core/errors.js';
import type { Logger } from '../types/logger.js';

/**
 * One complete server reply, multi-line replies folded together
 */
export interface Reply {
  code: number;
  /** Text of the final line, after the code */
  message: string;
  lines: string[];
}

interface Waiter {
  resolve: (reply: Reply) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export interface ReplyReaderOptions {
  /** Log prefix, e.g. `FTP` */
  protocol: string;
  logger: Logger;
  /** Every raw line as received, terminator included */
  onLine?: (line: string) => void;
}

const FINAL_LINE = /^(\d{3})(?: (.*))?$/;
const CONTINUED_LINE = /^(\d{3})-(.*)$/;

/**
 * Reads `NNN text` replies (FTP, SMTP) off a control connection.
 *
 * Replies that arrive before anyone asks are queued, so a command can be
 * written and its reply awaited without racing the socket. Multi-line
 * replies (`NNN-` ... `NNN `) are delivered once, when complete.
 */
export class ReplyReader {
  private socket: Socket | null = null;
  private buffer = '';
  private decoder = new StringDecoder('utf8');
  private pendingCode: number | null = null;
  private pendingLines: string[] = [];
  private readonly queue: Reply[] = [];
  private waiter: Waiter | null = null;
  private failure: Error | null = null;

  constructor(private readonly options: ReplyReaderOptions) {}

  /**
   * Start reading from `socket`, releasing any socket read before
   */
  attach(socket: Socket): void {
    this.detach();
    this.socket = socket;
    // Characters split across packets are completed by the next chunk
    this.decoder = new StringDecoder('utf8');
    socket.on('data', this.handleData);
    socket.on('error', this.handleError);
    socket.on('close', this.handleClose);
  }

  detach(): void {
    if (!this.socket) return;
    this.socket.removeListener('data', this.handleData);
    this.socket.removeListener('error', this.handleError);
    this.socket.removeListener('close', this.handleClose);
    this.socket = null;
  }

  /**
   * Next reply, queued or yet to arrive
   *
   * @throws {TimeoutError} when nothing complete arrives within `timeout` ms
   * @throws {ConnectionError} when the connection closes or fails first
   */
  next(timeout: number): Promise<Reply> {
    const queued = this.queue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.waiter) {
      return Promise.reject(new Error('A reply is already awaited'));
    }

    return new Promise<Reply>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new TimeoutError({ phase: 'reply', timeout }));
      }, timeout);
      this.waiter = { resolve, reject, timer };
    });
  }

  private readonly handleData = (chunk: Buffer): void => {
    this.buffer += this.decoder.write(chunk);

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const raw = this.buffer.substring(0, newline + 1);
      this.buffer = this.buffer.substring(newline + 1);
      this.consumeLine(raw);
      newline = this.buffer.indexOf('\n');
    }
  };

  private readonly handleError = (err: Error): void => {
    this.fail(new ConnectionError(`Connection failed: ${err.message}`, {
      code: 'code' in err && typeof err.code === 'string' ? err.code : undefined,
    }));
  };

  private readonly handleClose = (): void => {
    this.fail(new ConnectionError('Connection closed by server', { retriable: true }));
  };

  private consumeLine(raw: string): void {
    this.options.onLine?.(raw);
    const line = raw.replace(/\r?\n$/, '');

    if (this.pendingCode !== null) {
      this.pendingLines.push(line);
      const final = FINAL_LINE.exec(line);
      if (final && parseInt(final[1], 10) === this.pendingCode) {
        this.deliver(this.pendingCode, final[2] ?? '', this.pendingLines);
        this.pendingCode = null;
        this.pendingLines = [];
      }
      return;
    }

    const continued = CONTINUED_LINE.exec(line);
    if (continued) {
      this.pendingCode = parseInt(continued[1], 10);
      this.pendingLines = [line];
      return;
    }

    const final = FINAL_LINE.exec(line);
    if (final) {
      this.deliver(parseInt(final[1], 10), final[2] ?? '', [line]);
    }
    // anything else outside a reply is noise
  }

  private deliver(code: number, message: string, lines: string[]): void {
    const reply: Reply = { code, message, lines };
    this.options.logger.debug(`[${this.options.protocol}] < ${code} ${message}`);

    if (this.waiter) {
      const { resolve, timer } = this.waiter;
      clearTimeout(timer);
      this.waiter = null;
      resolve(reply);
      return;
    }
    this.queue.push(reply);
  }

  private fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;

    if (this.waiter) {
      const { reject, timer } = this.waiter;
      clearTimeout(timer);
      this.waiter = null;
      reject(error);
    }
  }
}
