/**
 * FTP transfer engine on `node:net` / `node:tls`.
 *
 * One control connection per call: greeting, login, optional quote
 * commands, then at most one passive-mode transfer. Implicit FTPS is
 * selected with the `ftps://` scheme.
 */

import type { Socket } from 'node:net';
import { AuthenticationError, ConfigurationError, ProtocolError, TimeoutError, describeError } from '../core/errors.js';
import { failedResult, type TransferEngine, type TransferResult, type TransferSink } from '../core/transfer.js';
import type { Logger } from '../types/logger.js';
import { maskSecrets } from '../utils/logger.js';
import { DEFAULT_PORTS, UPLOAD_CHUNK_SIZE } from '../constants.js';
import { decodePath } from '../utils/url-path.js';
import { ReplyReader, type Reply } from './reply-reader.js';
import { openSocket, writeAsync } from './socket.js';

const ResponseCode = {
  SERVICE_READY: 220,
  ENTERING_PASSIVE: 227,
  USER_LOGGED_IN: 230,
  NEED_PASSWORD: 331,
  FILE_NOT_FOUND: 550,
} as const;

/**
 * - `list`: long listing (`LIST`)
 * - `nlst`: names only (`NLST`)
 * - `retrieve` / `store`: file download / upload
 * - `none`: login and quote commands only
 */
export type FtpTransferMode = 'list' | 'nlst' | 'retrieve' | 'store' | 'none';

export interface FtpRequest {
  /** `ftp://host[:port]/path` or `ftps://…` */
  url: string;
  mode: FtpTransferMode;
  username?: string;
  password?: string;
  /** Raw commands sent after login, in order; a reply >= 400 fails the call */
  quote?: string[];
  timeout?: number;
}

export interface PreparedFtpRequest extends FtpRequest {
  host: string;
  port: number;
  secure: boolean;
  /** Path relative to the login directory, '' for none */
  path: string;
}

export interface FtpEngineOptions {
  ca?: Buffer;
  timeout: number;
  connectTimeout: number;
  logger: Logger;
}

const PASV_ADDRESS = /\((\d+),(\d+),(\d+),(\d+),(\d+),(\d+)\)/;

/** Outcome tracked across one call; `status` is the last reply code */
interface Exchange {
  status: number;
}

export class FtpEngine implements TransferEngine<PreparedFtpRequest> {
  constructor(private readonly options: FtpEngineOptions) {}

  /**
   * @throws {ConfigurationError} for URLs that are not `ftp://` or `ftps://`
   */
  prepare(request: FtpRequest): PreparedFtpRequest {
    let target: URL;
    try {
      target = new URL(request.url);
    } catch {
      throw new ConfigurationError(`Invalid URL: ${request.url}`, { configKey: 'url' });
    }
    if ((target.protocol !== 'ftp:' && target.protocol !== 'ftps:') || !target.hostname) {
      throw new ConfigurationError(`Unsupported FTP URL: ${request.url}`, { configKey: 'url' });
    }

    const secure = target.protocol === 'ftps:';
    return {
      ...request,
      host: target.hostname.replace(/^\[|\]$/g, ''),
      port: target.port ? Number(target.port) : DEFAULT_PORTS[secure ? 'ftps' : 'ftp'],
      secure,
      path: decodePath(target.pathname.replace(/^\//, '')),
      username: request.username || decodePath(target.username) || undefined,
      password: request.password || decodePath(target.password) || undefined,
    };
  }

  async perform(request: PreparedFtpRequest, sink: TransferSink): Promise<TransferResult> {
    const exchange: Exchange = { status: 0 };
    const sockets: Socket[] = [];
    const total = request.timeout ?? this.options.timeout;
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new TimeoutError({ phase: 'operation', timeout: total })), total);
    });

    try {
      await Promise.race([this.run(request, sink, exchange, sockets), deadline]);
      return { ok: true, status: exchange.status };
    } catch (error) {
      const message = describeError(error, 'FTP transfer failed');
      this.debug(`! ${message}`);
      return failedResult(message, exchange.status);
    } finally {
      clearTimeout(timer);
      for (const socket of sockets) {
        socket.destroy();
      }
    }
  }

  private async run(
    request: PreparedFtpRequest,
    sink: TransferSink,
    exchange: Exchange,
    sockets: Socket[]
  ): Promise<void> {
    const { connectTimeout } = this.options;
    const replyTimeout = request.timeout ?? this.options.timeout;

    const reader = new ReplyReader({
      protocol: 'FTP',
      logger: this.options.logger,
      onLine: (line) => sink.onHeaderLine(line),
    });

    const read = async (): Promise<Reply> => {
      const reply = await reader.next(replyTimeout);
      exchange.status = reply.code;
      return reply;
    };

    const control = await openSocket({
      host: request.host,
      port: request.port,
      secure: request.secure,
      ca: this.options.ca,
      timeout: connectTimeout,
    });
    sockets.push(control);
    reader.attach(control);

    const send = async (command: string): Promise<Reply> => {
      this.debug(`> ${maskSecrets(command)}`);
      await writeAsync(control, `${command}\r\n`);
      return read();
    };

    let greeting = await read();
    while (greeting.code < 200) {
      greeting = await read();
    }
    if (greeting.code !== ResponseCode.SERVICE_READY) {
      throw new ProtocolError(`Server not ready: ${greeting.code} ${greeting.message}`, {
        protocol: 'ftp', code: greeting.code, phase: 'greeting',
      });
    }

    await this.login(request, send);

    if (request.secure) {
      await send('PBSZ 0');
      await send('PROT P');
    }

    for (const command of request.quote ?? []) {
      const reply = await send(command);
      if (reply.code >= 400) {
        throw new ProtocolError('QUOTE command returned error', {
          protocol: 'ftp', code: reply.code, phase: 'quote',
        });
      }
    }

    if (request.mode !== 'none') {
      await this.transfer(request, sink, { send, read, control, sockets });
    }

    // QUIT without waiting for the goodbye
    this.debug('> QUIT');
    control.end('QUIT\r\n');
  }

  private async login(
    request: PreparedFtpRequest,
    send: (command: string) => Promise<Reply>
  ): Promise<void> {
    const user = request.username || 'anonymous';
    const password = request.password || 'ftp@example.com';

    const userReply = await send(`USER ${user}`);
    if (userReply.code === ResponseCode.USER_LOGGED_IN) {
      return;
    }
    if (userReply.code !== ResponseCode.NEED_PASSWORD) {
      throw new AuthenticationError(`Access denied: ${userReply.code}`, { authType: 'ftp' });
    }

    const passReply = await send(`PASS ${password}`);
    if (passReply.code !== ResponseCode.USER_LOGGED_IN) {
      throw new AuthenticationError(`Access denied: ${passReply.code}`, { authType: 'ftp' });
    }
  }

  private async transfer(
    request: PreparedFtpRequest,
    sink: TransferSink,
    channel: {
      send: (command: string) => Promise<Reply>;
      read: () => Promise<Reply>;
      control: Socket;
      sockets: Socket[];
    }
  ): Promise<void> {
    const { send, read, control, sockets } = channel;
    const listing = request.mode === 'list' || request.mode === 'nlst';

    await send(listing ? 'TYPE A' : 'TYPE I');

    const pasv = await send('PASV');
    if (pasv.code !== ResponseCode.ENTERING_PASSIVE) {
      throw new ProtocolError(`PASV failed: ${pasv.code} ${pasv.message}`, {
        protocol: 'ftp', code: pasv.code, phase: 'pasv',
      });
    }
    const match = PASV_ADDRESS.exec(pasv.message);
    if (!match) {
      throw new ProtocolError('Failed to parse PASV response', { protocol: 'ftp', code: pasv.code, phase: 'pasv' });
    }
    // The advertised address is ignored; the data port lives on the control host
    const dataPort = parseInt(match[5], 10) * 256 + parseInt(match[6], 10);
    this.debug(`PASV ${request.host}:${dataPort}`);

    const data = await openSocket({
      host: request.host,
      port: dataPort,
      secure: request.secure,
      ca: this.options.ca,
      timeout: this.options.connectTimeout,
    });
    sockets.push(data);

    const dataDone = new Promise<void>((resolve, reject) => {
      data.on('data', (chunk: Buffer) => {
        sink.onBodyChunk(chunk);
      });
      data.once('error', reject);
      data.once('close', () => resolve());
    });
    // Failures surface through the preliminary reply instead
    dataDone.catch(() => undefined);

    const command = this.transferCommand(request);
    const preliminary = await send(command);
    if (preliminary.code >= 400) {
      data.destroy();
      throw this.transferRejected(request, preliminary);
    }

    if (request.mode === 'store') {
      await this.pump(sink, data);
    }
    await dataDone;

    // A 2xx preliminary reply already completed the transfer
    const final = preliminary.code >= 200 ? preliminary : await read();
    if (final.code >= 400) {
      throw this.transferRejected(request, final);
    }

    if (control.destroyed) {
      throw new ProtocolError('Control connection lost', { protocol: 'ftp', phase: 'transfer' });
    }
  }

  private transferCommand(request: PreparedFtpRequest): string {
    switch (request.mode) {
      case 'list':
        return request.path ? `LIST ${request.path}` : 'LIST';
      case 'nlst':
        return request.path ? `NLST ${request.path}` : 'NLST';
      case 'retrieve':
        return `RETR ${request.path}`;
      case 'store':
        return `STOR ${request.path}`;
      case 'none':
        return 'NOOP';
    }
  }

  private transferRejected(request: PreparedFtpRequest, reply: Reply): ProtocolError {
    const message = request.mode === 'retrieve' && reply.code === ResponseCode.FILE_NOT_FOUND
      ? 'Remote file not found'
      : `${this.transferCommand(request).split(' ')[0]} failed: ${reply.code} ${reply.message}`;

    return new ProtocolError(message, { protocol: 'ftp', code: reply.code, phase: 'transfer' });
  }

  /**
   * Feed an upload from the sink until it signals the end
   */
  private async pump(sink: TransferSink, data: Socket): Promise<void> {
    for (;;) {
      const chunk = await sink.onReadRequest(UPLOAD_CHUNK_SIZE);
      if (chunk.length === 0) break;

      if (!data.write(chunk)) {
        await new Promise<void>((resolve, reject) => {
          const onDrain = () => {
            data.removeListener('close', onClose);
            resolve();
          };
          const onClose = () => {
            data.removeListener('drain', onDrain);
            reject(new ProtocolError('Data connection closed during upload', { protocol: 'ftp', phase: 'transfer' }));
          };
          data.once('drain', onDrain);
          data.once('close', onClose);
        });
      }
    }
    data.end();
  }

  private debug(message: string): void {
    this.options.logger.debug(`[FTP] ${message}`);
  }
}
