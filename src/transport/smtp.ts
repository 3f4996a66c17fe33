/**
 * SMTP submission engine on `node:net` / `node:tls`.
 *
 * CONNECT -> EHLO -> (STARTTLS -> EHLO) -> AUTH -> MAIL FROM -> RCPT TO* -> DATA -> QUIT
 *
 * `smtps://` is implicit TLS; `smtp://` upgrades with STARTTLS according
 * to the `tls` policy. The message is pulled from the sink and
 * dot-stuffed on the way out.
 */

import type { Socket } from 'node:net';
import { AuthenticationError, ConfigurationError, ProtocolError, TimeoutError, describeError } from '../core/errors.js';
import { failedResult, type TransferEngine, type TransferResult, type TransferSink } from '../core/transfer.js';
import type { Logger } from '../types/logger.js';
import { maskSecrets } from '../utils/logger.js';
import { DEFAULT_PORTS, UPLOAD_CHUNK_SIZE } from '../constants.js';
import { decodePath } from '../utils/url-path.js';
import { ReplyReader, type Reply } from './reply-reader.js';
import { openSocket, upgradeSocket, writeAsync } from './socket.js';

export type SmtpTlsPolicy = 'required' | 'opportunistic' | 'none';

export interface SmtpRequest {
  /** `smtp://host[:port][/ehlo-name]` or `smtps://…` */
  url: string;
  from: string;
  recipients: string[];
  /** Checked with the envelope; the engine never writes it itself */
  subject?: string;
  username?: string;
  password?: string;
  tls: SmtpTlsPolicy;
  timeout?: number;
}

export interface PreparedSmtpRequest extends SmtpRequest {
  host: string;
  port: number;
  secure: boolean;
  ehloName: string;
}

export interface SmtpEngineOptions {
  ca?: Buffer;
  timeout: number;
  connectTimeout: number;
  logger: Logger;
}

interface Capabilities {
  keywords: Set<string>;
  auth: Set<string>;
}

/**
 * Bare address from `Name <user@host>` or `user@host`
 */
export function extractAddress(value: string): string {
  const match = /<([^>]*)>/.exec(value);
  return (match ? match[1] : value).trim();
}

/**
 * Doubles a leading `.` on every line, across chunk boundaries
 */
export class DotStuffer {
  private atLineStart = true;
  private lastBytes: [number, number] = [0, 0];

  transform(chunk: Buffer): Buffer {
    const out: number[] = [];
    for (const byte of chunk) {
      if (this.atLineStart && byte === 0x2e) {
        out.push(0x2e);
      }
      out.push(byte);
      this.atLineStart = byte === 0x0a;
      this.lastBytes = [this.lastBytes[1], byte];
    }
    return Buffer.from(out);
  }

  /**
   * End-of-data marker, preceded by a CRLF unless the payload ended with one
   */
  finish(): Buffer {
    const endsWithCrlf = this.lastBytes[0] === 0x0d && this.lastBytes[1] === 0x0a;
    return Buffer.from(endsWithCrlf ? '.\r\n' : '\r\n.\r\n', 'ascii');
  }
}

function assertSingleLine(field: string, value: string | undefined): void {
  if (value !== undefined && /[\r\n]/.test(value)) {
    throw new ConfigurationError(`Line break in SMTP ${field}`, { configKey: field });
  }
}

function parseCapabilities(reply: Reply): Capabilities {
  const keywords = new Set<string>();
  const auth = new Set<string>();

  // The first line carries the server's greeting, not a capability
  for (const line of reply.lines.slice(1)) {
    const text = line.substring(4).trim().toUpperCase();
    const [keyword, ...params] = text.split(/[\s=]+/);
    if (!keyword) continue;
    keywords.add(keyword);
    if (keyword === 'AUTH') {
      params.forEach((mechanism) => auth.add(mechanism));
    }
  }

  return { keywords, auth };
}

export class SmtpEngine implements TransferEngine<PreparedSmtpRequest> {
  constructor(private readonly options: SmtpEngineOptions) {}

  /**
   * @throws {ConfigurationError} for URLs that are not `smtp://` or `smtps://`,
   * and for line breaks in the sender, recipients, subject or username
   */
  prepare(request: SmtpRequest): PreparedSmtpRequest {
    assertSingleLine('from', request.from);
    request.recipients.forEach((recipient) => assertSingleLine('to', recipient));
    assertSingleLine('subject', request.subject);
    assertSingleLine('username', request.username);

    let target: URL;
    try {
      target = new URL(request.url);
    } catch {
      throw new ConfigurationError(`Invalid URL: ${request.url}`, { configKey: 'url' });
    }
    if ((target.protocol !== 'smtp:' && target.protocol !== 'smtps:') || !target.hostname) {
      throw new ConfigurationError(`Unsupported SMTP URL: ${request.url}`, { configKey: 'url' });
    }

    const secure = target.protocol === 'smtps:';
    const ehloName = decodePath(target.pathname.replace(/^\//, '')) || 'localhost';

    return {
      ...request,
      host: target.hostname.replace(/^\[|\]$/g, ''),
      port: target.port ? Number(target.port) : DEFAULT_PORTS[secure ? 'smtps' : 'smtp'],
      secure,
      ehloName,
    };
  }

  async perform(request: PreparedSmtpRequest, sink: TransferSink): Promise<TransferResult> {
    const exchange = { status: 0 };
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
      const message = describeError(error, 'SMTP transfer failed');
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
    request: PreparedSmtpRequest,
    sink: TransferSink,
    exchange: { status: number },
    sockets: Socket[]
  ): Promise<void> {
    const replyTimeout = request.timeout ?? this.options.timeout;
    const reader = new ReplyReader({
      protocol: 'SMTP',
      logger: this.options.logger,
      onLine: (line) => sink.onHeaderLine(line),
    });

    let socket = await openSocket({
      host: request.host,
      port: request.port,
      secure: request.secure,
      ca: this.options.ca,
      timeout: this.options.connectTimeout,
    });
    sockets.push(socket);
    reader.attach(socket);

    const read = async (): Promise<Reply> => {
      const reply = await reader.next(replyTimeout);
      exchange.status = reply.code;
      return reply;
    };

    const send = async (command: string, display = maskSecrets(command)): Promise<Reply> => {
      this.debug(`> ${display}`);
      await writeAsync(socket, `${command}\r\n`);
      return read();
    };

    const expect = (reply: Reply, codes: number[], phase: string): void => {
      if (!codes.includes(reply.code)) {
        throw new ProtocolError(`${phase} failed: ${reply.code} ${reply.message}`, {
          protocol: 'smtp', code: reply.code, phase,
        });
      }
    };

    expect(await read(), [220], 'Greeting');

    const hello = async (): Promise<Capabilities> => {
      const ehlo = await send(`EHLO ${request.ehloName}`);
      if (ehlo.code === 250) {
        return parseCapabilities(ehlo);
      }
      expect(await send(`HELO ${request.ehloName}`), [250], 'HELO');
      return { keywords: new Set(), auth: new Set() };
    };

    let capabilities = await hello();

    if (!request.secure && request.tls !== 'none') {
      if (capabilities.keywords.has('STARTTLS')) {
        expect(await send('STARTTLS'), [220], 'STARTTLS');
        reader.detach();
        socket = await upgradeSocket(socket, {
          host: request.host,
          ca: this.options.ca,
          timeout: this.options.connectTimeout,
        });
        sockets.push(socket);
        reader.attach(socket);
        capabilities = await hello();
      } else if (request.tls === 'required') {
        throw new ProtocolError('STARTTLS not supported by server', { protocol: 'smtp', phase: 'STARTTLS' });
      }
    }

    if (request.username && request.password && capabilities.auth.size > 0) {
      await this.authenticate(request.username, request.password, capabilities, send);
    }

    expect(await send(`MAIL FROM:<${extractAddress(request.from)}>`), [250], 'MAIL FROM');
    for (const recipient of request.recipients) {
      expect(await send(`RCPT TO:<${extractAddress(recipient)}>`), [250, 251], 'RCPT TO');
    }
    expect(await send('DATA'), [354], 'DATA');

    const stuffer = new DotStuffer();
    let sent = 0;
    for (;;) {
      const chunk = await sink.onReadRequest(UPLOAD_CHUNK_SIZE);
      if (chunk.length === 0) break;
      sent += chunk.length;
      await writeAsync(socket, stuffer.transform(chunk));
    }
    this.debug(`> (${sent} bytes of message data)`);
    await writeAsync(socket, stuffer.finish());
    expect(await read(), [250], 'Message submission');

    this.debug('> QUIT');
    socket.end('QUIT\r\n');
  }

  private async authenticate(
    username: string,
    password: string,
    capabilities: Capabilities,
    send: (command: string, display?: string) => Promise<Reply>
  ): Promise<void> {
    const encode = (value: string) => Buffer.from(value, 'utf8').toString('base64');

    if (capabilities.auth.has('PLAIN')) {
      const reply = await send(`AUTH PLAIN ${encode(`\0${username}\0${password}`)}`);
      if (reply.code !== 235) {
        throw new AuthenticationError(`Login denied: ${reply.code} ${reply.message}`, { authType: 'PLAIN' });
      }
      return;
    }

    if (capabilities.auth.has('LOGIN')) {
      const start = await send('AUTH LOGIN');
      const user = start.code === 334 ? await send(encode(username), '****') : start;
      const pass = user.code === 334 ? await send(encode(password), '****') : user;
      if (pass.code !== 235) {
        throw new AuthenticationError(`Login denied: ${pass.code} ${pass.message}`, { authType: 'LOGIN' });
      }
      return;
    }

    throw new AuthenticationError(
      `No supported authentication mechanism (server offers ${[...capabilities.auth].join(', ')})`,
      { authType: 'none' }
    );
  }

  private debug(message: string): void {
    this.options.logger.debug(`[SMTP] ${message}`);
  }
}
