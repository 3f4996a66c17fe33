/**
 * Telnet engine (RFC 854/855) on `node:net`, optionally through a SOCKS
 * tunnel.
 *
 * Inbound bytes are split into protocol commands, answered on the spot,
 * and text, handed to the sink. Queued commands are written once the
 * banner (and the login exchange, when credentials are given) has
 * arrived. The call ends when the server closes, when it goes quiet for
 * the idle period after the last command, or on the overall timeout.
 */

import type { Socket } from 'node:net';
import { DEFAULT_PORTS } from '../constants.js';
import { ConfigurationError, TimeoutError, describeError } from '../core/errors.js';
import type { TransferEngine, TransferResult, TransferSink } from '../core/transfer.js';
import type { Logger } from '../types/logger.js';
import { openSocket } from './socket.js';
import { isSocksUrl, openSocksTunnel, parseSocksUrl, type SocksEndpoint } from './socks.js';

/** Interpret As Command - escape byte for telnet commands */
const IAC = 255;

const CMD = {
  SE: 240,
  SB: 250,
  WILL: 251,
  WONT: 252,
  DO: 253,
  DONT: 254,
} as const;

const OPT = {
  BINARY: 0,
  ECHO: 1,
  SGA: 3,
  TTYPE: 24,
  XDISPLOC: 35,
  NEW_ENVIRON: 39,
} as const;

/** Subnegotiation verbs */
const SUB = {
  IS: 0,
  SEND: 1,
} as const;

/** NEW-ENVIRON type codes */
const ENV = {
  VAR: 0,
  VALUE: 1,
} as const;

export interface TelnetOptions {
  terminalType?: string;
  displayLocation?: string;
  environment: Array<[string, string]>;
}

/**
 * Parse `TTYPE=<term>`, `XDISPLOC=<display>` and `NEW_ENV=<name>,<value>`
 *
 * @throws {ConfigurationError} for anything else
 */
export function parseTelnetOptions(options: string[]): TelnetOptions {
  const parsed: TelnetOptions = { environment: [] };

  for (const option of options) {
    const equals = option.indexOf('=');
    const keyword = equals === -1 ? option : option.substring(0, equals);
    const value = equals === -1 ? '' : option.substring(equals + 1);

    switch (keyword.toUpperCase()) {
      case 'TTYPE':
        parsed.terminalType = value;
        break;
      case 'XDISPLOC':
        parsed.displayLocation = value;
        break;
      case 'NEW_ENV': {
        const comma = value.indexOf(',');
        if (comma === -1) {
          throw new ConfigurationError(`Syntax error in telnet option: ${option}`, { configKey: 'telnetOptions' });
        }
        parsed.environment.push([value.substring(0, comma), value.substring(comma + 1)]);
        break;
      }
      default:
        throw new ConfigurationError(`Unknown telnet option ${option}`, { configKey: 'telnetOptions' });
    }
  }

  return parsed;
}

/**
 * Escape IAC bytes in outbound text
 */
export function escapeIac(data: Buffer): Buffer {
  if (!data.includes(IAC)) return data;
  const out: number[] = [];
  for (const byte of data) {
    out.push(byte);
    if (byte === IAC) out.push(IAC);
  }
  return Buffer.from(out);
}

/**
 * Splits inbound bytes into text and option negotiation, producing the
 * replies a client owes the server. Incomplete sequences are held until
 * the next call.
 */
export class TelnetNegotiator {
  private pending = Buffer.alloc(0);
  private readonly localOptions = new Set<number>();
  private readonly remoteOptions = new Set<number>();

  constructor(
    private readonly options: TelnetOptions,
    private readonly debug: (message: string) => void = () => {}
  ) {}

  process(data: Buffer): { text: Buffer; replies: Buffer[] } {
    const buffer = this.pending.length > 0 ? Buffer.concat([this.pending, data]) : data;
    const text: number[] = [];
    const replies: Buffer[] = [];
    let i = 0;

    while (i < buffer.length) {
      if (buffer[i] !== IAC) {
        text.push(buffer[i]);
        i++;
        continue;
      }

      if (i + 1 >= buffer.length) break;
      const cmd = buffer[i + 1];

      if (cmd === IAC) {
        // Escaped IAC (0xFF 0xFF -> 0xFF)
        text.push(IAC);
        i += 2;
      } else if (cmd === CMD.SB) {
        const end = this.findSubnegotiationEnd(buffer, i + 2);
        if (end === -1) break;
        const reply = this.handleSubnegotiation(buffer.subarray(i + 2, end));
        if (reply) replies.push(reply);
        i = end + 2;
      } else if (cmd >= CMD.WILL && cmd <= CMD.DONT) {
        if (i + 2 >= buffer.length) break;
        const reply = this.handleNegotiation(cmd, buffer[i + 2]);
        if (reply) replies.push(reply);
        i += 3;
      } else {
        // NOP, GA, DM and friends carry nothing for us
        i += 2;
      }
    }

    this.pending = Buffer.from(buffer.subarray(i));
    return { text: Buffer.from(text), replies };
  }

  private findSubnegotiationEnd(buffer: Buffer, start: number): number {
    for (let i = start; i < buffer.length - 1; i++) {
      if (buffer[i] === IAC && buffer[i + 1] === CMD.SE) {
        return i;
      }
    }
    return -1;
  }

  private shouldEnableOption(option: number): boolean {
    switch (option) {
      case OPT.TTYPE:
        return this.options.terminalType !== undefined;
      case OPT.XDISPLOC:
        return this.options.displayLocation !== undefined;
      case OPT.NEW_ENVIRON:
        return this.options.environment.length > 0;
      case OPT.SGA:
      case OPT.BINARY:
        return true;
      default:
        return false;
    }
  }

  private shouldAcceptOption(option: number): boolean {
    switch (option) {
      case OPT.ECHO:
      case OPT.SGA:
      case OPT.BINARY:
        return true;
      default:
        return false;
    }
  }

  private handleNegotiation(command: number, option: number): Buffer | null {
    this.debug(`< IAC ${command} ${option}`);

    switch (command) {
      case CMD.DO:
        if (this.localOptions.has(option)) return null;
        if (this.shouldEnableOption(option)) {
          this.localOptions.add(option);
          return Buffer.from([IAC, CMD.WILL, option]);
        }
        return Buffer.from([IAC, CMD.WONT, option]);

      case CMD.DONT:
        if (!this.localOptions.delete(option)) return null;
        return Buffer.from([IAC, CMD.WONT, option]);

      case CMD.WILL:
        if (this.remoteOptions.has(option)) return null;
        if (this.shouldAcceptOption(option)) {
          this.remoteOptions.add(option);
          return Buffer.from([IAC, CMD.DO, option]);
        }
        return Buffer.from([IAC, CMD.DONT, option]);

      case CMD.WONT:
        if (!this.remoteOptions.delete(option)) return null;
        return Buffer.from([IAC, CMD.DONT, option]);

      default:
        return null;
    }
  }

  private handleSubnegotiation(data: Buffer): Buffer | null {
    if (data.length < 2 || data[1] !== SUB.SEND) return null;
    const option = data[0];

    switch (option) {
      case OPT.TTYPE:
        if (this.options.terminalType === undefined) return null;
        return this.subnegotiation(option, [SUB.IS, ...Buffer.from(this.options.terminalType)]);

      case OPT.XDISPLOC:
        if (this.options.displayLocation === undefined) return null;
        return this.subnegotiation(option, [SUB.IS, ...Buffer.from(this.options.displayLocation)]);

      case OPT.NEW_ENVIRON: {
        const payload: number[] = [SUB.IS];
        for (const [name, value] of this.options.environment) {
          payload.push(ENV.VAR, ...Buffer.from(name), ENV.VALUE, ...Buffer.from(value));
        }
        return this.subnegotiation(option, payload);
      }

      default:
        return null;
    }
  }

  private subnegotiation(option: number, payload: number[]): Buffer {
    this.debug(`> IAC SB ${option} (${payload.length} bytes)`);
    return Buffer.concat([
      Buffer.from([IAC, CMD.SB, option]),
      escapeIac(Buffer.from(payload)),
      Buffer.from([IAC, CMD.SE]),
    ]);
  }
}

export interface TelnetRequest {
  /** `telnet://host[:port]` */
  url: string;
  commands: string[];
  options: TelnetOptions;
  /** SOCKS proxy URL */
  proxy?: string;
  username?: string;
  password?: string;
  /** Overall and connect limit in ms */
  timeout: number;
}

export interface PreparedTelnetRequest extends TelnetRequest {
  host: string;
  port: number;
  socks?: SocksEndpoint;
}

export interface TelnetEngineOptions {
  /** Quiet period after the last command that ends the call, in ms */
  idleTimeout: number;
  logger: Logger;
  loginPrompt?: RegExp;
  passwordPrompt?: RegExp;
}

export class TelnetEngine implements TransferEngine<PreparedTelnetRequest> {
  private readonly loginPrompt: RegExp;
  private readonly passwordPrompt: RegExp;

  constructor(private readonly options: TelnetEngineOptions) {
    this.loginPrompt = options.loginPrompt ?? /login[: ]*$/i;
    this.passwordPrompt = options.passwordPrompt ?? /password[: ]*$/i;
  }

  /**
   * @throws {ConfigurationError} for non-telnet URLs and non-SOCKS proxies
   */
  prepare(request: TelnetRequest): PreparedTelnetRequest {
    let target: URL;
    try {
      target = new URL(request.url);
    } catch {
      throw new ConfigurationError(`Invalid URL: ${request.url}`, { configKey: 'url' });
    }
    if (target.protocol !== 'telnet:' || !target.hostname) {
      throw new ConfigurationError(`Unsupported telnet URL: ${request.url}`, { configKey: 'url' });
    }

    let socks: SocksEndpoint | undefined;
    if (request.proxy) {
      if (!isSocksUrl(request.proxy)) {
        throw new ConfigurationError(`Unsupported proxy for telnet: ${request.proxy}`, { configKey: 'proxy' });
      }
      socks = parseSocksUrl(request.proxy);
    }

    return {
      ...request,
      host: target.hostname.replace(/^\[|\]$/g, ''),
      port: target.port ? Number(target.port) : DEFAULT_PORTS.telnet,
      socks,
    };
  }

  async perform(request: PreparedTelnetRequest, sink: TransferSink): Promise<TransferResult> {
    let socket: Socket;
    try {
      socket = request.socks
        ? await openSocksTunnel(request.socks, { host: request.host, port: request.port }, request.timeout)
        : await openSocket({ host: request.host, port: request.port, timeout: request.timeout });
    } catch (error) {
      const message = describeError(error, 'Telnet connection failed');
      this.debug(`! ${message}`);
      return { ok: false, status: 0, error: message };
    }

    try {
      return await this.converse(socket, request, sink);
    } finally {
      socket.destroy();
    }
  }

  private converse(socket: Socket, request: PreparedTelnetRequest, sink: TransferSink): Promise<TransferResult> {
    const negotiator = new TelnetNegotiator(request.options, (message) => this.debug(message));
    const wantsLogin = Boolean(request.username && request.password);

    return new Promise<TransferResult>((resolve) => {
      let loginState: 'username' | 'password' | 'done' = wantsLogin ? 'username' : 'done';
      let transcript = '';
      let commandsSent = false;
      let finished = false;
      let idleTimer: NodeJS.Timeout | undefined;

      const finish = (result: TransferResult) => {
        if (finished) return;
        finished = true;
        clearTimeout(idleTimer);
        clearTimeout(overallTimer);
        socket.removeAllListeners('data');
        resolve(result);
      };

      const write = (data: Buffer) => {
        if (!socket.destroyed) socket.write(data);
      };

      const sendCommands = () => {
        if (commandsSent) return;
        commandsSent = true;
        for (const command of request.commands) {
          this.debug(`> ${command}`);
          write(escapeIac(Buffer.from(`${command}\r\n`, 'utf8')));
        }
      };

      const armIdle = () => {
        clearTimeout(idleTimer);
        idleTimer = setTimeout(() => {
          if (!commandsSent) {
            sendCommands();
            armIdle();
            return;
          }
          this.debug('idle, closing');
          finish({ ok: true, status: 0 });
        }, this.options.idleTimeout);
      };

      const handleLogin = () => {
        if (loginState === 'username' && this.loginPrompt.test(transcript)) {
          this.debug(`> ${request.username ?? ''}`);
          write(Buffer.from(`${request.username ?? ''}\r\n`, 'utf8'));
          loginState = 'password';
          transcript = '';
        } else if (loginState === 'password' && this.passwordPrompt.test(transcript)) {
          this.debug('> ****');
          write(Buffer.from(`${request.password ?? ''}\r\n`, 'utf8'));
          loginState = 'done';
          transcript = '';
        }
      };

      const overallTimer = setTimeout(() => {
        finish({
          ok: false,
          status: 0,
          error: new TimeoutError({ phase: 'operation', timeout: request.timeout }).message,
        });
      }, request.timeout);

      socket.on('data', (chunk: Buffer) => {
        const { text, replies } = negotiator.process(chunk);
        for (const reply of replies) {
          write(reply);
        }

        if (text.length > 0) {
          sink.onBodyChunk(text);

          if (loginState !== 'done') {
            transcript = `${transcript}${text.toString('utf8').replace(/\x00/g, '')}`.trimEnd();
            handleLogin();
          } else {
            sendCommands();
          }
        }
        armIdle();
      });

      socket.once('close', () => finish({ ok: true, status: 0 }));
      socket.on('error', (err) => {
        finish({ ok: false, status: 0, error: `Connection failed: ${err.message}` });
      });

      armIdle();
    });
  }

  private debug(message: string): void {
    this.options.logger.debug(`[Telnet] ${message}`);
  }
}
