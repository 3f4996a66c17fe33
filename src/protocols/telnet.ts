import { readFile } from 'node:fs/promises';
import { DEFAULT_TELNET_TIMEOUT_SECONDS } from '../constants.js';
import type { SessionContext } from '../core/context.js';
import { ConfigurationError } from '../core/errors.js';
import { TelnetResponseBuilder, type TelnetResponse } from '../core/response.js';
import {
  parseTelnetOptions,
  type PreparedTelnetRequest,
  type TelnetEngine,
  type TelnetOptions,
} from '../transport/telnet.js';
import { splitLines } from '../utils/lines.js';

export interface TelnetCallOptions {
  /** SOCKS proxy URL */
  proxy?: string;
  /** Login is automated only when both username and password are set */
  username?: string;
  password?: string;
  /**
   * Connect and overall limit, in seconds
   * @default 30
   */
  timeout?: number;
}

/**
 * Telnet sessions that send a fixed list of lines and collect whatever
 * the remote end prints until it closes the connection or goes quiet.
 *
 * @example
 * ```typescript
 * const res = await session.telnet.command('telnet://router.local', ['show version', 'exit'], {
 *   username: 'admin',
 *   password: 'test-secret',
 * });
 * ```
 */
export class TelnetClient {
  constructor(
    private readonly context: SessionContext,
    private readonly engine: TelnetEngine
  ) {}

  /**
   * Banner only
   */
  connect(url: string, options: TelnetCallOptions = {}): Promise<TelnetResponse | null> {
    return this.command(url, [], options);
  }

  quote(url: string, command: string, options: TelnetCallOptions = {}): Promise<TelnetResponse | null> {
    return this.command(url, [command], options);
  }

  command(url: string, commands: string[], options: TelnetCallOptions = {}): Promise<TelnetResponse | null> {
    return this.execute(url, commands, { environment: [] }, options);
  }

  /**
   * Send the non-empty lines of a local file
   */
  async script(url: string, scriptPath: string, options: TelnetCallOptions = {}): Promise<TelnetResponse | null> {
    let text: string;
    try {
      text = await readFile(scriptPath, 'utf8');
    } catch {
      const errorMessage = `unable to open script file: ${scriptPath}`;
      this.context.logger.warn(`[Telnet] ${errorMessage}`);
      return { errorMessage, content: '' };
    }
    return this.command(url, splitLines(text), options);
  }

  /**
   * Like {@link command}, negotiating the given options first:
   * `TTYPE=<term>`, `XDISPLOC=<display>`, `NEW_ENV=<name>,<value>`.
   */
  async execWithOptions(
    url: string,
    telnetOptions: string[],
    commands: string[],
    options: TelnetCallOptions = {}
  ): Promise<TelnetResponse | null> {
    let negotiation: TelnetOptions;
    try {
      negotiation = parseTelnetOptions(telnetOptions);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.context.logger.warn(`[Telnet] ${error.message}`);
        return { errorMessage: error.message, content: '' };
      }
      throw error;
    }
    return this.execute(url, commands, negotiation, options);
  }

  private async execute(
    url: string,
    commands: string[],
    negotiation: TelnetOptions,
    options: TelnetCallOptions
  ): Promise<TelnetResponse | null> {
    this.context.assertOpen();
    const { logger } = this.context;

    let prepared: PreparedTelnetRequest;
    try {
      prepared = this.engine.prepare({
        url,
        commands,
        options: negotiation,
        proxy: options.proxy || undefined,
        username: options.username,
        password: options.password,
        timeout: (options.timeout ?? DEFAULT_TELNET_TIMEOUT_SECONDS) * 1000,
      });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        logger.warn(`[Telnet] ${url}: ${error.message}`);
        return null;
      }
      throw error;
    }

    const sink = new TelnetResponseBuilder();
    const response = sink.finish(await this.engine.perform(prepared, sink));
    if (response.errorMessage) {
      logger.warn(`[Telnet] ${url} failed: ${response.errorMessage}`);
    }
    return response;
  }
}
