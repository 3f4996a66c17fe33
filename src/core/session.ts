import { readFile } from 'node:fs/promises';
import type { Agent } from 'undici';
import { FtpClient } from '../protocols/ftp.js';
import { HttpClient } from '../protocols/http.js';
import { SmtpClient } from '../protocols/smtp.js';
import { TelnetClient } from '../protocols/telnet.js';
import { TorClient } from '../protocols/tor.js';
import { FtpEngine } from '../transport/ftp.js';
import { SmtpEngine } from '../transport/smtp.js';
import { TelnetEngine } from '../transport/telnet.js';
import { UndiciEngine, createSessionAgent } from '../transport/undici.js';
import type { Logger } from '../types/logger.js';
import { ConsoleLogger } from '../utils/logger.js';
import { loadConfig, type SessionConfig, type SessionOptions } from './config.js';
import type { SessionContext } from './context.js';
import { ConfigurationError, StateError } from './errors.js';

/**
 * Holds the validated configuration and the shared HTTP dispatcher,
 * and hands out one client per protocol. Close it when done, or use
 * {@link withSession}.
 *
 * @example
 * ```typescript
 * const session = await openSession({ caCertPath: '/etc/ssl/custom.pem' });
 * try {
 *   const res = await session.http.get('https://example.com');
 * } finally {
 *   await session.close();
 * }
 * ```
 */
export class Session implements SessionContext {
  readonly http: HttpClient;
  readonly ftp: FtpClient;
  readonly smtp: SmtpClient;
  readonly telnet: TelnetClient;
  readonly tor: TorClient;

  private closed = false;

  private constructor(
    readonly config: SessionConfig,
    readonly logger: Logger,
    private readonly agent: Agent,
    ca: Buffer | undefined
  ) {
    const { timeout, connectTimeout } = config;

    this.http = new HttpClient(this, new UndiciEngine({
      agent,
      ca,
      timeout,
      connectTimeout,
      followRedirects: config.followRedirects,
      maxRedirects: config.maxRedirects,
      userAgent: config.userAgent,
      logger,
    }));
    this.ftp = new FtpClient(this, new FtpEngine({ ca, timeout, connectTimeout, logger }));
    this.smtp = new SmtpClient(this, new SmtpEngine({ ca, timeout, connectTimeout, logger }));
    this.telnet = new TelnetClient(this, new TelnetEngine({ idleTimeout: config.telnetIdleTimeout, logger }));
    this.tor = new TorClient(this, this.http);
  }

  /**
   * Validate options and load the CA bundle.
   *
   * @throws {ConfigurationError} for invalid options or an unreadable CA bundle
   */
  static async open(options: SessionOptions = {}): Promise<Session> {
    const config = loadConfig(options);
    const logger = config.logger ?? new ConsoleLogger(config.debug ? { level: 'debug' } : {});

    let ca: Buffer | undefined;
    if (config.caCertPath) {
      try {
        ca = await readFile(config.caCertPath);
      } catch (error) {
        throw new ConfigurationError(
          `Unable to read CA bundle ${config.caCertPath}: ${error instanceof Error ? error.message : String(error)}`,
          { configKey: 'caCertPath' }
        );
      }
    }

    const agent = createSessionAgent({ ca, connectTimeout: config.connectTimeout });
    logger.debug(`[Session] opened${config.caCertPath ? ` with CA bundle ${config.caCertPath}` : ''}`);
    return new Session(config, logger, agent, ca);
  }

  /** CA bundle trusted by every TLS connection of this session */
  get caCertPath(): string | undefined {
    return this.config.caCertPath;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  assertOpen(): void {
    if (this.closed) {
      throw new StateError('Session is closed', { expectedState: 'open', actualState: 'closed' });
    }
  }

  /**
   * Release the shared dispatcher. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.agent.close();
    this.logger.debug('[Session] closed');
  }
}

export function openSession(options: SessionOptions = {}): Promise<Session> {
  return Session.open(options);
}

/**
 * Run `fn` with an open session that is closed on every exit path
 *
 * @example
 * ```typescript
 * const listing = await withSession({}, (session) => session.ftp.list('ftp://host/pub/'));
 * ```
 */
export async function withSession<T>(
  options: SessionOptions,
  fn: (session: Session) => Promise<T> | T
): Promise<T> {
  const session = await Session.open(options);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
