import type { Readable } from 'node:stream';
import { Agent, ProxyAgent, errors as undiciErrors, type Dispatcher } from 'undici';
import { ConfigurationError, ProtocolError, TimeoutError, WirekitError, describeError } from '../core/errors.js';
import { failedResult, type TransferEngine, type TransferResult, type TransferSink } from '../core/transfer.js';
import type { Logger } from '../types/logger.js';
import { createSocksAgent, isSocksUrl, parseSocksUrl } from './socks.js';

export type HttpMethod = 'GET' | 'HEAD' | 'POST';

export interface HttpRequest {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: Readable | Buffer | string;
  /** `http://`, `https://` or any SOCKS scheme */
  proxy?: string;
  /** Overall limit in ms, redirects included */
  timeout?: number;
  connectTimeout?: number;
}

export interface PreparedHttpRequest extends HttpRequest {
  target: URL;
  dispatcher: Dispatcher;
  /** Set when the dispatcher was created for this call and must be destroyed after it */
  ownsDispatcher: boolean;
}

export interface UndiciEngineOptions {
  agent: Agent;
  ca?: Buffer;
  timeout: number;
  connectTimeout: number;
  followRedirects: boolean;
  maxRedirects: number;
  userAgent: string;
  logger: Logger;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Shared dispatcher of a session, trusting `ca` when given
 */
export function createSessionAgent(options: { ca?: Buffer; connectTimeout: number }): Agent {
  return new Agent({
    connect: { ca: options.ca, timeout: options.connectTimeout },
  });
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error) {
    if ('code' in error && typeof error.code === 'string') return error.code;
    if (error.cause !== undefined) return errorCode(error.cause);
  }
  return undefined;
}

const CODE_MESSAGES: Record<string, string> = {
  ECONNREFUSED: "Couldn't connect to server",
  ENOTFOUND: "Couldn't resolve host name",
  EAI_AGAIN: "Couldn't resolve host name",
  ECONNRESET: 'Connection reset by peer',
  EPIPE: 'Failed sending data to the peer',
  EHOSTUNREACH: "Couldn't connect to server",
  ENETUNREACH: "Couldn't connect to server",
  DEPTH_ZERO_SELF_SIGNED_CERT: 'SSL peer certificate was not OK',
  SELF_SIGNED_CERT_IN_CHAIN: 'SSL peer certificate was not OK',
  UNABLE_TO_VERIFY_LEAF_SIGNATURE: 'SSL peer certificate was not OK',
  CERT_HAS_EXPIRED: 'SSL peer certificate was not OK',
  ERR_TLS_CERT_ALTNAME_INVALID: 'SSL peer certificate was not OK',
};

/**
 * Short, stable message for anything a dispatch can fail with
 */
export function describeHttpError(error: unknown, timeouts: { connect: number; total: number }): string {
  if (error instanceof WirekitError) {
    return error.message;
  }
  if (error instanceof undiciErrors.ConnectTimeoutError) {
    return new TimeoutError({ phase: 'connect', timeout: timeouts.connect }).message;
  }
  if (error instanceof undiciErrors.HeadersTimeoutError || error instanceof undiciErrors.BodyTimeoutError) {
    return new TimeoutError({ phase: 'transfer', timeout: timeouts.total }).message;
  }

  const code = errorCode(error);
  if (code && CODE_MESSAGES[code]) {
    return CODE_MESSAGES[code];
  }
  return describeError(error, 'HTTP transfer failed');
}

function deleteHeader(headers: Record<string, string>, name: string): void {
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === name) {
      delete headers[key];
    }
  }
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  return Object.keys(headers).some((key) => key.toLowerCase() === name);
}

interface HopRequest {
  url: URL;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: Readable | Buffer | string;
  deadline: number;
  total: number;
}

interface HopOutcome {
  status: number;
  /** Set when the hop is a redirect that will be followed */
  location?: string;
}

/** Last status seen across hops, kept for failures mid-transfer */
interface HopProgress {
  status: number;
}

/**
 * HTTP engine on undici's dispatcher API.
 *
 * Dispatch is used instead of `request()` so header names reach the sink
 * as the server sent them. Redirects are followed here: every hop's
 * status line and headers are replayed to the sink, but only the final
 * hop's body is.
 */
export class UndiciEngine implements TransferEngine<PreparedHttpRequest> {
  constructor(private readonly options: UndiciEngineOptions) {}

  /**
   * Resolve the target URL and dispatcher for a request.
   *
   * @throws {ConfigurationError} when the request can never be dispatched
   * (malformed URL, non-HTTP scheme, unsupported proxy)
   */
  prepare(request: HttpRequest): PreparedHttpRequest {
    let target: URL;
    try {
      target = new URL(request.url);
    } catch {
      throw new ConfigurationError(`Invalid URL: ${request.url}`, { configKey: 'url' });
    }
    if (target.protocol !== 'http:' && target.protocol !== 'https:') {
      throw new ConfigurationError(`Unsupported protocol: ${target.protocol}`, { configKey: 'url' });
    }

    const connectTimeout = request.connectTimeout ?? this.options.connectTimeout;

    if (request.proxy) {
      return { ...request, target, dispatcher: this.createProxyDispatcher(request.proxy, connectTimeout), ownsDispatcher: true };
    }

    if (connectTimeout !== this.options.connectTimeout) {
      return { ...request, target, dispatcher: createSessionAgent({ ca: this.options.ca, connectTimeout }), ownsDispatcher: true };
    }

    return { ...request, target, dispatcher: this.options.agent, ownsDispatcher: false };
  }

  private createProxyDispatcher(proxy: string, connectTimeout: number): Dispatcher {
    if (isSocksUrl(proxy)) {
      return createSocksAgent(parseSocksUrl(proxy), { ca: this.options.ca, connectTimeout });
    }

    if (!/^https?:\/\//i.test(proxy)) {
      throw new ConfigurationError(`Unsupported proxy: ${proxy}`, { configKey: 'proxy' });
    }

    try {
      return new ProxyAgent({
        uri: proxy,
        requestTls: { ca: this.options.ca, timeout: connectTimeout },
        connectTimeout,
      });
    } catch (error) {
      throw new ConfigurationError(
        `Invalid proxy URL: ${proxy} (${describeError(error, 'rejected')})`,
        { configKey: 'proxy' }
      );
    }
  }

  async perform(request: PreparedHttpRequest, sink: TransferSink): Promise<TransferResult> {
    const { logger } = this.options;
    const total = request.timeout ?? this.options.timeout;
    const deadline = Date.now() + total;
    const headers: Record<string, string> = { 'User-Agent': this.options.userAgent, ...request.headers };
    const progress: HopProgress = { status: 0 };

    let url = request.target;
    let method = request.method;
    let body = request.body;

    try {
      for (let hop = 0; ; hop++) {
        logger.debug(`[HTTP] > ${method} ${url.href}`);

        const outcome = await this.dispatchHop(
          request.dispatcher,
          { url, method, headers, body, deadline, total },
          sink,
          progress
        );

        if (outcome.location === undefined) {
          break;
        }

        if (hop >= this.options.maxRedirects) {
          throw new ProtocolError(`Maximum (${this.options.maxRedirects}) redirects followed`, {
            protocol: 'http',
            code: outcome.status,
            phase: 'redirect',
          });
        }

        const next = new URL(outcome.location, url);
        if (outcome.status === 303 || ((outcome.status === 301 || outcome.status === 302) && method === 'POST')) {
          if (method !== 'HEAD') method = 'GET';
          body = undefined;
          deleteHeader(headers, 'content-type');
          deleteHeader(headers, 'content-length');
        }
        if (next.origin !== url.origin) {
          deleteHeader(headers, 'authorization');
        }
        url = next;
      }

      return { ok: true, status: progress.status };
    } catch (error) {
      const message = describeHttpError(error, {
        connect: request.connectTimeout ?? this.options.connectTimeout,
        total,
      });
      logger.debug(`[HTTP] ! ${message}`);
      return failedResult(message, progress.status);
    } finally {
      await this.release(request);
    }
  }

  /**
   * Destroy a dispatcher created by `prepare` for this request alone
   */
  async release(request: PreparedHttpRequest): Promise<void> {
    if (request.ownsDispatcher) {
      await request.dispatcher.destroy();
    }
  }

  private shouldFollow(statusCode: number, location: string | undefined, body: HopRequest['body']): boolean {
    if (!this.options.followRedirects || location === undefined || !REDIRECT_STATUSES.has(statusCode)) {
      return false;
    }
    // A streamed body cannot be sent a second time
    const replayable = body === undefined || typeof body === 'string' || Buffer.isBuffer(body);
    return replayable || (statusCode !== 307 && statusCode !== 308);
  }

  private dispatchHop(
    dispatcher: Dispatcher,
    hop: HopRequest,
    sink: TransferSink,
    progress: HopProgress
  ): Promise<HopOutcome> {
    const { logger } = this.options;
    const remaining = Math.max(1, hop.deadline - Date.now());
    const headers = { ...hop.headers };
    if (typeof hop.body === 'string' && !hasHeader(headers, 'content-length')) {
      headers['Content-Length'] = String(Buffer.byteLength(hop.body));
    }

    return new Promise<HopOutcome>((resolve, reject) => {
      let abort: ((err?: Error) => void) | undefined;
      let settled = false;
      const outcome: HopOutcome = { status: 0 };

      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
        } else {
          resolve(outcome);
        }
      };

      const timer = setTimeout(() => {
        const error = new TimeoutError({ phase: 'operation', timeout: hop.total });
        abort?.(error);
        settle(error);
      }, remaining);

      const handler: Dispatcher.DispatchHandlers = {
        onConnect: (abortRequest) => {
          abort = abortRequest;
        },
        onError: (err) => settle(err),
        onHeaders: (statusCode, rawHeaders, _resume, statusText) => {
          progress.status = statusCode;
          outcome.status = statusCode;
          logger.debug(`[HTTP] < ${statusCode} ${statusText}`);

          let location: string | undefined;
          sink.onHeaderLine(`HTTP/1.1 ${statusCode} ${statusText}\r\n`);
          for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
            const name = rawHeaders[i].toString('latin1');
            const value = rawHeaders[i + 1].toString('latin1');
            if (name.toLowerCase() === 'location') {
              location = value;
            }
            sink.onHeaderLine(`${name}: ${value}\r\n`);
          }
          sink.onHeaderLine('\r\n');

          if (this.shouldFollow(statusCode, location, hop.body)) {
            outcome.location = location;
          }
          return true;
        },
        onData: (chunk) => {
          // Bodies of redirect hops are dropped
          if (outcome.location === undefined) {
            sink.onBodyChunk(chunk);
          }
          return true;
        },
        onComplete: () => settle(),
      };

      dispatcher.dispatch(
        {
          origin: hop.url.origin,
          path: `${hop.url.pathname}${hop.url.search}`,
          method: hop.method,
          headers,
          body: hop.body ?? null,
          headersTimeout: remaining,
          bodyTimeout: remaining,
        },
        handler
      );
    });
  }
}
