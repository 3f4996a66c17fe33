import { performance } from 'node:perf_hooks';
import { PING_TIMEOUT_MS } from '../constants.js';
import type { SessionContext } from '../core/context.js';
import { ConfigurationError, LocalFileError } from '../core/errors.js';
import {
  FileBody,
  HttpResponseBuilder,
  emptyHttpResponse,
  type HttpResponse,
} from '../core/response.js';
import type { HttpMethod, HttpRequest, PreparedHttpRequest, UndiciEngine } from '../transport/undici.js';
import { formatCookieHeader } from '../utils/header-parser.js';
import { assembleFormData, verifyReadable } from '../utils/multipart.js';

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  /** Sent as a single `Cookie: a=b; c=d` header */
  cookies?: Record<string, string>;
  /** `http://`, `https://` or SOCKS proxy URL */
  proxy?: string;
  /** Basic auth is used only when both username and password are non-empty */
  username?: string;
  password?: string;
  /** Overall limit in ms; defaults to the session timeout */
  timeout?: number;
}

export interface HttpPostOptions extends HttpRequestOptions {
  /** Text fields, one part each */
  form?: Record<string, string>;
  /** Field name -> local file path, streamed from disk */
  files?: Record<string, string>;
}

export type HttpPingOptions = Pick<HttpRequestOptions, 'proxy' | 'username' | 'password'>;

export function basicAuthorization(username?: string, password?: string): string | undefined {
  if (!username || !password) {
    return undefined;
  }
  return `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
}

function withoutHeader(headers: Record<string, string>, name: string): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).filter(([key]) => key.toLowerCase() !== name)
  );
}

/**
 * HTTP operations of a session.
 *
 * Every operation resolves to `null` when the request cannot be set up
 * (bad URL, unsupported proxy); otherwise to an {@link HttpResponse}
 * whose `errorMessage` tells success from failure. Nothing is thrown.
 *
 * @example
 * ```typescript
 * const res = await session.http.get('https://example.com', {
 *   headers: { Accept: 'text/html' },
 *   cookies: { session: 'abc' },
 * });
 * if (res && !res.errorMessage) console.log(res.status, res.content);
 * ```
 */
export class HttpClient {
  constructor(
    private readonly context: SessionContext,
    private readonly engine: UndiciEngine
  ) {}

  async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse | null> {
    return this.execute('GET', url, options, new HttpResponseBuilder());
  }

  /**
   * Multipart form post. Files are checked before anything is sent.
   */
  async post(url: string, options: HttpPostOptions = {}): Promise<HttpResponse | null> {
    return this.execute('POST', url, options, new HttpResponseBuilder(), {
      form: options.form ?? {},
      files: options.files ?? {},
    });
  }

  /**
   * HEAD probe limited to 5 seconds; `content` is the elapsed time as
   * `"<ms> ms"`.
   */
  async ping(url: string, options: HttpPingOptions = {}): Promise<HttpResponse | null> {
    const started = performance.now();
    const response = await this.execute(
      'HEAD',
      url,
      { ...options, timeout: PING_TIMEOUT_MS },
      new HttpResponseBuilder(),
      undefined,
      PING_TIMEOUT_MS
    );

    if (response && !response.errorMessage) {
      response.content = `${Math.floor(performance.now() - started)} ms`;
    }
    return response;
  }

  /**
   * Stream the body into `outputPath`. With `form` or `files` the request
   * is a multipart POST, otherwise a GET. The file is created before any
   * connection is made; `content` stays empty.
   */
  async downloadFile(
    url: string,
    outputPath: string,
    options: HttpPostOptions = {}
  ): Promise<HttpResponse | null> {
    const hasForm = Object.keys(options.form ?? {}).length > 0 || Object.keys(options.files ?? {}).length > 0;
    const form = hasForm ? { form: options.form ?? {}, files: options.files ?? {} } : undefined;

    return this.execute(hasForm ? 'POST' : 'GET', url, options, async () => {
      const body = await FileBody.open(outputPath);
      return new HttpResponseBuilder(body);
    }, form);
  }

  private async execute(
    method: HttpMethod,
    url: string,
    options: HttpRequestOptions,
    builder: HttpResponseBuilder | (() => Promise<HttpResponseBuilder>),
    form?: { form: Record<string, string>; files: Record<string, string> },
    connectTimeout?: number
  ): Promise<HttpResponse | null> {
    this.context.assertOpen();
    const { logger } = this.context;

    let prepared: PreparedHttpRequest;
    try {
      prepared = this.engine.prepare(this.buildRequest(method, url, options, connectTimeout));
    } catch (error) {
      if (error instanceof ConfigurationError) {
        logger.warn(`[HTTP] ${method} ${url}: ${error.message}`);
        return null;
      }
      throw error;
    }

    let sink: HttpResponseBuilder;
    try {
      if (form) {
        await verifyReadable(Object.values(form.files));
      }
      sink = typeof builder === 'function' ? await builder() : builder;
    } catch (error) {
      await this.engine.release(prepared);
      if (error instanceof LocalFileError) {
        logger.warn(`[HTTP] ${method} ${url}: ${error.message}`);
        return { ...emptyHttpResponse(), errorMessage: error.message };
      }
      throw error;
    }

    if (form) {
      const assembled = assembleFormData(form.form, form.files);
      prepared.headers = {
        ...withoutHeader(prepared.headers ?? {}, 'content-type'),
        'Content-Type': assembled.contentType,
      };
      prepared.body = assembled.body;
    }

    const result = await this.engine.perform(prepared, sink);
    const response = await sink.finish(result);
    if (response.errorMessage) {
      logger.warn(`[HTTP] ${method} ${url} failed: ${response.errorMessage}`);
    }
    return response;
  }

  private buildRequest(
    method: HttpMethod,
    url: string,
    options: HttpRequestOptions,
    connectTimeout?: number
  ): HttpRequest {
    const headers: Record<string, string> = { ...options.headers };

    const cookies = formatCookieHeader(options.cookies ?? {});
    if (cookies) {
      headers.Cookie = cookies;
    }

    const authorization = basicAuthorization(options.username, options.password);
    if (authorization) {
      headers.Authorization = authorization;
    }

    return {
      url,
      method,
      headers,
      proxy: options.proxy || undefined,
      timeout: options.timeout,
      connectTimeout,
    };
  }
}
