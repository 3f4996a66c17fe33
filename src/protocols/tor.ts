import type { SessionContext } from '../core/context.js';
import type { HttpResponse } from '../core/response.js';
import type { HttpClient, HttpPingOptions, HttpPostOptions, HttpRequestOptions } from './http.js';

export type TorRequestOptions = Omit<HttpRequestOptions, 'proxy'>;
export type TorPostOptions = Omit<HttpPostOptions, 'proxy'>;
export type TorPingOptions = Omit<HttpPingOptions, 'proxy'>;

/**
 * The HTTP surface routed through the session's Tor SOCKS proxy
 * (`torProxy`, `socks5h://localhost:9050` unless configured).
 * Names are resolved by the proxy, so `.onion` hosts work.
 */
export class TorClient {
  constructor(
    private readonly context: SessionContext,
    private readonly http: HttpClient
  ) {}

  get proxy(): string {
    return this.context.config.torProxy;
  }

  get(url: string, options: TorRequestOptions = {}): Promise<HttpResponse | null> {
    return this.http.get(url, { ...options, proxy: this.proxy });
  }

  post(url: string, options: TorPostOptions = {}): Promise<HttpResponse | null> {
    return this.http.post(url, { ...options, proxy: this.proxy });
  }

  ping(url: string, options: TorPingOptions = {}): Promise<HttpResponse | null> {
    return this.http.ping(url, { ...options, proxy: this.proxy });
  }

  downloadFile(url: string, outputPath: string, options: TorPostOptions = {}): Promise<HttpResponse | null> {
    return this.http.downloadFile(url, outputPath, { ...options, proxy: this.proxy });
  }

  /**
   * Ping the check URL (`torCheckUrl`) through the proxy; true on a 200
   */
  async isTorRunning(): Promise<boolean> {
    const response = await this.ping(this.context.config.torCheckUrl);
    return response !== null && response.status === 200 && !response.errorMessage;
  }
}
