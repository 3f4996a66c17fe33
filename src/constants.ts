/**
 * Global constants for wirekit
 * Centralizes magic numbers and configuration defaults
 */

export const VERSION = '0.1.0';
export const DEFAULT_USER_AGENT = `wirekit/${VERSION}`;

// Timeouts
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
export const PING_TIMEOUT_MS = 5000;

// HTTP
export const DEFAULT_MAX_REDIRECTS = 20;

// Tor
export const DEFAULT_TOR_PROXY = 'socks5h://localhost:9050';
export const DEFAULT_TOR_CHECK_URL = 'https://check.torproject.org';

// Telnet
export const DEFAULT_TELNET_TIMEOUT_SECONDS = 30;
export const DEFAULT_TELNET_IDLE_TIMEOUT_MS = 2000;

// Transfer buffers
export const UPLOAD_CHUNK_SIZE = 64 * 1024;

// Default ports
export const DEFAULT_PORTS: Record<string, number> = {
  http: 80,
  https: 443,
  ftp: 21,
  ftps: 990,
  smtp: 25,
  smtps: 465,
  telnet: 23,
};
