import { z } from 'zod';
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_MAX_REDIRECTS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_TELNET_IDLE_TIMEOUT_MS,
  DEFAULT_TOR_CHECK_URL,
  DEFAULT_TOR_PROXY,
  DEFAULT_USER_AGENT,
} from '../constants.js';
import type { Logger } from '../types/logger.js';
import { ConfigurationError } from './errors.js';

function isLogger(value: unknown): value is Logger {
  if (typeof value !== 'object' || value === null) return false;
  return ['debug', 'info', 'warn', 'error'].every(
    (level) => level in value && typeof Reflect.get(value, level) === 'function'
  );
}

export const sessionConfigSchema = z.object({
  /** PEM bundle trusted for every TLS connection of the session */
  caCertPath: z.string().min(1).optional(),
  timeout: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  connectTimeout: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
  userAgent: z.string().default(DEFAULT_USER_AGENT),
  followRedirects: z.boolean().default(true),
  maxRedirects: z.number().int().nonnegative().default(DEFAULT_MAX_REDIRECTS),
  torProxy: z.string().url().default(DEFAULT_TOR_PROXY),
  torCheckUrl: z.string().url().default(DEFAULT_TOR_CHECK_URL),
  smtpTls: z.enum(['required', 'opportunistic', 'none']).default('required'),
  telnetIdleTimeout: z.number().int().positive().default(DEFAULT_TELNET_IDLE_TIMEOUT_MS),
  logger: z.custom<Logger>(isLogger, { message: 'logger must implement debug, info, warn and error' }).optional(),
  debug: z.boolean().default(false),
});

/** What callers pass; every field is optional */
export type SessionOptions = z.input<typeof sessionConfigSchema>;

/** Validated configuration with defaults applied */
export type SessionConfig = Readonly<z.output<typeof sessionConfigSchema>>;

function fromEnvironment(env: NodeJS.ProcessEnv): SessionOptions {
  const options: SessionOptions = {};

  if (env.WIREKIT_CA_CERT) {
    options.caCertPath = env.WIREKIT_CA_CERT;
  }
  if (env.WIREKIT_TIMEOUT) {
    options.timeout = Number(env.WIREKIT_TIMEOUT);
  }
  if (env.WIREKIT_TOR_PROXY) {
    options.torProxy = env.WIREKIT_TOR_PROXY;
  }
  const debug = env.DEBUG ?? '';
  if (debug === '*' || debug.split(',').some((scope) => scope.trim().startsWith('wirekit'))) {
    options.debug = true;
  }

  return options;
}

function withoutUndefined(options: SessionOptions): SessionOptions {
  return Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined));
}

/**
 * Validate session options, layered over `WIREKIT_*` environment
 * variables. Explicit options win.
 *
 * @throws {ConfigurationError} naming the first invalid key
 *
 * @example
 * ```typescript
 * const config = loadConfig({ timeout: 5000 });
 * config.torProxy; // 'socks5h://localhost:9050'
 * ```
 */
export function loadConfig(
  overrides: SessionOptions = {},
  env: NodeJS.ProcessEnv = process.env
): SessionConfig {
  const result = sessionConfigSchema.safeParse({
    ...fromEnvironment(env),
    ...withoutUndefined(overrides),
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue.path.join('.');
    throw new ConfigurationError(`Invalid configuration for "${key}": ${issue.message}`, { configKey: key });
  }

  return Object.freeze(result.data);
}
