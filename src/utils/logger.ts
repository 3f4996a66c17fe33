import type { Logger, LogLevel } from '../types/logger.js';

export interface ConsoleLoggerOptions {
  level?: LogLevel | 'none';
  prefix?: string;
  timestamp?: boolean;
  colors?: boolean;
  env?: NodeJS.ProcessEnv;
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

const levels: Record<LogLevel | 'none', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 999,
};

/**
 * Colored console logger used when the session is not given one.
 * Silent unless DEBUG mentions wirekit (or `level` is set explicitly).
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel | 'none';
  private prefix: string;
  private useTimestamp: boolean;
  private useColors: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    const env = options.env ?? process.env;
    this.level = options.level ?? detectLogLevel(env);
    this.prefix = options.prefix ?? 'wirekit';
    this.useTimestamp = options.timestamp !== false;
    this.useColors = options.colors !== false && supportsColors(env);
  }

  get currentLevel(): LogLevel | 'none' {
    return this.level;
  }

  debug(msgOrObj: string | object, ...args: unknown[]): void {
    this.log('debug', msgOrObj, args);
  }

  info(msgOrObj: string | object, ...args: unknown[]): void {
    this.log('info', msgOrObj, args);
  }

  warn(msgOrObj: string | object, ...args: unknown[]): void {
    this.log('warn', msgOrObj, args, 'yellow');
  }

  error(msgOrObj: string | object, ...args: unknown[]): void {
    this.log('error', msgOrObj, args, 'red');
  }

  private shouldLog(level: LogLevel): boolean {
    return levels[level] >= levels[this.level];
  }

  private colorize(text: string, color: keyof typeof colors): string {
    if (!this.useColors) return text;
    return `${colors[color]}${text}${colors.reset}`;
  }

  private formatTimestamp(): string {
    if (!this.useTimestamp) return '';
    const time = new Date().toTimeString().split(' ')[0];
    return this.colorize(`[${time}]`, 'gray') + ' ';
  }

  private log(level: LogLevel, msgOrObj: string | object, args: unknown[], color?: keyof typeof colors): void {
    if (!this.shouldLog(level)) return;

    const prefix = `${this.formatTimestamp()}${this.colorize(`[${this.prefix}]`, 'cyan')}`;

    if (typeof msgOrObj === 'string') {
      const message = color ? this.colorize(msgOrObj, color) : msgOrObj;
      console.log(`${prefix} ${message}`, ...args);
      return;
    }

    // Pino-style (obj, message, ...args)
    const [message, ...rest] = args;
    console.log(`${prefix} ${typeof message === 'string' ? message : ''}`, ...rest, msgOrObj);
  }
}

function detectLogLevel(env: NodeJS.ProcessEnv): LogLevel | 'none' {
  const debug = env.DEBUG ?? '';
  if (debug === '*' || debug.includes('wirekit')) {
    return 'debug';
  }
  return 'none';
}

function supportsColors(env: NodeJS.ProcessEnv): boolean {
  return Boolean(process.stdout.isTTY) && !env.NO_COLOR && env.TERM !== 'dumb';
}

/**
 * Hide credentials in commands before they reach the log
 */
export function maskSecrets(command: string): string {
  if (/^PASS /i.test(command)) return 'PASS ****';
  if (/^AUTH PLAIN /i.test(command)) return 'AUTH PLAIN ****';
  return command;
}
