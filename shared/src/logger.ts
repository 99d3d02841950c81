/**
 * Logging utilities for mediabridge plugins
 */

import type { LogLevel } from './types.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export type LogFormat = 'pretty' | 'json';

type OutputLevel = LogLevel | 'success';

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export class Logger {
  private name: string;
  private level: LogLevel;
  private useColors: boolean;
  private format: LogFormat;

  constructor(name: string, level: LogLevel = 'info', useColors = true, format: LogFormat = 'pretty') {
    this.name = name;
    this.level = level;
    this.format = format;
    this.useColors = useColors && format === 'pretty' && process.stdout.isTTY === true;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private colorize(text: string, color: keyof typeof COLORS): string {
    if (!this.useColors) return text;
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }

  private formatMessage(level: OutputLevel, message: string, meta?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();

    if (this.format === 'json') {
      return JSON.stringify({ timestamp, level, logger: this.name, message, ...meta });
    }

    let output = `${this.colorize(timestamp, 'gray')} ${this.formatLevel(level)} ${this.colorize(`[${this.name}]`, 'cyan')} ${message}`;

    if (meta && Object.keys(meta).length > 0) {
      output += ` ${this.colorize(JSON.stringify(meta), 'gray')}`;
    }

    return output;
  }

  private formatLevel(level: OutputLevel): string {
    const colors: Record<OutputLevel, keyof typeof COLORS> = {
      debug: 'gray',
      info: 'blue',
      warn: 'yellow',
      error: 'red',
      success: 'green',
    };

    const labels: Record<OutputLevel, string> = {
      debug: 'DEBUG',
      info: 'INFO ',
      warn: 'WARN ',
      error: 'ERROR',
      success: 'OK   ',
    };

    return this.colorize(labels[level], colors[level]);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.log(this.formatMessage('debug', message, meta));
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.formatMessage('info', message, meta));
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, meta));
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, meta));
    }
  }

  success(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.formatMessage('success', message, meta));
    }
  }

  child(name: string): Logger {
    return new Logger(`${this.name}:${name}`, this.level, this.useColors, this.format);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

export function createLogger(name: string, level?: LogLevel): Logger {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  const format: LogFormat = process.env.LOG_FORMAT === 'json' ? 'json' : 'pretty';
  return new Logger(name, level ?? (isLogLevel(envLevel) ? envLevel : 'info'), true, format);
}
