/**
 * Structured Logger with Winston
 *
 * Features:
 * - Log levels (error, warn, info, debug)
 * - File logging with daily rotation
 * - Console output for development
 * - Telegram alerts for critical errors
 * - Child loggers carrying context (symbol, orderId, ...)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import TelegramBot from 'node-telegram-bot-api';
import * as path from 'path';
import * as fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  /** Service name (backtest, live, optimizer) */
  service: string;
  level?: LogLevel;
  /** Enable console output */
  console?: boolean;
  /** Enable file logging */
  file?: boolean;
  logDir?: string;
  /** Drop every record (tests) */
  silent?: boolean;
  telegramToken?: string;
  telegramChatId?: string;
  /** Only alert on these levels */
  telegramLevels?: LogLevel[];
}

export type LogContext = Record<string, unknown>;

export interface TelegramSink {
  bot: TelegramBot;
  chatId: string;
  levels: ReadonlySet<LogLevel>;
}

const LEVEL_EMOJI: Record<LogLevel, string> = {
  error: '🔴',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🐛',
};

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function buildWinston(config: LoggerConfig): winston.Logger {
  const transports: winston.transport[] = [];
  const silent = config.silent === true;

  const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
    winston.format.json()
  );

  const consoleFormat = winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${metaStr}`;
    })
  );

  if (!silent && config.console !== false) {
    transports.push(new winston.transports.Console({ format: consoleFormat }));
  }

  if (!silent && config.file === true) {
    const logDir = config.logDir ?? path.join(process.cwd(), 'logs', config.service);
    fs.mkdirSync(logDir, { recursive: true });

    transports.push(
      new DailyRotateFile({
        filename: path.join(logDir, `${config.service}-%DATE%.log`),
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: '14d',
        format: logFormat,
      })
    );

    transports.push(
      new DailyRotateFile({
        filename: path.join(logDir, `${config.service}-error-%DATE%.log`),
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: '30d',
        level: 'error',
        format: logFormat,
      })
    );
  }

  return winston.createLogger({
    level: config.level ?? 'info',
    silent,
    defaultMeta: { service: config.service },
    transports,
  });
}

/**
 * Logger class with structured logging
 */
export class Logger {
  private readonly logger: winston.Logger;
  private readonly service: string;
  private readonly telegram: TelegramSink | null;

  constructor(
    config: LoggerConfig,
    parent?: { logger: winston.Logger; telegram: TelegramSink | null }
  ) {
    this.service = config.service;

    if (parent) {
      this.logger = parent.logger;
      this.telegram = parent.telegram;
      return;
    }

    this.logger = buildWinston(config);
    this.telegram =
      config.telegramToken && config.telegramChatId && !config.silent
        ? {
            bot: new TelegramBot(config.telegramToken, { polling: false }),
            chatId: config.telegramChatId,
            levels: new Set(config.telegramLevels ?? ['error']),
          }
        : null;
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.logger.log(level, message, context);

    if (this.telegram && this.telegram.levels.has(level)) {
      this.sendTelegramAlert(this.telegram, level, message, context).catch((error: unknown) => {
        this.logger.error('Failed to send Telegram alert', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }
  }

  private async sendTelegramAlert(
    sink: TelegramSink,
    level: LogLevel,
    message: string,
    context?: LogContext
  ): Promise<void> {
    let text = `${LEVEL_EMOJI[level]} <b>${level.toUpperCase()}: ${this.service}</b>\n\n`;
    text += `<b>Message:</b>\n<code>${escapeHtml(message)}</code>\n\n`;

    if (context && Object.keys(context).length > 0) {
      text += `<b>Context:</b>\n<code>${escapeHtml(JSON.stringify(context, null, 2))}</code>\n\n`;
    }

    text += `🕐 ${new Date().toISOString()}`;

    await sink.bot.sendMessage(sink.chatId, text, { parse_mode: 'HTML' });
  }

  /**
   * Create child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger(
      { service: this.service },
      { logger: this.logger.child(context), telegram: this.telegram }
    );
  }

  /**
   * Close logger and flush logs
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.close();
      setTimeout(resolve, 100);
    });
  }
}

export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Logger that discards everything, for tests and library callers that
 * do not pass one
 */
export function createSilentLogger(service = 'test'): Logger {
  return new Logger({ service, silent: true, console: false, file: false });
}
