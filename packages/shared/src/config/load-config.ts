/**
 * Configuration loading
 *
 * YAML file (optional) -> environment overrides -> zod validation -> frozen
 * TradingConfig. Nothing re-reads configuration after startup.
 */

import { readFileSync } from 'fs';
import yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import {
  ConfigFileSchema,
  toTradingConfig,
  type TradingConfig,
} from '../schemas/config.schema.js';
import { ConfigValidationError, errorMessage } from '../errors.js';

export type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  /** YAML file path; defaults apply when omitted */
  path?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: Env;
}

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = raw[key];
  if (isRecord(existing)) {
    return existing;
  }
  const created: Record<string, unknown> = {};
  raw[key] = created;
  return created;
}

/**
 * Apply environment overrides onto the raw (pre-validation) document
 */
function applyEnv(raw: Record<string, unknown>, env: Env): void {
  if (env.LOG_LEVEL) {
    section(raw, 'logging').level = env.LOG_LEVEL;
  }
  if (env.INITIAL_CAPITAL) {
    section(raw, 'backtest').initial_capital = Number(env.INITIAL_CAPITAL);
  }
  if (env.SYMBOLS) {
    section(raw, 'trading').symbols = env.SYMBOLS.split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
  return value;
}

/**
 * Validate an already-parsed document (YAML or object literal)
 */
export function parseTradingConfig(raw: unknown, env: Env = {}, source?: string): Readonly<TradingConfig> {
  if (raw !== undefined && raw !== null && !isRecord(raw)) {
    throw new ConfigValidationError(['(root): expected a mapping'], source);
  }
  const document: Record<string, unknown> = isRecord(raw) ? structuredClone(raw) : {};
  applyEnv(document, env);

  const result = ConfigFileSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues.map(formatIssue), source);
  }

  const config = toTradingConfig(result.data);
  if (env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID) {
    config.telegram = { botToken: env.TELEGRAM_BOT_TOKEN, chatId: env.TELEGRAM_CHAT_ID };
  }

  return deepFreeze(config);
}

/**
 * Read, validate and freeze the trading configuration
 */
export function loadTradingConfig(options: LoadConfigOptions = {}): Readonly<TradingConfig> {
  const env = options.env ?? process.env;
  let raw: unknown;

  if (options.path) {
    try {
      raw = yaml.load(readFileSync(options.path, 'utf8'));
    } catch (error) {
      throw new ConfigValidationError([errorMessage(error)], options.path);
    }
  }

  return parseTradingConfig(raw, env, options.path);
}

export const DEFAULT_TRADING_CONFIG: Readonly<TradingConfig> = parseTradingConfig({});
