import type { LogLevel } from './types.js';

const ALLOWED_LOG_LEVELS: ReadonlySet<string> = new Set([
  'debug',
  'info',
  'warn',
  'error',
]);

function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.has(value);
}

function isBelowMin(value: number, min: number | undefined): boolean {
  if (min === undefined) return false;
  return value < min;
}

function isAboveMax(value: number, max: number | undefined): boolean {
  if (max === undefined) return false;
  return value > max;
}

export function parseInteger(
  envValue: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  if (!envValue) return defaultValue;
  const parsed = parseInt(envValue, 10);
  if (Number.isNaN(parsed)) return defaultValue;
  if (isBelowMin(parsed, min)) return defaultValue;
  if (isAboveMax(parsed, max)) return defaultValue;
  return parsed;
}

export function parsePort(
  envValue: string | undefined,
  defaultValue: number
): number {
  if (envValue?.trim() === '0') return 0;
  return parseInteger(envValue, defaultValue, 1, 65535);
}

export function parseBoolean(
  envValue: string | undefined,
  defaultValue: boolean
): boolean {
  if (!envValue) return defaultValue;
  return envValue.trim().toLowerCase() !== 'false';
}

/**
 * Comma-separated list: entries are trimmed, blanks dropped and duplicates
 * removed while keeping first-seen order.
 */
export function parseList(envValue: string | undefined): string[] {
  if (!envValue) return [];
  const entries = envValue
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return Array.from(new Set(entries));
}

export function parseUrlEnv(
  value: string | undefined,
  name: string
): URL | undefined {
  if (!value) return undefined;
  if (!URL.canParse(value)) {
    throw new Error(`Invalid ${name} value: ${value}`);
  }
  return new URL(value);
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  const level = envValue?.toLowerCase();
  if (!level) return 'info';
  return isLogLevel(level) ? level : 'info';
}

export function parseChoice<T extends string>(
  envValue: string | undefined,
  choices: readonly T[],
  defaultValue: T
): T {
  const normalized = envValue?.trim().toLowerCase();
  if (!normalized) return defaultValue;
  return choices.find((choice) => choice === normalized) ?? defaultValue;
}
