import { stripVTControlCharacters } from 'node:util';

import { config } from '../config/index.js';
import type { LogLevel, LogMetadata } from '../config/types.js';

import { getRequestContext } from './context.js';

let stderrAvailable = true;

process.stderr.on('error', () => {
  stderrAvailable = false;
});

function buildContextMetadata(): LogMetadata {
  const ctx = getRequestContext();
  const contextMeta: LogMetadata = {};
  if (!ctx) return contextMeta;

  contextMeta.requestId = ctx.requestId;
  if (ctx.sessionId) contextMeta.sessionId = ctx.sessionId;
  if (ctx.role) contextMeta.role = ctx.role;
  return contextMeta;
}

function formatMetadata(meta?: LogMetadata): string {
  const merged = { ...buildContextMetadata(), ...meta };
  return Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
}

function createTimestamp(): string {
  return new Date().toISOString();
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  meta?: LogMetadata
): string {
  return `[${createTimestamp()}] ${level.toUpperCase()}: ${message}${formatMetadata(meta)}`;
}

function shouldLog(level: LogLevel): boolean {
  if (!config.logging.enabled) return false;
  if (level === 'debug') return config.logging.level === 'debug';
  return true;
}

function writeLog(level: LogLevel, message: string, meta?: LogMetadata): void {
  if (!shouldLog(level) || !stderrAvailable) return;
  try {
    process.stderr.write(
      `${stripVTControlCharacters(formatLogEntry(level, message, meta))}\n`
    );
  } catch {
    // EPIPE and friends: stop writing rather than crash the server.
    stderrAvailable = false;
  }
}

export function logInfo(message: string, meta?: LogMetadata): void {
  writeLog('info', message, meta);
}

export function logDebug(message: string, meta?: LogMetadata): void {
  writeLog('debug', message, meta);
}

export function logWarn(message: string, meta?: LogMetadata): void {
  writeLog('warn', message, meta);
}

export function logError(message: string, error?: Error | LogMetadata): void {
  const errorMeta: LogMetadata =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : (error ?? {});
  writeLog('error', message, errorMeta);
}
