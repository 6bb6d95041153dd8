/**
 * Live execution logger for pagecheck.
 *
 * All output goes to stderr so stdout stays clean for report output.
 * Emoji prefixes give instant visual context in the terminal; the optional
 * log file gets plain, timestamped lines.
 */

import { appendFileSync } from 'node:fs';
import { ConfigurationError } from '../core/errors.js';

// ── Configuration ───────────────────────────────────────────

export type LogLevel = 'quiet' | 'info' | 'verbose';

export interface LoggerOptions {
  level?: LogLevel | undefined;
  file?: string | undefined;
}

let currentLevel: LogLevel = 'info';
let logFile: string | undefined;

/** Throws ConfigurationError when the log file cannot be appended to. */
export function configureLogger(options: LoggerOptions): void {
  if (options.level !== undefined) currentLevel = options.level;
  logFile = undefined;

  if (options.file !== undefined) {
    try {
      appendFileSync(options.file, '', 'utf-8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Cannot write log file ${options.file}: ${reason}`, {
        cause: err,
      });
    }
    logFile = options.file;
  }
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

// ── Core write ──────────────────────────────────────────────

type Severity = 'debug' | 'info' | 'warn' | 'error';

function enabled(severity: Severity): boolean {
  switch (currentLevel) {
    case 'quiet':
      return severity === 'error';
    case 'info':
      return severity !== 'debug';
    case 'verbose':
      return true;
  }
}

function write(severity: Severity, prefix: string, message: string): void {
  if (!enabled(severity)) return;

  process.stderr.write(`${prefix}${message}\n`);

  if (logFile !== undefined) {
    const line = `${new Date().toISOString()} ${severity.toUpperCase().padEnd(5)} ${message.trim()}\n`;
    try {
      appendFileSync(logFile, line, 'utf-8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      process.stderr.write(`⚠️  Log file ${logFile} disabled: ${reason}\n`);
      logFile = undefined;
    }
  }
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write('info', 'ℹ️  ', message);
}

export function detail(message: string): void {
  write('info', '   ', message);
}

export function debug(message: string): void {
  write('debug', '🔎 ', message);
}

export function section(title: string): void {
  write('info', '', `\n${'─'.repeat(50)}`);
  write('info', '▶  ', title);
  write('info', '', '─'.repeat(50));
}

export function warn(message: string): void {
  write('warn', '⚠️  ', message);
}

export function error(message: string): void {
  write('error', '💥 ', message);
}

export function agent(name: string, url: string): void {
  write('info', '🤖 ', `${name} → ${url}`);
}

export function runResult(
  success: boolean,
  name: string,
  url: string,
  durationMs: number,
): void {
  const icon = success ? '✅' : '❌';
  write(
    success ? 'info' : 'warn',
    `${icon} `,
    `${name} on ${url} (${(durationMs / 1000).toFixed(1)}s)`,
  );
}

export function retry(message: string): void {
  write('warn', '🔁 ', message);
}

export function llm(message: string): void {
  write('debug', '🧠 ', message);
}

export function browser(message: string): void {
  write('debug', '🌐 ', message);
}
