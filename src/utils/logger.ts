// Utility: Structured logging
// JSON-line component loggers on the console, plus an opt-in JSONL audit trail of tool calls

import fs from 'fs';
import path from 'path';

export interface LogContext {
  [key: string]: string | number | boolean | null | undefined;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_RANK;
}

function defaultLevel(): LogLevel {
  if (isLogLevel(process.env.LOG_LEVEL)) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === 'test') return 'silent';
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Structured logger bound to one component
 */
export class Logger {
  constructor(
    private component: string,
    private level: LogLevel = defaultLevel()
  ) {}

  private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...context,
    };

    const formatted = `[${this.component}] ${JSON.stringify(logEntry)}`;
    if (level === 'error') {
      console.error(formatted);
    } else if (level === 'warn') {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}

// ========== Tool call audit trail ==========

export interface ToolCallLog {
  timestamp: string;
  campaignId: string;
  toolName: string;
  arguments: unknown;
  success: boolean;
  errorCode?: string;
  eventNames: string[];
  sequence?: number;
  durationMs: number;
}

const MAX_ARGUMENT_CHARS = 20000;

let auditFile: string | null = null;

/**
 * Enable appending tool calls to `<directory>/tool-calls.log`
 */
export function enableToolAuditLog(directory: string): void {
  fs.mkdirSync(directory, { recursive: true });
  auditFile = path.join(directory, 'tool-calls.log');
}

export function logToolCall(entry: ToolCallLog): void {
  if (!auditFile) return;

  const out: ToolCallLog = { ...entry };
  const raw = JSON.stringify(entry.arguments ?? null);
  if (raw.length > MAX_ARGUMENT_CHARS) {
    out.arguments = raw.slice(0, MAX_ARGUMENT_CHARS) + `... [TRUNCATED ${raw.length - MAX_ARGUMENT_CHARS} chars]`;
  }

  fs.appendFileSync(auditFile, JSON.stringify(out) + '\n', 'utf8');
}
