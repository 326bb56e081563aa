/**
 * Structured Logger Service
 *
 * JSON-formatted logging for the analyst.
 * All logs go to stderr (stdout reserved for MCP JSON-RPC protocol).
 *
 * - Correlation: all logs from one question share request_id
 * - Parsing: JSON can be piped to jq or a log aggregator
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogContext {
  // Request identification
  request_id?: string;
  session_id?: string;

  // Pipeline
  phase?: string;
  intent?: string;
  dimension?: string;
  rows?: number;
  groups?: number;

  // Performance
  duration_ms?: number;

  // Errors
  error?: string;

  // Extensible
  [key: string]: unknown;
}

function parseLevel(value: string | undefined): LogLevel {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }
  return 'info';
}

let minLevel: LogLevel = parseLevel(process.env.LOG_LEVEL);

/**
 * Change the minimum level written to stderr
 */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

/**
 * Log a structured message to stderr
 *
 * Output format:
 * {"ts":"2025-12-16T10:30:45.123Z","level":"info","msg":"Plan executed","request_id":"req_...",...}
 */
export function log(level: LogLevel, message: string, context: LogContext = {}): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

  const entry = {
    ts: new Date().toISOString(),
    level,
    msg: message,
    ...context,
  };
  console.error(JSON.stringify(entry));
}

// Convenience functions
export const logInfo = (msg: string, ctx?: LogContext) => log('info', msg, ctx);
export const logWarn = (msg: string, ctx?: LogContext) => log('warn', msg, ctx);
export const logError = (msg: string, ctx?: LogContext) => log('error', msg, ctx);
export const logDebug = (msg: string, ctx?: LogContext) => log('debug', msg, ctx);

/**
 * Generate unique request ID for log correlation
 * Format: req_<timestamp>_<random>
 *
 * Example: req_1734345045123_a1b2c3
 */
export function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).substring(2, 8)}`;
}
