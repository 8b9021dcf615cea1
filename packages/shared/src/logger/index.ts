/**
 * Structured logging for seqctl
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = pino.Logger;

export interface LogContext {
  runId?: string;
  group?: string;
  component?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Logs go to stderr; stdout carries the human-readable report
function createBaseLogger(level: LogLevel = 'info'): pino.Logger {
  const options: pino.LoggerOptions = {
    level,
    base: {
      service: 'seqctl',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (process.env.NODE_ENV === 'development') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const envLevel = process.env.LOG_LEVEL;
    loggerInstance = createBaseLogger(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return loggerInstance;
}

/**
 * Override the level at runtime (CLI --log-level)
 */
export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
}

export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

// Structured event logging for group lifecycle
export function logGroupTransition(
  runId: string,
  group: string,
  fromStage: string,
  toStage: string
): void {
  getLogger().info(
    {
      event: 'group_transition',
      runId,
      group,
      fromStage,
      toStage,
    },
    `Group ${group}: ${fromStage} -> ${toStage}`
  );
}

export function logGroupOutcome(
  runId: string,
  group: string,
  outcome: string,
  durationMs: number
): void {
  getLogger().info(
    {
      event: 'group_outcome',
      runId,
      group,
      outcome,
      durationMs,
    },
    `Group ${group} finished with ${outcome} in ${durationMs}ms`
  );
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
