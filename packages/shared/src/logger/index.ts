/**
 * Structured logging for RemedyOps
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  incidentId?: string;
  component?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function resolveLevel(raw: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}

// Create base logger
function createBaseLogger(level: LogLevel = 'info') {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'remedyops',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createBaseLogger(resolveLevel(process.env.LOG_LEVEL));
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

// Structured event logging for lifecycle transitions
export function logStatusTransition(
  incidentId: string,
  fromStatus: string,
  toStatus: string,
  reason: string
): void {
  getLogger().info(
    {
      event: 'status_transition',
      incidentId,
      fromStatus,
      toStatus,
      reason,
    },
    `Status transition: ${fromStatus} -> ${toStatus}`
  );
}

export function logHumanAction(
  incidentId: string,
  actor: string,
  action: string,
  role: string | null
): void {
  getLogger().info(
    {
      event: 'human_action',
      incidentId,
      actor,
      action,
      role,
    },
    `Human action: ${action} by ${actor}${role ? ` (${role})` : ''}`
  );
}
