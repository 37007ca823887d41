// engine/logger.ts
// One JSON line per event, same shape for every level.

const SERVICE = 'consistency-report';

export type LogContext = Record<string, unknown>;

export function logInfo(event: string, ctx: LogContext = {}): void {
  console.info(JSON.stringify({ level: 'info', service: SERVICE, event, ...ctx }));
}

export function logWarn(event: string, ctx: LogContext = {}): void {
  console.warn(JSON.stringify({ level: 'warn', service: SERVICE, event, ...ctx }));
}

export function logError(event: string, ctx: LogContext = {}): void {
  console.error(JSON.stringify({ level: 'error', service: SERVICE, event, ...ctx }));
}

/**
 * Flatten an unknown thrown value into loggable fields (message + stack).
 */
export function describeError(err: unknown): LogContext {
  if (err instanceof Error) {
    return { error_name: err.name, error_message: err.message, stack: err.stack };
  }
  return { error_message: String(err) };
}
