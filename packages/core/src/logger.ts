import pino from 'pino';

export type Logger = pino.Logger;

let stderr: pino.DestinationStream | undefined;

/**
 * Create a named component logger. The level comes from `LOG_LEVEL`.
 *
 * Logs go to stderr so they never interleave with transcripts printed on
 * stdout.
 */
export function createLogger(name: string, level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  stderr ??= pino.destination({ fd: 2, sync: true });
  return pino({ name, level }, stderr);
}

/**
 * A logger that discards everything, for tests and library callers that
 * handle reporting themselves.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
