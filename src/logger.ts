/**
 * Structured Logging with Pino
 * JSON lines go to stderr so command output on stdout stays parseable
 */

import { destination, pino, type DestinationStream, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  name?: string;
}

const MAX_LOGGED_TAGS = 5;
const SENSITIVE_KEY_PATTERNS = ['secret', 'password', 'token'];

/**
 * Create the process logger, writing to stderr unless a destination is given
 */
export function createLogger(options: LoggerOptions = {}, stream?: DestinationStream): Logger {
  return pino(
    {
      name: options.name ?? 'aws-cost-engine',
      level: options.level ?? 'info',
    },
    stream ?? destination(2),
  );
}

/**
 * Logger that drops everything; the default for library callers that pass none
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Create a child logger with component context
 */
export function componentLogger(logger: Logger, component: string): Logger {
  return logger.child({ component });
}

/**
 * Reduce a tag map to something safe and short enough to log
 */
export function sanitizeTagsForLogging(tags: Readonly<Record<string, string>> | undefined): Record<string, string> {
  const sanitized: Record<string, string> = {};
  if (!tags) return sanitized;

  let count = 0;
  for (const [key, value] of Object.entries(tags)) {
    if (count >= MAX_LOGGED_TAGS) break;
    const lowered = key.toLowerCase();
    if (SENSITIVE_KEY_PATTERNS.some(pattern => lowered.includes(pattern))) continue;
    sanitized[key] = value;
    count++;
  }
  return sanitized;
}
