import pino from 'pino';
import type { Logger } from 'pino';
import { z } from 'zod';

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

/** LOG_LEVEL when it names a pino level; silent under Vitest, info otherwise */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): { level: LogLevel; invalid: string | null } {
  const raw = env['LOG_LEVEL'];
  const fallback: LogLevel = env['VITEST'] ? 'silent' : 'info';
  if (raw === undefined || raw === '') return { level: fallback, invalid: null };
  const parsed = logLevelSchema.safeParse(raw.toLowerCase());
  return parsed.success ? { level: parsed.data, invalid: null } : { level: fallback, invalid: raw };
}

const resolved = resolveLogLevel();

export const logger = pino({ level: resolved.level });

if (resolved.invalid !== null) {
  logger.warn({ LOG_LEVEL: resolved.invalid, level: resolved.level }, 'Unknown LOG_LEVEL, using default');
}

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
