import 'dotenv/config';
import { z } from 'zod';
import { ConfigError, InvalidWindowError } from './lib/errors.js';

export const WindowMsSchema = z
  .number({ invalid_type_error: 'window must be a number of milliseconds' })
  .finite('window must be finite')
  .nonnegative('window must be >= 0');

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TIMEWINDOW_DEFAULT_MS: z.coerce.number().int().nonnegative().default(60_000),
});

export type AppConfig = z.infer<typeof EnvSchema>;

function parseEnv<S extends z.ZodTypeAny>(schema: S, env: NodeJS.ProcessEnv): z.infer<S> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    const variables = [...new Set(parsed.error.issues.map((i) => i.path.join('.')))];
    throw new ConfigError(variables, `environment validation failed: ${issues}`);
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return parseEnv(EnvSchema, env);
}

/** Reads only TIMEWINDOW_DEFAULT_MS, so an unrelated bad variable does not block construction. */
export function defaultWindowMs(env: NodeJS.ProcessEnv = process.env): number {
  return parseEnv(EnvSchema.pick({ TIMEWINDOW_DEFAULT_MS: true }), env).TIMEWINDOW_DEFAULT_MS;
}

/** Validates a window duration, throwing InvalidWindowError when it is negative, NaN or infinite. */
export function parseWindowMs(windowMs: unknown): number {
  const parsed = WindowMsSchema.safeParse(windowMs);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => i.message).join(', ');
    throw new InvalidWindowError(windowMs, `invalid window duration ${String(windowMs)}: ${issues}`);
  }
  return parsed.data;
}
