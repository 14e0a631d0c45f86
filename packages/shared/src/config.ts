import { z } from 'zod';

/**
 * Environment variables of the current process, or an empty record when the
 * library runs without one (a browser page).
 */
function readEnv(): Record<string, string | undefined> {
  if (typeof process === 'undefined' || !process.env) return {};
  return process.env;
}

/**
 * Load and validate environment variables using a Zod schema.
 *
 * Falls back to the schema's own defaults when the environment does not
 * parse but `undefined` does.
 *
 * @example
 * ```typescript
 * const schema = z.object({
 *   LOADING_KIT_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
 * });
 *
 * export const config = loadEnv(schema);
 * ```
 */
export function loadEnv<T extends z.ZodSchema>(schema: T): z.infer<T> {
  try {
    return schema.parse(readEnv());
  } catch (error) {
    if (error instanceof z.ZodError) {
      const testResult = schema.safeParse(undefined);
      if (testResult.success) {
        return testResult.data;
      }
      const errorMessages = error.issues
        .map((err) => ` - ${err.path.join('.')}: ${err.message}`)
        .join('\n');
      throw new Error(`Environment variable validation failed: \n${errorMessages}`);
    }
    throw error;
  }
}

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/** Unset or unrecognised log levels read as `warn` */
export const sharedConfigSchema = z.object({
  LOADING_KIT_LOG_LEVEL: LogLevelSchema.catch('warn'),
});

export type SharedConfig = z.infer<typeof sharedConfigSchema>;
