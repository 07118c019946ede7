import { z } from 'zod';

const positiveIntegerString = (name: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, { message: `${name} must be a positive integer` })
    .transform((val: string) => parseInt(val, 10))
    .refine((val: number) => val > 0, { message: `${name} must be a positive integer` });

export const envSchema = z.object({
  KUDA_REQUEST_URL: z.string().trim().url({ message: 'KUDA_REQUEST_URL must be an absolute URL' }).optional(),
  KUDA_TIMEOUT_MS: positiveIntegerString('KUDA_TIMEOUT_MS').default('10000'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validate an environment record without touching the cache.
 * @throws Error listing every invalid variable
 */
export function parseEnv(env: Record<string, string | undefined>): ValidatedEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates `process.env` on first access and caches the result.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Forget the cached environment so the next accessor re-reads `process.env`.
 * Tests that stub variables call this between cases.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * The single Kuda endpoint every service type is POSTed to.
 * @throws Error when KUDA_REQUEST_URL is unset or not a URL
 */
export function getKudaRequestUrl(): string {
  const env = validateEnv();
  if (!env.KUDA_REQUEST_URL) {
    throw new Error('Environment validation failed:\n  - KUDA_REQUEST_URL: Required');
  }
  return env.KUDA_REQUEST_URL;
}

export function getRequestTimeoutMs(): number {
  return validateEnv().KUDA_TIMEOUT_MS;
}

export function getLogLevel(): ValidatedEnv['LOG_LEVEL'] {
  return validateEnv().LOG_LEVEL;
}

/**
 * Get the current NODE_ENV value.
 * @returns 'development', 'production', or 'test'
 */
export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  return validateEnv().NODE_ENV;
}

export function isTest(): boolean {
  return getNodeEnv() === 'test';
}

export function isProduction(): boolean {
  return getNodeEnv() === 'production';
}
