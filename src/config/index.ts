import { config as loadEnv } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import type { EnvConfig } from '../types';

const envFile = resolve(process.cwd(), '.env');
if (existsSync(envFile)) {
  loadEnv({ path: envFile });
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('warn'),
  // Empty string turns the file transport off
  LOG_FILE: z.string().default('./ledger-payment-matcher.log'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
}

export const env: EnvConfig = parsed.data;

export default env;
