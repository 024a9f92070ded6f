import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  DAYLOG_URL: z.string().url().default('https://psf.nchu.edu.tw/punch/Menu.jsp'),
  DAYLOG_ACCOUNT_ID: z.string().min(1).optional(),
  DAYLOG_SECRET: z.string().min(1).optional(),
  DAYLOG_HEADLESS: booleanFlag.default('false'),
  DAYLOG_DELAY_SECONDS: z.coerce.number().int().positive().default(2),
  DAYLOG_PROFILE_PATH: z.string().min(1).optional(),
  DAYLOG_BROWSER_CHANNEL: z.string().min(1).optional(),
  DAYLOG_BROWSER_PATH: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Drop the cached environment so the next getEnv() re-reads process.env. */
export function resetEnv(): void {
  _env = null;
}
