import { z } from 'zod';

const positiveInt = (fallback: number, name: string) =>
  z
    .string()
    .optional()
    .transform((v) => (v ? Number(v) : fallback))
    .refine((v) => Number.isInteger(v) && v > 0, `${name} must be a positive integer`);

const EnvSchema = z.object({
  PORT: positiveInt(8787, 'PORT'),
  DATA_DIR: z.string().optional().default('data'),
  GEOGUESSR_NCFA_TOKEN: z.string().optional(),
  SYNC_FETCH_WINDOW: positiveInt(100, 'SYNC_FETCH_WINDOW'),
  SYNC_CONCURRENCY: positiveInt(4, 'SYNC_CONCURRENCY'),
  FETCH_TIMEOUT_MS: positiveInt(10_000, 'FETCH_TIMEOUT_MS'),
  FEED_STOP_DATE: z
    .string()
    .optional()
    .default('2023-01-01')
    .refine((v) => !Number.isNaN(Date.parse(v)), 'FEED_STOP_DATE must be a date'),
  COUNTRY_MIN_SAMPLES: positiveInt(5, 'COUNTRY_MIN_SAMPLES'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional().default('info'),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return EnvSchema.parse(source);
}

export const env: Env = parseEnv(process.env);
