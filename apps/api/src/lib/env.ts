import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { OutlierScope } from '@carelens/shared/constants/extract.constants.js';

// Load .env from monorepo root
dotenv.config({ path: fileURLToPath(new URL('../../../../.env', import.meta.url)) });

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    API_PORT: z.coerce.number().default(3001),
    API_HOST: z.string().default('0.0.0.0'),
    CORS_ORIGIN: z.string().default('http://localhost:3000'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
    MAX_UPLOAD_MB: z.coerce.number().positive().default(50),
    DEFAULT_EXTRACT_PATH: z.string().min(1).optional(),

    // In-memory session store
    SESSION_TTL_MINUTES: z.coerce.number().positive().default(60),
    MAX_SESSIONS: z.coerce.number().int().min(1).default(20),
    MAX_CACHED_FILTERS: z.coerce.number().int().min(1).default(100),

    // Regulatory thresholds
    STAFFING_BENCHMARK_PCT: z.coerce.number().min(0).max(200).default(100),
    STAR_RATING_CONCERN_CUTOFF: z.coerce.number().min(1).max(5).default(2),
    CONCERN_COMPONENT_RULES: booleanFlag,

    // Size buckets by residential places
    SIZE_SMALL_MAX_PLACES: z.coerce.number().int().nonnegative().default(29),
    SIZE_MEDIUM_MAX_PLACES: z.coerce.number().int().nonnegative().default(60),

    IQR_MULTIPLIER: z.coerce.number().positive().default(1.5),
    OUTLIER_SCOPE: z.enum([OutlierScope.FILTER, OutlierScope.NATIONAL]).default(OutlierScope.FILTER),
    MIN_OUTLIER_SAMPLE: z.coerce.number().int().min(1).default(5),
    NORMALIZATION_STRICT: booleanFlag,
  })
  .refine((env) => env.SIZE_SMALL_MAX_PLACES < env.SIZE_MEDIUM_MAX_PLACES, {
    message: 'SIZE_SMALL_MAX_PLACES must be below SIZE_MEDIUM_MAX_PLACES',
    path: ['SIZE_SMALL_MAX_PLACES'],
  });

export type Env = z.infer<typeof envSchema>;

let _env: Env | undefined;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    console.error('Invalid environment variables:', result.error.flatten().fieldErrors);
    throw new Error('Invalid environment variables');
  }
  return result.data;
}

export function getEnv(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
