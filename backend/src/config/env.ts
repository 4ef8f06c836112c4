import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalPositiveInt = z.coerce.number().int().positive().optional();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  DATABASE_PATH: z.string().min(1).default('./data/duels.db'),
  SESSION_CONFIG_PATH: z.string().min(1).default('./config/session.json'),
  MANIFEST_PATH: z.string().min(1).optional(),
  VIDEO_FOLDER: z.string().min(1).default('./videos'),
  RESULT_FILE: z.string().min(1).optional(),
  REWARD_AGGREGATION: z.enum(['sum', 'mean']).default('sum'),
  CORS_ORIGINS: z.string().optional(),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(900000),
  RATE_LIMIT_MAX_REQUESTS: optionalPositiveInt,
});

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): Env => envSchema.parse(source);

export const corsOrigins = (env: Pick<Env, 'CORS_ORIGINS'>): string[] => {
  if (env.CORS_ORIGINS) {
    return env.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean);
  }
  return ['http://localhost:3000', 'http://localhost:5173'];
};
