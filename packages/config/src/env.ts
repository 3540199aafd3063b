import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  RENDER_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(2),
  RENDER_TIMEOUT_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  RENDER_OUTPUT_DIR: z.string().min(1).default('./renders'),
});

export type Env = z.infer<typeof envSchema>;

function parseEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('Invalid environment variables:', result.error.flatten().fieldErrors);
    throw new Error('Invalid environment variables');
  }
  return result.data;
}

export const env = parseEnv();
