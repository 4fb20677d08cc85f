import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
  CORS_ORIGIN: z.string().min(1).default('*'),
  UPLOAD_LIMIT_MB: z.coerce.number().positive().default(200),
  HTTP_LOG_FORMAT: z.string().min(1).default('combined'),
});

export type AppConfig = z.infer<typeof envSchema>;

/** Reads configuration from the environment; throws ZodError when a value is invalid. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(env);
}
