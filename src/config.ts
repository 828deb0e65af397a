import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  PROJECTS_INPUT: z.string().default('data/projects.yaml'),
  PROJECTS_OUTPUT: z.string().default('data/projects_enriched.json'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  FETCH_USER_AGENT: z.string().default('Mozilla/5.0 (compatible; ProjectMetaFetcher/1.0)'),
});

export const config = envSchema.parse(process.env);
