import dotenv from 'dotenv';
dotenv.config();
import { z } from 'zod';
import { LOG_LEVELS } from './utils/logger.js';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

export const envSchema = z.object({
  // HTTP
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  CORS_ORIGIN: z.string().default('*'),

  // Served under /static/*
  STATIC_ROOT: z.string().min(1).default('static'),

  // Registry
  ACTIVITIES_FILE: z.string().optional(),
  ENFORCE_CAPACITY: booleanFlag,

  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type AppConfig = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv) {
  return envSchema.safeParse(env);
}

function loadConfig(): AppConfig {
  const parsed = parseConfig(process.env);
  if (!parsed.success) {
    console.error('❌ Invalid environment:');
    for (const issue of parsed.error.issues) {
      console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }
  return parsed.data;
}

export const config = loadConfig();
