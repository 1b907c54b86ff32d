import { z } from 'zod';
import { config } from 'dotenv';

// Load environment variables
config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  DEBUG: z.string().optional(),
  VERBOSE: z.string().optional(),
  /** Overrides the per-user application data directory */
  STREAMWATCH_HOME: z.string().min(1).optional(),
  /** Explicit streamlink executable, probed before every other candidate */
  STREAMLINK_PATH: z.string().min(1).optional(),
  STREAMWATCH_PROXY_URL: z.string().url().optional()
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
