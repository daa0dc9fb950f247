import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

// Environment variables schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Service configuration file (YAML or JSON)
  CONFIG_PATH: z.string().default('config.yaml'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Control API overrides (take precedence over the config file)
  API_PORT: z.string().optional(),
  API_KEY: z.string().optional(),
});

// Parse and validate environment variables
const env = envSchema.parse(process.env);

// Export typed configuration
export const config = {
  env: env.NODE_ENV,
  configPath: env.CONFIG_PATH,
  logLevel: env.LOG_LEVEL,

  api: {
    port: env.API_PORT ? parseInt(env.API_PORT, 10) : undefined,
    key: env.API_KEY,
  },
};

export default config;
