import { config as dotenvConfig } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { z } from 'zod';

// Load environment variables
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
// Project root, from both src/config and dist/config
export const envFile = join(__dirname, '../../.env');
dotenvConfig({ path: envFile });

const configSchema = z
  .object({
    logging: z.object({
      level: z
        .preprocess((val) => (typeof val === 'string' ? val.toLowerCase() : val), z.enum(['error', 'warn', 'info', 'debug']))
        .catch('info'),
      serviceName: z.string().min(1).catch('machine-conditions'),
    }),

    // Unrecognized values fall back to the defaults.
    nodeEnv: z.enum(['development', 'production', 'test']).catch('development'),
  })
  .transform((data) => ({
    ...data,
    isDevelopment: data.nodeEnv === 'development',
    isProduction: data.nodeEnv === 'production',
    isTest: data.nodeEnv === 'test',
  }));

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Map environment variables to the schema structure
  const rawConfig = {
    logging: {
      level: env.LOG_LEVEL,
      serviceName: env.LOG_SERVICE_NAME,
    },
    nodeEnv: env.NODE_ENV,
  };

  return configSchema.parse(rawConfig);
}

export const config = loadConfig();
