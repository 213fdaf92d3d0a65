import { z } from 'zod';
import { config as loadEnv } from 'dotenv';

// Environment validation schema
const environmentSchema = z.enum(['development', 'test', 'production']).default('development');

const flagSchema = z.enum(['true', 'false']).default('false').transform((val) => val === 'true');

// Logging configuration schema
const loggingSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: flagSchema,
});

// Default formatting for human-readable sizes
const formatSchema = z.object({
  base: z.coerce.number().pipe(z.union([z.literal(1000), z.literal(1024)])).default(1000),
  decimals: z.coerce.number().int().min(0).max(20).default(0),
});

const appConfigSchema = z.object({
  name: z.string().min(1).default('memory-size'),
  environment: environmentSchema,
});

// Complete configuration schema
const configSchema = z.object({
  app: appConfigSchema,
  logging: loggingSchema,
  format: formatSchema,
});

// Type inference from schema
export type Config = z.infer<typeof configSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

/**
 * Reads `.env` into `process.env` and returns it
 */
export function loadProcessEnv(): NodeJS.ProcessEnv {
  loadEnv();
  return process.env;
}

/**
 * Validates and parses environment variables into a typed configuration object
 * @throws {Error} If validation fails with detailed error messages
 */
export function createConfig(env: NodeJS.ProcessEnv = loadProcessEnv()): Config {
  try {
    const rawConfig = {
      app: {
        name: env.APP_NAME,
        environment: env.NODE_ENV,
      },
      logging: {
        level: env.LOG_LEVEL,
        pretty: env.PRETTY_LOGS,
      },
      format: {
        base: env.MEMORY_SIZE_BASE,
        decimals: env.MEMORY_SIZE_DECIMALS,
      },
    };

    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errorMessages = error.issues.map(err => {
        const path = err.path.join('.');
        return `${path}: ${err.message}`;
      }).join('\n');

      throw new Error(`Configuration validation failed:\n${errorMessages}`);
    }
    throw error;
  }
}

/**
 * Checks if the application is running in production environment
 */
export function isProduction(config: AppConfig): boolean {
  return config.environment === 'production';
}

/**
 * Checks if the application is running in test environment
 */
export function isTest(config: AppConfig): boolean {
  return config.environment === 'test';
}
