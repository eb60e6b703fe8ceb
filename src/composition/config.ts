import { z } from 'zod';
import { AppError, ConfigurationError } from '../application/errors.js';
import { mapError } from '../shared/combinators.js';
import { type Result, of } from '../shared/result.js';

const booleanFlag = z.preprocess((val) => val === 'true' || val === true, z.boolean());

// Environment validation schema
const environmentSchema = z.enum(['development', 'test', 'production']).default('development');

const appConfigSchema = z.object({
  name: z.string().min(1, 'App name cannot be empty').default('typed-result'),
  version: z.string().default('1.0.0'),
  environment: environmentSchema,
});

const loggingSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: booleanFlag.default(false),
});

const configSchema = z.object({
  app: appConfigSchema,
  logging: loggingSchema,
});

export type Config = z.infer<typeof configSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;

/**
 * Validates environment variables into a typed configuration object.
 * Every invalid setting is reported as one `path: message` line of the error.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<Config, ConfigurationError> {
  const rawConfig = {
    app: {
      name: env.APP_NAME,
      version: env.APP_VERSION,
      environment: env.NODE_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      pretty: env.PRETTY_LOGS,
    },
  };

  const parsed = of(() => configSchema.parse(rawConfig), z.ZodError);

  return mapError(parsed, (error) => {
    const errorMessages = error.errors.map(err => {
      const path = err.path.join('.');
      return `${path}: ${err.message}`;
    }).join('\n');

    return AppError.configuration(`Configuration validation failed:\n${errorMessages}`);
  }, ConfigurationError);
}

export function isProduction(config: AppConfig): boolean {
  return config.environment === 'production';
}
