import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  AWS_REGION: z.string().min(1).default('us-east-1'),
  AWS_COGNITO_USER_POOL_ID: z.string().min(1),
  AWS_COGNITO_APP_CLIENT_ID: z.string().min(1),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  readonly nodeEnv: 'development' | 'test' | 'production';
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly cognito: {
    readonly region: string;
    readonly userPoolId: string;
    readonly clientId: string;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Read configuration from environment variables (after dotenv has run).
 * Nothing reads the environment after this call.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  const vars = parsed.data;
  return Object.freeze({
    nodeEnv: vars.NODE_ENV,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    cognito: Object.freeze({
      region: vars.AWS_REGION,
      userPoolId: vars.AWS_COGNITO_USER_POOL_ID,
      clientId: vars.AWS_COGNITO_APP_CLIENT_ID,
    }),
  });
}
