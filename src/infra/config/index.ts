import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../../application/errors.js';

dotenv.config();

const port = z.coerce.number().int().min(1).max(65535);

const envSchema = z
  .object({
    PORT: port.default(3000),
    // An empty DATABASE_URL= line in .env means unset
    DATABASE_URL: z.preprocess(
      (value) => (value === '' ? undefined : value),
      z.string().min(1).optional()
    ),
    DB_HOST: z.string().min(1).default('localhost'),
    DB_PORT: port.default(5432),
    DB_USER: z.string().min(1).default('postgres'),
    DB_PASS: z.string().default('postgres'),
    DB_NAME: z.string().min(1).default('postgres'),
    POOL_MIN_SIZE: z.coerce.number().int().min(0).default(1),
    POOL_MAX_SIZE: z.coerce.number().int().min(1).default(10),
    // Seconds
    COMMAND_TIMEOUT: z.coerce.number().positive().default(60),
    POOL_IDLE_TIMEOUT: z.coerce.number().positive().default(300),
    RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).default(60),
  })
  .refine((env) => env.POOL_MIN_SIZE <= env.POOL_MAX_SIZE, {
    message: 'must not exceed POOL_MAX_SIZE',
    path: ['POOL_MIN_SIZE'],
  });

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export interface PoolSizing {
  minSize: number;
  maxSize: number;
  commandTimeoutSeconds: number;
  idleTimeoutSeconds: number;
}

export interface AppConfig {
  port: number;
  rateLimitPerMinute: number;
  database: DatabaseConfig;
  pool: PoolSizing;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const reasons = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid configuration: ${reasons.join('; ')}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    rateLimitPerMinute: parsed.RATE_LIMIT_PER_MINUTE,
    database: {
      connectionString: parsed.DATABASE_URL,
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
      user: parsed.DB_USER,
      password: parsed.DB_PASS,
      database: parsed.DB_NAME,
    },
    pool: {
      minSize: parsed.POOL_MIN_SIZE,
      maxSize: parsed.POOL_MAX_SIZE,
      commandTimeoutSeconds: parsed.COMMAND_TIMEOUT,
      idleTimeoutSeconds: parsed.POOL_IDLE_TIMEOUT,
    },
  };
}
