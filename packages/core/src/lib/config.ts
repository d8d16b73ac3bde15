import dotenv from 'dotenv';
import { z } from 'zod';
import { ValidationError } from './errors';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'trace', 'system'] as const;

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => value?.trim().toLowerCase() === 'true');

const idList = z
  .string()
  .default('1,2')
  .transform((value) =>
    value
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
      .map(Number),
  )
  .pipe(z.array(z.number().int().positive()));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME_SERVER: z.string().min(1).default('helpdesk'),
  DB_USER_SERVER: z.string().min(1).default('app_user'),
  DB_PASSWORD_SERVER: z.string().default(''),
  DB_POOL_MIN: z.coerce.number().int().nonnegative().default(2),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),

  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_IS_FORMAT_JSON: booleanFlag,
  LOG_ENABLED_FILE_LOGGING: booleanFlag,
  LOG_DIR_PATH: z.string().min(1).default('./logs'),

  HELPDESK_ADMIN_USER_IDS: idList,
  HELPDESK_ADMIN_GROUP: z.string().trim().min(1).default('admin'),
  HELPDESK_TIMEZONE: z.string().min(1).default('UTC'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface HelpdeskConfig {
  env: 'development' | 'test' | 'production';
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    pool: { min: number; max: number };
  };
  logging: {
    level: LogLevel;
    json: boolean;
    fileLogging: boolean;
    dirPath: string;
  };
  helpdesk: {
    adminUserIds: readonly number[];
    adminGroup: string;
    timeZone: string;
  };
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Validates and coerces an environment map. Throws a ValidationError naming every failing key.
 */
export function parseConfig(env: NodeJS.ProcessEnv): HelpdeskConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const parsed = result.data;
  if (!isValidTimeZone(parsed.HELPDESK_TIMEZONE)) {
    throw new ValidationError(`Invalid configuration: HELPDESK_TIMEZONE: unknown time zone`, {
      issues: ['HELPDESK_TIMEZONE: unknown time zone'],
    });
  }
  if (parsed.DB_POOL_MIN > parsed.DB_POOL_MAX) {
    throw new ValidationError('Invalid configuration: DB_POOL_MIN: must not exceed DB_POOL_MAX', {
      issues: ['DB_POOL_MIN: must not exceed DB_POOL_MAX'],
    });
  }

  return {
    env: parsed.NODE_ENV,
    database: {
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
      database: parsed.DB_NAME_SERVER,
      user: parsed.DB_USER_SERVER,
      password: parsed.DB_PASSWORD_SERVER,
      pool: { min: parsed.DB_POOL_MIN, max: parsed.DB_POOL_MAX },
    },
    logging: {
      level: parsed.LOG_LEVEL,
      json: parsed.LOG_IS_FORMAT_JSON,
      fileLogging: parsed.LOG_ENABLED_FILE_LOGGING,
      dirPath: parsed.LOG_DIR_PATH,
    },
    helpdesk: {
      adminUserIds: parsed.HELPDESK_ADMIN_USER_IDS,
      adminGroup: parsed.HELPDESK_ADMIN_GROUP,
      timeZone: parsed.HELPDESK_TIMEZONE,
    },
  };
}

let cachedConfig: HelpdeskConfig | undefined;

/**
 * Loads `.env` once and returns the parsed configuration for this process.
 */
export function loadConfig(): HelpdeskConfig {
  if (!cachedConfig) {
    dotenv.config();
    cachedConfig = parseConfig(process.env);
  }
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = undefined;
}
