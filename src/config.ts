import { z } from 'zod';
import { ConfigError } from './errors.js';

export const REQUIRED_SECRETS = ['WP_DOMAIN', 'WP_USERNAME', 'WP_APP_PASSWORD', 'OPENAI_API_KEY'] as const;

const envSchema = z.object({
  WP_DOMAIN: z.string().trim().min(1),
  WP_USERNAME: z.string().trim().min(1),
  WP_APP_PASSWORD: z.string().min(1),
  OPENAI_API_KEY: z.string().trim().min(1),
  LLM_PROVIDER: z.enum(['openai']).default('openai'),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o'),
  OPENAI_SOCIAL_MODEL: z.string().min(1).default('gpt-4o-mini'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  SCHEDULER_INTERVAL_SECONDS: z.coerce.number().int().positive().default(1800),
  PORT: z.coerce.number().int().positive().default(3000),
  DB_PATH: z.string().min(1).default(':memory:'),
});

export interface AppConfig {
  wordpress: {
    domain: string;
    username: string;
    appPassword: string;
  };
  llm: {
    provider: 'openai';
    apiKey: string;
    blogModel: string;
    socialModel: string;
  };
  requestTimeoutMs: number;
  schedulerIntervalMs: number;
  port: number;
  dbPath: string;
}

/**
 * Validates the environment. Any missing secret is fatal: callers are expected
 * to let the ConfigError stop the process.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const invalid = [...new Set(parsed.error.issues.map(issue => issue.path.join('.')))];
    const missingSecrets = REQUIRED_SECRETS.filter(name => invalid.includes(name));

    if (missingSecrets.length > 0) {
      throw new ConfigError(
        `One or more required secrets (${REQUIRED_SECRETS.join(', ')}) are missing: ${missingSecrets.join(', ')}`
      );
    }
    throw new ConfigError(`Invalid configuration: ${invalid.join(', ')}`);
  }

  const vars = parsed.data;
  return {
    wordpress: {
      domain: vars.WP_DOMAIN.replace(/\/+$/, ''),
      username: vars.WP_USERNAME,
      appPassword: vars.WP_APP_PASSWORD,
    },
    llm: {
      provider: vars.LLM_PROVIDER,
      apiKey: vars.OPENAI_API_KEY,
      blogModel: vars.OPENAI_MODEL,
      socialModel: vars.OPENAI_SOCIAL_MODEL,
    },
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    schedulerIntervalMs: vars.SCHEDULER_INTERVAL_SECONDS * 1000,
    port: vars.PORT,
    dbPath: vars.DB_PATH,
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
