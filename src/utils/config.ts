import { config as dotenvConfig } from 'dotenv';
import { Config } from '../types/index.js';

dotenvConfig();

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, required = true): string {
  const value = env[key];
  if (required && !value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || '';
}

function getNumberEnvVar(env: Env, key: string, fallback: number): number {
  const raw = getEnvVar(env, key, false);
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Environment variable ${key} must be a positive number, got "${raw}"`);
  }
  return value;
}

export interface LoadConfigOptions {
  /** Dry runs never open a Supabase connection */
  requireSupabase?: boolean;
}

/**
 * Build the runtime configuration from environment variables.
 * Called once by each entry point; the result is passed down explicitly.
 */
export function loadConfig(env: Env = process.env, options: LoadConfigOptions = {}): Config {
  const requireSupabase = options.requireSupabase ?? true;

  return {
    supabase: {
      url: getEnvVar(env, 'SUPABASE_URL', requireSupabase),
      serviceKey: getEnvVar(env, 'SUPABASE_SERVICE_KEY', requireSupabase),
    },
    site: {
      baseUrl: getEnvVar(env, 'SITE_BASE_URL', false) || 'https://www.autoscout24.lu',
      requestTimeoutMs: getNumberEnvVar(env, 'REQUEST_TIMEOUT_MS', 15000),
      maxAutoPages: Math.floor(getNumberEnvVar(env, 'MAX_AUTO_PAGES', 50)),
    },
    app: {
      dataDir: getEnvVar(env, 'DATA_DIR', false) || 'data',
      modelsFile: getEnvVar(env, 'MODELS_FILE', false) || 'models.csv',
      schedule: getEnvVar(env, 'SCHEDULE', false) || '0 8 * * *',
      apiPort: getNumberEnvVar(env, 'API_PORT', 3000),
      logLevel: getEnvVar(env, 'LOG_LEVEL', false) || 'info',
      scraperVersion: getEnvVar(env, 'SCRAPER_VERSION', false) || '2.0',
    },
  };
}
