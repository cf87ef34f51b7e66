/**
 * Runtime configuration for the Place Reconciliation Service
 * Values come from the environment (loaded from .env by dotenv in index.ts)
 */

export interface GoogleMapsConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  cacheTtlSeconds: number;
}

export interface AuthConfig {
  apiKeys: string[];
}

export interface RateLimitConfig {
  maxRequests: number;
  windowMs: number;
  cleanupIntervalMs: number;
}

export interface ServiceConfig {
  port: number;
  host: string;
  environment: string;
  corsOrigin: string;
  defaultLanguage: string;
  defaultCountry: string;
  googleMaps: GoogleMapsConfig;
  auth: AuthConfig;
  rateLimit: RateLimitConfig;
}

const parseInteger = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

// Only the test environment falls back to these
const TEST_API_KEYS = ['dev-key-1', 'dev-key-2', 'master-dev-key'];

const readApiKeys = (env: NodeJS.ProcessEnv, environment: string): string[] => {
  const keys = [env.API_KEY_1, env.API_KEY_2, env.MASTER_API_KEY]
    .filter((key): key is string => typeof key === 'string' && key.length > 0);

  return keys.length === 0 && environment === 'test' ? [...TEST_API_KEYS] : keys;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const environment = env.NODE_ENV || 'development';

  return {
    port: parseInteger(env.PORT, 3001),
    host: env.HOST || '0.0.0.0',
    environment,
    corsOrigin: env.CORS_ORIGIN || '*',
    defaultLanguage: env.DEFAULT_LANGUAGE || 'fr',
    defaultCountry: env.DEFAULT_COUNTRY || 'france',
    googleMaps: {
      apiKey: env.GOOGLE_MAPS_API_KEY || '',
      baseUrl: env.GOOGLE_MAPS_BASE_URL || 'https://maps.googleapis.com/maps/api',
      timeoutMs: parseInteger(env.GOOGLE_MAPS_TIMEOUT_MS, 10000),
      cacheTtlSeconds: parseInteger(env.GOOGLE_MAPS_CACHE_TTL, 300)
    },
    auth: {
      apiKeys: readApiKeys(env, environment)
    },
    rateLimit: {
      maxRequests: parseInteger(env.RATE_LIMIT_MAX_REQUESTS, 1000),
      windowMs: parseInteger(env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000),
      cleanupIntervalMs: parseInteger(env.RATE_LIMIT_CLEANUP_INTERVAL, 5 * 60 * 1000)
    }
  };
}

export const config: ServiceConfig = loadConfig();

export default config;
