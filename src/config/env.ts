import { cleanEnv, str, num, bool, url } from 'envalid';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

/**
 * Validated environment variables
 *
 * Using envalid for runtime validation and type safety:
 * - Validates types (string, number, boolean, url)
 * - Enforces choices for enums
 * - Fails fast on startup if a value is malformed
 *
 * KIS credentials are optional here: requests may carry their own,
 * and without any the service serves the fallback dataset.
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Server Configuration
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment (affects logging, error handling, CORS)',
  }),
  PORT: num({
    default: 3000,
    desc: 'HTTP server port',
  }),

  // ==========================================
  // Logging & Metrics Configuration
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info',
    desc: 'Minimum log level to output',
  }),
  LOG_PRETTY: bool({
    default: true,
    desc: 'Pretty-print logs in development (false for JSON logs)',
  }),
  METRICS_TYPE: str({
    choices: ['prometheus', 'noop'],
    default: 'prometheus',
    desc: 'Metrics backend: in-memory Prometheus registry or no-op',
  }),

  // ==========================================
  // Quote Provider (Korea Investment & Securities)
  // ==========================================
  KIS_BASE_URL: url({
    default: 'https://openapi.koreainvestment.com:9443',
    desc: 'KIS open API base URL',
  }),
  KIS_APP_KEY: str({
    default: '',
    desc: 'KIS app key used when a request carries no credentials',
  }),
  KIS_APP_SECRET: str({
    default: '',
    desc: 'KIS app secret used when a request carries no credentials',
  }),
  KIS_ACCOUNT_NUMBER: str({
    default: '',
    desc: 'KIS account number (accepted, not used by the ranking pipeline)',
  }),
  KIS_HTTP_TIMEOUT_MS: num({
    default: 10_000,
    desc: 'Timeout for every outbound KIS request',
  }),

  // ==========================================
  // Snapshot Pipeline
  // ==========================================
  USE_LIVE_DATA: bool({
    default: false,
    desc: 'Default for the "use live data" flag when a request omits it',
  }),
  SNAPSHOT_CACHE_TTL_SECONDS: num({
    default: 300,
    desc: 'Validity window of a cached universe snapshot batch',
  }),
});

export type Env = typeof env;
