/**
 * Application configuration with environment variable support
 */

export interface ApiConfig {
  graphqlUrl: string;
  restUrl: string;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
}

export interface PollingConfig {
  initialDelaySeconds: number;
  intervalSeconds: number;
  backoffMultiplier: number;
  maxAttempts: number;
  /** Wall-clock ceiling for the whole poll loop; 0 disables it */
  maxElapsedSeconds: number;
}

export interface AppConfig {
  apiKey?: string;
  api: ApiConfig;
  polling: PollingConfig;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: AppConfig = {
  api: {
    graphqlUrl: 'https://apps.cloudhealthtech.com/graphql',
    restUrl: 'https://chapi.cloudhealthtech.com',
    requestTimeoutMs: 30000,
    downloadTimeoutMs: 60000,
  },
  polling: {
    initialDelaySeconds: 15,
    intervalSeconds: 10,
    backoffMultiplier: 1.5,
    maxAttempts: 5,
    maxElapsedSeconds: 900,
  },
};

/**
 * Parse numeric environment variable with fallback.
 * Non-finite values and values rejected by `accept` fall back too.
 */
export function parseNumber(
  value: string | undefined,
  fallback: number,
  accept: (parsed: number) => boolean = () => true
): number {
  if (!value?.trim()) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && accept(parsed) ? parsed : fallback;
}

export const isNonNegative = (value: number): boolean => value >= 0;
export const isPositive = (value: number): boolean => value > 0;
export const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

function parseString(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

/**
 * Load configuration from environment variables with defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const apiKey = env.CLOUDHEALTH_API_KEY?.trim();
  const { api, polling } = DEFAULT_CONFIG;

  return {
    apiKey: apiKey ? apiKey : undefined,
    api: {
      graphqlUrl: parseString(env.CLOUDHEALTH_GRAPHQL_URL, api.graphqlUrl),
      restUrl: parseString(env.CLOUDHEALTH_REST_URL, api.restUrl),
      requestTimeoutMs: parseNumber(env.FLEXREPORT_REQUEST_TIMEOUT_MS, api.requestTimeoutMs, isNonNegative),
      downloadTimeoutMs: parseNumber(env.FLEXREPORT_DOWNLOAD_TIMEOUT_MS, api.downloadTimeoutMs, isNonNegative),
    },
    polling: {
      initialDelaySeconds: parseNumber(env.FLEXREPORT_INITIAL_DELAY_SECONDS, polling.initialDelaySeconds, isNonNegative),
      intervalSeconds: parseNumber(env.FLEXREPORT_POLL_INTERVAL_SECONDS, polling.intervalSeconds, isNonNegative),
      backoffMultiplier: parseNumber(env.FLEXREPORT_BACKOFF_MULTIPLIER, polling.backoffMultiplier, isPositive),
      maxAttempts: parseNumber(env.FLEXREPORT_MAX_POLL_ATTEMPTS, polling.maxAttempts, isPositiveInteger),
      maxElapsedSeconds: parseNumber(env.FLEXREPORT_MAX_ELAPSED_SECONDS, polling.maxElapsedSeconds, isNonNegative),
    },
  };
}

/**
 * Singleton configuration instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (mainly for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Override specific configuration values (mainly for testing)
 */
export function setConfig(overrides: Partial<AppConfig>): void {
  configInstance = {
    ...getConfig(),
    ...overrides,
  };
}
