import path from 'path';

export interface AppConfig {
  http: {
    userAgent: string;
    timeoutMs: number;
    authTimeoutMs: number;
    pageLimit: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
  };
  paths: {
    dataDir: string;
    definitionsPath: string;
  };
}

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
};

export const config: AppConfig = {
  http: {
    userAgent: process.env.USER_AGENT ?? 'crm-extractor/1.0',
    timeoutMs: numberFromEnv(process.env.HTTP_TIMEOUT_MS, 60_000),
    authTimeoutMs: numberFromEnv(process.env.AUTH_TIMEOUT_MS, 30_000),
    pageLimit: numberFromEnv(process.env.PAGE_LIMIT, 1000)
  },
  retry: {
    maxAttempts: numberFromEnv(process.env.RETRY_MAX_ATTEMPTS, 5),
    baseDelayMs: numberFromEnv(process.env.RETRY_BASE_DELAY_MS, 1000)
  },
  paths: {
    dataDir: process.env.DATA_DIR ?? './data',
    definitionsPath: process.env.ENDPOINT_DEFINITIONS ?? path.resolve(__dirname, '../../config/endpoints.yaml')
  }
};
