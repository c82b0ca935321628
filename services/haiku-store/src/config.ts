import 'dotenv/config';

const IS_TEST = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

export interface StoreCredentials {
  url?: string;
  key?: string;
}

export interface AppConfig {
  port: number;
  host: string;
  store: StoreCredentials & {
    keyPrefix: string;
    connectTimeoutMs: number;
    maxRetriesPerRequest: number;
  };
  // Query bounds applied at the HTTP edge and as service defaults
  limits: {
    defaultLimit: number;
    maxLimit: number;
    subjectMaxLength: number;
  };
  log: {
    level: string;
    pretty: boolean;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseInt(env.PORT || '8080', 10),
    host: env.HOST || '0.0.0.0',
    store: {
      url: env.HAIKU_STORE_URL || undefined,
      key: env.HAIKU_STORE_KEY || undefined,
      keyPrefix: env.HAIKU_STORE_KEY_PREFIX || 'haiku',
      connectTimeoutMs: parseInt(env.HAIKU_STORE_CONNECT_TIMEOUT_MS || '5000', 10),
      maxRetriesPerRequest: parseInt(env.HAIKU_STORE_MAX_RETRIES || '1', 10),
    },
    limits: {
      defaultLimit: 10,
      maxLimit: 100,
      subjectMaxLength: 200,
    },
    log: {
      level: env.LOG_LEVEL || (IS_TEST ? 'silent' : 'info'),
      pretty: env.LOG_PRETTY === 'true',
    },
  };
}

export const config = loadConfig();
