import { type RelayConfig, configSchema } from './types.js';

/**
 * Load configuration from environment variables
 * Following 12-factor app methodology
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const envConfig = {
    server: {
      host: env.RELAY_HOST,
      port: readInt(env.RELAY_PORT),
    },
    receiver: {
      host: env.RELAY_RECEIVER_HOST,
      port: readInt(env.RELAY_RECEIVER_PORT),
    },
    storage: {
      provider: env.RELAY_STORAGE_PROVIDER,
      connectionString: readString(env.RELAY_STORAGE_CONNECTION_STRING),
      fileStorage: {
        dataDir: env.RELAY_FILE_DATA_DIR,
        lockTimeout: readInt(env.RELAY_FILE_LOCK_TIMEOUT),
      },
      mongodb: {
        database: env.RELAY_MONGODB_DATABASE,
      },
      redis: {
        database: readInt(env.RELAY_REDIS_DATABASE),
        keyPrefix: env.RELAY_REDIS_KEY_PREFIX,
      },
    },
    proxy: {
      defaultEndpoint: readString(env.RELAY_DEFAULT_ENDPOINT),
      // WEBHOOK_PUBLIC_BASE_URL is accepted for deployments that already set it
      publicBaseUrl: readString(env.RELAY_PUBLIC_BASE_URL) ?? readString(env.WEBHOOK_PUBLIC_BASE_URL),
      protocol: env.RELAY_PROTOCOL,
      eventTimeoutMs: readInt(env.RELAY_EVENT_TIMEOUT_MS),
      submitTimeoutMs: readInt(env.RELAY_SUBMIT_TIMEOUT_MS),
      agentCardTimeoutMs: readInt(env.RELAY_AGENT_CARD_TIMEOUT_MS),
    },
    logging: {
      level: env.RELAY_LOG_LEVEL,
    },
  };

  // Remove undefined values to let Joi apply defaults
  const cleanConfig = removeUndefined(envConfig);

  const { error, value } = configSchema.validate(cleanConfig, {
    allowUnknown: false,
    stripUnknown: true,
  });

  if (error) {
    throw new Error(`Configuration validation failed: ${error.message}`);
  }

  return value;
}

function readInt(raw: string | undefined): number | undefined {
  return raw ? parseInt(raw, 10) : undefined;
}

function readString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Recursively remove undefined values from an object
 */
function removeUndefined(input: unknown): unknown {
  if (input === null || typeof input !== 'object') {
    return input;
  }

  if (Array.isArray(input)) {
    return input.map(removeUndefined);
  }

  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      cleaned[key] = removeUndefined(value);
    }
  }
  return cleaned;
}

/**
 * Build the callback URL a target agent posts results to
 */
export function buildCallbackUrl(publicBaseUrl: string, protocol: string, todolistId: string): string {
  return `${publicBaseUrl}/webhook/${protocol}/todolist/${encodeURIComponent(todolistId)}`;
}

/**
 * Get environment-specific configuration examples
 */
export function getConfigExamples(): Record<string, Record<string, string>> {
  return {
    development: {
      RELAY_STORAGE_PROVIDER: 'file',
      RELAY_FILE_DATA_DIR: './data',
      RELAY_LOG_LEVEL: 'debug',
      RELAY_DEFAULT_ENDPOINT: 'http://localhost:9999',
    },
    production: {
      RELAY_HOST: '0.0.0.0',
      RELAY_PORT: '3000',
      RELAY_RECEIVER_PORT: '3001',
      RELAY_STORAGE_PROVIDER: 'redis',
      RELAY_STORAGE_CONNECTION_STRING: 'redis://localhost:6379',
      RELAY_PUBLIC_BASE_URL: 'https://relay.example.com',
      RELAY_LOG_LEVEL: 'info',
    },
  };
}

export * from './types.js';
