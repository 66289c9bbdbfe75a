import Joi from 'joi';

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface RelayConfig {
  // Executor HTTP surface (task submission)
  server: {
    host: string;
    port: number;
  };

  // Webhook listener, usually a separate process
  receiver: {
    host: string;
    port: number;
  };

  // Event store shared by executor and receiver
  storage: {
    provider: 'file' | 'mongodb' | 'redis';
    connectionString?: string;
    fileStorage?: {
      dataDir: string;
      lockTimeout: number;
    };
    mongodb?: {
      database: string;
    };
    redis?: {
      database: number;
      keyPrefix: string;
    };
  };

  proxy: {
    defaultEndpoint?: string;
    publicBaseUrl?: string;
    protocol: string;
    eventTimeoutMs: number;
    submitTimeoutMs: number;
    agentCardTimeoutMs: number;
  };

  logging: {
    level: LogLevelName;
  };
}

const httpUrl = Joi.string().uri({ scheme: ['http', 'https'] });

export const configSchema = Joi.object<RelayConfig>({
  server: Joi.object({
    host: Joi.string().default('localhost'),
    port: Joi.number().port().default(3000),
  }).default(),

  receiver: Joi.object({
    host: Joi.string().default('0.0.0.0'),
    port: Joi.number().port().default(3001),
  }).default(),

  storage: Joi.object({
    provider: Joi.string().valid('file', 'mongodb', 'redis').default('file'),
    connectionString: Joi.string().when('provider', {
      is: Joi.valid('mongodb', 'redis'),
      then: Joi.required(),
      otherwise: Joi.optional(),
    }),
    fileStorage: Joi.object({
      dataDir: Joi.string().default('./data'),
      lockTimeout: Joi.number().integer().min(1000).default(30000),
    }).when('provider', {
      is: 'file',
      then: Joi.required(),
      otherwise: Joi.optional(),
    }),
    mongodb: Joi.object({
      database: Joi.string().default('agent_relay'),
    }).when('provider', {
      is: 'mongodb',
      then: Joi.required(),
      otherwise: Joi.optional(),
    }),
    redis: Joi.object({
      database: Joi.number().integer().min(0).default(0),
      keyPrefix: Joi.string().default('relay:'),
    }).when('provider', {
      is: 'redis',
      then: Joi.required(),
      otherwise: Joi.optional(),
    }),
  }).default(),

  proxy: Joi.object({
    defaultEndpoint: httpUrl.optional(),
    publicBaseUrl: httpUrl.replace(/\/+$/, '').optional(),
    protocol: Joi.string().pattern(/^[a-z0-9-]+$/).default('a2a'),
    eventTimeoutMs: Joi.number().integer().min(1).default(120000),
    submitTimeoutMs: Joi.number().integer().min(1).default(30000),
    agentCardTimeoutMs: Joi.number().integer().min(1).default(10000),
  }).default(),

  logging: Joi.object({
    level: Joi.string().valid('error', 'warn', 'info', 'debug', 'trace').default('info'),
  }).default(),
}).default();
