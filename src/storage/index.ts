import type { RelayConfig } from '../config/index.js';
import type { EventStore } from './EventStore.js';
import { FileEventStore } from './FileEventStore.js';
import { MongoEventStore } from './MongoEventStore.js';
import { RedisEventStore } from './RedisEventStore.js';

/**
 * Create an event store based on configuration
 */
export function createEventStore(config: RelayConfig): EventStore {
  switch (config.storage.provider) {
    case 'file':
      if (!config.storage.fileStorage) {
        throw new Error('File storage configuration is required when provider is "file"');
      }
      return new FileEventStore(config.storage.fileStorage.dataDir, config.storage.fileStorage.lockTimeout);

    case 'mongodb':
      if (!config.storage.connectionString) {
        throw new Error('MongoDB connection string is required when using MongoDB storage provider');
      }
      return new MongoEventStore(config.storage.connectionString, config.storage.mongodb?.database ?? 'agent_relay');

    case 'redis':
      if (!config.storage.connectionString) {
        throw new Error('Redis connection string is required when using Redis storage provider');
      }
      return new RedisEventStore(
        config.storage.connectionString,
        config.storage.redis?.database ?? 0,
        config.storage.redis?.keyPrefix ?? 'relay:'
      );

    default:
      throw new Error(`Unknown storage provider: ${String(config.storage.provider)}`);
  }
}

export * from './EventStore.js';
export * from './FileEventStore.js';
export * from './MongoEventStore.js';
export * from './RedisEventStore.js';
