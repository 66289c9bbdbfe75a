#!/usr/bin/env node

/**
 * Relay HTTP processes
 * The executor server takes tasks from callers; the webhook receiver takes
 * push notifications from target agents. Each runs in its own process.
 */

import { fileURLToPath } from 'node:url';
import { loadConfig, type RelayConfig } from './config/index.js';
import { RelayHttpServer } from './server.js';
import { WebhookHttpServer } from './webhookServer.js';

interface Stoppable {
  stop(): Promise<void>;
}

function handleShutdown(name: string, server: Stoppable): void {
  const shutdown = async (): Promise<void> => {
    console.log(`\n🛑 Shutting down ${name}...`);
    try {
      await server.stop();
      console.log(`✅ ${name} stopped gracefully`);
      process.exit(0);
    } catch (error) {
      console.error('❌ Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

function printStorage(config: RelayConfig): void {
  console.log(`   Storage: ${config.storage.provider}`);
  if (config.storage.provider === 'file' && config.storage.fileStorage) {
    console.log(`   Data dir: ${config.storage.fileStorage.dataDir}`);
  }
}

export async function runExecutorServer(config: RelayConfig = loadConfig()): Promise<void> {
  console.log('🌐 Starting relay executor server...');

  const { host, port } = config.server;
  console.log(`📡 Server configuration:`);
  console.log(`   Host: ${host}`);
  console.log(`   Port: ${port}`);
  printStorage(config);
  console.log(`   Default endpoint: ${config.proxy.defaultEndpoint ?? '(none)'}`);
  console.log(
    `   Non-blocking delivery: ${config.proxy.publicBaseUrl ? `callbacks to ${config.proxy.publicBaseUrl}` : 'disabled (no public base URL)'}`
  );

  const server = new RelayHttpServer(config);
  handleShutdown('executor server', server);
  await server.start();

  console.log('✅ Relay executor server is running!');
  console.log(`🔗 API available at: http://${host}:${port}/api`);
  console.log(`🔍 Health check: http://${host}:${port}/health`);
  console.log('');
  console.log('📋 API Endpoints:');
  console.log('   POST /api/tasks                   - Submit a task (JSON, or SSE with Accept: text/event-stream)');
  console.log('   POST /api/tasks/:id/cancel        - Cancel a live blocking stream');
  console.log('   GET  /api/tasks/:id/events        - Stored event log');
  console.log('   GET  /metrics                     - Prometheus metrics');
  console.log('');
  console.log('💡 Press Ctrl+C to stop the server');
}

export async function runWebhookReceiver(config: RelayConfig = loadConfig()): Promise<void> {
  console.log('🪝 Starting relay webhook receiver...');

  const { host, port } = config.receiver;
  console.log(`📡 Receiver configuration:`);
  console.log(`   Host: ${host}`);
  console.log(`   Port: ${port}`);
  console.log(`   Protocol: ${config.proxy.protocol}`);
  printStorage(config);

  const server = new WebhookHttpServer(config);
  handleShutdown('webhook receiver', server);
  await server.start();

  console.log('✅ Webhook receiver is running!');
  console.log(`🔗 Callbacks: POST http://${host}:${port}/webhook/${config.proxy.protocol}/todolist/:todolistId`);
  console.log(`🔍 Health check: http://${host}:${port}/health`);
  console.log('');
  console.log('💡 Press Ctrl+C to stop the receiver');
}

// Allow running directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const run = process.argv.includes('--receiver') ? runWebhookReceiver : runExecutorServer;
  run().catch((error: unknown) => {
    console.error('❌ Failed to start:', error);
    process.exit(1);
  });
}
