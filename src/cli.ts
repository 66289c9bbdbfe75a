#!/usr/bin/env node

/**
 * agent-relay CLI
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { fileURLToPath } from 'node:url';
import chalk from './utils/chalk.js';
import { getConfigExamples, loadConfig, type RelayConfig } from './config/index.js';
import { createEventStore, type EventStore } from './storage/index.js';
import { EndpointResolver } from './services/EndpointResolver.js';
import { ForwardingClient } from './services/ForwardingClient.js';
import { ProxyExecutor } from './services/ProxyExecutor.js';
import type { EventQueue } from './services/EventQueue.js';
import type { TaskEvent } from './types/index.js';
import { taskSubmissionSchema, validate } from './utils/validation.js';
import { formatEvent, formatEventLog, formatJson, formatTask } from './commands/formatters.js';

async function withStore<T>(config: RelayConfig, run: (store: EventStore) => Promise<T>): Promise<T> {
  const store = createEventStore(config);
  await store.initialize();
  try {
    return await run(store);
  } finally {
    await store.close();
  }
}

// Connection strings can carry credentials
function redactConfig(config: RelayConfig): RelayConfig {
  if (!config.storage.connectionString) return config;
  return {
    ...config,
    storage: { ...config.storage, connectionString: config.storage.connectionString.replace(/\/\/[^@/]*@/, '//***@') },
  };
}

interface SubmitArgs {
  message: string;
  endpoint?: string;
  taskId?: string;
  contextId?: string;
  role?: string;
  delivery?: string;
  json: boolean;
}

async function submitTask(config: RelayConfig, args: SubmitArgs): Promise<void> {
  const context = validate(taskSubmissionSchema, {
    message: args.message,
    taskId: args.taskId,
    contextId: args.contextId,
    role: args.role,
    delivery: args.delivery,
    agents: args.endpoint ? [{ endpoint: args.endpoint, role: args.role }] : undefined,
  });

  const task = await withStore(config, async store => {
    const { proxy } = config;
    const executor = new ProxyExecutor(
      store,
      new ForwardingClient({
        eventTimeoutMs: proxy.eventTimeoutMs,
        submitTimeoutMs: proxy.submitTimeoutMs,
        agentCardTimeoutMs: proxy.agentCardTimeoutMs,
      }),
      new EndpointResolver(proxy.defaultEndpoint),
      { publicBaseUrl: proxy.publicBaseUrl, protocol: proxy.protocol }
    );

    const queue: EventQueue = {
      enqueue: (event: TaskEvent) => console.log(args.json ? JSON.stringify(event) : formatEvent(event)),
    };

    // Ctrl+C cancels the live stream instead of killing the process
    const controller = new AbortController();
    const cancel = (): void => controller.abort();
    process.once('SIGINT', cancel);
    try {
      return await executor.execute(context, queue, controller.signal);
    } finally {
      process.removeListener('SIGINT', cancel);
    }
  });

  console.log(args.json ? formatJson(task) : formatTask(task));
  if (task.status === 'failed' || task.status === 'cancelled') {
    process.exitCode = 1;
  }
}

function buildCli(args: string[]) {
  return yargs(args)
    .scriptName('agent-relay')
    .usage('$0 <command> [options]')
    .command('serve', 'Run the executor HTTP server', {}, async () => {
      const { runExecutorServer } = await import('./http.js');
      await runExecutorServer(loadConfig());
    })
    .command('receiver', 'Run the webhook receiver HTTP server', {}, async () => {
      const { runWebhookReceiver } = await import('./http.js');
      await runWebhookReceiver(loadConfig());
    })
    .command(
      'submit',
      'Forward one task to a target agent and print its events',
      y =>
        y
          .option('message', { alias: 'm', type: 'string', demandOption: true, describe: 'Message to send' })
          .option('endpoint', { alias: 'e', type: 'string', describe: 'Target agent URL (default: RELAY_DEFAULT_ENDPOINT)' })
          .option('task-id', { type: 'string', describe: 'Task id; also the todolist id in callbacks' })
          .option('context-id', { type: 'string', describe: 'Conversation context id' })
          .option('role', { type: 'string', describe: 'Preferred agent role' })
          .option('delivery', { type: 'string', choices: ['blocking', 'non_blocking'], describe: 'Delivery mode' })
          .option('json', { type: 'boolean', default: false, describe: 'Print events as JSON lines' }),
      async argv => {
        await submitTask(loadConfig(), {
          message: argv.message,
          endpoint: argv.endpoint,
          taskId: argv['task-id'],
          contextId: argv['context-id'],
          role: argv.role,
          delivery: argv.delivery,
          json: argv.json,
        });
      }
    )
    .command(
      'events <taskId>',
      'Print the stored event log of a task',
      y =>
        y
          .positional('taskId', { type: 'string', demandOption: true, describe: 'Task id' })
          .option('json', { type: 'boolean', default: false, describe: 'Print as JSON' }),
      async argv => {
        const events = await withStore(loadConfig(), store => store.listEvents(argv.taskId));
        console.log(argv.json ? formatJson(events) : formatEventLog(argv.taskId, events));
      }
    )
    .command(
      'config',
      'Print the effective configuration',
      y => y.option('examples', { type: 'boolean', default: false, describe: 'Print example environments instead' }),
      argv => {
        console.log(formatJson(argv.examples ? getConfigExamples() : redactConfig(loadConfig())));
      }
    )
    .demandCommand(1, 'You need at least one command before moving on')
    .strict()
    .fail((msg, err) => {
      if (err) {
        console.error(chalk.red('❌ Error:'), err.message);
      } else {
        console.error(chalk.red('❌ Error:'), msg);
        console.error('\nRun --help to see available commands and options');
      }
      process.exit(1);
    })
    .help()
    .version()
    .alias('h', 'help');
}

export async function runCLI(args: string[] = hideBin(process.argv)): Promise<void> {
  await buildCli(args).parseAsync();
}

// Run when executed directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  runCLI().catch((error: unknown) => {
    console.error(chalk.red('❌ CLI error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
