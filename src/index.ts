#!/usr/bin/env node

/**
 * agent-relay
 * Main entry point - runs the executor server, the webhook receiver or the CLI
 */

import { readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { isRecord } from './types/index.js';

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  return isRecord(raw) && typeof raw.version === 'string' ? raw.version : 'unknown';
}

// CLI arguments with the --mode selector taken out
function withoutMode(args: string[]): string[] {
  const rest: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--mode') {
      i++;
      continue;
    }
    if (arg.startsWith('--mode=')) continue;
    rest.push(arg);
  }
  return rest;
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    strict: false,
    options: {
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
      mode: { type: 'string', default: 'executor' },
    },
  });

  if (values.help && positionals.length === 0) {
    console.log(`
agent-relay - Forwarding proxy for agent-to-agent tasks

Usage:
  agent-relay [options] [command]

Options:
  -h, --help     Show this help message
  -v, --version  Show version
  --mode <mode>  Run mode: 'executor', 'receiver', or 'cli' (default: executor)

Executor Mode:
  Accepts tasks over HTTP and forwards them to target agents

Receiver Mode:
  Accepts push notifications from target agents and records results

CLI Mode:
  Submit tasks and inspect stored events from the terminal

Examples:
  agent-relay                                  # Run the executor server
  agent-relay --mode=receiver                  # Run the webhook receiver
  agent-relay submit --message "hi" --endpoint http://localhost:9999
`);
    return;
  }

  if (values.version && positionals.length === 0) {
    console.log(`agent-relay v${readVersion()}`);
    return;
  }

  if (values.mode === 'cli' || positionals.length > 0) {
    const { runCLI } = await import('./cli.js');
    await runCLI(withoutMode(process.argv.slice(2)));
  } else if (values.mode === 'receiver') {
    const { runWebhookReceiver } = await import('./http.js');
    await runWebhookReceiver();
  } else if (values.mode === 'executor') {
    const { runExecutorServer } = await import('./http.js');
    await runExecutorServer();
  } else {
    throw new Error(`Unknown mode: ${String(values.mode)}`);
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
