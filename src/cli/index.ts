#!/usr/bin/env node
/**
 * txn-insight CLI
 *
 * Usage:
 *   txn-insight chat --dataset data/transactions.csv
 *   txn-insight ask "fraud rate by sender bank" --json
 *   txn-insight serve
 */

import 'dotenv/config';
import { Command } from 'commander';
import { errorMessage } from '../common/errors.js';
import { SERVER_VERSION, runStdio } from '../console/index.js';
import { askCommand } from './commands/ask.js';
import { chatCommand } from './commands/chat.js';

const program = new Command();

program
  .name('txn-insight')
  .description('Conversational analytics over transaction data')
  .version(SERVER_VERSION);

program
  .command('chat')
  .description('Start an interactive analyst session')
  .option('--dataset <path>', 'CSV, XLSX or SQLite file (defaults to DATASET_PATH)')
  .option('--table <name>', 'Table name for SQLite datasets')
  .action(chatCommand);

program
  .command('ask <question>')
  .description('Answer a single question')
  .option('--dataset <path>', 'CSV, XLSX or SQLite file (defaults to DATASET_PATH)')
  .option('--table <name>', 'Table name for SQLite datasets')
  .option('--json', 'Print the raw response as JSON', false)
  .action(askCommand);

program
  .command('serve')
  .description('Serve the analyst over MCP stdio')
  .option('--dataset <path>', 'CSV, XLSX or SQLite file (defaults to DATASET_PATH)')
  .action(async (options: { dataset?: string }) => {
    try {
      await runStdio({ datasetPath: options.dataset });
    } catch (error) {
      console.error(`Fatal error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

program.parseAsync().catch((error) => {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
