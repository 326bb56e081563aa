/**
 * chat command
 *
 * Interactive session against a dataset. Every line is one question; the
 * whole REPL shares a single analyst session so follow-ups and
 * clarification answers carry over.
 */

import { createInterface } from 'node:readline';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage } from '../../common/errors.js';
import { openDataset } from '../../common/services/dataset-loader.js';
import { getAnalystConfig } from '../../console/analyst/config.js';
import { AnalystEngine } from '../../console/analyst/engine.js';
import { prepareCommand } from '../environment.js';
import { formatResponse } from '../format.js';

export interface ChatOptions {
  dataset?: string;
  table?: string;
}

const EXIT_WORDS = new Set(['exit', 'quit', ':q']);

export async function chatCommand(options: ChatOptions): Promise<void> {
  const spinner = ora('Loading dataset...').start();
  let engine: AnalystEngine;
  try {
    const env = prepareCommand(options);
    const dataset = openDataset({ path: env.DATASET_PATH, table: env.DATASET_TABLE });
    engine = new AnalystEngine(dataset, { config: getAnalystConfig() });
    spinner.succeed('Dataset loaded');
  } catch (error) {
    spinner.fail(`Failed to load dataset: ${errorMessage(error)}`);
    process.exitCode = 1;
    return;
  }

  const sessionId = engine.createSession();
  console.log(chalk.bold('\n' + '='.repeat(60)));
  console.log(chalk.bold('  Transaction analyst'));
  console.log(chalk.bold('='.repeat(60)));
  console.log(chalk.dim(`  session ${sessionId}`));
  console.log(chalk.dim('  type "reset" to clear context, "exit" to quit\n'));

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: chalk.cyan('? ') });
  rl.prompt();

  for await (const raw of rl) {
    const line = raw.trim();
    if (EXIT_WORDS.has(line.toLowerCase())) break;

    if (line.toLowerCase() === 'reset') {
      engine.resetSession(sessionId);
      console.log(chalk.dim('  context cleared'));
    } else if (line.length > 0) {
      try {
        const response = await engine.handleQuery(line, sessionId);
        console.log(chalk.dim(`  intent ${response.intent} (${response.confidence})`));
        for (const out of formatResponse(response)) console.log(out);
      } catch (error) {
        console.log(chalk.red(`  Error: ${errorMessage(error)}`));
      }
    }
    console.log();
    rl.prompt();
  }

  rl.close();
}
