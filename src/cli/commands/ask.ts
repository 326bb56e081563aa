/**
 * ask command: answer one question and print the response
 */

import chalk from 'chalk';
import { errorMessage } from '../../common/errors.js';
import { openDataset } from '../../common/services/dataset-loader.js';
import { getAnalystConfig } from '../../console/analyst/config.js';
import { AnalystEngine } from '../../console/analyst/engine.js';
import { prepareCommand } from '../environment.js';
import { formatResponse } from '../format.js';

export interface AskOptions {
  dataset?: string;
  table?: string;
  json?: boolean;
}

export async function askCommand(question: string, options: AskOptions): Promise<void> {
  try {
    const env = prepareCommand(options);
    const dataset = openDataset({ path: env.DATASET_PATH, table: env.DATASET_TABLE });
    const engine = new AnalystEngine(dataset, { config: getAnalystConfig() });
    const response = await engine.handleQuery(question);

    if (options.json) {
      console.log(JSON.stringify(response, null, 2));
      return;
    }
    for (const line of formatResponse(response)) console.log(line);
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exitCode = 1;
  }
}
