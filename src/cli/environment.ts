/**
 * Shared setup for the CLI commands
 */

import { loadEnvironmentWith, type DatasetOverrides, type Environment } from '../common/environment.js';
import { setLogLevel } from '../common/services/logger.js';

/**
 * Validate the environment with the command's dataset options over it and
 * set the log level. An explicit LOG_LEVEL applies; otherwise only warnings
 * and errors reach stderr.
 *
 * @throws ConfigError when an option or variable is invalid
 */
export function prepareCommand(options: DatasetOverrides, source: NodeJS.ProcessEnv = process.env): Environment {
  const env = loadEnvironmentWith(options, source);
  setLogLevel(source.LOG_LEVEL ? env.LOG_LEVEL : 'warn');
  return env;
}
