/**
 * Open the configured dataset
 *
 * `.db` / `.sqlite` / `.sqlite3` paths open read-only through better-sqlite3;
 * anything else (CSV, XLSX) is loaded into memory.
 */

import type { TransactionDataset } from '../types.js';
import { datasetBackend } from '../environment.js';
import { logInfo } from './logger.js';
import { InMemoryTransactionDataset } from './memory-dataset.js';
import { SqliteTransactionDataset } from './sqlite-dataset.js';

export interface DatasetSource {
  path: string;
  table?: string;
}

/**
 * @throws DatasetError when the file cannot be opened or read
 */
export function openDataset(source: DatasetSource): TransactionDataset {
  const backend = datasetBackend(source.path);
  logInfo('Opening dataset', { phase: 'startup', path: source.path, backend });

  if (backend === 'sqlite') {
    return SqliteTransactionDataset.open(source.path, source.table);
  }
  return InMemoryTransactionDataset.fromFile(source.path);
}
