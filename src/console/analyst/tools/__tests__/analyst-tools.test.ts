/**
 * Jest Unit Tests for the analyst MCP tool handlers
 */

import { createAnalystToolHandlers, type AnalystToolHandlers, type ToolResult } from '../analyst-tools.js';
import { AnalystQuerySchema, SupportedEntitiesSchema } from '../tool-schemas.js';
import { AnalystEngine } from '../../engine.js';
import { DEFAULT_ANALYST_CONFIG } from '../../config.js';
import { InMemoryTransactionDataset } from '../../../../common/services/memory-dataset.js';
import { FailingDataset, SAMPLE_TRANSACTIONS } from '../../__tests__/fixtures.js';

function parse(result: ToolResult): unknown {
  return JSON.parse(result.content[0].text);
}

describe('Analyst tools', () => {
  let engine: AnalystEngine;
  let handlers: AnalystToolHandlers;

  beforeEach(() => {
    engine = new AnalystEngine(new InMemoryTransactionDataset(SAMPLE_TRANSACTIONS), { config: DEFAULT_ANALYST_CONFIG });
    handlers = createAnalystToolHandlers(engine);
  });

  // ==========================================================================
  // SCHEMAS
  // ==========================================================================

  describe('Schemas', () => {
    test('query must not be empty', () => {
      expect(AnalystQuerySchema.safeParse({ query: '' }).success).toBe(false);
      expect(AnalystQuerySchema.safeParse({ query: 'fraud', session_id: 'abc' }).success).toBe(true);
    });

    test('dimension defaults to all', () => {
      expect(SupportedEntitiesSchema.parse({})).toEqual({ dimension: 'all' });
    });
  });

  // ==========================================================================
  // HANDLERS
  // ==========================================================================

  test('analyst_query returns the response as JSON', async () => {
    const result = await handlers.query({ query: 'average amount', session_id: 'abc' });

    expect(result.isError).toBeUndefined();
    expect(parse(result)).toMatchObject({
      session_id: 'abc',
      intent: 'descriptive',
      confidence: 0.75,
      entities: { metric: 'avg' },
      result: { kind: 'descriptive', total_count: 8 },
    });
  });

  test('history lists answered turns', async () => {
    await handlers.query({ query: 'average amount', session_id: 'abc' });
    const result = await handlers.history({ session_id: 'abc' });

    expect(parse(result)).toMatchObject({
      session_id: 'abc',
      turns: [{ query: 'average amount', intent: 'descriptive', responseSummary: '8 transactions, average 318.75' }],
    });
  });

  test('history of an unknown session is an error result', async () => {
    const result = await handlers.history({ session_id: 'missing' });
    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error: Session not found or expired: missing' }],
      isError: true,
    });
  });

  test('reset and delete', async () => {
    await handlers.query({ query: 'average amount', session_id: 'abc' });

    expect(parse(await handlers.reset({ session_id: 'abc' }))).toEqual({ session_id: 'abc', reset: true });
    expect(engine.getHistory('abc')).toEqual([]);

    expect(parse(await handlers.remove({ session_id: 'abc' }))).toEqual({ session_id: 'abc', deleted: true });
    expect(parse(await handlers.remove({ session_id: 'abc' }))).toEqual({ session_id: 'abc', deleted: false });
  });

  test('dataset failures become error results', async () => {
    const failing = createAnalystToolHandlers(new AnalystEngine(new FailingDataset(), { config: DEFAULT_ANALYST_CONFIG }));
    const result = await failing.query({ query: 'average amount' });
    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe('Error: dataset unavailable');
  });

  test('supported entities for one dimension', async () => {
    const result = parse(await handlers.supportedEntities({ dimension: 'device_type' }));
    expect(result).toMatchObject({
      dictionary_version: '1.0',
      values: { device_type: ['Android', 'iOS', 'Web'] },
      metrics: ['amount', 'count', 'avg', 'fraud_rate', 'failure_rate'],
    });
  });

  test('supported entities for all dimensions', async () => {
    const result = parse(await handlers.supportedEntities({ dimension: 'all' }));
    expect(result).toMatchObject({
      values: {
        merchant_category: expect.arrayContaining(['Food', 'Travel']),
        transaction_status: ['success', 'failed', 'pending'],
      },
    });
  });
});
