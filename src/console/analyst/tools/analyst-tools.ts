/**
 * Analyst MCP Tools
 *
 * Exposes the analyst engine over MCP:
 *
 *   analyst_query({ query: "fraud rate by sender bank", session_id? })
 *   analyst_session_history({ session_id })
 *   analyst_session_reset({ session_id })
 *   analyst_session_delete({ session_id })
 *   analyst_supported_entities({ dimension? })
 *
 * Results are JSON text. Failures come back as `isError` results rather than
 * protocol errors.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { errorMessage } from '../../../common/errors.js';
import { logError, logInfo } from '../../../common/services/logger.js';
import { DICTIONARY_DIMENSIONS, getEntityDictionary, type EntityDictionary } from '../../../knowledge/dictionary.js';
import type { AnalystEngine } from '../engine.js';
import {
  AnalystQuerySchema,
  SessionIdSchema,
  SupportedEntitiesSchema,
  type AnalystQueryInput,
  type SessionIdInput,
  type SupportedEntitiesInput,
} from './tool-schemas.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface AnalystToolHandlers {
  query(input: AnalystQueryInput): Promise<ToolResult>;
  history(input: SessionIdInput): Promise<ToolResult>;
  reset(input: SessionIdInput): Promise<ToolResult>;
  remove(input: SessionIdInput): Promise<ToolResult>;
  supportedEntities(input: SupportedEntitiesInput): Promise<ToolResult>;
}

const METRICS = ['amount', 'count', 'avg', 'fraud_rate', 'failure_rate'];

const TIME_REFERENCES = [
  'today',
  'yesterday',
  'this week',
  'this month',
  'this year',
  'last week',
  'last month',
  'morning',
  'afternoon',
  'evening',
  'night',
  'peak',
];

// =============================================================================
// HANDLERS
// =============================================================================

function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function errorResult(tool: string, error: unknown): ToolResult {
  const message = errorMessage(error);
  logError('Tool call failed', { phase: 'tool', tool, error: message });
  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}

/**
 * Tool handlers bound to an engine
 */
export function createAnalystToolHandlers(
  engine: AnalystEngine,
  dictionary: EntityDictionary = getEntityDictionary()
): AnalystToolHandlers {
  return {
    async query({ query, session_id }) {
      try {
        return jsonResult(await engine.handleQuery(query, session_id));
      } catch (error) {
        return errorResult('analyst_query', error);
      }
    },

    async history({ session_id }) {
      try {
        return jsonResult({ session_id, turns: engine.getHistory(session_id) });
      } catch (error) {
        return errorResult('analyst_session_history', error);
      }
    },

    async reset({ session_id }) {
      try {
        engine.resetSession(session_id);
        return jsonResult({ session_id, reset: true });
      } catch (error) {
        return errorResult('analyst_session_reset', error);
      }
    },

    async remove({ session_id }) {
      return jsonResult({ session_id, deleted: engine.deleteSession(session_id) });
    },

    async supportedEntities({ dimension }) {
      const dimensions = dimension === 'all' ? DICTIONARY_DIMENSIONS : DICTIONARY_DIMENSIONS.filter((d) => d === dimension);
      const values = Object.fromEntries(dimensions.map((d) => [d, dictionary.values[d]]));
      return jsonResult({
        dictionary_version: dictionary.version,
        values,
        metrics: METRICS,
        time_references: TIME_REFERENCES,
      });
    },
  };
}

// =============================================================================
// TOOL REGISTRATION
// =============================================================================

/**
 * Register the analyst tools with the MCP server
 */
export function registerAnalystTools(server: McpServer, engine: AnalystEngine): void {
  const handlers = createAnalystToolHandlers(engine);

  server.tool(
    'analyst_query',
    'Ask a question about the transaction dataset. Returns descriptive statistics, a comparison, a segmentation or a risk analysis, or a clarification question when a grouping needs a sender/receiver direction. Pass session_id to continue a conversation.',
    AnalystQuerySchema.shape,
    async (args) => handlers.query(args)
  );

  server.tool(
    'analyst_session_history',
    'List the answered turns of an analyst session.',
    SessionIdSchema.shape,
    async (args) => handlers.history(args)
  );

  server.tool(
    'analyst_session_reset',
    'Clear the memory of an analyst session but keep its ID.',
    SessionIdSchema.shape,
    async (args) => handlers.reset(args)
  );

  server.tool(
    'analyst_session_delete',
    'Delete an analyst session.',
    SessionIdSchema.shape,
    async (args) => handlers.remove(args)
  );

  server.tool(
    'analyst_supported_entities',
    'List the categories, states, banks and other values the analyst recognises.',
    SupportedEntitiesSchema.shape,
    async (args) => handlers.supportedEntities(args)
  );

  logInfo('Registered analyst tools', { phase: 'startup', tools: 5 });
}
