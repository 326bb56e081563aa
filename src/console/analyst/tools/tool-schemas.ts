import { z } from 'zod';

/**
 * Schema for analyst_query tool
 */
export const AnalystQuerySchema = z.object({
  query: z.string().min(1).describe('Question about the transaction data'),
  session_id: z.string().min(1).optional().describe('Session ID to continue a conversation'),
});

export type AnalystQueryInput = z.infer<typeof AnalystQuerySchema>;

/**
 * Schema for the session tools (history, reset, delete)
 */
export const SessionIdSchema = z.object({
  session_id: z.string().min(1).describe('Session ID returned by analyst_query'),
});

export type SessionIdInput = z.infer<typeof SessionIdSchema>;

/**
 * Schema for analyst_supported_entities tool
 */
export const SupportedEntitiesSchema = z.object({
  dimension: z
    .enum([
      'all',
      'merchant_category',
      'state',
      'bank',
      'age_group',
      'device_type',
      'network_type',
      'transaction_type',
      'transaction_status',
    ])
    .optional()
    .default('all')
    .describe('Limit the listing to one dimension'),
});

export type SupportedEntitiesInput = z.infer<typeof SupportedEntitiesSchema>;
