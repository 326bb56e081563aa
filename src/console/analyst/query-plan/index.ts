/**
 * Query Plan Builder
 *
 * Maps a classified intent to its builder and runs it against the dataset.
 */

import type { AnalysisResult, IntentType, TransactionDataset } from '../../../common/types.js';
import { logDebug } from '../../../common/services/logger.js';
import { DEFAULT_ANALYST_CONFIG } from '../config.js';
import { buildComparative } from './comparative.js';
import { buildDescriptive } from './descriptive.js';
import { buildRisk } from './risk.js';
import { buildSegmentation } from './segmentation.js';
import type { PlanRequest, PlanSettings } from './plan-context.js';

export type { PlanRequest, PlanSettings } from './plan-context.js';

type PlanBuilder = (dataset: TransactionDataset, request: PlanRequest, settings: PlanSettings) => Promise<AnalysisResult>;

const BUILDERS: Record<IntentType, PlanBuilder> = {
  descriptive: buildDescriptive,
  comparative: buildComparative,
  user_segmentation: buildSegmentation,
  risk_analysis: buildRisk,
};

export class QueryPlanBuilder {
  private readonly settings: PlanSettings;

  constructor(
    private readonly dataset: TransactionDataset,
    settings: Partial<PlanSettings> = {}
  ) {
    this.settings = {
      sampleRowLimit: settings.sampleRowLimit ?? DEFAULT_ANALYST_CONFIG.sampleRowLimit,
      hotspotLimit: settings.hotspotLimit ?? DEFAULT_ANALYST_CONFIG.hotspotLimit,
    };
  }

  /**
   * Build and run the plan for one turn
   *
   * @throws DatasetError when the dataset fails
   */
  async execute(request: PlanRequest): Promise<AnalysisResult> {
    logDebug('Building query plan', { phase: 'plan', intent: request.intent });
    return BUILDERS[request.intent](this.dataset, request, this.settings);
  }
}
