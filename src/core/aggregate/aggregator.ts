// src/core/aggregate/aggregator.ts
import type { BatchResult, ItemOutcome } from '../types/index.js';

export type CountMode = 'items' | 'identifiers';

export interface Tally {
  total: number;
  succeeded: number;
  failed: number;
  downloaded: number;
}

export type SummaryFn = (tally: Tally) => string;

/**
 * `identifiers` mode counts the rows each successful item fetched, so a
 * favourites folder URL counts its entries rather than the folder itself.
 */
export function tally(outcomes: readonly ItemOutcome[], mode: CountMode): Tally {
  let succeeded = 0;
  let failed = 0;
  let rows = 0;

  for (const outcome of outcomes) {
    if (outcome.status === 'success') {
      succeeded++;
      rows += outcome.payloadSize;
    } else {
      failed++;
    }
  }

  return {
    total: outcomes.length,
    succeeded,
    failed,
    downloaded: mode === 'items' ? succeeded : rows,
  };
}

/**
 * Folds per-item outcomes into one report. Partial failure still counts as
 * success; producing nothing usable does not.
 */
export function aggregate(
  outcomes: readonly ItemOutcome[],
  mode: CountMode,
  summarize: SummaryFn
): BatchResult {
  const counts = tally(outcomes, mode);

  return {
    success: counts.downloaded > 0,
    message: summarize(counts),
    downloadedCount: counts.downloaded,
    failedCount: counts.failed,
    details: [...outcomes],
  };
}
