// src/core/export/json.ts
import type { BatchResult, ItemOutcome, ItemStatus } from '../types/index.js';

export interface ReportDetail {
  url: string;
  status: ItemStatus;
  extractedIds?: string[];
  error?: string;
}

export interface BatchReport {
  success: boolean;
  message: string;
  downloadedCount: number;
  failedCount: number;
  details: ReportDetail[];
}

function toDetail(outcome: ItemOutcome): ReportDetail {
  const detail: ReportDetail = { url: outcome.input, status: outcome.status };

  if (outcome.extractedIds.length > 0) {
    detail.extractedIds = [...outcome.extractedIds];
  }
  if (outcome.error !== undefined) {
    detail.error = outcome.error;
  }

  return detail;
}

export function toReport(result: BatchResult): BatchReport {
  return {
    success: result.success,
    message: result.message,
    downloadedCount: result.downloadedCount,
    failedCount: result.failedCount,
    details: result.details.map(toDetail),
  };
}

export function formatJsonOutput(result: BatchResult): string {
  return JSON.stringify(toReport(result), null, 2);
}
