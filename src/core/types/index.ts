// src/core/types/index.ts
export type Platform = 'douyin' | 'tiktok';

export const ACTION_NAMES = [
  'detail',
  'account',
  'live',
  'comment',
  'mix',
  'user',
  'search',
  'hot',
  'collection',
  'collection_music',
  'collects',
  'detail_unofficial',
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

export type AccountTab = 'post' | 'favorite' | 'collection';

export type SearchType = 'general' | 'user' | 'video' | 'live';

export type StorageFormat = '' | 'csv' | 'jsonl';

/**
 * Caller-supplied inputs before normalization. Left as `unknown` because the
 * entry point accepts whatever a CLI or HTTP shim hands it.
 */
export type RawInputs = unknown;

export interface InvocationRequest {
  action: string;
  primaryCredential: string;
  altCredential?: string;
  inputs: RawInputs;
  options: Record<string, unknown>;
}

export type ItemStatus = 'success' | 'failed';

export interface ItemOutcome {
  input: string;
  status: ItemStatus;
  extractedIds: string[];
  error?: string;
  payloadSize: number;
}

export interface BatchResult {
  success: boolean;
  message: string;
  downloadedCount: number;
  failedCount: number;
  details: ItemOutcome[];
}
