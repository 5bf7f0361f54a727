// src/core/backend/types.ts
import type { InvocationOptions } from '../config/options.js';
import type { AccountTab, Platform, SearchType, StorageFormat } from '../types/index.js';

export type LinkKind = 'detail' | 'live' | 'mix' | 'collects';

/**
 * Turns provider URLs into opaque identifiers. Either method may answer
 * synchronously; both reject (or throw) when the URL is not recognized.
 */
export interface LinkExtractor {
  extractIdentifiers(url: string, kind: LinkKind, platform: Platform): string[] | Promise<string[]>;
  extractAccountTargets(url: string, platform: Platform): string[] | Promise<string[]>;
}

export type FetchTarget =
  | { kind: 'detail'; ids: string[] }
  | { kind: 'detail_unofficial'; ids: string[] }
  | { kind: 'account'; userId: string; tab: AccountTab; pages: number }
  | { kind: 'mix'; mixIds: string[] }
  | { kind: 'live'; ids: string[] }
  | { kind: 'comment'; ids: string[]; pages: number }
  | { kind: 'user'; ids: string[] }
  | { kind: 'search'; keyword: string; searchType: SearchType; pages: number }
  | { kind: 'hot' }
  | { kind: 'collection' }
  | { kind: 'collection_music' }
  | { kind: 'collects'; ids: string[] };

export interface FetchedItem {
  id: string;
  [field: string]: unknown;
}

export interface RecordingSession {
  write(rows: readonly FetchedItem[]): Promise<void>;
  close(): Promise<void>;
}

export interface RecorderOptions {
  format: StorageFormat;
  name: string;
}

export type RecorderFactory = (root: string, options: RecorderOptions) => Promise<RecordingSession>;

export interface Credentials {
  cookie: string;
  cookieTiktok: string;
}

export type BackendConfig = InvocationOptions;

/**
 * An authenticated connection to the content backend. Retry, backoff and
 * timeouts are the client's business.
 */
export interface FetchClient {
  fetchBatch(target: FetchTarget, platform: Platform, session: RecordingSession): Promise<FetchedItem[]>;
  close(): Promise<void>;
}

export interface Backend {
  readonly links: LinkExtractor;
  connect(credentials: Credentials, config: BackendConfig): Promise<FetchClient>;
}
