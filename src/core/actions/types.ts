// src/core/actions/types.ts
import type { CountMode, SummaryFn } from '../aggregate/aggregator.js';
import type { InvocationOptions } from '../config/options.js';
import type { FetchClient, LinkExtractor, RecordingSession } from '../backend/types.js';
import type { Logger } from '../logger.js';
import type { ActionName, ItemOutcome, Platform } from '../types/index.js';

export type InputKind = 'urls' | 'keyword' | 'none';

/**
 * `invocation`: one recording session for the whole call.
 * `item`: a fresh session around every item's fetch.
 */
export type SessionScope = 'invocation' | 'item';

export interface HandlerContext {
  action: ActionName;
  platform: Platform;
  options: InvocationOptions;
  links: LinkExtractor;
  client: FetchClient;
  logger: Logger;
  useSession<T>(body: (session: RecordingSession) => Promise<T>): Promise<T>;
}

export type ActionHandler = (items: readonly string[], ctx: HandlerContext) => Promise<ItemOutcome[]>;

export interface ActionSpec {
  readonly name: ActionName;
  readonly requiresInput: boolean;
  readonly inputKind: InputKind;
  readonly platformRestricted: ReadonlySet<Platform>;
  readonly countMode: CountMode;
  readonly sessionScope: SessionScope;
  readonly summarize: SummaryFn;
  readonly handler: ActionHandler;
}
