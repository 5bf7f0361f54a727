// src/core/batch/executor.ts
import { NO_IDENTIFIERS_MESSAGE } from '../config/constants.js';
import { DispatchError, ErrorCode, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { err, ok, type Result } from './result.js';
import type { FetchedItem } from '../backend/types.js';
import type { ItemOutcome } from '../types/index.js';

export interface ItemPipeline {
  /** Omitted for actions that take no per-item input (hot list, own favourites). */
  extract?(item: string): string[] | Promise<string[]>;
  fetch(item: string, ids: string[]): Promise<FetchedItem[]>;
}

export interface ItemSuccess {
  extractedIds: string[];
  payloadSize: number;
}

export interface ItemError {
  code: ErrorCode.EXTRACT_FAILED | ErrorCode.FETCH_FAILED;
  message: string;
  extractedIds: string[];
}

export type ItemResult = Result<ItemSuccess, ItemError>;

/**
 * Resource failures are the only errors allowed to abort a batch.
 */
function isBatchFatal(error: unknown): boolean {
  return error instanceof DispatchError && error.code === ErrorCode.RESOURCE_UNAVAILABLE;
}

function itemError(code: ItemError['code'], message: string, extractedIds: string[] = []): ItemError {
  return { code, message, extractedIds };
}

async function extractStep(pipeline: ItemPipeline, item: string): Promise<Result<string[] | undefined, ItemError>> {
  if (!pipeline.extract) {
    return ok(undefined);
  }

  try {
    const ids = await pipeline.extract(item);
    if (ids.length === 0) {
      return err(itemError(ErrorCode.EXTRACT_FAILED, NO_IDENTIFIERS_MESSAGE));
    }
    return ok(ids);
  } catch (error) {
    if (isBatchFatal(error)) throw error;
    return err(itemError(ErrorCode.EXTRACT_FAILED, errorMessage(error)));
  }
}

async function fetchStep(
  pipeline: ItemPipeline,
  item: string,
  extracted: string[] | undefined
): Promise<ItemResult> {
  const ids = extracted ?? [];
  try {
    const fetched = await pipeline.fetch(item, ids);
    if (fetched.length === 0) {
      return err(itemError(ErrorCode.FETCH_FAILED, 'no items returned', ids));
    }
    return ok({
      extractedIds: extracted ?? fetched.map((row) => row.id),
      payloadSize: fetched.length,
    });
  } catch (error) {
    if (isBatchFatal(error)) throw error;
    return err(itemError(ErrorCode.FETCH_FAILED, errorMessage(error), ids));
  }
}

export async function runItem(pipeline: ItemPipeline, item: string): Promise<ItemResult> {
  const extracted = await extractStep(pipeline, item);
  if (!extracted.ok) {
    return extracted;
  }
  return fetchStep(pipeline, item, extracted.value);
}

export function toOutcome(item: string, result: ItemResult): ItemOutcome {
  if (result.ok) {
    return {
      input: item,
      status: 'success',
      extractedIds: result.value.extractedIds,
      payloadSize: result.value.payloadSize,
    };
  }
  return {
    input: item,
    status: 'failed',
    extractedIds: result.error.extractedIds,
    error: result.error.message,
    payloadSize: 0,
  };
}

/**
 * Runs every item through `pipeline`, one at a time and in order. A failing
 * item is recorded and the loop moves on.
 */
export async function runBatch(
  items: readonly string[],
  pipeline: ItemPipeline,
  logger: Logger = silentLogger
): Promise<ItemOutcome[]> {
  const outcomes: ItemOutcome[] = [];

  for (const item of items) {
    const result = await runItem(pipeline, item);
    if (result.ok) {
      logger.info(`✓ ${item}`);
    } else {
      logger.warn(`✗ ${item} (${result.error.code}: ${result.error.message})`);
    }
    outcomes.push(toOutcome(item, result));
  }

  return outcomes;
}
