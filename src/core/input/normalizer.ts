// src/core/input/normalizer.ts
import { DispatchError, ErrorCode } from '../errors.js';
import { err, ok, type Result } from '../batch/result.js';

export function normalizeUrls(raw: unknown): Result<string[], DispatchError> {
  if (typeof raw === 'string') {
    const url = raw.trim();
    if (url.length === 0) {
      return err(new DispatchError(ErrorCode.EMPTY_INPUT, 'No valid URL provided'));
    }
    return ok([url]);
  }

  if (Array.isArray(raw)) {
    const urls: string[] = [];
    for (const entry of raw) {
      if (typeof entry !== 'string') {
        return err(invalidType());
      }
      const url = entry.trim();
      if (url.length > 0) {
        urls.push(url);
      }
    }

    if (urls.length === 0) {
      return err(new DispatchError(ErrorCode.EMPTY_INPUT, 'No valid URL provided'));
    }
    return ok(urls);
  }

  if (raw === undefined || raw === null) {
    return err(new DispatchError(ErrorCode.EMPTY_INPUT, 'No valid URL provided'));
  }

  return err(invalidType());
}

export function normalizeKeyword(raw: unknown): Result<string, DispatchError> {
  if (raw === undefined || raw === null) {
    return err(new DispatchError(ErrorCode.EMPTY_KEYWORD, 'No search keyword provided'));
  }
  if (typeof raw !== 'string') {
    return err(
      new DispatchError(ErrorCode.INVALID_INPUT_TYPE, 'Search keyword must be a string')
    );
  }

  const keyword = raw.trim();
  if (keyword.length === 0) {
    return err(new DispatchError(ErrorCode.EMPTY_KEYWORD, 'No search keyword provided'));
  }
  return ok(keyword);
}

/**
 * Blank-ness check used by action validation, before the shape is verified.
 */
export function isBlankInput(raw: unknown): boolean {
  if (raw === undefined || raw === null) return true;
  if (typeof raw === 'string') return raw.trim().length === 0;
  if (Array.isArray(raw)) return raw.length === 0;
  return false;
}

function invalidType(): DispatchError {
  return new DispatchError(
    ErrorCode.INVALID_INPUT_TYPE,
    'URLs must be a string or a list of strings'
  );
}
