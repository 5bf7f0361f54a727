import { describe, it, expect } from '@jest/globals';
import { isBlankInput, normalizeKeyword, normalizeUrls } from '../normalizer.js';
import { ErrorCode } from '../../errors.js';

describe('normalizeUrls', () => {
  it('should trim a single url into a one-element list', () => {
    expect(normalizeUrls('  https://x  ')).toEqual({ ok: true, value: ['https://x'] });
  });

  it('should keep order and drop blank entries', () => {
    const result = normalizeUrls([' https://b ', '', 'https://a', '   ', 'https://b']);

    expect(result).toEqual({ ok: true, value: ['https://b', 'https://a', 'https://b'] });
  });

  it.each([[''], ['   '], [[]], [['', ' ']], [undefined], [null]])('should report empty input for %p', (raw) => {
    const result = normalizeUrls(raw);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.EMPTY_INPUT);
    }
  });

  it.each([[42], [{ url: 'https://x' }], [['https://x', 3]]])('should report invalid type for %p', (raw) => {
    const result = normalizeUrls(raw);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.INVALID_INPUT_TYPE);
      expect(result.error.message).toBe('URLs must be a string or a list of strings');
    }
  });
});

describe('normalizeKeyword', () => {
  it('should trim the keyword', () => {
    expect(normalizeKeyword('  street food ')).toEqual({ ok: true, value: 'street food' });
  });

  it('should report a blank keyword', () => {
    const result = normalizeKeyword(' ');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.EMPTY_KEYWORD);
    }
  });

  it('should reject a list keyword', () => {
    const result = normalizeKeyword(['a']);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.INVALID_INPUT_TYPE);
    }
  });
});

describe('isBlankInput', () => {
  it('should treat only absent, blank and empty-list inputs as blank', () => {
    expect(isBlankInput(undefined)).toBe(true);
    expect(isBlankInput(' ')).toBe(true);
    expect(isBlankInput([])).toBe(true);
    expect(isBlankInput([' '])).toBe(false);
    expect(isBlankInput(0)).toBe(false);
  });
});
