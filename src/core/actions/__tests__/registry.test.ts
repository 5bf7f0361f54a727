import { describe, it, expect } from '@jest/globals';
import { ActionRegistry, actionRegistry } from '../registry.js';
import { ErrorCode } from '../../errors.js';

describe('ActionRegistry', () => {
  it('should register every supported action once', () => {
    expect(actionRegistry.names()).toEqual([
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
    ]);
  });

  it('should freeze action specs', () => {
    expect(Object.isFrozen(actionRegistry.get('detail'))).toBe(true);
  });

  it('should accept a valid request', () => {
    expect(actionRegistry.validate('detail', { inputs: 'https://x', platform: 'douyin' })).toBeUndefined();
  });

  it('should list supported actions for an unknown name', () => {
    const error = actionRegistry.validate('bogus', { inputs: 'https://x', platform: 'douyin' });

    expect(error?.code).toBe(ErrorCode.UNKNOWN_ACTION);
    expect(error?.message).toContain('Supported actions: detail, account, live');
  });

  it('should require input for url actions', () => {
    const error = actionRegistry.validate('mix', { inputs: [], platform: 'douyin' });

    expect(error?.code).toBe(ErrorCode.MISSING_INPUT);
    expect(error?.message).toBe('Action "mix" requires urls');
  });

  it('should not require input for the hot list', () => {
    expect(actionRegistry.validate('hot', { inputs: undefined, platform: 'douyin' })).toBeUndefined();
  });

  it.each(['comment', 'user', 'search', 'hot', 'collection', 'collection_music', 'collects'])(
    'should reject %s on tiktok',
    (action) => {
      const error = actionRegistry.validate(action, { inputs: 'anything', platform: 'tiktok' });

      expect(error?.code).toBe(ErrorCode.PLATFORM_UNSUPPORTED);
      expect(error?.message).toBe(`Action "${action}" is not supported on tiktok`);
    }
  );

  it.each(['detail', 'detail_unofficial', 'account', 'mix', 'live'])('should allow %s on tiktok', (action) => {
    expect(actionRegistry.validate(action, { inputs: 'https://x', platform: 'tiktok' })).toBeUndefined();
  });

  it('should check input before platform support', () => {
    const error = actionRegistry.validate('comment', { inputs: '', platform: 'tiktok' });

    expect(error?.code).toBe(ErrorCode.MISSING_INPUT);
  });

  it('should use identifier counting for search-style actions', () => {
    expect(actionRegistry.get('search')?.countMode).toBe('identifiers');
    expect(actionRegistry.get('collects')?.countMode).toBe('identifiers');
    expect(actionRegistry.get('account')?.countMode).toBe('items');
  });

  it('should be constructible with a custom table', () => {
    const registry = new ActionRegistry([]);

    expect(registry.names()).toEqual([]);
    expect(registry.validate('detail', { inputs: 'https://x', platform: 'douyin' })?.message).toBe(
      'Invalid action: detail. Supported actions: '
    );
  });
});
