import { describe, it, expect } from '@jest/globals';
import { PatternLinkExtractor } from '../patterns.js';

const extractor = new PatternLinkExtractor();

describe('PatternLinkExtractor', () => {
  describe('douyin', () => {
    it('should extract a video id', () => {
      expect(
        extractor.extractIdentifiers('https://www.douyin.com/video/7253355171290352955', 'detail', 'douyin')
      ).toEqual(['7253355171290352955']);
    });

    it('should extract the modal id from a user page', () => {
      const url =
        'https://www.douyin.com/user/self?from_tab_name=main&modal_id=7253355171290352955&showTab=favorite_collection';

      expect(extractor.extractIdentifiers(url, 'detail', 'douyin')).toEqual(['7253355171290352955']);
    });

    it('should extract a live room id', () => {
      expect(extractor.extractIdentifiers('https://live.douyin.com/123456789', 'live', 'douyin')).toEqual([
        '123456789',
      ]);
    });

    it('should extract a mix id', () => {
      expect(extractor.extractIdentifiers('https://www.douyin.com/collection/7100000000000000001', 'mix', 'douyin')).toEqual(
        ['7100000000000000001']
      );
    });

    it('should extract the account sec uid', () => {
      expect(extractor.extractAccountTargets('https://www.douyin.com/user/MS4wLjABAAAAtest-user_1?x=1', 'douyin')).toEqual(
        ['MS4wLjABAAAAtest-user_1']
      );
    });

    it('should not treat the self page as an account', () => {
      expect(extractor.extractAccountTargets('https://www.douyin.com/user/self?showTab=like', 'douyin')).toEqual([]);
    });

    it('should return nothing for an unrelated path', () => {
      expect(extractor.extractIdentifiers('https://www.douyin.com/discover', 'detail', 'douyin')).toEqual([]);
    });

    it('should reject short links', () => {
      expect(() => extractor.extractIdentifiers('https://v.douyin.com/abcd/', 'detail', 'douyin')).toThrow(
        'Short link must be expanded before extraction: https://v.douyin.com/abcd/'
      );
    });
  });

  describe('tiktok', () => {
    it('should extract a video id', () => {
      expect(
        extractor.extractIdentifiers('https://www.tiktok.com/@some.user/video/7300000000000000001', 'detail', 'tiktok')
      ).toEqual(['7300000000000000001']);
    });

    it('should extract the handle for an account', () => {
      expect(extractor.extractAccountTargets('https://www.tiktok.com/@some.user', 'tiktok')).toEqual(['some.user']);
    });

    it('should extract a playlist id', () => {
      expect(
        extractor.extractIdentifiers(
          'https://www.tiktok.com/@some.user/playlist/cooking-7300000000000000009',
          'mix',
          'tiktok'
        )
      ).toEqual(['7300000000000000009']);
    });

    it('should reject a douyin url', () => {
      expect(() =>
        extractor.extractIdentifiers('https://www.douyin.com/video/7253355171290352955', 'detail', 'tiktok')
      ).toThrow('Unsupported tiktok URL: https://www.douyin.com/video/7253355171290352955');
    });
  });

  it('should reject something that is not a url', () => {
    expect(() => extractor.extractIdentifiers('not a url', 'detail', 'douyin')).toThrow('Invalid URL: not a url');
  });

  it('should reject non-http schemes', () => {
    expect(() => extractor.extractIdentifiers('ftp://www.douyin.com/video/1', 'detail', 'douyin')).toThrow(
      'Invalid URL: ftp://www.douyin.com/video/1'
    );
  });

  it('should drop duplicate ids', () => {
    const url = 'https://www.douyin.com/video/7253355171290352955?vid=7253355171290352955';

    expect(extractor.extractIdentifiers(url, 'detail', 'douyin')).toEqual(['7253355171290352955']);
  });
});
