// src/core/extract/patterns.ts
import { DispatchError, ErrorCode } from '../errors.js';
import type { LinkExtractor, LinkKind } from '../backend/types.js';
import type { Platform } from '../types/index.js';

type PatternKind = LinkKind | 'account';

interface PlatformPatterns {
  domains: string[];
  shortLinkHosts: string[];
  patterns: Partial<Record<PatternKind, RegExp[]>>;
}

const DOUYIN_ID = '(\\d{19})';

export const LINK_PATTERNS: Record<Platform, PlatformPatterns> = {
  douyin: {
    domains: ['douyin.com', 'iesdouyin.com', 'amemv.com'],
    shortLinkHosts: ['v.douyin.com'],
    patterns: {
      detail: [
        new RegExp(`/(?:video|note|slides)/${DOUYIN_ID}`, 'g'),
        new RegExp(`[?&](?:modal_id|vid)=${DOUYIN_ID}`, 'g'),
      ],
      live: [
        /live\.douyin\.com\/(\d+)/g,
        /\/follow\/live\/(\d+)/g,
        /\/webcast\/reflow\/(\d+)/g,
      ],
      mix: [/\/collection\/(\d+)/g, /\/mix\/detail\/(\d+)/g, /[?&]mix_id=(\d+)/g],
      collects: [/\/collects\/(\d+)/g, /[?&]collects_id=(\d+)/g],
      account: [/\/user\/(?!self\b)([\w-]{8,})/g, /[?&]sec_uid=([\w-]{8,})/g],
    },
  },
  tiktok: {
    domains: ['tiktok.com'],
    shortLinkHosts: ['vm.tiktok.com', 'vt.tiktok.com'],
    patterns: {
      detail: [/\/@[\w.-]+\/(?:video|photo)\/(\d{19})/g],
      live: [/\/@([\w.-]+)\/live/g],
      mix: [/\/@[\w.-]+\/(?:playlist|collection)\/[^/?#]*?(\d{19})/g],
      account: [/\/@([\w.-]+)/g],
    },
  },
};

function matchesHost(hostname: string, domains: string[]): boolean {
  return domains.some((domain) => hostname === domain || hostname.endsWith(`.${domain}`));
}

/**
 * Regex-based extractor over canonical share URLs. It does no network I/O, so
 * short links have to be expanded by the caller first.
 */
export class PatternLinkExtractor implements LinkExtractor {
  constructor(private readonly table: Record<Platform, PlatformPatterns> = LINK_PATTERNS) {}

  extractIdentifiers(url: string, kind: LinkKind, platform: Platform): string[] {
    return this.extract(url, kind, platform);
  }

  extractAccountTargets(url: string, platform: Platform): string[] {
    return this.extract(url, 'account', platform);
  }

  private extract(url: string, kind: PatternKind, platform: Platform): string[] {
    const config = this.table[platform];
    const parsed = this.parse(url);
    const hostname = parsed.hostname.toLowerCase();

    if (config.shortLinkHosts.includes(hostname)) {
      throw new DispatchError(
        ErrorCode.EXTRACT_FAILED,
        `Short link must be expanded before extraction: ${url}`,
        false,
        'Open the link in a browser and pass the final URL'
      );
    }
    if (!matchesHost(hostname, config.domains)) {
      throw new DispatchError(ErrorCode.EXTRACT_FAILED, `Unsupported ${platform} URL: ${url}`);
    }

    const ids: string[] = [];
    for (const pattern of config.patterns[kind] ?? []) {
      for (const match of parsed.href.matchAll(pattern)) {
        const id = match[1];
        if (id && !ids.includes(id)) {
          ids.push(id);
        }
      }
    }
    return ids;
  }

  private parse(url: string): URL {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new DispatchError(ErrorCode.EXTRACT_FAILED, `Invalid URL: ${url}`);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new DispatchError(ErrorCode.EXTRACT_FAILED, `Invalid URL: ${url}`);
    }
    return parsed;
  }
}
