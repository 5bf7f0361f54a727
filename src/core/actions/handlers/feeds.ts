// src/core/actions/handlers/feeds.ts
import { runBatch } from '../../batch/executor.js';
import type { FetchTarget } from '../../backend/types.js';
import type { ActionHandler, HandlerContext } from '../types.js';

/**
 * Handler for actions with no per-URL extraction: the single item is either
 * the search keyword or the action's own label.
 */
function fetchOnly(target: (item: string, ctx: HandlerContext) => FetchTarget): ActionHandler {
  return (items, ctx) =>
    runBatch(
      items,
      {
        fetch: (item) =>
          ctx.useSession((session) => ctx.client.fetchBatch(target(item, ctx), ctx.platform, session)),
      },
      ctx.logger
    );
}

export const handleSearch = fetchOnly((keyword, ctx) => ({
  kind: 'search',
  keyword,
  searchType: ctx.options.searchType,
  pages: ctx.options.maxPages,
}));

export const handleHot = fetchOnly(() => ({ kind: 'hot' }));

export const handleCollection = fetchOnly(() => ({ kind: 'collection' }));

export const handleCollectionMusic = fetchOnly(() => ({ kind: 'collection_music' }));
