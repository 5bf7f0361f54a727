// src/core/actions/handlers/works.ts
import { runBatch } from '../../batch/executor.js';
import type { FetchTarget, LinkKind } from '../../backend/types.js';
import type { ActionHandler, HandlerContext } from '../types.js';

/**
 * Handler for actions that extract ids from each URL and fetch them in one
 * call per URL.
 */
function extractThenFetch(
  kind: LinkKind,
  target: (ids: string[], ctx: HandlerContext) => FetchTarget
): ActionHandler {
  return (items, ctx) =>
    runBatch(
      items,
      {
        extract: (url) => ctx.links.extractIdentifiers(url, kind, ctx.platform),
        fetch: (_url, ids) =>
          ctx.useSession((session) => ctx.client.fetchBatch(target(ids, ctx), ctx.platform, session)),
      },
      ctx.logger
    );
}

export const handleDetail = extractThenFetch('detail', (ids) => ({ kind: 'detail', ids }));

export const handleDetailUnofficial = extractThenFetch('detail', (ids) => ({
  kind: 'detail_unofficial',
  ids,
}));

export const handleLive = extractThenFetch('live', (ids) => ({ kind: 'live', ids }));

export const handleComment = extractThenFetch('detail', (ids, ctx) => ({
  kind: 'comment',
  ids,
  pages: ctx.options.maxPages,
}));

export const handleMix = extractThenFetch('mix', (mixIds) => ({ kind: 'mix', mixIds }));

export const handleCollects = extractThenFetch('collects', (ids) => ({ kind: 'collects', ids }));

/**
 * Account-style URLs resolve to user ids rather than work ids.
 */
function accountThenFetch(target: (ids: string[], ctx: HandlerContext) => FetchTarget): ActionHandler {
  return (items, ctx) =>
    runBatch(
      items,
      {
        extract: (url) => ctx.links.extractAccountTargets(url, ctx.platform),
        fetch: (_url, ids) =>
          ctx.useSession((session) => ctx.client.fetchBatch(target(ids, ctx), ctx.platform, session)),
      },
      ctx.logger
    );
}

// Only the first resolved account is walked, matching one account per URL.
export const handleAccount = accountThenFetch((ids, ctx) => ({
  kind: 'account',
  userId: ids[0],
  tab: ctx.options.accountTab,
  pages: ctx.options.maxPages,
}));

export const handleUser = accountThenFetch((ids) => ({ kind: 'user', ids }));
