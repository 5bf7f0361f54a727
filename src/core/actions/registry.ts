// src/core/actions/registry.ts
import type { CountMode, SummaryFn } from '../aggregate/aggregator.js';
import { DispatchError, ErrorCode } from '../errors.js';
import { err, ok, type Result } from '../batch/result.js';
import { isBlankInput } from '../input/normalizer.js';
import type { ActionName, Platform } from '../types/index.js';
import type { ActionHandler, ActionSpec, InputKind, SessionScope } from './types.js';
import {
  handleAccount,
  handleCollects,
  handleComment,
  handleDetail,
  handleDetailUnofficial,
  handleLive,
  handleMix,
  handleUser,
} from './handlers/works.js';
import {
  handleCollection,
  handleCollectionMusic,
  handleHot,
  handleSearch,
} from './handlers/feeds.js';

export function summarizeAs(noun: string): SummaryFn {
  return (t) =>
    t.downloaded === 0
      ? `No ${noun} processed (${t.failed} of ${t.total} inputs failed)`
      : `Processed ${t.downloaded} ${noun} from ${t.total} inputs (${t.failed} failed)`;
}

const DEFAULT_ONLY: ReadonlySet<Platform> = new Set<Platform>(['tiktok']);
const ANY_PLATFORM: ReadonlySet<Platform> = new Set<Platform>();

function defineAction(
  name: ActionName,
  handler: ActionHandler,
  settings: {
    input: InputKind;
    count: CountMode;
    scope?: SessionScope;
    restricted?: ReadonlySet<Platform>;
    noun: string;
  }
): ActionSpec {
  return Object.freeze({
    name,
    requiresInput: settings.input !== 'none',
    inputKind: settings.input,
    platformRestricted: settings.restricted ?? ANY_PLATFORM,
    countMode: settings.count,
    sessionScope: settings.scope ?? 'invocation',
    summarize: summarizeAs(settings.noun),
    handler,
  });
}

export const DEFAULT_ACTIONS: readonly ActionSpec[] = [
  defineAction('detail', handleDetail, { input: 'urls', count: 'items', noun: 'works' }),
  defineAction('account', handleAccount, { input: 'urls', count: 'items', scope: 'item', noun: 'accounts' }),
  defineAction('live', handleLive, { input: 'urls', count: 'items', noun: 'live streams' }),
  defineAction('comment', handleComment, {
    input: 'urls',
    count: 'items',
    restricted: DEFAULT_ONLY,
    noun: 'comment threads',
  }),
  defineAction('mix', handleMix, { input: 'urls', count: 'items', scope: 'item', noun: 'mixes' }),
  defineAction('user', handleUser, { input: 'urls', count: 'items', restricted: DEFAULT_ONLY, noun: 'user profiles' }),
  defineAction('search', handleSearch, {
    input: 'keyword',
    count: 'identifiers',
    restricted: DEFAULT_ONLY,
    noun: 'search results',
  }),
  defineAction('hot', handleHot, { input: 'none', count: 'identifiers', restricted: DEFAULT_ONLY, noun: 'hot list entries' }),
  defineAction('collection', handleCollection, {
    input: 'none',
    count: 'identifiers',
    restricted: DEFAULT_ONLY,
    noun: 'favourited works',
  }),
  defineAction('collection_music', handleCollectionMusic, {
    input: 'none',
    count: 'identifiers',
    restricted: DEFAULT_ONLY,
    noun: 'favourited tracks',
  }),
  defineAction('collects', handleCollects, {
    input: 'urls',
    count: 'identifiers',
    restricted: DEFAULT_ONLY,
    noun: 'favourites folder entries',
  }),
  defineAction('detail_unofficial', handleDetailUnofficial, { input: 'urls', count: 'items', noun: 'works' }),
];

export interface ValidationTarget {
  inputs: unknown;
  platform: Platform;
}

export class ActionRegistry {
  private readonly specs: ReadonlyMap<string, ActionSpec>;

  constructor(specs: readonly ActionSpec[] = DEFAULT_ACTIONS) {
    this.specs = new Map(specs.map((spec) => [spec.name, spec]));
  }

  names(): string[] {
    return [...this.specs.keys()];
  }

  get(action: string): ActionSpec | undefined {
    return this.specs.get(action);
  }

  /**
   * Checks an action against the registry without touching any backend.
   */
  validate(action: string, target: ValidationTarget): DispatchError | undefined {
    const resolved = this.resolve(action, target);
    return resolved.ok ? undefined : resolved.error;
  }

  /**
   * Looks up an action by name only. Needs no options, so callers can reject an
   * unknown action before anything else is checked.
   */
  lookup(action: string): Result<ActionSpec, DispatchError> {
    const spec = this.specs.get(action);
    if (!spec) {
      return err(
        new DispatchError(
          ErrorCode.UNKNOWN_ACTION,
          `Invalid action: ${action}. Supported actions: ${this.names().join(', ')}`
        )
      );
    }
    return ok(spec);
  }

  resolve(action: string, target: ValidationTarget): Result<ActionSpec, DispatchError> {
    const found = this.lookup(action);
    if (!found.ok) {
      return found;
    }
    const spec = found.value;

    if (spec.requiresInput && isBlankInput(target.inputs)) {
      const what = spec.inputKind === 'keyword' ? 'a search keyword' : 'urls';
      return err(new DispatchError(ErrorCode.MISSING_INPUT, `Action "${action}" requires ${what}`));
    }

    if (spec.platformRestricted.has(target.platform)) {
      return err(
        new DispatchError(
          ErrorCode.PLATFORM_UNSUPPORTED,
          `Action "${action}" is not supported on ${target.platform}`,
          false,
          'Run it against the default platform instead'
        )
      );
    }

    return ok(spec);
  }
}

export const actionRegistry = new ActionRegistry();
