// src/core/dispatcher.ts
import { actionRegistry, type ActionRegistry } from './actions/registry.js';
import type { ActionSpec, HandlerContext } from './actions/types.js';
import { aggregate } from './aggregate/aggregator.js';
import { err, ok, type Result } from './batch/result.js';
import { parseOptions, platformOf, type InvocationOptions } from './config/options.js';
import { DispatchError, ErrorCode, createFailedResult, errorMessage } from './errors.js';
import { normalizeKeyword, normalizeUrls } from './input/normalizer.js';
import { silentLogger, type Logger } from './logger.js';
import { createFileRecorder } from './record/file-recorder.js';
import { withSession, type SessionRequest } from './record/scoped.js';
import type { Backend, Credentials, FetchClient, RecorderFactory } from './backend/types.js';
import type { BatchResult, InvocationRequest, ItemOutcome, Platform } from './types/index.js';

export interface DispatcherDeps {
  backend: Backend;
  recorderFactory?: RecorderFactory;
  registry?: ActionRegistry;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

const HEADER_UNSAFE = /[\r\n\0]/;

function checkCredentials(request: InvocationRequest): Result<Credentials, DispatchError> {
  const cookie = request.primaryCredential;
  const cookieTiktok = request.altCredential ?? '';

  if (typeof cookie !== 'string' || HEADER_UNSAFE.test(cookie)) {
    return err(new DispatchError(ErrorCode.MALFORMED_CREDENTIAL, 'Cookie is malformed'));
  }
  if (typeof cookieTiktok !== 'string' || HEADER_UNSAFE.test(cookieTiktok)) {
    return err(new DispatchError(ErrorCode.MALFORMED_CREDENTIAL, 'TikTok cookie is malformed'));
  }
  return ok({ cookie, cookieTiktok });
}

function normalizeItems(spec: ActionSpec, inputs: unknown): Result<string[], DispatchError> {
  switch (spec.inputKind) {
    case 'urls':
      return normalizeUrls(inputs);
    case 'keyword': {
      const keyword = normalizeKeyword(inputs);
      return keyword.ok ? ok([keyword.value]) : keyword;
    }
    case 'none':
      // No caller input: the action's own name labels its single item.
      return ok([spec.name]);
  }
}

export class Dispatcher {
  private readonly backend: Backend;
  private readonly recorderFactory: RecorderFactory;
  private readonly registry: ActionRegistry;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(deps: DispatcherDeps) {
    this.backend = deps.backend;
    this.recorderFactory = deps.recorderFactory ?? createFileRecorder;
    this.registry = deps.registry ?? actionRegistry;
    this.logger = deps.logger ?? silentLogger;
    this.env = deps.env ?? process.env;
  }

  /**
   * Runs one action. Never rejects: every failure comes back as a result with
   * `success: false`.
   */
  async dispatch(request: InvocationRequest): Promise<BatchResult> {
    try {
      return await this.run(request);
    } catch (error) {
      this.logger.error(`${request.action} aborted: ${errorMessage(error)}`);
      return createFailedResult(error);
    }
  }

  private async run(request: InvocationRequest): Promise<BatchResult> {
    const known = this.registry.lookup(request.action);
    if (!known.ok) {
      return createFailedResult(known.error);
    }

    const parsed = parseOptions(request.options, this.env);
    if (!parsed.ok) {
      return createFailedResult(parsed.error);
    }
    const options = parsed.value;
    const platform = platformOf(options);

    const resolved = this.registry.resolve(request.action, { inputs: request.inputs, platform });
    if (!resolved.ok) {
      return createFailedResult(resolved.error);
    }
    const spec = resolved.value;

    const credentials = checkCredentials(request);
    if (!credentials.ok) {
      return createFailedResult(credentials.error);
    }

    const items = normalizeItems(spec, request.inputs);
    if (!items.ok) {
      return createFailedResult(items.error);
    }

    this.logger.debug(`${spec.name}: ${items.value.length} input(s) on ${platform}`);

    const client = await this.connect(credentials.value, options);
    try {
      const outcomes = await this.execute(spec, items.value, options, platform, client);
      const result = aggregate(outcomes, spec.countMode, spec.summarize);
      this.logger.info(result.message);
      return result;
    } finally {
      await this.release(client);
    }
  }

  private async connect(credentials: Credentials, options: InvocationOptions): Promise<FetchClient> {
    try {
      return await this.backend.connect(credentials, options);
    } catch (error) {
      throw new DispatchError(
        ErrorCode.BACKEND_UNAVAILABLE,
        `Backend connection failed: ${errorMessage(error)}`,
        true
      );
    }
  }

  private async release(client: FetchClient): Promise<void> {
    try {
      await client.close();
    } catch (error) {
      this.logger.warn(`Failed to close backend client: ${errorMessage(error)}`);
    }
  }

  private async execute(
    spec: ActionSpec,
    items: string[],
    options: InvocationOptions,
    platform: Platform,
    client: FetchClient
  ): Promise<ItemOutcome[]> {
    const sessionRequest: SessionRequest = {
      root: options.downloadPath,
      format: options.storageFormat,
      name: `${platform}-${spec.name}`,
    };
    const sessionLogger = this.logger.child('Recorder');
    const base: Omit<HandlerContext, 'useSession'> = {
      action: spec.name,
      platform,
      options,
      links: this.backend.links,
      client,
      logger: this.logger.child('Batch'),
    };

    if (spec.sessionScope === 'item') {
      return spec.handler(items, {
        ...base,
        useSession: (body) => withSession(this.recorderFactory, sessionRequest, body, sessionLogger),
      });
    }

    return withSession(
      this.recorderFactory,
      sessionRequest,
      (session) => spec.handler(items, { ...base, useSession: (body) => body(session) }),
      sessionLogger
    );
  }
}

/**
 * Functional entry point: `urls`, `searchKeyword` and `cookieTiktok` are read
 * out of the options bag, everything else is passed on as options.
 */
export async function dispatch(
  action: string,
  credential: string,
  options: Record<string, unknown>,
  deps: DispatcherDeps
): Promise<BatchResult> {
  const { urls, searchKeyword, cookieTiktok, ...rest } = options;
  if (cookieTiktok !== undefined && typeof cookieTiktok !== 'string') {
    return createFailedResult(
      new DispatchError(ErrorCode.INVALID_OPTION, 'Invalid options: cookieTiktok: Expected string')
    );
  }

  const registry = deps.registry ?? actionRegistry;
  const inputs = registry.get(action)?.inputKind === 'keyword' ? searchKeyword : urls;

  return new Dispatcher(deps).dispatch({
    action,
    primaryCredential: credential,
    altCredential: cookieTiktok,
    inputs,
    options: rest,
  });
}
