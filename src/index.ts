export { Dispatcher, dispatch, type DispatcherDeps } from './core/dispatcher.js';
export { ActionRegistry, DEFAULT_ACTIONS, actionRegistry } from './core/actions/registry.js';
export type { ActionSpec, ActionHandler, HandlerContext, InputKind, SessionScope } from './core/actions/types.js';
export { aggregate, tally, type CountMode, type Tally } from './core/aggregate/aggregator.js';
export { runBatch, type ItemPipeline } from './core/batch/executor.js';
export type { Result } from './core/batch/result.js';
export { normalizeKeyword, normalizeUrls } from './core/input/normalizer.js';
export { withSession } from './core/record/scoped.js';
export { createFileRecorder } from './core/record/file-recorder.js';
export { PatternLinkExtractor } from './core/extract/patterns.js';
export { parseOptions, type InvocationOptions } from './core/config/options.js';
export { DispatchError, ErrorCode } from './core/errors.js';
export { createConsoleLogger, silentLogger, type Logger } from './core/logger.js';
export { toReport, formatJsonOutput, type BatchReport, type ReportDetail } from './core/export/json.js';
export type * from './core/backend/types.js';
export type * from './core/types/index.js';
