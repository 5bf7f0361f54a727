// src/core/record/scoped.ts
import { DispatchError, ErrorCode, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { RecorderFactory, RecorderOptions, RecordingSession } from '../backend/types.js';

export interface SessionRequest extends RecorderOptions {
  root: string;
}

/**
 * Runs `body` with a freshly acquired recording session and releases it exactly
 * once, whichever way `body` exits. If acquisition fails `body` is never called.
 *
 * A close failure after a successful body is raised: rows still buffered in the
 * session may not have been persisted. Under item scope that fails only the
 * item whose session it was, with the close error as its message.
 */
export async function withSession<T>(
  factory: RecorderFactory,
  request: SessionRequest,
  body: (session: RecordingSession) => Promise<T>,
  logger: Logger = silentLogger
): Promise<T> {
  let session: RecordingSession;
  try {
    session = await factory(request.root, { format: request.format, name: request.name });
  } catch (error) {
    throw new DispatchError(
      ErrorCode.RESOURCE_UNAVAILABLE,
      `Recorder unavailable: ${errorMessage(error)}`,
      true,
      'Check that the download path is writable',
      { root: request.root, name: request.name }
    );
  }

  logger.debug(`Session opened: ${request.name}`);

  let result: T;
  try {
    result = await body(session);
  } catch (error) {
    try {
      await session.close();
    } catch (closeError) {
      logger.warn(`Failed to close session ${request.name}: ${errorMessage(closeError)}`);
    }
    throw error;
  }

  try {
    await session.close();
  } catch (error) {
    throw new Error(`Failed to close session ${request.name}: ${errorMessage(error)}`, { cause: error });
  }
  logger.debug(`Session closed: ${request.name}`);
  return result;
}
