import { z } from 'zod';
import { getDefaultDownloadRoot } from './app-dirs.js';
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_MAX_PAGES,
  DEFAULT_MAX_RETRY,
  DEFAULT_TIMEOUT_SECONDS,
} from './constants.js';
import { DispatchError, ErrorCode } from '../errors.js';
import { err, ok, type Result } from '../batch/result.js';
import type { Platform } from '../types/index.js';

export const invocationOptionsSchema = z
  .object({
    tiktok: z.boolean().default(false),
    downloadPath: z.string().trim().min(1, 'Download path must not be blank').optional(),
    proxy: z.string().optional(),
    proxyTiktok: z.string().optional(),
    maxRetry: z.number().int().min(0).default(DEFAULT_MAX_RETRY),
    chunk: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
    timeout: z.number().positive().default(DEFAULT_TIMEOUT_SECONDS),
    storageFormat: z.enum(['', 'csv', 'jsonl']).default(''),
    download: z.boolean().default(true),
    dynamicCover: z.boolean().default(false),
    staticCover: z.boolean().default(false),
    music: z.boolean().default(false),
    folderMode: z.boolean().default(false),
    accountTab: z.enum(['post', 'favorite', 'collection']).default('post'),
    searchType: z.enum(['general', 'user', 'video', 'live']).default('general'),
    maxPages: z.number().int().positive().default(DEFAULT_MAX_PAGES),
  })
  .strict();

export type InvocationOptions = Omit<z.output<typeof invocationOptionsSchema>, 'downloadPath'> & {
  downloadPath: string;
};

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${where}${issue.message}`;
    })
    .join('; ');
}

export function parseOptions(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Result<InvocationOptions, DispatchError> {
  const parsed = invocationOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      new DispatchError(
        ErrorCode.INVALID_OPTION,
        `Invalid options: ${formatIssues(parsed.error)}`,
        false,
        undefined,
        { issues: parsed.error.issues }
      )
    );
  }

  return ok({
    ...parsed.data,
    downloadPath: parsed.data.downloadPath ?? getDefaultDownloadRoot(env),
  });
}

export function platformOf(options: Pick<InvocationOptions, 'tiktok'>): Platform {
  return options.tiktok ? 'tiktok' : 'douyin';
}
