// src/cli/config.ts
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { formatIssues } from '../core/config/options.js';
import { ENV_BACKEND, ENV_COOKIE, ENV_COOKIE_TIKTOK } from '../core/config/constants.js';

const configFileSchema = z
  .object({
    cookie: z.string().optional(),
    cookieTiktok: z.string().optional(),
    backend: z.string().optional(),
    options: z.record(z.unknown()).default({}),
  })
  .strict();

export type ConfigFile = z.output<typeof configFileSchema>;

export interface RunFlags {
  cookie?: string;
  cookieTiktok?: string;
  tiktok?: boolean;
  keyword?: string;
  searchType?: string;
  tab?: string;
  pages?: number;
  out?: string;
  format?: string;
  download?: boolean;
  backend?: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

export interface ResolvedRun {
  cookie: string;
  cookieTiktok?: string;
  backend?: string;
  options: Record<string, unknown>;
}

export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  const content = await readFile(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new Error(`Config file ${filePath} is not valid JSON`, { cause: error });
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Config file ${filePath} is invalid: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function flagOptions(flags: RunFlags): Record<string, unknown> {
  const options: Record<string, unknown> = {};
  if (flags.tiktok) options.tiktok = true;
  if (flags.searchType !== undefined) options.searchType = flags.searchType;
  if (flags.tab !== undefined) options.accountTab = flags.tab;
  if (flags.pages !== undefined) options.maxPages = flags.pages;
  if (flags.out !== undefined) options.downloadPath = flags.out;
  if (flags.format !== undefined) options.storageFormat = flags.format;
  // commander defaults `download` to true for --no-download
  if (flags.download === false) options.download = false;
  return options;
}

/**
 * Precedence, lowest first: config file, environment, flags.
 */
export function resolveRun(
  flags: RunFlags,
  file: ConfigFile | undefined,
  env: NodeJS.ProcessEnv
): ResolvedRun {
  return {
    cookie: flags.cookie ?? env[ENV_COOKIE] ?? file?.cookie ?? '',
    cookieTiktok: flags.cookieTiktok ?? env[ENV_COOKIE_TIKTOK] ?? file?.cookieTiktok,
    backend: flags.backend ?? env[ENV_BACKEND] ?? file?.backend,
    options: { ...(file?.options ?? {}), ...flagOptions(flags) },
  };
}
