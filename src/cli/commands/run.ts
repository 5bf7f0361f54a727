// src/cli/commands/run.ts
import { Command, InvalidArgumentError } from 'commander';
import { Dispatcher } from '../../core/dispatcher.js';
import { actionRegistry } from '../../core/actions/registry.js';
import { formatJsonOutput } from '../../core/export/json.js';
import { createConsoleLogger } from '../../core/logger.js';
import { loadBackend } from '../backend.js';
import { loadConfigFile, resolveRun, type RunFlags } from '../config.js';
import type { Backend } from '../../core/backend/types.js';
import type { BatchResult } from '../../core/types/index.js';

export interface RunDeps {
  env?: NodeJS.ProcessEnv;
  loadBackend?: (specifier: string) => Promise<Backend>;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer');
  }
  return parsed;
}

export async function runAction(
  action: string,
  urls: string[],
  flags: RunFlags,
  deps: RunDeps = {}
): Promise<BatchResult> {
  const env = deps.env ?? process.env;
  const file = flags.config ? await loadConfigFile(flags.config) : undefined;
  const resolved = resolveRun(flags, file, env);

  if (!resolved.backend) {
    throw new Error('No backend configured: pass --backend <module> or set FEEDGRAB_BACKEND');
  }
  const backend = await (deps.loadBackend ?? loadBackend)(resolved.backend);

  const dispatcher = new Dispatcher({
    backend,
    logger: createConsoleLogger('Dispatch', { verbose: flags.verbose ?? false }),
    env,
  });

  const keywordAction = actionRegistry.get(action)?.inputKind === 'keyword';
  return dispatcher.dispatch({
    action,
    primaryCredential: resolved.cookie,
    altCredential: resolved.cookieTiktok,
    inputs: keywordAction ? flags.keyword : urls,
    options: resolved.options,
  });
}

export function printReport(result: BatchResult): void {
  if (result.details.length > 0) {
    console.log('\n' + '━'.repeat(50));
  }
  for (const detail of result.details) {
    if (detail.status === 'success') {
      console.log(`✓ ${detail.input}`);
    } else {
      console.log(`✗ ${detail.input}: ${detail.error ?? 'unknown error'}`);
    }
  }
  console.log(
    `Summary: ${result.downloadedCount} downloaded, ${result.failedCount} failed. ${result.message}`
  );
}

export function registerRunCommand(program: Command, deps: RunDeps = {}): void {
  program
    .command('run <action> [urls...]')
    .description('Run one action against the configured backend')
    .option('--cookie <cookie>', 'Cookie for the default platform')
    .option('--cookie-tiktok <cookie>', 'Cookie for the tiktok platform')
    .option('--tiktok', 'Target the tiktok platform')
    .option('--keyword <keyword>', 'Search keyword (search action)')
    .option('--search-type <type>', 'Search type (general|user|video|live)')
    .option('--tab <tab>', 'Account tab (post|favorite|collection)')
    .option('--pages <n>', 'Maximum pages to request', parsePositiveInt)
    .option('--out <dir>', 'Download root directory')
    .option('--format <format>', 'Record format (csv|jsonl)')
    .option('--no-download', 'Collect data without downloading media')
    .option('--backend <module>', 'Backend module exporting createBackend()')
    .option('--config <file>', 'JSON config file')
    .option('--json', 'Output JSON to stdout', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (action: string, urls: string[], flags: RunFlags) => {
      try {
        const result = await runAction(action, urls, flags, deps);

        if (flags.json) {
          console.log(formatJsonOutput(result));
        } else {
          printReport(result);
        }

        if (!result.success) {
          process.exit(1);
        }
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
