// src/cli/commands/actions.ts
import { Command } from 'commander';
import { actionRegistry, type ActionRegistry } from '../../core/actions/registry.js';
import type { Platform } from '../../core/types/index.js';

const PLATFORMS: Platform[] = ['douyin', 'tiktok'];

export function formatActionTable(registry: ActionRegistry = actionRegistry): string[] {
  return registry.names().map((name) => {
    const spec = registry.get(name);
    if (!spec) return name;
    const platforms = PLATFORMS.filter((p) => !spec.platformRestricted.has(p)).join(', ');
    return `${name.padEnd(18)}${spec.inputKind.padEnd(9)}${platforms}`;
  });
}

export function registerActionsCommand(program: Command): void {
  program
    .command('actions')
    .description('List supported actions')
    .action(() => {
      for (const line of formatActionTable()) {
        console.log(line);
      }
    });
}
