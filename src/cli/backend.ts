// src/cli/backend.ts
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { Backend } from '../core/backend/types.js';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isBackend(value: unknown): value is Backend {
  if (!isObject(value) || typeof value.connect !== 'function' || !isObject(value.links)) {
    return false;
  }
  return (
    typeof value.links.extractIdentifiers === 'function' &&
    typeof value.links.extractAccountTargets === 'function'
  );
}

/**
 * Loads a backend module. Relative paths resolve against `cwd`; the module must
 * export a `createBackend()` factory.
 */
export async function loadBackend(specifier: string, cwd: string = process.cwd()): Promise<Backend> {
  const target =
    specifier.startsWith('.') || path.isAbsolute(specifier)
      ? pathToFileURL(path.resolve(cwd, specifier)).href
      : specifier;

  const mod: unknown = await import(target);
  if (!isObject(mod) || typeof mod.createBackend !== 'function') {
    throw new Error(`Backend module ${specifier} does not export createBackend()`);
  }

  const backend: unknown = await mod.createBackend();
  if (!isBackend(backend)) {
    throw new Error(`createBackend() in ${specifier} did not return a backend`);
  }
  return backend;
}
