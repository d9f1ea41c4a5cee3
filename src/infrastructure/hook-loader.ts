import { readdir, stat } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { Logger } from 'pino';
import { HookLoadError } from '../domain/index.js';
import type { HookLoader, HookRegistry } from '../application/index.js';

const MODULE_EXTENSIONS = new Set(['.js', '.mjs', '.ts', '.mts']);

/** What a handler module exports. */
export interface HookModule {
  registerHooks(registry: HookRegistry): unknown;
}

function isHookModule(mod: unknown): mod is HookModule {
  return (
    typeof mod === 'object' &&
    mod !== null &&
    'registerHooks' in mod &&
    typeof mod.registerHooks === 'function'
  );
}

/**
 * Files starting with `_` are helpers, never handler modules.
 */
function isHandlerFile(fileName: string): boolean {
  if (fileName.startsWith('_') || fileName.endsWith('.d.ts')) return false;
  if (/\.(test|spec)\.[cm]?[jt]s$/.test(fileName)) return false;
  return MODULE_EXTENSIONS.has(extname(fileName));
}

async function collect(path: string): Promise<string[]> {
  const info = await stat(path).catch((err: unknown) => {
    throw new HookLoadError(`Hook path not found: ${path}`, { path, cause: String(err) });
  });

  if (!info.isDirectory()) {
    return [path];
  }

  const entries = await readdir(path, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const files: string[] = [];
  for (const entry of entries) {
    const child = join(path, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collect(child)));
    } else if (entry.isFile() && isHandlerFile(entry.name)) {
      files.push(child);
    }
  }
  return files;
}

/**
 * Creates the loader used by `setup()`.
 *
 * Every path is a module file or a directory walked recursively in name
 * order. Each module is imported and its `registerHooks(registry)` export
 * is called, so reloading after `reset()` registers the same handlers
 * again even though the module itself is cached.
 */
export function createHookLoader(log: Logger): HookLoader {
  return async (registry, paths) => {
    const loaded: string[] = [];

    for (const path of paths) {
      for (const file of await collect(resolve(path))) {
        const mod: unknown = await import(pathToFileURL(file).href).catch((err: unknown) => {
          throw new HookLoadError(`Failed to import hook module ${file}`, { path: file, cause: String(err) });
        });

        if (!isHookModule(mod)) {
          log.warn({ path: file }, 'Hook module has no registerHooks export, skipping');
          continue;
        }

        const before = registry.size;
        await mod.registerHooks(registry);
        loaded.push(file);
        log.debug({ path: file, module: basename(file), hooks: registry.size - before }, 'Hook module loaded');
      }
    }

    return loaded;
  };
}
