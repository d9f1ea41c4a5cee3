import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../domain/index.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
    })
    .default({}),
  hooks: z
    .object({
      modules: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  validation: z
    .object({
      accept_field_names: z.boolean().default(false),
    })
    .default({}),
});

/**
 * Runtime configuration loaded from YAML.
 */
export type HookwireConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: HookwireConfig = configSchema.parse({});

type YamlValue = string | boolean | string[];

/**
 * Minimal YAML parser for the flat config structure.
 *
 * Handles only the subset used in config/hookwire.yaml: top-level
 * sections with indented scalar values, and indented `- item` lists
 * under a key with no inline value. A key with no value and no items is
 * left unset. Not a general-purpose YAML parser.
 */
export function parseSimpleYaml(content: string): Record<string, Record<string, YamlValue>> {
  const result: Record<string, Record<string, YamlValue>> = {};
  let section: Record<string, YamlValue> | undefined;
  let lastKey: string | undefined;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      const name = line.split(':')[0]?.trim() ?? '';
      section = {};
      result[name] = section;
      lastKey = undefined;
      continue;
    }

    if (section === undefined) continue;

    // List item under the last key: "    - item"
    if (trimmed.startsWith('- ')) {
      if (lastKey === undefined) continue;
      const list: YamlValue = section[lastKey] ?? [];
      if (Array.isArray(list)) {
        list.push(unquote(trimmed.slice(2).trim()));
        section[lastKey] = list;
      }
      continue;
    }

    const colonIdx = trimmed.indexOf(':');
    if (colonIdx === -1) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();
    lastKey = key;

    if (value === '') {
      // A list if `- item` lines follow, otherwise left unset.
      continue;
    } else if (value === '[]') {
      section[key] = [];
    } else if (value === 'true') {
      section[key] = true;
    } else if (value === 'false') {
      section[key] = false;
    } else {
      section[key] = unquote(value);
    }
  }

  return result;
}

function unquote(value: string): string {
  if (value.length >= 2 && (value.startsWith('"') || value.startsWith("'")) && value.endsWith(value[0] ?? '')) {
    return value.slice(1, -1);
  }
  return value;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function readConfigFile(filePath: string): string | undefined {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (isMissingFile(err)) return undefined;
    throw new ConfigError(`Cannot read config file ${filePath}`, { path: filePath, cause: String(err) });
  }
}

/**
 * Loads configuration from the YAML file.
 *
 * Falls back to DEFAULT_CONFIG if the file is missing. Merges loaded
 * values over defaults so missing keys get default values. `LOG_LEVEL`
 * in the environment overrides `logging.level`.
 */
export function loadHookwireConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): HookwireConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'hookwire.yaml');
  const content = readConfigFile(filePath);
  const parsed: Record<string, Record<string, YamlValue>> = content === undefined ? {} : parseSimpleYaml(content);

  const logLevel = env['LOG_LEVEL'];
  if (logLevel !== undefined && logLevel !== '') {
    parsed['logging'] = { ...parsed['logging'], level: logLevel };
  }

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${filePath}`, {
      path: filePath,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}
