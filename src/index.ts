import type { Logger } from 'pino';
import { WebhookRuntime } from './application/index.js';
import type { OverrideEntry } from './application/index.js';
import {
  createHookLoader,
  createLogger,
  createSilentLogger,
  loadHookwireConfig,
} from './infrastructure/index.js';

export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';

export interface CreateRuntimeOptions {
  readonly logger?: Logger;
  readonly acceptFieldNames?: boolean;
}

export function createRuntime(options: CreateRuntimeOptions = {}): WebhookRuntime {
  const logger = options.logger ?? createSilentLogger();
  return new WebhookRuntime({
    logger,
    loadHooks: createHookLoader(logger),
    acceptFieldNames: options.acceptFieldNames ?? false,
  });
}

/**
 * Builds a runtime from config/hookwire.yaml (or `configPath`) and loads
 * the hook modules it lists.
 */
export async function createConfiguredRuntime(
  configPath?: string,
  overrides: readonly OverrideEntry[] = [],
): Promise<WebhookRuntime> {
  const config = loadHookwireConfig(configPath);
  const runtime = createRuntime({
    logger: createLogger({ level: config.logging.level }),
    acceptFieldNames: config.validation.accept_field_names,
  });
  await runtime.setup({ hooks: config.hooks.modules, overrides });
  return runtime;
}

/** Process-wide runtime behind the top-level functions below. */
export const defaultRuntime: WebhookRuntime = createRuntime();

export const hook = defaultRuntime.registry.hook.bind(defaultRuntime.registry);
export const register = defaultRuntime.registry.register.bind(defaultRuntime.registry);
export const parse = defaultRuntime.parser.parse.bind(defaultRuntime.parser);
export const handleWebhook = defaultRuntime.handleWebhook.bind(defaultRuntime);
export const setup = defaultRuntime.setup.bind(defaultRuntime);
export const reset = defaultRuntime.reset.bind(defaultRuntime);
