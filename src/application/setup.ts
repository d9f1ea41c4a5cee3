import type { Logger } from 'pino';
import type { FieldShape, RecordDescriptor, RecordOf } from '../domain/index.js';
import { EventParser } from './event-factory.js';
import { HookRegistry } from './hook-registry.js';
import type { DispatchSummary } from './hook-registry.js';
import { ModelOverrides } from './model-overrides.js';
import type { RecordExtension } from './model-overrides.js';

/** Imports handler modules and lets them register; resolves to the loaded paths. */
export type HookLoader = (registry: HookRegistry, paths: readonly string[]) => Promise<readonly string[]>;

/** One model override, bound to its descriptor's record type. */
export interface OverrideEntry {
  readonly descriptorName: string;
  apply(overrides: ModelOverrides): void;
}

export function override<S extends FieldShape>(
  descriptor: RecordDescriptor<S>,
  extend: RecordExtension<RecordOf<RecordDescriptor<S>>>,
): OverrideEntry {
  return {
    descriptorName: descriptor.name,
    apply: (overrides) => overrides.set(descriptor, extend),
  };
}

export interface SetupOptions {
  /** Handler module files or directories. */
  readonly hooks?: readonly string[];
  readonly overrides?: readonly OverrideEntry[];
}

export interface WebhookRuntimeOptions {
  readonly logger: Logger;
  readonly loadHooks: HookLoader;
  readonly acceptFieldNames?: boolean;
}

/**
 * One registry, its parser and its model overrides, with the
 * setup/reset lifecycle around them.
 */
export class WebhookRuntime {
  readonly overrides = new ModelOverrides();
  readonly parser: EventParser;
  readonly registry: HookRegistry;
  private readonly log: Logger;
  private readonly loadHooks: HookLoader;
  private configured = false;

  constructor(options: WebhookRuntimeOptions) {
    this.log = options.logger;
    this.loadHooks = options.loadHooks;
    this.parser = new EventParser({
      logger: options.logger,
      overrides: this.overrides,
      acceptFieldNames: options.acceptFieldNames ?? false,
    });
    this.registry = new HookRegistry({ logger: options.logger, parser: this.parser });
  }

  get isConfigured(): boolean {
    return this.configured;
  }

  /**
   * Replaces the current configuration: clears registrations and overrides,
   * installs `overrides`, then loads `hooks`. Calling it again without
   * `reset()` is allowed but logged.
   */
  async setup(options: SetupOptions = {}): Promise<readonly string[]> {
    if (this.configured) {
      this.log.warn('setup() called multiple times; reconfiguring');
    }
    this.reset();

    for (const entry of options.overrides ?? []) {
      entry.apply(this.overrides);
    }

    const loaded = await this.loadHooks(this.registry, options.hooks ?? []);
    this.configured = true;
    this.log.info(
      { modules: loaded.length, hooks: this.registry.size, overrides: this.overrides.size },
      'Webhook handlers configured',
    );
    return loaded;
  }

  /** Back to the initial state: no registrations, no overrides. */
  reset(): void {
    this.registry.reset();
    this.overrides.clear();
    this.configured = false;
  }

  handleWebhook(eventName: string, raw: unknown): DispatchSummary {
    return this.registry.dispatch(eventName, raw);
  }
}
