import type { Logger } from 'pino';
import { HandlerExecutionError } from '../domain/index.js';
import type { EventEnvelopes, EventName, FallbackEvent } from '../domain/index.js';
import { EventParser } from './event-factory.js';
import type { WebhookEnvelope } from './event-factory.js';

/** Envelope a handler for `N` receives: its own shape, or the fallback when parsing fell back. */
export type EnvelopeFor<N extends EventName> = EventEnvelopes[N] | FallbackEvent;

export type HookCallback<E = WebhookEnvelope> = (event: E) => void;

export interface HookOptions {
  /** Actions to react to. Omitted or empty means any action. */
  readonly actions?: readonly string[];
  /** `owner/name` of repositories to react to. Omitted or empty means any repository. */
  readonly repositories?: readonly string[];
  /** While any debug handler exists for an event type, only debug handlers run. */
  readonly debug?: boolean;
  /** Name used in logs; defaults to the callback's function name. */
  readonly name?: string;
}

export interface HookRegistration {
  readonly eventType: string;
  /** `'any'` or the accepted actions. */
  readonly actions: 'any' | ReadonlySet<string>;
  /** `'any'` or the accepted repository full names. */
  readonly repositories: 'any' | ReadonlySet<string>;
  readonly debug: boolean;
  readonly name: string;
  /** Declared as a method: each registration only receives envelopes of its own event type. */
  callback(event: WebhookEnvelope): void;
}

export interface DispatchSummary {
  readonly event: string;
  readonly action: string | null;
  readonly matched: number;
  readonly succeeded: number;
  readonly failed: number;
  /** True when the debug override selected the handlers. */
  readonly debug: boolean;
}

export interface HookRegistryOptions {
  readonly logger: Logger;
  readonly parser?: EventParser;
}

function toFilter(values: readonly string[] | undefined): 'any' | ReadonlySet<string> {
  return values === undefined || values.length === 0 ? 'any' : new Set(values);
}

function accepts(filter: 'any' | ReadonlySet<string>, value: string | null): boolean {
  return filter === 'any' || (value !== null && filter.has(value));
}

function repositoryName(envelope: WebhookEnvelope): string | null {
  if (!('repository' in envelope) || envelope.repository === null) {
    return null;
  }
  return envelope.repository.fullName;
}

/**
 * Handler registry and dispatcher.
 *
 * Registrations are append-only until `reset()`. Dispatch is synchronous:
 * handlers run one after another in registration order, and a handler
 * that throws is logged and skipped without affecting the others or the
 * caller.
 */
export class HookRegistry {
  private entries: HookRegistration[] = [];
  private readonly log: Logger;
  readonly parser: EventParser;

  constructor(options: HookRegistryOptions) {
    this.log = options.logger;
    this.parser = options.parser ?? new EventParser({ logger: options.logger });
  }

  register<N extends EventName>(
    eventType: N,
    callback: HookCallback<EnvelopeFor<N>>,
    options?: HookOptions,
  ): HookRegistration;
  register(eventType: string, callback: HookCallback, options?: HookOptions): HookRegistration;
  register(eventType: string, callback: HookCallback<never>, options: HookOptions = {}): HookRegistration {
    return this.add(eventType, callback, options);
  }

  /**
   * Decorator-style registration: returns a function that registers its
   * argument and hands it back unchanged.
   */
  hook<N extends EventName>(
    eventType: N,
    options?: HookOptions,
  ): <C extends HookCallback<EnvelopeFor<N>>>(callback: C) => C;
  hook(eventType: string, options?: HookOptions): <C extends HookCallback>(callback: C) => C;
  hook(eventType: string, options: HookOptions = {}): <C extends HookCallback<never>>(callback: C) => C {
    return (callback) => {
      this.add(eventType, callback, options);
      return callback;
    };
  }

  private add(eventType: string, callback: HookCallback<never>, options: HookOptions): HookRegistration {
    const registration: HookRegistration = Object.freeze({
      eventType,
      actions: toFilter(options.actions),
      repositories: toFilter(options.repositories),
      debug: options.debug ?? false,
      name: options.name ?? (callback.name || 'anonymous'),
      callback,
    });
    this.entries.push(registration);
    return registration;
  }

  /** Snapshot of the registrations, in registration order. */
  registrations(): readonly HookRegistration[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  /** Drops every registration. Safe to call on an empty registry. */
  reset(): void {
    this.entries = [];
  }

  /** Registrations that would run for `envelope`, applying the debug override. */
  select(eventName: string, envelope: WebhookEnvelope): { handlers: HookRegistration[]; debug: boolean } {
    const forType = this.entries.filter((entry) => entry.eventType === eventName);

    const debugHandlers = forType.filter((entry) => entry.debug);
    if (debugHandlers.length > 0) {
      return { handlers: debugHandlers, debug: true };
    }

    const action = envelope.action;
    const repository = repositoryName(envelope);
    return {
      handlers: forType.filter(
        (entry) => accepts(entry.actions, action) && accepts(entry.repositories, repository),
      ),
      debug: false,
    };
  }

  /**
   * Parses the payload and runs every applicable handler.
   * Never throws because of a handler; see `EventParser.parse` for parse failures.
   */
  dispatch(eventName: string, raw: unknown): DispatchSummary {
    const envelope = this.parser.parse(eventName, raw);
    const { handlers, debug } = this.select(eventName, envelope);

    if (debug) {
      this.log.info({ event: eventName, handlers: handlers.length }, 'Debug handlers found');
    }

    let succeeded = 0;
    let failed = 0;

    for (const handler of handlers) {
      this.log.debug({ event: eventName, handler: handler.name }, 'Evaluating handler');
      try {
        handler.callback(envelope);
        succeeded++;
      } catch (cause: unknown) {
        failed++;
        this.log.error(
          {
            err: new HandlerExecutionError(eventName, handler.name, cause),
            event: eventName,
            action: envelope.action,
            handler: handler.name,
          },
          'Handler failed',
        );
      }
    }

    const summary: DispatchSummary = {
      event: eventName,
      action: envelope.action,
      matched: handlers.length,
      succeeded,
      failed,
      debug,
    };
    this.log.info(summary, 'Webhook dispatched');
    return summary;
  }
}
