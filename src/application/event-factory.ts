import type { Logger } from 'pino';
import {
  EVENT_DESCRIPTORS,
  FallbackValidationError,
  UnknownEventTypeError,
  fallbackEventDescriptor,
  formatIssue,
  isEventName,
} from '../domain/index.js';
import type { EventEnvelopes, EventName, FallbackEvent } from '../domain/index.js';
import type { ModelOverrides } from './model-overrides.js';
import { descriptorOf, validate } from './validation-engine.js';
import type { ValidateOptions } from './validation-engine.js';

/** Anything `parse` can return. */
export type WebhookEnvelope = EventEnvelopes[EventName] | FallbackEvent;

export interface EventParserOptions {
  readonly logger: Logger;
  readonly overrides?: ModelOverrides;
  /** Accept bare field names when a wire alias is missing, for every descriptor. */
  readonly acceptFieldNames?: boolean;
}

/**
 * Turns `(eventName, payload)` into a typed event envelope.
 *
 * Never throws for bad input: an unknown event name or a payload that
 * fails its descriptor is logged and returned as a fallback envelope
 * built from the same payload. The fallback accepts any JSON object, so
 * the only exception is a payload that is not one.
 */
export class EventParser {
  private readonly log: Logger;
  private readonly validateOptions: ValidateOptions;

  constructor(options: EventParserOptions) {
    this.log = options.logger;
    this.validateOptions = {
      acceptFieldNames: options.acceptFieldNames ?? false,
      ...(options.overrides ? { overrides: options.overrides } : {}),
    };
  }

  parse<N extends EventName>(eventName: N, raw: unknown): EventEnvelopes[N] | FallbackEvent;
  parse(eventName: string, raw: unknown): WebhookEnvelope;
  parse(eventName: string, raw: unknown): WebhookEnvelope {
    if (!isEventName(eventName)) {
      this.log.warn(
        { err: new UnknownEventTypeError(eventName), event: eventName },
        'Unknown event type, using fallback',
      );
      return this.fallback(eventName, raw);
    }

    const descriptor = EVENT_DESCRIPTORS[eventName];
    const outcome = validate(descriptor, raw, this.validateOptions);
    if (outcome.ok) {
      return outcome.record;
    }

    this.log.warn(
      {
        event: eventName,
        descriptor: descriptor.name,
        issues: outcome.issues.map(formatIssue),
      },
      'Payload failed validation, using fallback',
    );
    return this.fallback(eventName, raw);
  }

  private fallback(eventName: string, raw: unknown): FallbackEvent {
    const outcome = validate(fallbackEventDescriptor, raw, this.validateOptions);
    if (!outcome.ok) {
      throw new FallbackValidationError(eventName, outcome.issues);
    }
    return outcome.record;
  }
}

export function createEventParser(options: EventParserOptions): EventParser {
  return new EventParser(options);
}

/** True when `parse` could not produce the event-specific envelope. */
export function isFallbackEvent(envelope: WebhookEnvelope): envelope is FallbackEvent {
  return descriptorOf(envelope) === fallbackEventDescriptor;
}

/** Narrows an envelope to the shape of one event name. */
export function isEvent<N extends EventName>(
  envelope: WebhookEnvelope,
  eventName: N,
): envelope is EventEnvelopes[N] {
  return descriptorOf(envelope) === EVENT_DESCRIPTORS[eventName];
}
