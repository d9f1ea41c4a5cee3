import type { JsonKind } from './descriptor.js';

/**
 * Error taxonomy.
 *
 * Validation problems are values (`ValidationIssue`), never thrown: schema
 * drift is routine and the event factory recovers from it into a fallback
 * envelope. The Error classes below cover the conditions that are logged
 * (unknown event type, handler failure) or genuinely fatal (a fallback
 * descriptor that cannot validate, a malformed descriptor definition).
 */

/** Field names and list indices from the record root down to the problem. */
export type IssuePath = readonly (string | number)[];

export interface MissingRequiredField {
  readonly code: 'missing_required_field';
  readonly path: IssuePath;
}

export interface TypeMismatch {
  readonly code: 'type_mismatch';
  readonly path: IssuePath;
  readonly expected: string;
  readonly received: JsonKind;
}

/** A child record's issue with the parent field path prepended. */
export interface NestedValidationFailure {
  readonly code: 'nested_validation_failure';
  readonly path: IssuePath;
  readonly cause: MissingRequiredField | TypeMismatch;
}

export type ValidationIssue = MissingRequiredField | TypeMismatch | NestedValidationFailure;

/** Renders a path as `pull_request.labels[1].name`. */
export function formatPath(path: IssuePath): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out === '' ? segment : `.${segment}`;
    }
  }
  return out === '' ? '<root>' : out;
}

export function formatIssue(issue: ValidationIssue): string {
  const leaf = issue.code === 'nested_validation_failure' ? issue.cause : issue;
  const where = formatPath(issue.path);
  if (leaf.code === 'missing_required_field') {
    return `${where}: required field is missing`;
  }
  return `${where}: expected ${leaf.expected}, received ${leaf.received}`;
}

/**
 * Base error class. Adds a machine-readable `code` and structured
 * `context` that is logged alongside the message.
 */
export class HookwireError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;

  constructor(message: string, code: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'HookwireError';
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** Event name missing from the static table. Logged, never thrown. */
export class UnknownEventTypeError extends HookwireError {
  constructor(eventName: string) {
    super(`Unknown event type "${eventName}"`, 'UNKNOWN_EVENT_TYPE', { event: eventName });
    this.name = 'UnknownEventTypeError';
  }
}

/** A registered callback threw during dispatch. Logged, never rethrown. */
export class HandlerExecutionError extends HookwireError {
  constructor(eventName: string, handler: string, cause: unknown) {
    super(`Handler "${handler}" failed while handling "${eventName}"`, 'HANDLER_EXECUTION_FAILED', {
      event: eventName,
      handler,
    });
    this.name = 'HandlerExecutionError';
    this.cause = cause;
  }
}

/**
 * The fallback descriptor rejected a payload. It accepts any JSON object,
 * so the payload was not one (an array, a string, `null`). Thrown.
 */
export class FallbackValidationError extends HookwireError {
  readonly issues: readonly ValidationIssue[];

  constructor(eventName: string, issues: readonly ValidationIssue[]) {
    super(`Fallback descriptor rejected "${eventName}" payload`, 'FALLBACK_INVALID', {
      event: eventName,
      issues: issues.map(formatIssue),
    });
    this.name = 'FallbackValidationError';
    this.issues = issues;
  }
}

/** Thrown while building a descriptor (e.g. two fields share a wire key). */
export class DescriptorDefinitionError extends HookwireError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'DESCRIPTOR_INVALID', context);
    this.name = 'DescriptorDefinitionError';
  }
}

/** A hook module path could not be found or does not export `registerHooks`. */
export class HookLoadError extends HookwireError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'HOOK_LOAD_FAILED', context);
    this.name = 'HookLoadError';
  }
}

export class ConfigError extends HookwireError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_INVALID', context);
    this.name = 'ConfigError';
  }
}
