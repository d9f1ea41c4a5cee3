export { validate, jsonKind, unrecognizedFields, descriptorOf } from './validation-engine.js';
export type { ValidateOptions, ValidationOutcome } from './validation-engine.js';
export { interpolate } from './template.js';
export type { TemplateParam } from './template.js';
export { ModelOverrides } from './model-overrides.js';
export type { RecordExtension } from './model-overrides.js';
export { EventParser, createEventParser, isFallbackEvent, isEvent } from './event-factory.js';
export type { EventParserOptions, WebhookEnvelope } from './event-factory.js';
export { HookRegistry } from './hook-registry.js';
export type {
  DispatchSummary,
  EnvelopeFor,
  HookCallback,
  HookOptions,
  HookRegistration,
  HookRegistryOptions,
} from './hook-registry.js';
export { WebhookRuntime, override } from './setup.js';
export type { HookLoader, OverrideEntry, SetupOptions, WebhookRuntimeOptions } from './setup.js';
