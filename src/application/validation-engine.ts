import { z } from 'zod';
import {
  DESCRIPTOR,
  UNRECOGNIZED,
} from '../domain/index.js';
import type {
  AnyDescriptor,
  FieldKind,
  FieldSpec,
  JsonKind,
  OpenMap,
  RecordOf,
  ScalarType,
  TemplateArg,
  ValidationIssue,
  MissingRequiredField,
  TypeMismatch,
  IssuePath,
} from '../domain/index.js';
import type { ModelOverrides } from './model-overrides.js';
import { interpolate } from './template.js';

/**
 * Strict primitive checks. No coercion: `"42"` is not an integer and
 * `1` is not a boolean.
 */
const SCALAR_SCHEMAS: Record<ScalarType, z.ZodTypeAny> = {
  string: z.string(),
  integer: z.number().int(),
  number: z.number(),
  boolean: z.boolean(),
};

export interface ValidateOptions {
  /** Fall back to the bare field name when the wire alias is missing. */
  readonly acceptFieldNames?: boolean;
  readonly overrides?: ModelOverrides;
}

/** Tagged outcome; validation failure is an expected result, not an exception. */
export type ValidationOutcome<R> =
  | { readonly ok: true; readonly record: R }
  | { readonly ok: false; readonly issues: readonly ValidationIssue[] };

type FieldOutcome =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly issues: ValidationIssue[] };

interface Context {
  readonly acceptFieldNames: boolean;
  readonly overrides: ModelOverrides | undefined;
}

export function jsonKind(value: unknown): JsonKind {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    case 'undefined':
      return 'undefined';
    default:
      return 'object';
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Copies a JSON object keeping every key as an own data property, `__proto__` included. */
function copyMap(map: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(map).map(([key, child]) => [key, copyJson(child)]));
}

function copyJson(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(copyJson);
  return isJsonObject(value) ? copyMap(value) : value;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function missing(name: string): MissingRequiredField {
  return { code: 'missing_required_field', path: [name] };
}

function mismatch(path: IssuePath, expected: string, value: unknown): TypeMismatch {
  return { code: 'type_mismatch', path, expected, received: jsonKind(value) };
}

/** Re-roots a child record's issue under `prefix`. */
function nest(prefix: IssuePath, issue: ValidationIssue): ValidationIssue {
  const path = [...prefix, ...issue.path];
  const cause = issue.code === 'nested_validation_failure' ? issue.cause : issue;
  return { code: 'nested_validation_failure', path, cause };
}

function expectedKind(kind: FieldKind): string {
  switch (kind.type) {
    case 'scalar':
      return kind.scalar;
    case 'scalarList':
    case 'recordList':
      return 'array';
    case 'record':
    case 'openMap':
      return 'object';
    case 'template':
      return 'string';
  }
}

/** Looks the field up by wire alias, then (if allowed) by its bare name. */
function lookup(
  raw: Record<string, unknown>,
  spec: FieldSpec,
  acceptFieldNames: boolean,
): { readonly key: string; readonly value: unknown } | undefined {
  if (Object.hasOwn(raw, spec.wireAlias)) {
    return { key: spec.wireAlias, value: raw[spec.wireAlias] };
  }
  if (acceptFieldNames && Object.hasOwn(raw, spec.name)) {
    return { key: spec.name, value: raw[spec.name] };
  }
  return undefined;
}

function templateAccessor(
  template: string,
  kind: Extract<FieldKind, { type: 'template' }>,
): (...values: readonly TemplateArg[]) => string {
  const source = kind.prepare ? kind.prepare(template) : template;
  return Object.freeze((...values: readonly TemplateArg[]) =>
    interpolate(
      source,
      kind.params.map((name, index) => [name, values[index]] as const),
    ),
  );
}

function validateField(spec: FieldSpec, value: unknown, ctx: Context): FieldOutcome {
  const { kind, name } = spec;

  switch (kind.type) {
    case 'scalar': {
      if (!SCALAR_SCHEMAS[kind.scalar].safeParse(value).success) {
        return { ok: false, issues: [mismatch([name], kind.scalar, value)] };
      }
      return { ok: true, value };
    }

    case 'scalarList': {
      if (!Array.isArray(value)) {
        return { ok: false, issues: [mismatch([name], 'array', value)] };
      }
      const schema = SCALAR_SCHEMAS[kind.scalar];
      const issues: ValidationIssue[] = [];
      value.forEach((item: unknown, index) => {
        if (!schema.safeParse(item).success) {
          issues.push(mismatch([name, index], kind.scalar, item));
        }
      });
      return issues.length > 0 ? { ok: false, issues } : { ok: true, value: Object.freeze([...value]) };
    }

    case 'record': {
      const child = validateRecord(kind.descriptor(), value, ctx);
      if (!child.ok) {
        return { ok: false, issues: child.issues.map((issue) => nest([name], issue)) };
      }
      return { ok: true, value: child.record };
    }

    case 'recordList': {
      if (!Array.isArray(value)) {
        return { ok: false, issues: [mismatch([name], 'array', value)] };
      }
      const descriptor = kind.descriptor();
      const records: unknown[] = [];
      const issues: ValidationIssue[] = [];
      value.forEach((item: unknown, index) => {
        const child = validateRecord(descriptor, item, ctx);
        if (child.ok) {
          records.push(child.record);
        } else {
          issues.push(...child.issues.map((issue) => nest([name, index], issue)));
        }
      });
      return issues.length > 0 ? { ok: false, issues } : { ok: true, value: Object.freeze(records) };
    }

    case 'openMap': {
      if (!isJsonObject(value)) {
        return { ok: false, issues: [mismatch([name], 'object', value)] };
      }
      return { ok: true, value: deepFreeze(copyMap(value)) };
    }

    case 'template': {
      if (typeof value !== 'string') {
        return { ok: false, issues: [mismatch([name], 'string', value)] };
      }
      return { ok: true, value: templateAccessor(value, kind) };
    }
  }
}

function validateRecord(
  descriptor: AnyDescriptor,
  raw: unknown,
  ctx: Context,
): { ok: true; record: unknown } | { ok: false; issues: ValidationIssue[] } {
  if (!isJsonObject(raw)) {
    return { ok: false, issues: [mismatch([], 'object', raw)] };
  }

  const acceptFieldNames = descriptor.acceptFieldNames || ctx.acceptFieldNames;
  const values: Record<string, unknown> = {};
  const consumed = new Set<string>();
  const issues: ValidationIssue[] = [];

  const absent = (spec: FieldSpec): unknown => (spec.defaultValue ? deepFreeze(spec.defaultValue()) : null);

  for (const spec of descriptor.fields) {
    const found = lookup(raw, spec, acceptFieldNames);
    const value = found?.value;

    if (value === undefined || value === null) {
      if (found !== undefined) consumed.add(found.key);
      if (acceptFieldNames && Object.hasOwn(raw, spec.name)) consumed.add(spec.name);
      if (!spec.required) {
        values[spec.name] = absent(spec);
      } else if (value === undefined) {
        issues.push(missing(spec.name));
      } else {
        issues.push(mismatch([spec.name], expectedKind(spec.kind), value));
      }
      continue;
    }

    const outcome = validateField(spec, value, ctx);
    if (!outcome.ok && descriptor.lenient && !spec.required) {
      values[spec.name] = absent(spec);
      continue;
    }

    if (found !== undefined) consumed.add(found.key);
    if (acceptFieldNames && Object.hasOwn(raw, spec.name)) consumed.add(spec.name);
    if (outcome.ok) {
      values[spec.name] = outcome.value;
    } else {
      issues.push(...outcome.issues);
    }
  }

  if (issues.length > 0) {
    return { ok: false, issues };
  }

  const unrecognized = copyMap(
    Object.fromEntries(Object.entries(raw).filter(([key]) => !consumed.has(key))),
  );

  return { ok: true, record: buildRecord(descriptor, values, unrecognized, ctx) };
}

/**
 * Assembles the frozen record: extension members first, declared fields
 * over them, metadata under non-enumerable symbol keys.
 */
function buildRecord(
  descriptor: AnyDescriptor,
  values: Record<string, unknown>,
  unrecognized: Record<string, unknown>,
  ctx: Context,
): object {
  const record: object = {};
  Object.defineProperty(record, UNRECOGNIZED, {
    value: deepFreeze(unrecognized),
  });
  Object.defineProperty(record, DESCRIPTOR, { value: descriptor });
  Object.assign(record, values);
  Object.freeze(record);

  const extras = ctx.overrides?.extend(descriptor, record);
  if (extras === undefined) {
    return record;
  }

  const merged: object = {};
  Object.defineProperties(merged, Object.getOwnPropertyDescriptors(extras));
  Object.defineProperties(merged, Object.getOwnPropertyDescriptors(record));
  return Object.freeze(merged);
}

/**
 * Validates a raw payload map against a descriptor.
 *
 * Declared fields are checked strictly; undeclared keys never fail and
 * are kept in the record's unrecognized-fields bag. Every issue of the
 * record is reported, with nested paths for child records and list
 * elements. The returned record is deeply immutable.
 */
export function validate<D extends AnyDescriptor>(
  descriptor: D,
  raw: unknown,
  options: ValidateOptions = {},
): ValidationOutcome<RecordOf<D>> {
  const outcome = validateRecord(descriptor, raw, {
    acceptFieldNames: options.acceptFieldNames ?? false,
    overrides: options.overrides,
  });
  if (!outcome.ok) {
    return outcome;
  }
  // The record was just built field-by-field from `descriptor`.
  return { ok: true, record: outcome.record as RecordOf<D> };
}

/** Undeclared wire keys kept by the engine. */
export function unrecognizedFields(record: { readonly [UNRECOGNIZED]: OpenMap }): OpenMap {
  return record[UNRECOGNIZED];
}

/** The descriptor a record was validated against. */
export function descriptorOf(record: { readonly [DESCRIPTOR]: AnyDescriptor }): AnyDescriptor {
  return record[DESCRIPTOR];
}
