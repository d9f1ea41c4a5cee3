import { DescriptorDefinitionError } from './errors.js';

/**
 * Record descriptors: the declarative shape of every webhook record.
 *
 * A descriptor is data: an ordered list of field specs consumed by the
 * validation engine. The builder API (`t.string()`, `t.record(...)`)
 * carries phantom types so the static shape of a validated record is
 * inferred from its descriptor instead of being written twice.
 */

/** Scalar kinds understood by the validation engine. */
export type ScalarType = 'string' | 'integer' | 'number' | 'boolean';

export interface ScalarTypeMap {
  string: string;
  integer: number;
  number: number;
  boolean: boolean;
}

/** JSON kind names used when reporting what a field actually received. */
export type JsonKind = 'string' | 'number' | 'boolean' | 'null' | 'array' | 'object' | 'undefined';

/** Opaque JSON object passed through without validation. */
export type OpenMap = Readonly<Record<string, unknown>>;

/** A value that can fill a URL template placeholder. */
export type TemplateValue = string | number | boolean;

/** `null` and `undefined` are the absence markers for template parameters. */
export type TemplateArg = TemplateValue | null | undefined;

/**
 * Accessor exposed for a template URL field. Arguments are positional,
 * in the order the field declared its parameter names.
 */
export type TemplateAccessor<P extends readonly string[]> = (
  ...values: { [K in keyof P]?: TemplateArg }
) => string;

export type FieldKind =
  | { readonly type: 'scalar'; readonly scalar: ScalarType }
  | { readonly type: 'scalarList'; readonly scalar: ScalarType }
  | { readonly type: 'record'; readonly descriptor: () => AnyDescriptor }
  | { readonly type: 'recordList'; readonly descriptor: () => AnyDescriptor }
  | { readonly type: 'openMap' }
  | {
      readonly type: 'template';
      readonly params: readonly string[];
      readonly prepare: ((template: string) => string) | undefined;
    };

/** Resolved field spec, as the engine sees it. */
export interface FieldSpec {
  readonly name: string;
  readonly wireAlias: string;
  readonly required: boolean;
  readonly defaultValue: (() => unknown) | undefined;
  readonly kind: FieldKind;
}

/**
 * Builder for one field. `T` is the validated value type; `A` is the type
 * the field takes when it is absent from the payload (`never` for required
 * fields and fields with a default).
 */
export class FieldBuilder<T, A = never> {
  declare readonly _value: T;
  declare readonly _absent: A;

  readonly kind: FieldKind;
  readonly required: boolean;
  readonly wireAlias: string | undefined;
  readonly defaultValue: (() => unknown) | undefined;

  constructor(
    kind: FieldKind,
    required = true,
    wireAlias: string | undefined = undefined,
    defaultValue: (() => unknown) | undefined = undefined,
  ) {
    this.kind = kind;
    this.required = required;
    this.wireAlias = wireAlias;
    this.defaultValue = defaultValue;
  }

  /**
   * Marks the field optional. Absent (or JSON null) values become `null`,
   * except list fields, which get a fresh empty array per record.
   */
  optional(): FieldBuilder<T, T extends readonly unknown[] ? never : null> {
    const isList = this.kind.type === 'recordList' || this.kind.type === 'scalarList';
    return new FieldBuilder<T, T extends readonly unknown[] ? never : null>(
      this.kind,
      false,
      this.wireAlias,
      isList ? () => [] : this.defaultValue,
    );
  }

  /** Reads the field from a differently named wire key. */
  from(wireAlias: string): FieldBuilder<T, A> {
    return new FieldBuilder<T, A>(this.kind, this.required, wireAlias, this.defaultValue);
  }

  /** Optional field with a default produced per record. */
  default(value: () => T): FieldBuilder<T, never> {
    return new FieldBuilder<T, never>(this.kind, false, this.wireAlias, value);
  }
}

export type AnyField = FieldBuilder<unknown, unknown>;

export type FieldShape = { readonly [name: string]: AnyField };

export interface RecordDescriptor<S extends FieldShape = FieldShape> {
  readonly name: string;
  readonly shape: S;
  readonly fields: readonly FieldSpec[];
  /** When set, a missing wire alias falls back to the bare field name. */
  readonly acceptFieldNames: boolean;
  /**
   * When set, an optional field whose value fails validation is read as
   * absent and its raw value is kept with the unrecognized fields.
   */
  readonly lenient: boolean;
}

export type AnyDescriptor = RecordDescriptor<FieldShape>;

export type FieldValue<F> = F extends FieldBuilder<infer T, infer A> ? T | A : never;

export type RecordValues<S extends FieldShape> = { readonly [K in keyof S]: FieldValue<S[K]> };

/** Key of the unrecognized-fields bag on every record. */
export const UNRECOGNIZED: unique symbol = Symbol('hookwire.unrecognized');
/** Key of the descriptor that produced a record. */
export const DESCRIPTOR: unique symbol = Symbol('hookwire.descriptor');

export interface RecordMeta {
  readonly [UNRECOGNIZED]: OpenMap;
  readonly [DESCRIPTOR]: AnyDescriptor;
}

/** Static type of the immutable record a descriptor validates into. */
export type RecordOf<D> = D extends RecordDescriptor<infer S> ? RecordValues<S> & RecordMeta : never;

export interface DefineRecordOptions {
  readonly acceptFieldNames?: boolean;
  readonly lenient?: boolean;
}

/**
 * Builds a descriptor from a field shape. Field order follows the shape's
 * key order; each wire alias defaults to the field name and must be unique.
 */
export function defineRecord<S extends FieldShape>(
  name: string,
  shape: S,
  options: DefineRecordOptions = {},
): RecordDescriptor<S> {
  const seen = new Map<string, string>();
  const fields: FieldSpec[] = [];

  for (const [fieldName, builder] of Object.entries(shape)) {
    const wireAlias = builder.wireAlias ?? fieldName;
    const owner = seen.get(wireAlias);
    if (owner !== undefined) {
      throw new DescriptorDefinitionError(
        `Descriptor "${name}" maps both "${owner}" and "${fieldName}" to wire key "${wireAlias}"`,
        { descriptor: name, wireAlias },
      );
    }
    seen.set(wireAlias, fieldName);
    fields.push({
      name: fieldName,
      wireAlias,
      required: builder.required,
      defaultValue: builder.defaultValue,
      kind: builder.kind,
    });
  }

  return Object.freeze({
    name,
    shape,
    fields: Object.freeze(fields),
    acceptFieldNames: options.acceptFieldNames ?? false,
    lenient: options.lenient ?? false,
  });
}

function scalar<K extends ScalarType>(type: K): FieldBuilder<ScalarTypeMap[K]> {
  return new FieldBuilder<ScalarTypeMap[K]>({ type: 'scalar', scalar: type });
}

function scalarList<K extends ScalarType>(type: K): FieldBuilder<readonly ScalarTypeMap[K][]> {
  return new FieldBuilder<readonly ScalarTypeMap[K][]>({ type: 'scalarList', scalar: type });
}

/** Field builders. */
export const t = {
  string: () => scalar('string'),
  integer: () => scalar('integer'),
  number: () => scalar('number'),
  boolean: () => scalar('boolean'),
  strings: () => scalarList('string'),
  integers: () => scalarList('integer'),

  record<D extends AnyDescriptor>(descriptor: () => D): FieldBuilder<RecordOf<D>> {
    return new FieldBuilder<RecordOf<D>>({ type: 'record', descriptor });
  },

  list<D extends AnyDescriptor>(descriptor: () => D): FieldBuilder<readonly RecordOf<D>[]> {
    return new FieldBuilder<readonly RecordOf<D>[]>({ type: 'recordList', descriptor });
  },

  openMap(): FieldBuilder<OpenMap> {
    return new FieldBuilder<OpenMap>({ type: 'openMap' });
  },

  /**
   * Hypermedia URL template, e.g. `followers_url: ".../{/other_user}"`.
   * `params` lists placeholder names in the order the accessor takes them.
   */
  template<P extends string[]>(...params: P): FieldBuilder<TemplateAccessor<P>> {
    return new FieldBuilder<TemplateAccessor<P>>({ type: 'template', params, prepare: undefined });
  },

  /** Template whose raw text is rewritten before interpolation. */
  preparedTemplate<P extends string[]>(
    prepare: (template: string) => string,
    ...params: P
  ): FieldBuilder<TemplateAccessor<P>> {
    return new FieldBuilder<TemplateAccessor<P>>({ type: 'template', params, prepare });
  },
};
