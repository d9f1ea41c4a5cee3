import type { AnyDescriptor, RecordDescriptor, FieldShape, RecordOf } from '../domain/index.js';

/** Produces the extra members merged into every record of one descriptor. */
export type RecordExtension<R> = (record: R) => object;

/**
 * Stored form of an extension. Declared as a method so the map can hold
 * extensions of different record types; each one is only ever called
 * with records of the descriptor it is keyed by.
 */
interface StoredExtension {
  extend(record: object): object;
}

/**
 * Per-descriptor extension registry.
 *
 * Stands in for swapping a record's class at construction time: callers
 * attach methods or values to every record a descriptor produces, nested
 * records included (a `user` extension reaches `sender`,
 * `pull_request.user`, `repository.owner`). Declared fields always win
 * over extension members of the same name.
 */
export class ModelOverrides {
  private readonly extensions: Map<AnyDescriptor, StoredExtension> = new Map();

  set<S extends FieldShape>(
    descriptor: RecordDescriptor<S>,
    extend: RecordExtension<RecordOf<RecordDescriptor<S>>>,
  ): void {
    if (typeof extend !== 'function') {
      throw new TypeError(`Override for "${descriptor.name}" must be a function`);
    }
    this.extensions.set(descriptor, { extend });
  }

  has(descriptor: AnyDescriptor): boolean {
    return this.extensions.has(descriptor);
  }

  /** Extra members for a freshly built record, or undefined when none is set. */
  extend(descriptor: AnyDescriptor, record: object): object | undefined {
    return this.extensions.get(descriptor)?.extend(record);
  }

  clear(): void {
    this.extensions.clear();
  }

  get size(): number {
    return this.extensions.size;
  }
}
