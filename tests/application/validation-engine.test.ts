import { describe, it, expect } from 'vitest';
import { defineRecord, t, userDescriptor, repositoryDescriptor } from '../../src/domain/index.js';
import {
  ModelOverrides,
  descriptorOf,
  jsonKind,
  unrecognizedFields,
  validate,
} from '../../src/application/index.js';
import { makeRepository, makeUser } from '../fixtures/payloads.js';

const tagDescriptor = defineRecord('Tag', {
  name: t.string(),
  weight: t.number().optional(),
});

const itemDescriptor = defineRecord('Item', {
  id: t.integer(),
  title: t.string(),
  open: t.boolean().optional(),
  tags: t.list(() => tagDescriptor).optional(),
  owner: t.record(() => tagDescriptor).optional(),
  extra: t.openMap().optional(),
});

function expectOk<R>(outcome: { ok: true; record: R } | { ok: false; issues: readonly unknown[] }): R {
  if (!outcome.ok) {
    throw new Error(`expected success, got ${JSON.stringify(outcome.issues)}`);
  }
  return outcome.record;
}

describe('validate', () => {
  it('builds a record with declared fields and defaults', () => {
    const record = expectOk(validate(itemDescriptor, { id: 1, title: 'first' }));

    expect(record.id).toBe(1);
    expect(record.title).toBe('first');
    expect(record.open).toBeNull();
    expect(record.tags).toEqual([]);
    expect(record.owner).toBeNull();
    expect(record.extra).toBeNull();
  });

  it('accepts an empty map for an all-optional descriptor', () => {
    const allOptional = defineRecord('AllOptional', { a: t.string().optional() });
    const record = expectOk(validate(allOptional, {}));
    expect(record.a).toBeNull();
  });

  it('treats JSON null on an optional field as absent', () => {
    const record = expectOk(validate(itemDescriptor, { id: 1, title: 'x', tags: null, open: null }));
    expect(record.tags).toEqual([]);
    expect(record.open).toBeNull();
  });

  it('gives each record its own empty list', () => {
    const a = expectOk(validate(itemDescriptor, { id: 1, title: 'a' }));
    const b = expectOk(validate(itemDescriptor, { id: 2, title: 'b' }));
    expect(a.tags).not.toBe(b.tags);
  });

  it('reports a missing required field by name', () => {
    const outcome = validate(itemDescriptor, { title: 'no id' });
    expect(outcome).toEqual({
      ok: false,
      issues: [{ code: 'missing_required_field', path: ['id'] }],
    });
  });

  it('reports a required field sent as null as a type mismatch', () => {
    const outcome = validate(itemDescriptor, { id: null, title: 't' });
    expect(outcome).toEqual({
      ok: false,
      issues: [{ code: 'type_mismatch', path: ['id'], expected: 'integer', received: 'null' }],
    });
  });

  it('does not coerce scalars', () => {
    const outcome = validate(itemDescriptor, { id: '42', title: 7, open: 1 });
    expect(outcome).toEqual({
      ok: false,
      issues: [
        { code: 'type_mismatch', path: ['id'], expected: 'integer', received: 'string' },
        { code: 'type_mismatch', path: ['title'], expected: 'string', received: 'number' },
        { code: 'type_mismatch', path: ['open'], expected: 'boolean', received: 'number' },
      ],
    });
  });

  it('rejects a fractional value for an integer field', () => {
    const outcome = validate(itemDescriptor, { id: 1.5, title: 't' });
    expect(outcome.ok).toBe(false);
  });

  it('prefixes nested issues with the parent path and list index', () => {
    const outcome = validate(itemDescriptor, {
      id: 1,
      title: 't',
      tags: [{ name: 'ok' }, { name: 5 }],
      owner: {},
    });

    expect(outcome).toEqual({
      ok: false,
      issues: [
        {
          code: 'nested_validation_failure',
          path: ['tags', 1, 'name'],
          cause: { code: 'type_mismatch', path: ['name'], expected: 'string', received: 'number' },
        },
        {
          code: 'nested_validation_failure',
          path: ['owner', 'name'],
          cause: { code: 'missing_required_field', path: ['name'] },
        },
      ],
    });
  });

  it('reports a non-array list value and a non-object nested value', () => {
    const outcome = validate(itemDescriptor, { id: 1, title: 't', tags: 'a,b', owner: [] });
    expect(outcome).toEqual({
      ok: false,
      issues: [
        { code: 'type_mismatch', path: ['tags'], expected: 'array', received: 'string' },
        {
          code: 'nested_validation_failure',
          path: ['owner'],
          cause: { code: 'type_mismatch', path: [], expected: 'object', received: 'array' },
        },
      ],
    });
  });

  it('rejects a raw value that is not an object', () => {
    expect(validate(itemDescriptor, 'nope')).toEqual({
      ok: false,
      issues: [{ code: 'type_mismatch', path: [], expected: 'object', received: 'string' }],
    });
  });

  it('keeps undeclared keys in the unrecognized-fields bag', () => {
    const record = expectOk(validate(itemDescriptor, { id: 1, title: 't', color: 'red', size: { w: 2 } }));

    expect(unrecognizedFields(record)).toEqual({ color: 'red', size: { w: 2 } });
    expect(Object.keys(record)).not.toContain('color');
  });

  it('keeps a __proto__ key as plain data', () => {
    const raw: unknown = JSON.parse('{"id":1,"title":"t","__proto__":{"x":1},"extra":{"__proto__":{"y":2}}}');
    const record = expectOk(validate(itemDescriptor, raw));
    const bag = unrecognizedFields(record);

    expect(Object.keys(bag)).toEqual(['__proto__']);
    expect(Object.getOwnPropertyDescriptor(bag, '__proto__')?.value).toEqual({ x: 1 });
    expect(Object.getPrototypeOf(bag)).toBe(Object.prototype);
    expect(Object.keys(record.extra ?? {})).toEqual(['__proto__']);
  });

  it('reads fields through their wire alias', () => {
    const record = expectOk(validate(repositoryDescriptor, makeRepository()));
    expect(record.fullName).toBe('acme/widgets');
    expect(record.owner.login).toBe('acme');
    expect(record.topics).toEqual(['tooling']);
    expect(unrecognizedFields(record)).toEqual({});
  });

  it('falls back to the bare field name only when enabled', () => {
    const raw: Record<string, unknown> = { ...makeRepository(), fullName: 'acme/other' };
    delete raw['full_name'];

    expect(validate(repositoryDescriptor, raw).ok).toBe(false);

    const record = expectOk(validate(repositoryDescriptor, raw, { acceptFieldNames: true }));
    expect(record.fullName).toBe('acme/other');
    expect(unrecognizedFields(record)).toEqual({});
  });

  it('prefers the wire alias over the bare name', () => {
    const raw = { ...makeRepository(), fullName: 'ignored/name' };
    const record = expectOk(validate(repositoryDescriptor, raw, { acceptFieldNames: true }));
    expect(record.fullName).toBe('acme/widgets');
  });

  it('passes open maps through unvalidated but copied', () => {
    const extra = { nested: { deep: [1, 2] } };
    const record = expectOk(validate(itemDescriptor, { id: 1, title: 't', extra }));

    expect(record.extra).toEqual(extra);
    expect(record.extra).not.toBe(extra);
  });

  it('rejects an open map that is not an object', () => {
    const outcome = validate(itemDescriptor, { id: 1, title: 't', extra: [1] });
    expect(outcome).toEqual({
      ok: false,
      issues: [{ code: 'type_mismatch', path: ['extra'], expected: 'object', received: 'array' }],
    });
  });

  it('produces deeply frozen records', () => {
    const record = expectOk(
      validate(itemDescriptor, { id: 1, title: 't', tags: [{ name: 'a' }], extra: { k: { v: 1 } }, other: { x: 1 } }),
    );

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.tags)).toBe(true);
    expect(Object.isFrozen(record.tags[0])).toBe(true);
    expect(Object.isFrozen(record.extra?.['k'])).toBe(true);
    expect(Object.isFrozen(unrecognizedFields(record)['other'])).toBe(true);
    expect(() => {
      Object.assign(record, { title: 'changed' });
    }).toThrow(TypeError);
  });

  it('does not freeze or change the caller payload', () => {
    const raw = { id: 1, title: 't', extra: { k: 1 } };
    expectOk(validate(itemDescriptor, raw));
    expect(Object.isFrozen(raw)).toBe(false);
    expect(Object.isFrozen(raw.extra)).toBe(false);
  });

  it('exposes template fields as accessor functions', () => {
    const record = expectOk(validate(userDescriptor, makeUser()));

    expect(record.followingUrl?.()).toBe('https://api.github.com/users/octo-tester/following');
    expect(record.followingUrl?.('hubber')).toBe('https://api.github.com/users/octo-tester/following/hubber');
    expect(record.starredUrl?.('acme', 'widgets')).toBe(
      'https://api.github.com/users/octo-tester/starred/acme/widgets',
    );
  });

  it('records the descriptor that built the record', () => {
    const record = expectOk(validate(itemDescriptor, { id: 1, title: 't' }));
    expect(descriptorOf(record)).toBe(itemDescriptor);
  });

  it('applies overrides to nested records, declared fields winning', () => {
    const overrides = new ModelOverrides();
    overrides.set(userDescriptor, (user) => ({
      login: 'shadowed',
      get handle() {
        return `@${user.login}`;
      },
    }));

    const record = expectOk(validate(repositoryDescriptor, makeRepository(), { overrides }));
    const owner: object = record.owner;

    expect(record.owner.login).toBe('acme');
    expect('handle' in owner && owner.handle).toBe('@acme');
    expect(Object.isFrozen(owner)).toBe(true);
    expect(descriptorOf(record.owner)).toBe(userDescriptor);
  });
});

describe('lenient descriptors', () => {
  const looseDescriptor = defineRecord(
    'Loose',
    {
      id: t.integer().optional(),
      name: t.string(),
      tags: t.strings().optional(),
      owner: t.record(() => tagDescriptor).optional(),
    },
    { lenient: true },
  );

  it('reads a wrongly typed optional field as absent and keeps the raw value', () => {
    const record = expectOk(
      validate(looseDescriptor, { id: 'x', name: 'n', tags: 'a', owner: { name: 3 } }),
    );

    expect(record.id).toBeNull();
    expect(record.tags).toEqual([]);
    expect(record.owner).toBeNull();
    expect(unrecognizedFields(record)).toEqual({ id: 'x', tags: 'a', owner: { name: 3 } });
  });

  it('still reports required fields', () => {
    expect(validate(looseDescriptor, { id: 1 })).toEqual({
      ok: false,
      issues: [{ code: 'missing_required_field', path: ['name'] }],
    });
    expect(validate(looseDescriptor, { name: 5 })).toEqual({
      ok: false,
      issues: [{ code: 'type_mismatch', path: ['name'], expected: 'string', received: 'number' }],
    });
  });
});

describe('jsonKind', () => {
  it('names JSON kinds', () => {
    expect(jsonKind(null)).toBe('null');
    expect(jsonKind([])).toBe('array');
    expect(jsonKind({})).toBe('object');
    expect(jsonKind('x')).toBe('string');
    expect(jsonKind(0)).toBe('number');
    expect(jsonKind(false)).toBe('boolean');
    expect(jsonKind(undefined)).toBe('undefined');
  });
});
