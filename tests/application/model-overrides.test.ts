import { describe, it, expect } from 'vitest';
import { labelDescriptor, userDescriptor } from '../../src/domain/index.js';
import { ModelOverrides } from '../../src/application/index.js';

describe('ModelOverrides', () => {
  it('stores one extension per descriptor', () => {
    const overrides = new ModelOverrides();
    overrides.set(userDescriptor, () => ({ a: 1 }));
    overrides.set(userDescriptor, () => ({ b: 2 }));

    expect(overrides.size).toBe(1);
    expect(overrides.has(userDescriptor)).toBe(true);
    expect(overrides.has(labelDescriptor)).toBe(false);
    expect(overrides.extend(userDescriptor, {})).toEqual({ b: 2 });
  });

  it('returns undefined for a descriptor without an extension', () => {
    const overrides = new ModelOverrides();
    expect(overrides.extend(labelDescriptor, {})).toBeUndefined();
  });

  it('passes the record to the extension', () => {
    const overrides = new ModelOverrides();
    overrides.set(labelDescriptor, (label) => ({ shout: label.name.toUpperCase() }));

    expect(overrides.extend(labelDescriptor, { name: 'bug' })).toEqual({ shout: 'BUG' });
  });

  it('rejects an extension that is not a function', () => {
    const overrides = new ModelOverrides();
    const notAFunction: unknown = { extra: true };

    expect(() => Reflect.apply(overrides.set, overrides, [userDescriptor, notAFunction])).toThrow('Override for "User" must be a function');
  });

  it('clears every extension', () => {
    const overrides = new ModelOverrides();
    overrides.set(userDescriptor, () => ({}));
    overrides.clear();

    expect(overrides.size).toBe(0);
    expect(overrides.has(userDescriptor)).toBe(false);
  });
});
