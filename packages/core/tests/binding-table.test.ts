import { describe, expect, it } from 'vitest';

import { BindingTable } from '../src/core/binding-table.js';
import { dependant } from '../src/core/dependant.js';
import { key } from '../src/core/key.js';
import { InvalidKeyError } from '../src/errors/errors.js';

interface Store {
  name: string;
}

const StoreKey = key<Store>('Store');
const real = dependant({ key: StoreKey, scope: 'app', factory: () => ({ name: 'real' }) });
const fake = dependant({ label: 'FakeStore', scope: 'app', factory: (): Store => ({ name: 'fake' }) });
const other = dependant({ label: 'OtherStore', scope: 'app', factory: (): Store => ({ name: 'other' }) });

describe('BindingTable', () => {
  it('returns the active override for a key', () => {
    const table = new BindingTable();

    expect(table.lookup(StoreKey)).toBeUndefined();
    const binding = table.bind(StoreKey, fake);

    expect(binding.key).toBe(StoreKey);
    expect(binding.dependant).toBe(fake);
    expect(table.lookup(StoreKey)).toBe(fake);
    expect(table.has(StoreKey)).toBe(true);
    expect(table.size).toBe(1);
    expect([...table.boundKeys()]).toEqual([StoreKey.id]);
  });

  it('restores the shadowed binding on unbind', () => {
    const table = new BindingTable();
    const first = table.bind(StoreKey, real);
    const second = table.bind(StoreKey, fake);

    expect(table.lookup(StoreKey)).toBe(fake);
    second.unbind();
    expect(table.lookup(StoreKey)).toBe(real);
    first.unbind();
    expect(table.lookup(StoreKey)).toBeUndefined();
    expect(table.has(StoreKey)).toBe(false);
    expect(table.size).toBe(0);
  });

  it('removes only the unbound entry when unbinding out of order', () => {
    const table = new BindingTable();
    const first = table.bind(StoreKey, real);
    table.bind(StoreKey, fake);
    table.bind(StoreKey, other);

    first.unbind();
    expect(table.lookup(StoreKey)).toBe(other);
  });

  it('bumps the version on every change and ignores repeated unbinds', () => {
    const table = new BindingTable();
    expect(table.version).toBe(0);

    const binding = table.bind(StoreKey, fake);
    expect(table.version).toBe(1);

    binding.unbind();
    binding.unbind();
    expect(table.version).toBe(2);
  });

  it('rejects invalid keys', () => {
    const table = new BindingTable();

    expect(() => table.bind(JSON.parse('{"id":"key_1"}'), fake)).toThrow(InvalidKeyError);
    expect(table.version).toBe(0);
  });
});
