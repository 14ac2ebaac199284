import { describe, expect, it } from 'vitest';

import { isKey, key } from '../src/core/key.js';

describe('key', () => {
  it('creates frozen keys with unique ids', () => {
    const a = key<number>('Counter');
    const b = key<number>('Counter');

    expect(a.kind).toBe('key');
    expect(a.label).toBe('Counter');
    expect(a.id).toMatch(/^key_\d+$/);
    expect(a.id).not.toBe(b.id);
    expect(Object.isFrozen(a)).toBe(true);
  });

  it('defaults the label', () => {
    expect(key().label).toBe('Key');
  });

  it('recognises keys at runtime', () => {
    expect(isKey(key('X'))).toBe(true);
    expect(isKey({ kind: 'key', id: 'key_1', label: 'X' })).toBe(true);
    expect(isKey({ kind: 'key', id: 1, label: 'X' })).toBe(false);
    expect(isKey('key_1')).toBe(false);
    expect(isKey(null)).toBe(false);
  });
});
