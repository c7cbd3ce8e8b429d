import { describe, expect, it } from 'vitest';
import { toBoolean, toIsoString, toNullableIsoString } from './rows';

describe('row normalisers', () => {
  it('renders Date values and stored ISO strings identically', () => {
    expect(toIsoString(new Date('2026-03-01T10:00:00.000Z'))).toBe('2026-03-01T10:00:00.000Z');
    expect(toIsoString('2026-03-01T10:00:00.000Z')).toBe('2026-03-01T10:00:00.000Z');
  });

  it('reads SQLite CURRENT_TIMESTAMP output as UTC', () => {
    expect(toIsoString('2026-03-01 10:00:00')).toBe('2026-03-01T10:00:00.000Z');
  });

  it('keeps nulls', () => {
    expect(toNullableIsoString(null)).toBeNull();
    expect(toNullableIsoString(undefined)).toBeNull();
  });

  it('maps integer flags to booleans', () => {
    expect(toBoolean(1)).toBe(true);
    expect(toBoolean(0)).toBe(false);
    expect(toBoolean(false)).toBe(false);
  });
});
