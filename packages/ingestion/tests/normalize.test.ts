import { describe, it, expect } from 'vitest';
import { emptyToNull, normalizeTimestamp, normalizeWhitespace } from '../src/normalize.js';

describe('normalizeWhitespace', () => {
  it('trims and collapses spaces', () => {
    expect(normalizeWhitespace('  hello   world  ')).toBe('hello world');
  });

  it('collapses newlines, tabs and non-breaking spaces', () => {
    expect(normalizeWhitespace('a  b\n\tc')).toBe('a b c');
  });
});

describe('emptyToNull', () => {
  it('returns null for missing or blank text', () => {
    expect(emptyToNull(undefined)).toBeNull();
    expect(emptyToNull(null)).toBeNull();
    expect(emptyToNull('   ')).toBeNull();
  });

  it('returns normalized text otherwise', () => {
    expect(emptyToNull('  Oslo  ')).toBe('Oslo');
  });
});

describe('normalizeTimestamp', () => {
  it('keeps ISO timestamps in UTC', () => {
    expect(normalizeTimestamp('2025-03-01T10:00:00+01:00')).toBe('2025-03-01T09:00:00.000Z');
  });

  it('reads date-only ISO values as UTC midnight', () => {
    expect(normalizeTimestamp('2025-03-01')).toBe('2025-03-01T00:00:00.000Z');
  });

  it('reads dd.mm.yyyy dates', () => {
    expect(normalizeTimestamp('1.3.2025')).toBe('2025-03-01T00:00:00.000Z');
    expect(normalizeTimestamp('20.03.2025')).toBe('2025-03-20T00:00:00.000Z');
  });

  it('rejects impossible dotted dates', () => {
    expect(normalizeTimestamp('31.02.2025')).toBeNull();
  });

  it('reads RFC 2822 dates', () => {
    expect(normalizeTimestamp('Sat, 01 Mar 2025 10:00:00 GMT')).toBe('2025-03-01T10:00:00.000Z');
  });

  it('returns null for text that is not a date', () => {
    expect(normalizeTimestamp('snarest')).toBeNull();
    expect(normalizeTimestamp('')).toBeNull();
    expect(normalizeTimestamp(null)).toBeNull();
  });
});
