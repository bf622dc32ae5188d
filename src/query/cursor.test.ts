import { describe, it, expect, vi } from 'vitest';
import { InvalidCursorError } from '../errors.js';
import { decodeCursor, encodeCursor, fingerprintOf, resumeCursor } from './cursor.js';

const SECRET = 'test-secret';

describe('fingerprintOf', () => {
  it('ignores key order and undefined values', () => {
    const fp = fingerprintOf({ table: 'weight', order: { column: 'date', direction: 'desc' } });
    expect(fp).toMatch(/^[0-9a-f]{16}$/);
    expect(fingerprintOf({ order: { direction: 'desc', column: 'date' }, table: 'weight' })).toBe(fp);
    expect(fingerprintOf({ table: 'weight', order: { column: 'date', direction: 'desc' }, filter: undefined })).toBe(fp);
  });

  it('changes with the context', () => {
    expect(fingerprintOf({ table: 'weight' })).not.toBe(fingerprintOf({ table: 'steps' }));
  });
});

describe('encodeCursor / decodeCursor', () => {
  const fingerprint = fingerprintOf({ table: 'weight' });

  it('round-trips a cursor in a short token', () => {
    const cursor = { page: 42, fingerprint, totalKnown: true };
    const token = encodeCursor(cursor, SECRET);

    expect(token.startsWith(`16.${fingerprint}.1.`)).toBe(true);
    expect(token.length).toBeLessThanOrEqual(64);
    expect(decodeCursor(token, SECRET)).toEqual(cursor);
  });

  it('rejects an edited token', () => {
    const token = encodeCursor({ page: 42, fingerprint, totalKnown: false }, SECRET);
    expect(() => decodeCursor(token.replace(/^16/, '17'), SECRET)).toThrow(InvalidCursorError);
  });

  it('rejects a token signed with another secret', () => {
    const token = encodeCursor({ page: 1, fingerprint, totalKnown: false }, 'other-secret');
    expect(() => decodeCursor(token, SECRET)).toThrow('Cursor signature mismatch');
  });

  it('rejects malformed tokens', () => {
    expect(() => decodeCursor('abc', SECRET)).toThrow('Malformed cursor');
    expect(() => decodeCursor('', SECRET)).toThrow(InvalidCursorError);
  });

  it('rejects a token from a different view when asked to', () => {
    const token = encodeCursor({ page: 1, fingerprint, totalKnown: false }, SECRET);
    const other = fingerprintOf({ table: 'steps' });
    expect(() => decodeCursor(token, SECRET, other)).toThrow('Cursor belongs to a different view');
  });

  it('refuses to encode invalid cursors', () => {
    expect(() => encodeCursor({ page: -1, fingerprint, totalKnown: false }, SECRET)).toThrow(RangeError);
    expect(() => encodeCursor({ page: 0, fingerprint: 'xyz', totalKnown: false }, SECRET)).toThrow(RangeError);
  });
});

describe('resumeCursor', () => {
  const fingerprint = fingerprintOf({ table: 'weight' });

  it('starts at page 0 without a token', () => {
    expect(resumeCursor(undefined, fingerprint, SECRET)).toEqual({ page: 0, fingerprint, totalKnown: false });
  });

  it('resumes the page of a matching token', () => {
    const token = encodeCursor({ page: 3, fingerprint, totalKnown: true }, SECRET);
    expect(resumeCursor(token, fingerprint, SECRET)).toEqual({ page: 3, fingerprint, totalKnown: true });
  });

  it('resets to page 0 when the view changed', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const token = encodeCursor({ page: 3, fingerprint: fingerprintOf({ table: 'steps' }), totalKnown: true }, SECRET);

    expect(resumeCursor(token, fingerprint, SECRET)).toEqual({ page: 0, fingerprint, totalKnown: false });
    expect(warn).toHaveBeenCalledWith('Pagination reset to first page: Cursor belongs to a different view');
  });

  it('resets to page 0 for garbage', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(resumeCursor('not-a-cursor', fingerprint, SECRET).page).toBe(0);
  });
});
