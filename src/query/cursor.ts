/**
 * Pagination cursors.
 *
 * Token layout: `<page base36>.<fingerprint>.<totalKnown 0|1>.<mac>`.
 * The mac is a truncated HMAC-SHA256 so that a token carried through a
 * client cannot be edited into a different page or view. Tokens stay well
 * under 64 bytes.
 */

import { createHash, createHmac, timingSafeEqual } from 'node:crypto';
import { InvalidCursorError } from '../errors.js';
import type { QueryCursor } from '../types/index.js';

const FINGERPRINT_PATTERN = /^[0-9a-f]{16}$/;
const TOKEN_PATTERN = /^([0-9a-z]{1,11})\.([0-9a-f]{16})\.([01])\.([A-Za-z0-9_-]{11})$/;
const MAC_LENGTH = 11;

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, canonicalize(v)])
    );
  }
  return value;
}

/**
 * Stable fingerprint of a filter/sort context. Key order does not matter.
 */
export function fingerprintOf(context: unknown): string {
  return createHash('sha256')
    .update(JSON.stringify(canonicalize(context)))
    .digest('hex')
    .slice(0, 16);
}

function sign(payload: string, secret: string): string {
  return createHmac('sha256', secret).update(payload).digest('base64url').slice(0, MAC_LENGTH);
}

export function encodeCursor(cursor: QueryCursor, secret: string): string {
  if (!Number.isSafeInteger(cursor.page) || cursor.page < 0) {
    throw new RangeError(`Cursor page must be a non-negative integer, got ${cursor.page}`);
  }
  if (!FINGERPRINT_PATTERN.test(cursor.fingerprint)) {
    throw new RangeError(`Cursor fingerprint must be 16 hex characters, got "${cursor.fingerprint}"`);
  }

  const payload = `${cursor.page.toString(36)}.${cursor.fingerprint}.${cursor.totalKnown ? 1 : 0}`;
  return `${payload}.${sign(payload, secret)}`;
}

/**
 * Decode and verify a token. With `activeFingerprint`, a token minted under
 * another filter/sort context is rejected as well.
 */
export function decodeCursor(token: string, secret: string, activeFingerprint?: string): QueryCursor {
  const match = TOKEN_PATTERN.exec(token);
  if (!match) {
    throw new InvalidCursorError('Malformed cursor');
  }

  const [, page36, fingerprint, totalKnown, mac] = match;
  const payload = `${page36}.${fingerprint}.${totalKnown}`;
  const expected = Buffer.from(sign(payload, secret));
  if (!timingSafeEqual(Buffer.from(mac), expected)) {
    throw new InvalidCursorError('Cursor signature mismatch');
  }

  const page = parseInt(page36, 36);
  if (!Number.isSafeInteger(page)) {
    throw new InvalidCursorError('Cursor page out of range');
  }
  if (activeFingerprint !== undefined && fingerprint !== activeFingerprint) {
    throw new InvalidCursorError('Cursor belongs to a different view');
  }

  return { page, fingerprint, totalKnown: totalKnown === '1' };
}

/**
 * Page to serve for the active view. A token minted under another
 * filter/sort context, or one that does not decode, restarts at page 0.
 */
export function resumeCursor(
  token: string | undefined,
  activeFingerprint: string,
  secret: string
): QueryCursor {
  const firstPage: QueryCursor = { page: 0, fingerprint: activeFingerprint, totalKnown: false };
  if (!token) return firstPage;

  try {
    return decodeCursor(token, secret, activeFingerprint);
  } catch (error) {
    if (!(error instanceof InvalidCursorError)) throw error;
    console.warn(`Pagination reset to first page: ${error.message}`);
    return firstPage;
  }
}
