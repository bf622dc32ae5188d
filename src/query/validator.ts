/**
 * Raw query validation.
 *
 * A deliberately small token scanner, not a SQL parser. Rules run in a fixed
 * order and the first violation wins; nothing is built from text that did
 * not pass every rule.
 */

import { tokenize, type Token } from './lexer.js';
import { BLOCKED_KEYWORDS, type RejectionReason, type ValidationOutcome } from '../types/index.js';

const BLOCKED = new Set<string>(BLOCKED_KEYWORDS);

function reject(reason: RejectionReason, message: string): ValidationOutcome {
  return { ok: false, reason, message };
}

function isWord(token: Token | undefined, pattern: RegExp): boolean {
  return token?.kind === 'word' && token.depth === 0 && pattern.test(token.text);
}

function integerLiteral(token: Token | undefined): number {
  return token?.kind === 'number' && /^\d+$/.test(token.text) ? Number(token.text) : Number.NaN;
}

/**
 * Find the top-level row limit, if any: `LIMIT n` or `FETCH FIRST|NEXT n ROW(S) ONLY`.
 * Returns null when there is none, the literal when it is a plain integer
 * that nothing but OFFSET or the end of the statement follows, and NaN for
 * anything that cannot be checked (ALL, parameters, expressions, WITH TIES).
 */
function findTopLevelLimit(tokens: readonly Token[]): number | null {
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind !== 'word' || token.depth !== 0) continue;

    const word = token.text.toUpperCase();

    if (word === 'LIMIT') {
      const follower = tokens[i + 2];
      if (follower !== undefined && !isWord(follower, /^OFFSET$/i)) {
        return Number.NaN;
      }
      return integerLiteral(tokens[i + 1]);
    }

    if (word === 'FETCH') {
      if (!isWord(tokens[i + 1], /^(FIRST|NEXT)$/i)) continue;
      // FETCH FIRST ROW ONLY means one row
      if (isWord(tokens[i + 2], /^ROWS?$/i)) {
        return isWord(tokens[i + 3], /^ONLY$/i) ? 1 : Number.NaN;
      }
      if (!isWord(tokens[i + 3], /^ROWS?$/i) || !isWord(tokens[i + 4], /^ONLY$/i)) {
        return Number.NaN;
      }
      return integerLiteral(tokens[i + 2]);
    }
  }
  return null;
}

/**
 * Validate a user-supplied statement and enforce a row limit.
 */
export function validateQuery(rawText: string, maxRows: number): ValidationOutcome {
  if (!Number.isInteger(maxRows) || maxRows < 1) {
    throw new RangeError(`maxRows must be a positive integer, got ${maxRows}`);
  }

  // Rule 1: one statement only; a single trailing separator is tolerated
  const body = rawText.trim().replace(/;\s*$/, '').trimEnd();
  if (body.includes(';')) {
    return reject('multiStatement', 'Only a single statement is allowed.');
  }

  const tokens = tokenize(body);

  // Rule 2: must start with SELECT
  const first = tokens.find(t => t.kind !== 'comment');
  if (!first || first.kind !== 'word' || first.text.toUpperCase() !== 'SELECT') {
    return reject('notSelect', 'Only SELECT statements are allowed.');
  }

  // Rule 3: whole-word denylist, outside literals and quoted identifiers
  const blocked = tokens.find(t => t.kind === 'word' && BLOCKED.has(t.text.toUpperCase()));
  if (blocked) {
    return reject('blockedKeyword', `Keyword ${blocked.text.toUpperCase()} is not allowed.`);
  }

  // Rule 4: comments could hide intent from a reader of the query
  if (tokens.some(t => t.kind === 'comment')) {
    return reject('commentInjection', 'Comments are not allowed in queries.');
  }

  // Rule 5: enforce the row limit
  const limit = findTopLevelLimit(tokens);
  if (limit === null) {
    return { ok: true, query: { sql: `${body} LIMIT ${maxRows}`, appliedLimit: maxRows } };
  }
  if (Number.isNaN(limit) || limit > maxRows) {
    return reject('limitExceeded', `Row limit must be a number no greater than ${maxRows}.`);
  }
  return { ok: true, query: { sql: body, appliedLimit: limit } };
}
