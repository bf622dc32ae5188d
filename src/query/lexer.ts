/**
 * Minimal PostgreSQL tokenizer.
 *
 * Not a parser: it only knows enough to tell words apart from string
 * literals, quoted identifiers and comments, and to track parenthesis depth.
 */

export type TokenKind =
  | 'word'
  | 'number'
  | 'string'
  | 'quoted'
  | 'param'
  | 'comment'
  | 'semicolon'
  | 'open'
  | 'close'
  | 'symbol';

export interface Token {
  kind: TokenKind;
  text: string;
  start: number;
  /** Parenthesis nesting level the token sits at (0 = top level) */
  depth: number;
}

const WORD_START = /[A-Za-z_\u0080-\uffff]/;
const WORD_PART = /[A-Za-z0-9_$\u0080-\uffff]/;
const DIGIT = /[0-9]/;
const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;

/**
 * Index just past a quoted run that opened at `start` (the quote itself).
 * A doubled quote character is an escaped quote. With `backslashEscapes`
 * (E'...' strings) a backslash escapes the next character.
 */
function scanQuoted(sql: string, start: number, quote: string, backslashEscapes: boolean): number {
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql[i];
    if (backslashEscapes && ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

function scanNumber(sql: string, start: number): number {
  let i = start;
  while (i < sql.length && DIGIT.test(sql[i])) i++;
  if (sql[i] === '.' && DIGIT.test(sql[i + 1] ?? '')) {
    i++;
    while (i < sql.length && DIGIT.test(sql[i])) i++;
  }
  if ((sql[i] === 'e' || sql[i] === 'E') && /[0-9+-]/.test(sql[i + 1] ?? '')) {
    i += 2;
    while (i < sql.length && DIGIT.test(sql[i])) i++;
  }
  return i;
}

export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let depth = 0;
  let i = 0;

  const push = (kind: TokenKind, end: number) => {
    tokens.push({ kind, text: sql.slice(i, end), start: i, depth });
    i = end;
  };

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1] ?? '';

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    // Comment openers are reported but their bodies are still tokenized,
    // so keywords hidden inside comments are seen by keyword checks.
    if ((ch === '-' && next === '-') || (ch === '/' && next === '*')) {
      push('comment', i + 2);
      continue;
    }
    if (ch === '*' && next === '/') {
      push('symbol', i + 2);
      continue;
    }

    if ((ch === 'E' || ch === 'e') && next === "'") {
      push('string', scanQuoted(sql, i + 1, "'", true));
      continue;
    }
    if (ch === "'") {
      push('string', scanQuoted(sql, i, "'", false));
      continue;
    }
    if (ch === '"') {
      push('quoted', scanQuoted(sql, i, '"', false));
      continue;
    }

    if (ch === '$') {
      if (DIGIT.test(next)) {
        let end = i + 1;
        while (end < sql.length && DIGIT.test(sql[end])) end++;
        push('param', end);
        continue;
      }
      const tag = DOLLAR_TAG.exec(sql.slice(i));
      if (tag) {
        const close = sql.indexOf(tag[0], i + tag[0].length);
        push('string', close === -1 ? sql.length : close + tag[0].length);
        continue;
      }
    }

    if (WORD_START.test(ch)) {
      let end = i + 1;
      while (end < sql.length && WORD_PART.test(sql[end])) end++;
      push('word', end);
      continue;
    }

    if (DIGIT.test(ch) || (ch === '.' && DIGIT.test(next))) {
      push('number', scanNumber(sql, i));
      continue;
    }

    if (ch === ';') {
      push('semicolon', i + 1);
      continue;
    }
    if (ch === '(') {
      push('open', i + 1);
      depth++;
      continue;
    }
    if (ch === ')') {
      depth = Math.max(0, depth - 1);
      push('close', i + 1);
      continue;
    }

    push('symbol', i + 1);
  }

  return tokens;
}
