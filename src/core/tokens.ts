// core/tokens.ts
// Placeholder token syntax ({{name}}), scanning and resolution

import type { BindingSet, BindingValue } from '../types/index.js';
import { MalformedTokenError, MissingBindingError } from '../types/index.js';
import { collectTextNodes } from './html-engine.js';

export const TOKEN_OPEN = '{{';
export const TOKEN_CLOSE = '}}';

export interface TokenMatch {
  name: string;
  start: number;
  end: number;
}

export interface ResolveOptions {
  strict?: boolean;
}

/**
 * Yield every token in a piece of text, in order.
 * Nested or unterminated delimiters throw; a lone `}}` is plain text.
 */
export function* matchTokens(text: string): Generator<TokenMatch> {
  let cursor = 0;

  while (cursor < text.length) {
    const start = text.indexOf(TOKEN_OPEN, cursor);
    if (start === -1) return;

    const bodyStart = start + TOKEN_OPEN.length;
    const close = text.indexOf(TOKEN_CLOSE, bodyStart);
    const nested = text.indexOf(TOKEN_OPEN, bodyStart);

    if (close === -1) {
      throw new MalformedTokenError('Unterminated token', start, excerpt(text, start));
    }
    if (nested !== -1 && nested < close) {
      throw new MalformedTokenError('Nested token delimiter', nested, excerpt(text, start));
    }

    const name = text.slice(bodyStart, close).trim();
    if (!name) {
      throw new MalformedTokenError('Empty token name', start, excerpt(text, start));
    }

    const end = close + TOKEN_CLOSE.length;
    yield { name, start, end };
    cursor = end;
  }
}

/**
 * Distinct token names in a string or a parsed document, in first-seen order.
 * Every call starts a fresh pass.
 */
export function* scanTokens(source: string | Document): Generator<string> {
  const seen = new Set<string>();
  const texts = typeof source === 'string' ? [source] : textsOf(source);

  for (const text of texts) {
    for (const match of matchTokens(text)) {
      if (!seen.has(match.name)) {
        seen.add(match.name);
        yield match.name;
      }
    }
  }
}

function* textsOf(doc: Document): Generator<string> {
  for (const node of collectTextNodes(doc)) {
    yield node.data;
  }
}

export function hasBinding(name: string, bindings: BindingSet): boolean {
  return Object.prototype.hasOwnProperty.call(bindings, name);
}

export function resolveToken(
  name: string,
  bindings: BindingSet,
  options: ResolveOptions = {}
): string {
  if (!hasBinding(name, bindings)) {
    if (options.strict) {
      throw new MissingBindingError([name]);
    }
    return '';
  }
  return stringifyValue(bindings[name]);
}

export function stringifyValue(value: BindingValue | undefined): string {
  if (value === null || value === undefined) return '';
  return typeof value === 'number' ? String(value) : value;
}

/**
 * Replace every token in `text` with its resolved value
 */
export function substituteTokens(
  text: string,
  bindings: BindingSet,
  options: ResolveOptions = {}
): string {
  let out = '';
  let cursor = 0;

  for (const match of matchTokens(text)) {
    out += text.slice(cursor, match.start);
    out += resolveToken(match.name, bindings, options);
    cursor = match.end;
  }

  return out + text.slice(cursor);
}

export function formatToken(name: string): string {
  return `${TOKEN_OPEN}${name}${TOKEN_CLOSE}`;
}

function excerpt(text: string, at: number): string {
  return text.slice(at, at + 24);
}
