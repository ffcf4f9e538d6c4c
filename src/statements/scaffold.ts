/**
 * @fileoverview Scaffold combinators
 *
 * Statements are matched as a stream of words and `$$$name$$$` slots. A
 * scaffold element maps one match state to every state it can reach (a
 * list-of-successes parser), so optional words and alternatives backtrack
 * without any special handling. A malformed number is the one committed
 * failure: it throws `StatementSyntaxError` instead of trying other paths.
 */

import { StatementSyntaxError } from '../core/errors.js';

// ============================================================================
// TOKENS
// ============================================================================

export type StatementToken =
  | { kind: 'word'; text: string; position: number }
  | { kind: 'ref'; name: string; position: number };

export type Modifier = 'must' | 'should';

export type ComparisonOperator = '=' | '!=' | '>=' | '<=' | '>' | '<';

const TOKEN_PATTERN = /\$\$\$([A-Za-z0-9_-]+)\$\$\$|[^\s$]+|\$+/g;
const EDGE_PUNCTUATION = /^[.,;:!?()"']+|[.,;:!?()"']+$/g;

/**
 * Split statement text into lowercased words and reference slots. Leading
 * and trailing punctuation is dropped from words; positions are character
 * offsets into the original text.
 */
export function tokenizeStatement(text: string): StatementToken[] {
  const tokens: StatementToken[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const position = match.index ?? 0;
    const name = match[1];
    if (name !== undefined) {
      tokens.push({ kind: 'ref', name, position });
      continue;
    }
    const word = match[0].replace(EDGE_PUNCTUATION, '').toLowerCase();
    if (word !== '') tokens.push({ kind: 'word', text: word, position });
  }
  return tokens;
}

/**
 * Remove the first `must` or `should`, wherever it appears.
 */
export function liftModifier(tokens: readonly StatementToken[]): { modifier: Modifier | null; tokens: StatementToken[] } {
  const index = tokens.findIndex((token) => token.kind === 'word' && (token.text === 'must' || token.text === 'should'));
  const found = tokens[index];
  if (index === -1 || !found || found.kind !== 'word') return { modifier: null, tokens: [...tokens] };
  return {
    modifier: found.text === 'should' ? 'should' : 'must',
    tokens: [...tokens.slice(0, index), ...tokens.slice(index + 1)],
  };
}

// ============================================================================
// MATCH STATE
// ============================================================================

export interface Bindings {
  refs: ReadonlyMap<string, string>;
  flags: ReadonlySet<string>;
  comparison?: ComparisonOperator;
  count?: number;
}

export interface MatchState {
  index: number;
  bindings: Bindings;
}

export type Element = (state: MatchState, input: MatchInput) => MatchState[];

export interface MatchInput {
  tokens: readonly StatementToken[];
  /** Original text, for error positions */
  text: string;
}

const EMPTY_BINDINGS: Bindings = { refs: new Map(), flags: new Set() };

function advance(state: MatchState, patch: Partial<Bindings> = {}): MatchState {
  return { index: state.index + 1, bindings: { ...state.bindings, ...patch } };
}

// ============================================================================
// COMBINATORS
// ============================================================================

/** One word out of `alternatives` */
export function word(...alternatives: string[]): Element {
  return (state, input) => {
    const token = input.tokens[state.index];
    return token?.kind === 'word' && alternatives.includes(token.text) ? [advance(state)] : [];
  };
}

/** Consecutive words */
export function phrase(...words: string[]): Element {
  return sequence(...words.map((text) => word(text)));
}

/** A `$$$name$$$` slot, bound under `slot` */
export function ref(slot: string): Element {
  return (state, input) => {
    const token = input.tokens[state.index];
    if (token?.kind !== 'ref') return [];
    const refs = new Map(state.bindings.refs);
    refs.set(slot, token.name);
    return [advance(state, { refs })];
  };
}

export function sequence(...elements: Element[]): Element {
  return (state, input) =>
    elements.reduce<MatchState[]>(
      (states, element) => states.flatMap((current) => element(current, input)),
      [state],
    );
}

export function choice(...alternatives: Element[]): Element {
  return (state, input) => alternatives.flatMap((alternative) => alternative(state, input));
}

export function optional(...elements: Element[]): Element {
  const inner = sequence(...elements);
  return (state, input) => [...inner(state, input), state];
}

/** Optional word that records `flag` when present */
export function flag(name: string, ...words: string[]): Element {
  return (state, input) => {
    const token = input.tokens[state.index];
    if (token?.kind === 'word' && words.includes(token.text)) {
      const flags = new Set(state.bindings.flags);
      flags.add(name);
      return [advance(state, { flags }), state];
    }
    return [state];
  };
}

/** Records `name` without consuming input */
export function mark(name: string): Element {
  return (state) => {
    const flags = new Set(state.bindings.flags);
    flags.add(name);
    return [{ index: state.index, bindings: { ...state.bindings, flags } }];
  };
}

const COMPARISON_PHRASES: ReadonlyArray<readonly [ComparisonOperator, readonly string[]]> = [
  ['=', ['exactly']],
  ['!=', ['not', 'exactly']],
  ['>=', ['at', 'least']],
  ['<=', ['at', 'most']],
  ['>', ['more', 'than']],
  ['<', ['fewer', 'than']],
  ['<', ['less', 'than']],
];

export function comparison(): Element {
  return (state, input) =>
    COMPARISON_PHRASES.flatMap(([operator, words]) =>
      phrase(...words)(state, input).map((next) => ({
        index: next.index,
        bindings: { ...next.bindings, comparison: operator },
      })),
    );
}

export function comparisonPhrase(operator: ComparisonOperator): string {
  const entry = COMPARISON_PHRASES.find(([candidate]) => candidate === operator);
  return entry ? entry[1].join(' ') : 'exactly';
}

/** A non-negative integer; anything else at this point is a syntax error */
export function count(): Element {
  return (state, input) => {
    const token = input.tokens[state.index];
    if (!token) {
      throw new StatementSyntaxError(input.text, input.text.length, 'expected a non-negative integer');
    }
    if (token.kind !== 'word' || !/^\d+$/.test(token.text)) {
      const found = token.kind === 'word' ? token.text : `$$$${token.name}$$$`;
      throw new StatementSyntaxError(input.text, token.position, `expected a non-negative integer, got '${found}'`);
    }
    return [advance(state, { count: Number.parseInt(token.text, 10) })];
  };
}

// ============================================================================
// RUNNING
// ============================================================================

/**
 * Match `element` against the whole input. Returns the bindings of the first
 * complete match, or null.
 */
export function matchAll(element: Element, input: MatchInput): Bindings | null {
  const complete = element({ index: 0, bindings: EMPTY_BINDINGS }, input).find(
    (state) => state.index === input.tokens.length,
  );
  return complete ? complete.bindings : null;
}
