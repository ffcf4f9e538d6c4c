import { describe, it, expect } from 'vitest';
import {
  count,
  flag,
  liftModifier,
  matchAll,
  optional,
  sequence,
  tokenizeStatement,
  word,
  type Element,
} from '../scaffold.js';
import { StatementSyntaxError } from '../../core/errors.js';

function run(element: Element, text: string) {
  return matchAll(element, { tokens: tokenizeStatement(text), text });
}

describe('tokenizeStatement', () => {
  it('splits words and reference slots with their offsets', () => {
    expect(tokenizeStatement('The $$$api-layer$$$ MUST exist.')).toEqual([
      { kind: 'word', text: 'the', position: 0 },
      { kind: 'ref', name: 'api-layer', position: 4 },
      { kind: 'word', text: 'must', position: 20 },
      { kind: 'word', text: 'exist', position: 25 },
    ]);
  });
});

describe('liftModifier', () => {
  it('removes the first modifier wherever it is', () => {
    const lifted = liftModifier(tokenizeStatement('should $$$a$$$ exist'));

    expect(lifted.modifier).toBe('should');
    expect(lifted.tokens.map((token) => token.kind)).toEqual(['ref', 'word']);
  });

  it('reports no modifier when there is none', () => {
    expect(liftModifier(tokenizeStatement('$$$a$$$ exists')).modifier).toBeNull();
  });
});

describe('combinators', () => {
  const pattern = sequence(word('a'), optional(word('b')), word('c'));

  it('backtracks over optional words', () => {
    expect(run(pattern, 'a c')).not.toBeNull();
    expect(run(pattern, 'a b c')).not.toBeNull();
    expect(run(pattern, 'a d c')).toBeNull();
  });

  it('requires the whole input to match', () => {
    expect(run(pattern, 'a c c')).toBeNull();
  });

  it('records flags', () => {
    const bindings = run(sequence(flag('transitive', 'transitively'), word('depend')), 'transitively depend');
    expect(bindings?.flags.has('transitive')).toBe(true);
  });

  it('throws on a malformed count with its position', () => {
    const pattern = sequence(word('at'), count());
    expect(() => run(pattern, 'at x')).toThrow(StatementSyntaxError);
    try {
      run(pattern, 'at x');
    } catch (error) {
      expect(error).toBeInstanceOf(StatementSyntaxError);
      if (error instanceof StatementSyntaxError) expect(error.position).toBe(3);
    }
  });

  it('throws at the end of input when the count is missing', () => {
    expect(() => run(sequence(word('at'), count()), 'at')).toThrow('Statement error at position 2: expected a non-negative integer');
  });

  it('binds a count', () => {
    expect(run(sequence(word('at'), count()), 'at 12')?.count).toBe(12);
  });
});
