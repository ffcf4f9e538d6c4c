/**
 * @fileoverview Boolean tag expressions
 *
 * expr    := orExpr
 * orExpr  := andExpr (OR andExpr)*
 * andExpr := notExpr (AND notExpr)*
 * notExpr := NOT notExpr | primary
 * primary := tag | '(' expr ')'
 *
 * Keywords are case-insensitive. A tag is quoted ('x' or "x") or a bare
 * identifier of letters, digits and `_ . : -`.
 */

import { TagExpressionSyntaxError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';

// ============================================================================
// AST
// ============================================================================

export type TagExpression =
  | { kind: 'tag'; tag: string }
  | { kind: 'not'; operand: TagExpression }
  | { kind: 'and'; operands: TagExpression[] }
  | { kind: 'or'; operands: TagExpression[] };

// ============================================================================
// TOKENIZER
// ============================================================================

type TokenType = 'tag' | 'and' | 'or' | 'not' | 'lparen' | 'rparen';

interface Token {
  type: TokenType;
  /** Tag text without quotes, or the keyword as written */
  text: string;
  position: number;
}

const BARE_TAG = /[A-Za-z0-9_.:-]/;
const KEYWORDS: Record<string, TokenType> = { and: 'and', or: 'or', not: 'not' };

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;
  while (index < source.length) {
    const char = source.charAt(index);
    if (/\s/.test(char)) {
      index += 1;
      continue;
    }
    if (char === '(' || char === ')') {
      tokens.push({ type: char === '(' ? 'lparen' : 'rparen', text: char, position: index });
      index += 1;
      continue;
    }
    if (char === "'" || char === '"') {
      const end = source.indexOf(char, index + 1);
      if (end === -1) {
        throw new TagExpressionSyntaxError(source, index, char, 'unterminated quoted tag');
      }
      const tag = source.slice(index + 1, end);
      if (tag.trim() === '') {
        throw new TagExpressionSyntaxError(source, index, source.slice(index, end + 1), 'empty tag');
      }
      tokens.push({ type: 'tag', text: tag, position: index });
      index = end + 1;
      continue;
    }
    if (BARE_TAG.test(char)) {
      const start = index;
      while (index < source.length && BARE_TAG.test(source.charAt(index))) index += 1;
      const word = source.slice(start, index);
      tokens.push({ type: KEYWORDS[word.toLowerCase()] ?? 'tag', text: word, position: start });
      continue;
    }
    throw new TagExpressionSyntaxError(source, index, char, 'unexpected character');
  }
  return tokens;
}

// ============================================================================
// PARSER
// ============================================================================

class TagExpressionParser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  parse(): TagExpression {
    const expression = this.parseOr();
    const extra = this.peek();
    if (extra) this.fail(extra, 'unexpected token after expression');
    return expression;
  }

  private parseOr(): TagExpression {
    const operands = [this.parseAnd()];
    while (this.peek()?.type === 'or') {
      this.index += 1;
      operands.push(this.parseAnd());
    }
    return operands.length === 1 && operands[0] ? operands[0] : { kind: 'or', operands };
  }

  private parseAnd(): TagExpression {
    const operands = [this.parseNot()];
    while (this.peek()?.type === 'and') {
      this.index += 1;
      operands.push(this.parseNot());
    }
    return operands.length === 1 && operands[0] ? operands[0] : { kind: 'and', operands };
  }

  private parseNot(): TagExpression {
    if (this.peek()?.type === 'not') {
      this.index += 1;
      return { kind: 'not', operand: this.parseNot() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): TagExpression {
    const token = this.peek();
    if (!token) {
      throw new TagExpressionSyntaxError(this.source, this.source.length, null, 'expected a tag');
    }
    if (token.type === 'tag') {
      this.index += 1;
      return { kind: 'tag', tag: token.text };
    }
    if (token.type === 'lparen') {
      this.index += 1;
      const inner = this.parseOr();
      const closing = this.peek();
      if (!closing) {
        throw new TagExpressionSyntaxError(this.source, this.source.length, null, "expected ')'");
      }
      if (closing.type !== 'rparen') this.fail(closing, "expected ')'");
      this.index += 1;
      return inner;
    }
    return this.fail(token, 'expected a tag');
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private fail(token: Token, reason: string): never {
    throw new TagExpressionSyntaxError(this.source, token.position, token.text, reason);
  }
}

/**
 * Parse a tag expression. Throws `TagExpressionSyntaxError` with the
 * character position of the offending token.
 */
export function parseTagExpression(source: string): TagExpression {
  return new TagExpressionParser(source, tokenize(source)).parse();
}

export function tryParseTagExpression(source: string): Result<TagExpression, TagExpressionSyntaxError> {
  try {
    return Ok(parseTagExpression(source));
  } catch (error) {
    if (error instanceof TagExpressionSyntaxError) return Err(error);
    throw error;
  }
}

// ============================================================================
// EVALUATION & FORMATTING
// ============================================================================

export function evaluateTagExpression(expression: TagExpression, tags: ReadonlySet<string>): boolean {
  switch (expression.kind) {
    case 'tag':
      return tags.has(expression.tag);
    case 'not':
      return !evaluateTagExpression(expression.operand, tags);
    case 'and':
      return expression.operands.every((operand) => evaluateTagExpression(operand, tags));
    case 'or':
      return expression.operands.some((operand) => evaluateTagExpression(operand, tags));
  }
}

/** Distinct tags named anywhere in the expression, in first-seen order */
export function collectTags(expression: TagExpression): string[] {
  const seen = new Set<string>();
  const visit = (node: TagExpression): void => {
    if (node.kind === 'tag') seen.add(node.tag);
    else if (node.kind === 'not') visit(node.operand);
    else node.operands.forEach(visit);
  };
  visit(expression);
  return Array.from(seen);
}

/**
 * Render an expression as text that parses back to the same tree. Tags are
 * quoted; parentheses appear only where precedence needs them.
 */
export function formatTagExpression(expression: TagExpression): string {
  switch (expression.kind) {
    case 'tag':
      return expression.tag.includes("'") ? `"${expression.tag}"` : `'${expression.tag}'`;
    case 'not': {
      const inner = formatTagExpression(expression.operand);
      return expression.operand.kind === 'and' || expression.operand.kind === 'or' ? `NOT (${inner})` : `NOT ${inner}`;
    }
    case 'and':
      return expression.operands
        .map((operand) => (operand.kind === 'or' || operand.kind === 'and' ? `(${formatTagExpression(operand)})` : formatTagExpression(operand)))
        .join(' AND ');
    case 'or':
      return expression.operands
        .map((operand) => (operand.kind === 'or' ? `(${formatTagExpression(operand)})` : formatTagExpression(operand)))
        .join(' OR ');
  }
}
