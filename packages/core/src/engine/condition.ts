// packages/core/src/engine/condition.ts — `when` guard expressions

import { ConditionError } from '../utils/errors.js';
import { type TemplateFilter, applyFilters, parseReference } from './template.js';

/**
 * Expression tree for step guards.
 *
 *   expr     := or
 *   or       := and ( "||" and )*
 *   and      := unary ( "&&" unary )*
 *   unary    := "!" unary | primary
 *   primary  := "(" expr ")" | operand ( ("==" | "!=") operand )?
 *   operand  := string | number | true | false | identifier | "${" identifier ( "|" filter )* "}"
 */
export type ConditionNode =
  | { kind: 'literal'; value: string }
  | { kind: 'var'; name: string; filters?: TemplateFilter[] }
  | { kind: 'eq'; left: ConditionNode; right: ConditionNode }
  | { kind: 'neq'; left: ConditionNode; right: ConditionNode }
  | { kind: 'and'; left: ConditionNode; right: ConditionNode }
  | { kind: 'or'; left: ConditionNode; right: ConditionNode }
  | { kind: 'not'; operand: ConditionNode };

/** Resolves a variable name to its value; unknown names resolve to ''. */
export type VariableLookup = (name: string) => string;

type Token =
  | { type: 'string'; value: string; pos: number }
  | { type: 'ident'; value: string; pos: number; filters?: TemplateFilter[] }
  | { type: 'op'; value: '==' | '!=' | '&&' | '||' | '!' | '(' | ')'; pos: number }
  | { type: 'end'; pos: number };

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_.-]/;
const DIGIT = /[0-9]/;

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expression.length) {
    const ch = expression[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const two = expression.slice(i, i + 2);
    if (two === '==' || two === '!=' || two === '&&' || two === '||') {
      tokens.push({ type: 'op', value: two, pos: i });
      i += 2;
      continue;
    }
    if (ch === '!' || ch === '(' || ch === ')') {
      tokens.push({ type: 'op', value: ch, pos: i });
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = i;
      let value = '';
      i++;
      while (i < expression.length && expression[i] !== ch) {
        if (expression[i] === '\\' && i + 1 < expression.length) {
          i++;
        }
        value += expression[i];
        i++;
      }
      if (i >= expression.length) {
        throw new ConditionError(expression, `unterminated string at ${start}`);
      }
      i++; // closing quote
      tokens.push({ type: 'string', value, pos: start });
      continue;
    }

    if (ch === '$' && expression[i + 1] === '{') {
      const start = i;
      const close = expression.indexOf('}', i + 2);
      const ref = close === -1 ? undefined : parseReference(expression.slice(i + 2, close));
      if (ref === undefined || 'error' in ref) {
        throw new ConditionError(expression, `bad variable reference at ${start}`);
      }
      tokens.push({ type: 'ident', value: ref.name, pos: start, filters: ref.filters });
      i = close + 1;
      continue;
    }

    if (DIGIT.test(ch)) {
      const start = i;
      while (i < expression.length && /[0-9.]/.test(expression[i])) i++;
      tokens.push({ type: 'string', value: expression.slice(start, i), pos: start });
      continue;
    }

    if (IDENT_START.test(ch)) {
      const start = i;
      while (i < expression.length && IDENT_PART.test(expression[i])) i++;
      const word = expression.slice(start, i);
      // Boolean keywords are literals, never variable references
      if (word === 'true' || word === 'false') {
        tokens.push({ type: 'string', value: word, pos: start });
      } else {
        tokens.push({ type: 'ident', value: word, pos: start });
      }
      continue;
    }

    throw new ConditionError(expression, `unexpected character '${ch}' at ${i}`);
  }

  tokens.push({ type: 'end', pos: expression.length });
  return tokens;
}

class ConditionParser {
  private index = 0;

  constructor(
    private readonly expression: string,
    private readonly tokens: Token[],
  ) {}

  parse(): ConditionNode {
    if (this.peek().type === 'end') {
      throw new ConditionError(this.expression, 'empty expression');
    }
    const node = this.parseOr();
    const next = this.peek();
    if (next.type !== 'end') {
      throw new ConditionError(this.expression, `unexpected token at ${next.pos}`);
    }
    return node;
  }

  private parseOr(): ConditionNode {
    let left = this.parseAnd();
    while (this.matchOp('||')) {
      left = { kind: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionNode {
    let left = this.parseUnary();
    while (this.matchOp('&&')) {
      left = { kind: 'and', left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): ConditionNode {
    if (this.matchOp('!')) {
      return { kind: 'not', operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ConditionNode {
    if (this.matchOp('(')) {
      const inner = this.parseOr();
      if (!this.matchOp(')')) {
        throw new ConditionError(this.expression, `missing ')' at ${this.peek().pos}`);
      }
      return inner;
    }

    const left = this.parseOperand();
    if (this.matchOp('==')) {
      return { kind: 'eq', left, right: this.parseOperand() };
    }
    if (this.matchOp('!=')) {
      return { kind: 'neq', left, right: this.parseOperand() };
    }
    return left;
  }

  private parseOperand(): ConditionNode {
    const token = this.peek();
    if (token.type === 'string') {
      this.index++;
      return { kind: 'literal', value: token.value };
    }
    if (token.type === 'ident') {
      this.index++;
      return token.filters?.length
        ? { kind: 'var', name: token.value, filters: token.filters }
        : { kind: 'var', name: token.value };
    }
    throw new ConditionError(this.expression, `expected a value at ${token.pos}`);
  }

  private matchOp(op: string): boolean {
    const token = this.peek();
    if (token.type === 'op' && token.value === op) {
      this.index++;
      return true;
    }
    return false;
  }

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }
}

/** Parse a guard expression into a tree. Throws ConditionError when malformed. */
export function parseCondition(expression: string): ConditionNode {
  return new ConditionParser(expression, tokenize(expression)).parse();
}

/** True when `expression` parses; used by the validator. */
export function isValidCondition(expression: string): boolean {
  try {
    parseCondition(expression);
    return true;
  } catch {
    return false;
  }
}

function valueOf(node: ConditionNode, lookup: VariableLookup): string {
  switch (node.kind) {
    case 'literal':
      return node.value;
    case 'var':
      return resolve(node, lookup);
    default:
      return evaluateNode(node, lookup) ? 'true' : 'false';
  }
}

function resolve(node: { name: string; filters?: TemplateFilter[] }, lookup: VariableLookup): string {
  const value = lookup(node.name);
  return node.filters ? applyFilters(value, node.filters) : value;
}

function truthy(value: string): boolean {
  return value.length > 0 && value.toLowerCase() !== 'false';
}

/** Pure tree walk. Never mutates, never executes anything. */
export function evaluateNode(node: ConditionNode, lookup: VariableLookup): boolean {
  switch (node.kind) {
    case 'literal':
      return truthy(node.value);
    case 'var':
      return truthy(resolve(node, lookup));
    case 'eq':
      return valueOf(node.left, lookup) === valueOf(node.right, lookup);
    case 'neq':
      return valueOf(node.left, lookup) !== valueOf(node.right, lookup);
    case 'and':
      return evaluateNode(node.left, lookup) && evaluateNode(node.right, lookup);
    case 'or':
      return evaluateNode(node.left, lookup) || evaluateNode(node.right, lookup);
    case 'not':
      return !evaluateNode(node.operand, lookup);
  }
}

/**
 * Evaluate an optional guard. An absent or blank guard is always true.
 * Throws ConditionError when the expression is malformed.
 */
export function evaluateCondition(expression: string | undefined, lookup: VariableLookup): boolean {
  if (expression === undefined || expression.trim() === '') return true;
  return evaluateNode(parseCondition(expression), lookup);
}
