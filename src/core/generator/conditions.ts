/**
 * Condition expressions for conditional markers.
 *
 * Grammar:
 *   or         := and ('||' and)*
 *   and        := comparison ('&&' comparison)*
 *   comparison := unary (('==' | '!=' | '<' | '<=' | '>' | '>=') unary)?
 *   unary      := '!' unary | primary
 *   primary    := literal | path | '(' or ')'
 *
 * Paths are dotted model keys (`flags.darkMode`). A path missing from the
 * model evaluates to undefined rather than failing.
 */
import { isTruthy, lookupInScopes } from './model.js';

export class ConditionError extends Error {
  constructor(message: string, public readonly expression: string) {
    super(message);
    this.name = 'ConditionError';
  }
}

const COMPARISON_OPS = ['==', '!=', '<', '<=', '>', '>='] as const;

type ComparisonOp = (typeof COMPARISON_OPS)[number];

function isComparisonOp(value: string): value is ComparisonOp {
  return (COMPARISON_OPS as readonly string[]).includes(value);
}

export type ConditionNode =
  | { type: 'literal'; value: string | number | boolean | null }
  | { type: 'path'; path: string }
  | { type: 'not'; operand: ConditionNode }
  | { type: 'and' | 'or'; left: ConditionNode; right: ConditionNode }
  | { type: 'compare'; op: ComparisonOp; left: ConditionNode; right: ConditionNode };

type Token =
  | { type: 'op'; value: string }
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'ident'; value: string };

const OPERATORS = ['===', '!==', '&&', '||', '==', '!=', '<=', '>=', '<', '>', '!', '(', ')'];
const IDENT_PATTERN = /^[A-Za-z_$][\w$]*(?:\.[\w$]+)*/;
const NUMBER_PATTERN = /^-?\d+(?:\.\d+)?/;

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let rest = expression;

  while (rest.length > 0) {
    const ws = rest.match(/^\s+/);
    if (ws) {
      rest = rest.slice(ws[0].length);
      continue;
    }

    const op = OPERATORS.find((candidate) => rest.startsWith(candidate));
    if (op) {
      // Strict and loose equality are the same here
      const normalized = op === '===' ? '==' : op === '!==' ? '!=' : op;
      tokens.push({ type: 'op', value: normalized });
      rest = rest.slice(op.length);
      continue;
    }

    const quote = rest[0];
    if (quote === '"' || quote === "'") {
      const close = rest.indexOf(quote, 1);
      if (close === -1) {
        throw new ConditionError(`Unterminated string in condition '${expression}'`, expression);
      }
      tokens.push({ type: 'string', value: rest.slice(1, close) });
      rest = rest.slice(close + 1);
      continue;
    }

    const num = rest.match(NUMBER_PATTERN);
    if (num) {
      tokens.push({ type: 'number', value: Number(num[0]) });
      rest = rest.slice(num[0].length);
      continue;
    }

    const ident = rest.match(IDENT_PATTERN);
    if (ident) {
      tokens.push({ type: 'ident', value: ident[0] });
      rest = rest.slice(ident[0].length);
      continue;
    }

    throw new ConditionError(`Unexpected '${rest[0]}' in condition '${expression}'`, expression);
  }

  return tokens;
}

class ConditionParser {
  private pos = 0;

  constructor(private readonly tokens: Token[], private readonly expression: string) {}

  parse(): ConditionNode {
    if (this.tokens.length === 0) {
      throw new ConditionError('Empty condition', this.expression);
    }
    const node = this.parseOr();
    const leftover = this.tokens[this.pos];
    if (leftover) {
      throw new ConditionError(
        `Unexpected '${String(leftover.value)}' in condition '${this.expression}'`,
        this.expression
      );
    }
    return node;
  }

  private peekOp(...values: string[]): string | undefined {
    const token = this.tokens[this.pos];
    if (token && token.type === 'op' && values.includes(token.value)) {
      return token.value;
    }
    return undefined;
  }

  private parseOr(): ConditionNode {
    let left = this.parseAnd();
    while (this.peekOp('||')) {
      this.pos++;
      left = { type: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionNode {
    let left = this.parseComparison();
    while (this.peekOp('&&')) {
      this.pos++;
      left = { type: 'and', left, right: this.parseComparison() };
    }
    return left;
  }

  private parseComparison(): ConditionNode {
    const left = this.parseUnary();
    const op = this.peekOp(...COMPARISON_OPS);
    if (!op || !isComparisonOp(op)) return left;
    this.pos++;
    return { type: 'compare', op, left, right: this.parseUnary() };
  }

  private parseUnary(): ConditionNode {
    if (this.peekOp('!')) {
      this.pos++;
      return { type: 'not', operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ConditionNode {
    const token = this.tokens[this.pos];
    if (!token) {
      throw new ConditionError(`Unexpected end of condition '${this.expression}'`, this.expression);
    }
    this.pos++;

    switch (token.type) {
      case 'string':
      case 'number':
        return { type: 'literal', value: token.value };
      case 'ident':
        if (token.value === 'true') return { type: 'literal', value: true };
        if (token.value === 'false') return { type: 'literal', value: false };
        if (token.value === 'null') return { type: 'literal', value: null };
        return { type: 'path', path: token.value };
      case 'op':
        if (token.value === '(') {
          const inner = this.parseOr();
          if (!this.peekOp(')')) {
            throw new ConditionError(`Missing ')' in condition '${this.expression}'`, this.expression);
          }
          this.pos++;
          return inner;
        }
        throw new ConditionError(
          `Unexpected '${token.value}' in condition '${this.expression}'`,
          this.expression
        );
    }
  }
}

export function parseCondition(expression: string): ConditionNode {
  return new ConditionParser(tokenize(expression), expression).parse();
}

function compare(op: ComparisonOp, left: unknown, right: unknown, expression: string): boolean {
  if (op === '==') return left === right;
  if (op === '!=') return left !== right;

  let order: number;
  if (typeof left === 'number' && typeof right === 'number') {
    order = left - right;
  } else if (typeof left === 'string' && typeof right === 'string') {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else {
    throw new ConditionError(
      `Cannot order ${typeof left} and ${typeof right} in condition '${expression}'`,
      expression
    );
  }

  if (op === '<') return order < 0;
  if (op === '<=') return order <= 0;
  if (op === '>') return order > 0;
  return order >= 0;
}

function evaluateNode(node: ConditionNode, scopes: ReadonlyArray<unknown>, expression: string): unknown {
  switch (node.type) {
    case 'literal':
      return node.value;
    case 'path': {
      const result = lookupInScopes(scopes, node.path);
      return result.found ? result.value : undefined;
    }
    case 'not':
      return !isTruthy(evaluateNode(node.operand, scopes, expression));
    case 'and':
      return isTruthy(evaluateNode(node.left, scopes, expression)) &&
        isTruthy(evaluateNode(node.right, scopes, expression));
    case 'or':
      return isTruthy(evaluateNode(node.left, scopes, expression)) ||
        isTruthy(evaluateNode(node.right, scopes, expression));
    case 'compare':
      return compare(
        node.op,
        evaluateNode(node.left, scopes, expression),
        evaluateNode(node.right, scopes, expression),
        expression
      );
  }
}

/**
 * Evaluate a condition to its value (used directly by switch markers).
 */
export function evaluateCondition(expression: string, scopes: ReadonlyArray<unknown>): unknown {
  return evaluateNode(parseCondition(expression), scopes, expression);
}

/**
 * Syntax error message of a condition, or undefined when it parses.
 */
export function conditionSyntaxError(expression: string): string | undefined {
  try {
    parseCondition(expression);
    return undefined;
  } catch (error) {
    if (error instanceof ConditionError) return error.message;
    throw error;
  }
}

/**
 * Model paths a condition reads. An unparsable condition reads nothing;
 * its syntax error is reported when the file is indexed.
 */
export function conditionKeys(expression: string): string[] {
  if (conditionSyntaxError(expression) !== undefined) return [];
  const root = parseCondition(expression);

  const keys = new Set<string>();
  const visit = (node: ConditionNode): void => {
    switch (node.type) {
      case 'path':
        keys.add(node.path);
        break;
      case 'not':
        visit(node.operand);
        break;
      case 'and':
      case 'or':
      case 'compare':
        visit(node.left);
        visit(node.right);
        break;
      case 'literal':
        break;
    }
  };
  visit(root);
  return [...keys];
}
