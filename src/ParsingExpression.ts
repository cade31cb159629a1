import type { Grammar } from './Grammar.js';
import { GrammarError } from './GrammarError.js';
import { NodeExtension, type Accessor } from './NodeExtension.js';

export type ExpressionReference = ParsingExpression | string;

let nextExpressionId = 0;

export abstract class Expression {
  readonly id: number = nextExpressionId++;
  /**
   * Replaced rather than mutated on every `extend`, so nodes produced before
   * an attachment keep the bundles they were built with.
   */
  extensions: readonly NodeExtension[] = [];

  extend(...extensions: NodeExtension[]): this {
    this.extensions = Object.freeze([...this.extensions, ...extensions]);
    return this;
  }

  accessor(name: string, accessor: Accessor): this {
    return this.extend(new NodeExtension(name, { [name]: accessor }));
  }
}

export class Terminal extends Expression {
  readonly kind = 'terminal';
  readonly literal: string;

  constructor(literal: string) {
    super();
    this.literal = literal;
  }
}

/**
 * A by-name reference to a rule of `grammar`. The rule body is looked up on
 * every match, so references may be created before the rule is declared and
 * rules may refer to each other cyclically.
 */
export class Nonterminal extends Expression {
  readonly kind = 'nonterminal';
  readonly name: string;
  readonly grammar: Grammar;

  constructor(name: string, grammar: Grammar) {
    super();
    this.name = name;
    this.grammar = grammar;
  }

  resolve(): ParsingExpression {
    return this.grammar.resolve(this.name);
  }
}

export class Sequence extends Expression {
  readonly kind = 'sequence';
  readonly elements: readonly ParsingExpression[];

  constructor(elements: ExpressionReference[]) {
    super();
    this.elements = Object.freeze(elements.map(toExpression));
  }
}

export class OrderedChoice extends Expression {
  readonly kind = 'choice';
  readonly alternatives: readonly ParsingExpression[];

  constructor(alternatives: ExpressionReference[]) {
    super();
    if (alternatives.length === 0) {
      throw new GrammarError('empty-choice', 'An ordered choice needs at least one alternative');
    }
    this.alternatives = Object.freeze(alternatives.map(toExpression));
  }
}

export class ZeroOrMore extends Expression {
  readonly kind = 'zero-or-more';
  readonly element: ParsingExpression;

  constructor(element: ExpressionReference) {
    super();
    this.element = toExpression(element);
  }
}

export class OneOrMore extends Expression {
  readonly kind = 'one-or-more';
  readonly element: ParsingExpression;

  constructor(element: ExpressionReference) {
    super();
    this.element = toExpression(element);
  }
}

export class Optional extends Expression {
  readonly kind = 'optional';
  readonly element: ParsingExpression;

  constructor(element: ExpressionReference) {
    super();
    this.element = toExpression(element);
  }
}

export type ParsingExpression =
  | Terminal
  | Nonterminal
  | Sequence
  | OrderedChoice
  | ZeroOrMore
  | OneOrMore
  | Optional;

export type ExpressionKind = ParsingExpression['kind'];

// ─── Construction helpers ──────────────────────────────────────────────────────

/** Strings become terminals; expressions pass through. */
export function toExpression(ref: ExpressionReference): ParsingExpression {
  return typeof ref === 'string' ? new Terminal(ref) : ref;
}

export function terminal(literal: string): Terminal {
  return new Terminal(literal);
}

export function sequence(...elements: ExpressionReference[]): Sequence {
  return new Sequence(elements);
}

export function choice(...alternatives: ExpressionReference[]): OrderedChoice {
  return new OrderedChoice(alternatives);
}

export function zeroOrMore(element: ExpressionReference): ZeroOrMore {
  return new ZeroOrMore(element);
}

export function oneOrMore(element: ExpressionReference): OneOrMore {
  return new OneOrMore(element);
}

export function optional(element: ExpressionReference): Optional {
  return new Optional(element);
}

// ─── Description ───────────────────────────────────────────────────────────────

/** Render an expression in PEG notation, e.g. `(multitive '+' additive) / multitive`. */
export function formatExpression(expression: ParsingExpression): string {
  switch (expression.kind) {
    case 'terminal':
      return `'${expression.literal}'`;
    case 'nonterminal':
      return expression.name;
    case 'sequence':
      return expression.elements.map(describeOperand).join(' ');
    case 'choice':
      return expression.alternatives.map(describeOperand).join(' / ');
    case 'zero-or-more':
      return `${describeOperand(expression.element)}*`;
    case 'one-or-more':
      return `${describeOperand(expression.element)}+`;
    case 'optional':
      return `${describeOperand(expression.element)}?`;
    default:
      return assertNever(expression);
  }
}

function describeOperand(expression: ParsingExpression): string {
  const text = formatExpression(expression);
  const compound =
    (expression.kind === 'sequence' && expression.elements.length > 1) ||
    (expression.kind === 'choice' && expression.alternatives.length > 1);
  return compound ? `(${text})` : text;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled parsing expression: ${String(value)}`);
}
