import { GrammarError } from './GrammarError.js';
import {
  type ExpressionReference,
  type ParsingExpression,
  Nonterminal,
  Sequence,
  OrderedChoice,
  ZeroOrMore,
  OneOrMore,
  Optional,
  toExpression,
  assertNever,
} from './ParsingExpression.js';
import { Parser, type ParserOptions } from './Parser.js';

export interface GrammarOptions {
  /** Rule a parser starts from when `newParser` is not given one. Defaults to the first declared rule. */
  start?: string;
}

export class Rule {
  readonly nonterminal: Nonterminal;
  readonly body: ParsingExpression;

  constructor(nonterminal: Nonterminal, body: ExpressionReference) {
    this.nonterminal = nonterminal;
    this.body = toExpression(body);
  }

  get name(): string {
    return this.nonterminal.name;
  }
}

export class Grammar {
  readonly options: GrammarOptions;
  private readonly rules: Map<string, Rule> = new Map();
  private readonly nonterminals: Map<string, Nonterminal> = new Map();
  private frozen = false;

  constructor(options?: GrammarOptions) {
    this.options = options ?? {};
  }

  /** Build a grammar in one block: `Grammar.define(g => { g.rule('foo', g.exp('foo')) })`. */
  static define(build: (builder: GrammarBuilder) => void, options?: GrammarOptions): Grammar {
    const grammar = new Grammar(options);
    build(new GrammarBuilder(grammar));
    return grammar;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** The grammar's single reference for `name`, created on first use. */
  nonterminal(name: string): Nonterminal {
    let nt = this.nonterminals.get(name);
    if (!nt) {
      nt = new Nonterminal(name, this);
      this.nonterminals.set(name, nt);
    }
    return nt;
  }

  declareRule(name: string | Nonterminal, body: ExpressionReference): Rule {
    const nt = typeof name === 'string' ? this.nonterminal(name) : name;
    return this.addRule(new Rule(nt, body));
  }

  addRule(rule: Rule): Rule {
    const name = rule.name;
    if (this.frozen) {
      throw new GrammarError(
        'frozen-grammar',
        `Cannot declare rule '${name}': a parser has already been created from this grammar`,
        name,
      );
    }
    if (rule.nonterminal.grammar !== this) {
      throw new GrammarError('foreign-nonterminal', `Nonterminal '${name}' belongs to another grammar`, name);
    }
    if (this.rules.has(name)) {
      throw new GrammarError('duplicate-rule', `Duplicate rule declaration: '${name}'`, name);
    }
    if (!this.nonterminals.has(name)) {
      this.nonterminals.set(name, rule.nonterminal);
    }
    this.rules.set(name, rule);
    return rule;
  }

  rule(name: string): Rule {
    const rule = this.rules.get(name);
    if (!rule) {
      throw new GrammarError('undeclared-rule', `Rule '${name}' is referenced but never declared`, name);
    }
    return rule;
  }

  hasRule(name: string): boolean {
    return this.rules.has(name);
  }

  /** Rule names in declaration order. */
  ruleNames(): string[] {
    return [...this.rules.keys()];
  }

  resolve(name: string): ParsingExpression {
    return this.rule(name).body;
  }

  undeclaredReferences(): string[] {
    return [...this.nonterminals.keys()].filter(name => !this.rules.has(name));
  }

  get startRule(): string {
    const start = this.options.start ?? this.ruleNames()[0];
    if (start === undefined) {
      throw new GrammarError('no-start-rule', 'Grammar has no rules to start from');
    }
    return start;
  }

  /**
   * Create a parser starting at `start` (or the default start rule). Freezes
   * the grammar and checks that every rule reachable from the start is declared.
   */
  newParser(start?: string, options?: ParserOptions): Parser {
    const startName = start ?? this.startRule;
    const missing = this.unresolvedFrom(this.rule(startName));
    if (missing.length > 0) {
      throw new GrammarError(
        'undeclared-rule',
        `Rule '${missing[0]}' is referenced but never declared`,
        missing[0],
      );
    }
    this.frozen = true;
    return new Parser(this, this.nonterminal(startName), options);
  }

  private unresolvedFrom(start: Rule): string[] {
    const missing: string[] = [];
    const visited = new Set<ParsingExpression>();
    const pending: ParsingExpression[] = [start.nonterminal];

    while (pending.length > 0) {
      const expression = pending.pop();
      if (!expression || visited.has(expression)) continue;
      visited.add(expression);

      switch (expression.kind) {
        case 'terminal':
          break;
        case 'nonterminal': {
          const owner = expression.grammar;
          if (owner.hasRule(expression.name)) {
            pending.push(owner.resolve(expression.name));
          } else if (!missing.includes(expression.name)) {
            missing.push(expression.name);
          }
          break;
        }
        case 'sequence':
          pending.push(...expression.elements);
          break;
        case 'choice':
          pending.push(...expression.alternatives);
          break;
        case 'zero-or-more':
        case 'one-or-more':
        case 'optional':
          pending.push(expression.element);
          break;
        default:
          assertNever(expression);
      }
    }
    return missing;
  }
}

/** The vocabulary handed to a `Grammar.define` block. */
export class GrammarBuilder {
  readonly grammar: Grammar;

  constructor(grammar: Grammar) {
    this.grammar = grammar;
  }

  rule(name: string, body: ExpressionReference): Rule {
    return this.grammar.declareRule(name, body);
  }

  ref(name: string): Nonterminal {
    return this.grammar.nonterminal(name);
  }

  exp(ref: ExpressionReference): ParsingExpression {
    return toExpression(ref);
  }

  seq(...elements: ExpressionReference[]): Sequence {
    return new Sequence(elements);
  }

  choice(...alternatives: ExpressionReference[]): OrderedChoice {
    return new OrderedChoice(alternatives);
  }

  zeroOrMore(element: ExpressionReference): ZeroOrMore {
    return new ZeroOrMore(element);
  }

  oneOrMore(element: ExpressionReference): OneOrMore {
    return new OneOrMore(element);
  }

  optional(element: ExpressionReference): Optional {
    return new Optional(element);
  }
}
