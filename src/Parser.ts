import type { Grammar } from './Grammar.js';
import { GrammarError, RecursionLimitError } from './GrammarError.js';
import { type Nonterminal, type ParsingExpression, assertNever } from './ParsingExpression.js';
import { SyntaxNode } from './SyntaxNode.js';

// ─── Public API ────────────────────────────────────────────────────────────────

export interface ParserOptions {
  /**
   * Maximum nesting of expression matches before `RecursionLimitError` is
   * thrown. Unlimited by default, in which case exhausting the call stack
   * surfaces as the host's `RangeError`.
   */
  maxDepth?: number;
}

export interface FailurePoint {
  /** Furthest offset at which a terminal failed to match. */
  position: number;
  /** Distinct terminals that failed at `position`, in the order they were tried. */
  expected: readonly ParsingExpression[];
}

export interface MatchStatistics {
  /** Expression/offset pairs actually matched. */
  evaluations: number;
  /** Lookups answered from the memo table. */
  cacheHits: number;
}

export class ParseSuccess {
  readonly node: SyntaxNode;
  readonly furthestFailure: FailurePoint | null;
  readonly stats: MatchStatistics;

  constructor(node: SyntaxNode, furthestFailure: FailurePoint | null, stats: MatchStatistics) {
    this.node = node;
    this.furthestFailure = furthestFailure;
    this.stats = stats;
  }

  get text(): string {
    return this.node.text;
  }

  isSuccess(): this is ParseSuccess {
    return true;
  }

  isFailure(): this is ParseFailure {
    return false;
  }
}

export class ParseFailure {
  /** Where the input diverged from every path through the grammar. */
  readonly position: number;
  readonly expected: readonly ParsingExpression[];
  /** End of the start rule's match when it succeeded without consuming all input. */
  readonly consumed: number | null;
  readonly furthestFailure: FailurePoint | null;
  readonly stats: MatchStatistics;

  constructor(
    position: number,
    expected: readonly ParsingExpression[],
    consumed: number | null,
    furthestFailure: FailurePoint | null,
    stats: MatchStatistics,
  ) {
    this.position = position;
    this.expected = expected;
    this.consumed = consumed;
    this.furthestFailure = furthestFailure;
    this.stats = stats;
  }

  isSuccess(): this is ParseSuccess {
    return false;
  }

  isFailure(): this is ParseFailure {
    return true;
  }
}

export type ParseResult = ParseSuccess | ParseFailure;

/**
 * Runs one grammar from one start rule. Holds no state between calls: every
 * `parse` gets its own memo table, so a parser can be reused freely.
 */
export class Parser {
  readonly grammar: Grammar;
  readonly start: Nonterminal;
  readonly options: ParserOptions;

  constructor(grammar: Grammar, start: Nonterminal, options?: ParserOptions) {
    this.grammar = grammar;
    this.start = start;
    this.options = options ?? {};
  }

  get startRule(): string {
    return this.start.name;
  }

  parse(input: string): ParseResult {
    const context = new MatchContext(input, this.options.maxDepth ?? Infinity);
    const outcome = context.match(this.start, 0);
    const furthest = context.furthestFailure();
    const stats = context.statistics();

    if (outcome.matched && outcome.end === input.length) {
      return new ParseSuccess(outcome.node, furthest, stats);
    }

    // A match that stops short of the end is still a failed parse.
    const consumed = outcome.matched ? outcome.end : null;
    const position = Math.max(furthest?.position ?? 0, consumed ?? 0);
    const expected = furthest && furthest.position === position ? furthest.expected : [];
    return new ParseFailure(position, expected, consumed, furthest, stats);
  }
}

// ─── Internal: Match Context ───────────────────────────────────────────────────

type Outcome =
  | { matched: true; node: SyntaxNode; end: number }
  | { matched: false; position: number };

const IN_PROGRESS = Symbol('in-progress');

type MemoEntry = Outcome | typeof IN_PROGRESS;

class MatchContext {
  private readonly input: string;
  private readonly maxDepth: number;
  private readonly memo: Map<ParsingExpression, Map<number, MemoEntry>> = new Map();

  // Nonterminals currently being matched, outermost first
  private readonly active: { rule: string; position: number }[] = [];
  private depth = 0;

  private furthest = -1;
  private expected: ParsingExpression[] = [];

  private evaluations = 0;
  private cacheHits = 0;

  constructor(input: string, maxDepth: number) {
    this.input = input;
    this.maxDepth = maxDepth;
  }

  furthestFailure(): FailurePoint | null {
    if (this.furthest < 0) return null;
    return { position: this.furthest, expected: [...this.expected] };
  }

  statistics(): MatchStatistics {
    return { evaluations: this.evaluations, cacheHits: this.cacheHits };
  }

  match(expression: ParsingExpression, position: number): Outcome {
    let byPosition = this.memo.get(expression);
    if (!byPosition) {
      byPosition = new Map();
      this.memo.set(expression, byPosition);
    }

    const cached = byPosition.get(position);
    if (cached === IN_PROGRESS) {
      throw this.leftRecursion(expression, position);
    }
    if (cached) {
      this.cacheHits++;
      return cached;
    }

    if (this.depth >= this.maxDepth) {
      throw new RecursionLimitError(this.maxDepth);
    }

    byPosition.set(position, IN_PROGRESS);
    this.depth++;
    this.evaluations++;
    const outcome = this.evaluate(expression, position);
    this.depth--;
    byPosition.set(position, outcome);
    return outcome;
  }

  private evaluate(expression: ParsingExpression, position: number): Outcome {
    switch (expression.kind) {
      case 'terminal': {
        if (!this.input.startsWith(expression.literal, position)) {
          return this.fail(expression, position);
        }
        return this.succeed(expression, position, position + expression.literal.length, []);
      }

      case 'nonterminal': {
        const body = expression.resolve();
        this.active.push({ rule: expression.name, position });
        const inner = this.match(body, position);
        this.active.pop();
        if (!inner.matched) return inner;

        const node = new SyntaxNode({
          expression,
          input: this.input,
          start: position,
          end: inner.end,
          elements: inner.node.elements,
          inner: inner.node,
          rule: expression.name,
          extensions: [...inner.node.extensions, ...expression.extensions],
        });
        return { matched: true, node, end: inner.end };
      }

      case 'sequence': {
        const nodes: SyntaxNode[] = [];
        let cursor = position;
        for (const element of expression.elements) {
          const outcome = this.match(element, cursor);
          if (!outcome.matched) return outcome;
          nodes.push(outcome.node);
          cursor = outcome.end;
        }
        return this.succeed(expression, position, cursor, nodes);
      }

      case 'choice': {
        let furthest = position;
        for (const alternative of expression.alternatives) {
          const outcome = this.match(alternative, position);
          if (outcome.matched) return outcome;
          furthest = Math.max(furthest, outcome.position);
        }
        return { matched: false, position: furthest };
      }

      case 'zero-or-more':
        return this.repeat(expression, expression.element, position, 0);

      case 'one-or-more':
        return this.repeat(expression, expression.element, position, 1);

      case 'optional': {
        const outcome = this.match(expression.element, position);
        if (!outcome.matched) {
          return this.succeed(expression, position, position, []);
        }
        return this.succeed(expression, position, outcome.end, [outcome.node]);
      }

      default:
        return assertNever(expression);
    }
  }

  /** Greedy repetition. A step that consumes nothing is kept and ends the loop. */
  private repeat(expression: ParsingExpression, element: ParsingExpression, position: number, min: number): Outcome {
    const nodes: SyntaxNode[] = [];
    let cursor = position;
    for (;;) {
      const outcome = this.match(element, cursor);
      if (!outcome.matched) {
        if (nodes.length < min) return outcome;
        break;
      }
      nodes.push(outcome.node);
      if (outcome.end === cursor) break;
      cursor = outcome.end;
    }
    return this.succeed(expression, position, cursor, nodes);
  }

  private succeed(expression: ParsingExpression, start: number, end: number, elements: SyntaxNode[]): Outcome {
    const node = new SyntaxNode({ expression, input: this.input, start, end, elements });
    return { matched: true, node, end };
  }

  private fail(expression: ParsingExpression, position: number): Outcome {
    if (position > this.furthest) {
      this.furthest = position;
      this.expected = [expression];
    } else if (position === this.furthest && !this.expected.includes(expression)) {
      this.expected.push(expression);
    }
    return { matched: false, position };
  }

  private leftRecursion(expression: ParsingExpression, position: number): GrammarError {
    let chain = this.active.filter(frame => frame.position === position).map(frame => frame.rule);
    let rule: string | null = chain.length > 0 ? chain[chain.length - 1] : null;
    if (expression.kind === 'nonterminal') {
      rule = expression.name;
      chain = [...chain.slice(Math.max(chain.indexOf(rule), 0)), rule];
    }
    return new GrammarError(
      'left-recursion',
      `Left recursion at offset ${position}: ${chain.join(' -> ')}`,
      rule,
    );
  }
}
