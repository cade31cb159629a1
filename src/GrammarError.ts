export type GrammarErrorCode =
  | 'undeclared-rule'
  | 'duplicate-rule'
  | 'left-recursion'
  | 'frozen-grammar'
  | 'foreign-nonterminal'
  | 'no-start-rule'
  | 'empty-choice'
  | 'unknown-accessor';

/**
 * A fault in the grammar definition itself. Parse failures are never thrown;
 * they come back as a `ParseFailure`.
 */
export class GrammarError extends Error {
  readonly code: GrammarErrorCode;
  readonly rule: string | null;

  constructor(code: GrammarErrorCode, message: string, rule: string | null = null) {
    super(message);
    this.name = 'GrammarError';
    this.code = code;
    this.rule = rule;
  }
}

export class RecursionLimitError extends Error {
  readonly depth: number;

  constructor(depth: number) {
    super(`Match depth exceeded the configured limit of ${depth}`);
    this.name = 'RecursionLimitError';
    this.depth = depth;
  }
}
