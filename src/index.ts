export { Grammar, GrammarBuilder, Rule } from './Grammar.js';
export type { GrammarOptions } from './Grammar.js';

export {
  Expression,
  Terminal,
  Nonterminal,
  Sequence,
  OrderedChoice,
  ZeroOrMore,
  OneOrMore,
  Optional,
  terminal,
  sequence,
  choice,
  zeroOrMore,
  oneOrMore,
  optional,
  toExpression,
  formatExpression,
} from './ParsingExpression.js';
export type { ParsingExpression, ExpressionKind, ExpressionReference } from './ParsingExpression.js';

export { SyntaxNode } from './SyntaxNode.js';
export type { SyntaxNodeInit } from './SyntaxNode.js';

export { NodeExtension, defineExtension } from './NodeExtension.js';
export type { Accessor } from './NodeExtension.js';

export { GrammarError, RecursionLimitError } from './GrammarError.js';
export type { GrammarErrorCode } from './GrammarError.js';

export { Parser, ParseSuccess, ParseFailure } from './Parser.js';
export type { ParserOptions, ParseResult, FailurePoint, MatchStatistics } from './Parser.js';
