import { describe, it, expect, beforeAll } from 'vitest';
import {
  Grammar,
  OrderedChoice,
  Sequence,
  Terminal,
  ZeroOrMore,
  defineExtension,
  formatExpression,
  type Parser,
  type ParseResult,
  type SyntaxNode,
} from '../src/index.js';

type BinaryFunction = (x: number, y: number) => number;

function isBinaryFunction(value: unknown): value is BinaryFunction {
  return typeof value === 'function' && value.length === 2;
}

function numberAt(node: SyntaxNode, name = 'value'): number {
  const value = node.get(name);
  if (typeof value !== 'number') {
    throw new TypeError(`Accessor '${name}' returned ${typeof value}, expected a number`);
  }
  return value;
}

function valueOf(result: ParseResult): number {
  if (!result.isSuccess()) {
    throw new Error(`Parse failed at ${result.position}`);
  }
  return numberAt(result.node);
}

const BinaryOperator = defineExtension('BinaryOperator', {
  leftArg: node => node.element(0),
  rightArg: node => node.element(2),
  value: node => {
    const operator = node.get('operator');
    if (!isBinaryFunction(operator)) {
      throw new TypeError('BinaryOperator needs an operator accessor returning a two-argument function');
    }
    return operator(numberAt(node.element(0)), numberAt(node.element(2)));
  },
});

const digits = (from: number) => Array.from({ length: 10 - from }, (_, i) => new Terminal(String(from + i)));

/**
 * additive  <- multitive '+' additive / multitive
 * multitive <- primary '*' multitive / primary
 * primary   <- '(' additive ')' / decimal
 * decimal   <- nonzero_digit digit* / '0'
 */
function arithmeticGrammar(withValues: boolean): Grammar {
  const g = new Grammar();

  const additive = g.nonterminal('additive');
  const multitive = g.nonterminal('multitive');
  const primary = g.nonterminal('primary');
  const decimal = g.nonterminal('decimal');
  const nonzeroDigit = g.nonterminal('nonzero_digit');
  const digit = g.nonterminal('digit');

  const sum = new Sequence([multitive, new Terminal('+'), additive]);
  g.declareRule(additive, new OrderedChoice([sum, multitive]));

  const product = new Sequence([primary, new Terminal('*'), multitive]);
  g.declareRule(multitive, new OrderedChoice([product, primary]));

  const parenthesized = new Sequence([new Terminal('('), additive, new Terminal(')')]);
  g.declareRule(primary, new OrderedChoice([parenthesized, decimal]));

  const number = new Sequence([nonzeroDigit, new ZeroOrMore(digit)]);
  const zero = new Terminal('0');
  g.declareRule(decimal, new OrderedChoice([number, zero]));

  g.declareRule(nonzeroDigit, new OrderedChoice(digits(1)));
  g.declareRule(digit, new OrderedChoice(digits(0)));

  if (withValues) {
    sum.extend(BinaryOperator).accessor('operator', () => (x: number, y: number) => x + y);
    product.extend(BinaryOperator).accessor('operator', () => (x: number, y: number) => x * y);
    parenthesized.extend(
      defineExtension('Parenthesized', {
        subexpression: node => node.element(1),
        value: node => numberAt(node.element(1)),
      }),
    );
    number.accessor('value', node => parseInt(node.text, 10));
    zero.accessor('value', () => 0);
  }

  return g;
}

describe('A parser for a simple arithmetic grammar', () => {
  let parser: Parser;

  beforeAll(() => {
    parser = arithmeticGrammar(false).newParser();
  });

  it('starts from the first declared rule', () => {
    expect(parser.startRule).toBe('additive');
  });

  it('succeeds for a single digit decimal', () => {
    expect(parser.parse('5').isSuccess()).toBe(true);
  });

  it('succeeds for a multi-digit decimal', () => {
    expect(parser.parse('5346').isSuccess()).toBe(true);
  });

  it('succeeds for a lone zero', () => {
    expect(parser.parse('0').isSuccess()).toBe(true);
  });

  it('fails for a multi-digit decimal that begins with zero', () => {
    const result = parser.parse('05346');
    expect(result.isFailure()).toBe(true);
    if (result.isFailure()) {
      expect(result.consumed).toBe(1);
      expect(result.position).toBe(1);
      expect(result.expected.map(formatExpression)).toEqual(["'*'", "'+'"]);
    }
  });

  it('fails for a multi-digit decimal that ends with characters', () => {
    expect(parser.parse('05346xs').isFailure()).toBe(true);
  });

  it('succeeds for a parenthesized decimal', () => {
    expect(parser.parse('(53)').isSuccess()).toBe(true);
  });

  it('fails for a partially parenthesized decimal', () => {
    const result = parser.parse('(53');
    expect(result.isFailure()).toBe(true);
    if (result.isFailure()) {
      expect(result.consumed).toBeNull();
      expect(result.position).toBe(3);
      expect(result.expected).toHaveLength(13);
      expect(formatExpression(result.expected[12])).toBe("')'");
    }
  });

  it('succeeds for a multiplication', () => {
    expect(parser.parse('45*4').isSuccess()).toBe(true);
  });

  it('fails for a partial multiplication', () => {
    const result = parser.parse('53*');
    expect(result.isFailure()).toBe(true);
    if (result.isFailure()) {
      expect(result.consumed).toBe(2);
      expect(result.position).toBe(3);
      expect(result.expected.map(formatExpression)).toEqual([
        "'('",
        "'1'", "'2'", "'3'", "'4'", "'5'", "'6'", "'7'", "'8'", "'9'",
        "'0'",
      ]);
    }
  });

  it('succeeds for an addition', () => {
    expect(parser.parse('45+4').isSuccess()).toBe(true);
  });

  it('succeeds for an expression with nested multiplication and addition', () => {
    const input = '((34*10)+(44*(6*(67+(5)))))';
    const result = parser.parse(input);
    expect(result.isSuccess() && result.text).toBe(input);
  });

  it('keeps the shape of the alternative that matched', () => {
    const result = parser.parse('45*4');
    if (!result.isSuccess()) throw new Error('expected success');
    const node = result.node;
    expect(node.rule).toBe('additive');
    expect(node.inner?.rule).toBe('multitive');
    expect(node.elements.map(e => e.text)).toEqual(['45', '*', '4']);
    expect(node.element(0).rule).toBe('primary');
    expect(node.element(2).rule).toBe('multitive');
  });
});

describe('A parser for a simple arithmetic grammar with accessors', () => {
  let parser: Parser;

  beforeAll(() => {
    parser = arithmeticGrammar(true).newParser();
  });

  it('returns a result with the correct value for a digit', () => {
    expect(valueOf(parser.parse('5'))).toBe(5);
  });

  it('evaluates a multi-digit decimal', () => {
    expect(valueOf(parser.parse('5346'))).toBe(5346);
  });

  it('evaluates zero', () => {
    expect(valueOf(parser.parse('0'))).toBe(0);
  });

  it('evaluates a parenthesized decimal', () => {
    expect(valueOf(parser.parse('(53)'))).toBe(53);
  });

  it('evaluates a multiplication', () => {
    expect(valueOf(parser.parse('45*4'))).toBe(180);
  });

  it('evaluates an addition', () => {
    expect(valueOf(parser.parse('45+4'))).toBe(49);
  });

  it('evaluates multiplication before addition', () => {
    expect(valueOf(parser.parse('2+3*4'))).toBe(14);
    expect(valueOf(parser.parse('2*3+4'))).toBe(10);
  });

  it('evaluates an expression with nested multiplication and addition', () => {
    expect(valueOf(parser.parse('(34+(44*(6*(67+(5)))))'))).toBe(19042);
    expect(valueOf(parser.parse('((34*10)+(44*(6*(67+(5)))))'))).toBe(19348);
  });

  it('shares the binary operator bundle between sum and product nodes', () => {
    const sum = parser.parse('1+2');
    const product = parser.parse('1*2');
    if (!sum.isSuccess() || !product.isSuccess()) throw new Error('expected success');
    expect(sum.node.is(BinaryOperator)).toBe(true);
    expect(product.node.is(BinaryOperator)).toBe(true);

    const left = sum.node.get('leftArg');
    const right = product.node.get('rightArg');
    expect(typeof left === 'object' && left !== null && 'text' in left && left.text).toBe('1');
    expect(typeof right === 'object' && right !== null && 'text' in right && right.text).toBe('2');
  });

  it('exposes the subexpression of a parenthesized primary', () => {
    const result = parser.parse('(7)');
    if (!result.isSuccess()) throw new Error('expected success');
    expect(result.node.get('subexpression')).toBe(result.node.element(1));
  });
});
