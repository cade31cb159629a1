import { GrammarError } from './GrammarError.js';
import type { NodeExtension } from './NodeExtension.js';
import type { ParsingExpression } from './ParsingExpression.js';

export interface SyntaxNodeInit {
  expression: ParsingExpression;
  input: string;
  start: number;
  end: number;
  elements?: readonly SyntaxNode[];
  inner?: SyntaxNode | null;
  rule?: string | null;
  extensions?: readonly NodeExtension[];
}

export class SyntaxNode {
  readonly expression: ParsingExpression;
  readonly input: string;
  readonly start: number;
  readonly end: number;
  readonly elements: readonly SyntaxNode[];
  /** For a nonterminal node, the node its rule body produced. */
  readonly inner: SyntaxNode | null;
  /** For a nonterminal node, the rule name. */
  readonly rule: string | null;
  readonly extensions: readonly NodeExtension[];

  constructor(init: SyntaxNodeInit) {
    this.expression = init.expression;
    this.input = init.input;
    this.start = init.start;
    this.end = init.end;
    this.elements = Object.freeze([...(init.elements ?? [])]);
    this.inner = init.inner ?? null;
    this.rule = init.rule ?? null;
    this.extensions = init.extensions ?? init.expression.extensions;
  }

  get text(): string {
    return this.input.slice(this.start, this.end);
  }

  get length(): number {
    return this.end - this.start;
  }

  element(index: number): SyntaxNode {
    const node = this.elements[index];
    if (node === undefined) {
      throw new RangeError(`Node '${this.text}' has no element at index ${index} (it has ${this.elements.length})`);
    }
    return node;
  }

  /** Evaluate a computed accessor. The most recently attached bundle defining `name` wins. */
  get(name: string): unknown {
    for (let i = this.extensions.length - 1; i >= 0; i--) {
      const accessor = this.extensions[i].get(name);
      if (accessor) {
        return accessor(this);
      }
    }
    throw new GrammarError(
      'unknown-accessor',
      `No accessor '${name}' on node '${this.text}' at ${this.start}`,
      this.rule,
    );
  }

  has(name: string): boolean {
    return this.extensions.some(e => e.has(name));
  }

  /** Whether this node carries `extension`, directly or through composition. */
  is(extension: NodeExtension): boolean {
    return this.extensions.some(e => e === extension || e.includesExtension(extension));
  }

  accessorNames(): string[] {
    const names = new Set<string>();
    for (const extension of this.extensions) {
      for (const name of extension.accessors.keys()) {
        names.add(name);
      }
    }
    return [...names];
  }
}
