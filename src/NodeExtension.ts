import type { SyntaxNode } from './SyntaxNode.js';

export type Accessor = (node: SyntaxNode) => unknown;

/**
 * A named bundle of computed accessors. Attach one to any number of parsing
 * expressions; every node those expressions produce can then evaluate the
 * accessors through `SyntaxNode.get`.
 *
 * Included bundles are flattened first, so an accessor defined directly on
 * this bundle overrides one of the same name from an included bundle.
 */
export class NodeExtension {
  readonly name: string;
  readonly accessors: ReadonlyMap<string, Accessor>;
  readonly includes: readonly NodeExtension[];

  constructor(name: string, accessors: Record<string, Accessor>, includes: NodeExtension[] = []) {
    this.name = name;
    this.includes = Object.freeze([...includes]);

    const merged = new Map<string, Accessor>();
    for (const included of includes) {
      for (const [key, accessor] of included.accessors) {
        merged.set(key, accessor);
      }
    }
    for (const [key, accessor] of Object.entries(accessors)) {
      merged.set(key, accessor);
    }
    this.accessors = merged;
  }

  get(name: string): Accessor | undefined {
    return this.accessors.get(name);
  }

  has(name: string): boolean {
    return this.accessors.has(name);
  }

  includesExtension(other: NodeExtension): boolean {
    return this.includes.some(e => e === other || e.includesExtension(other));
  }

  /** A new bundle with this one included and `accessors` layered on top. */
  with(accessors: Record<string, Accessor>, name: string = this.name): NodeExtension {
    return new NodeExtension(name, accessors, [this]);
  }
}

export function defineExtension(
  name: string,
  accessors: Record<string, Accessor>,
  ...includes: NodeExtension[]
): NodeExtension {
  return new NodeExtension(name, accessors, includes);
}
