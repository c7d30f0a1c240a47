import { SchemaErrorCode, StructuralError } from "@/errors";

import { qualifiedName } from "./node";

import type { NamedNode } from "./types";

/**
 * Table of completed named types, keyed by qualified name.
 *
 * One registry belongs to one compilation. Symbolic nodes store a key into
 * it rather than a reference to their target.
 */
export class NamedTypeRegistry {
  private readonly types = new Map<string, NamedNode>();

  /**
   * Register a completed named type under its qualified name
   * @throws StructuralError when the name is already taken
   */
  define(node: NamedNode): string {
    const fullName = qualifiedName(node);
    if (this.types.has(fullName)) {
      throw new StructuralError(
        `Type "${fullName}" is defined more than once`,
        SchemaErrorCode.DUPLICATE_TYPE,
      );
    }
    this.types.set(fullName, node);
    return fullName;
  }

  lookup(fullName: string): NamedNode | undefined {
    return this.types.get(fullName);
  }

  has(fullName: string): boolean {
    return this.types.has(fullName);
  }

  /** Qualified names in definition order */
  names(): string[] {
    return [...this.types.keys()];
  }

  entries(): [string, NamedNode][] {
    return [...this.types.entries()];
  }

  get size(): number {
    return this.types.size;
  }
}
