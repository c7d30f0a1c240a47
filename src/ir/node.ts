/**
 * Node accessors, symbolic resolution and IR builders
 */

import {
  InternalSchemaError,
  SchemaErrorCode,
  SchemaReferenceError,
} from "@/errors";

import type { NamedTypeRegistry } from "./registry";
import type {
  ArrayNode,
  EnumNode,
  FieldDetails,
  FixedNode,
  MapNode,
  NamedNode,
  PrimitiveKind,
  PrimitiveNode,
  RecordNode,
  SchemaNode,
  SymbolicNode,
  UnionNode,
} from "./types";

// ============================================================================
// Accessors
// ============================================================================

/**
 * Build a qualified name from a namespace and a simple name
 */
export function joinName(namespace: string, name: string): string {
  return namespace ? `${namespace}.${name}` : name;
}

/**
 * Split a possibly dotted name into namespace and simple name
 * e.g., "com.acme.Point" -> { namespace: "com.acme", name: "Point" }
 */
export function splitName(fullName: string): { namespace: string; name: string } {
  const index = fullName.lastIndexOf(".");
  if (index === -1) {
    return { namespace: "", name: fullName };
  }
  return {
    namespace: fullName.slice(0, index),
    name: fullName.slice(index + 1),
  };
}

/**
 * Qualified name of a named or symbolic node
 */
export function qualifiedName(node: NamedNode | SymbolicNode): string {
  if (node.kind === "symbolic") {
    return node.name;
  }
  return joinName(node.namespace, node.name);
}

export function childrenOf(node: SchemaNode): readonly SchemaNode[] {
  switch (node.kind) {
    case "record":
    case "array":
    case "map":
    case "union":
      return node.children;
    default:
      return [];
  }
}

export function childCount(node: SchemaNode): number {
  return childrenOf(node).length;
}

export function childAt(node: SchemaNode, index: number): SchemaNode {
  const children = childrenOf(node);
  const child = children[index];
  if (!child) {
    throw new InternalSchemaError(
      `Child index ${index} out of range for ${node.kind} with ${children.length} children`,
    );
  }
  return child;
}

export function fixedSize(node: FixedNode): number {
  return node.size;
}

/** Item type of an array */
export function itemsOf(node: ArrayNode): SchemaNode {
  return childAt(node, 0);
}

/** Value type of a map (the key is always the string primitive) */
export function valuesOf(node: MapNode): SchemaNode {
  return childAt(node, 1);
}

// ============================================================================
// Symbolic Resolution
// ============================================================================

/**
 * Follow a symbolic node to the named type it stands for.
 * Any other node resolves to itself.
 *
 * @throws SchemaReferenceError when the symbol was never bound or its
 *   target is missing from the registry
 */
export function resolve(
  node: SchemaNode,
  registry: NamedTypeRegistry,
): Exclude<SchemaNode, SymbolicNode> {
  if (node.kind !== "symbolic") {
    return node;
  }
  if (node.target === undefined) {
    throw new SchemaReferenceError(
      `Could not follow symbol "${node.name}": reference was never resolved`,
      SchemaErrorCode.BROKEN_REFERENCE,
      node.name,
    );
  }
  const target = registry.lookup(node.target);
  if (!target) {
    throw new SchemaReferenceError(
      `Could not follow symbol "${node.name}": no type named "${node.target}"`,
      SchemaErrorCode.BROKEN_REFERENCE,
      node.name,
    );
  }
  return target;
}

/**
 * Point a placeholder at the named type it was created for.
 *
 * @throws SchemaReferenceError when the placeholder's name differs from the
 *   qualified name of `node`
 */
export function bindSymbolic(placeholder: SymbolicNode, node: NamedNode): void {
  if (placeholder.target !== undefined) {
    throw new InternalSchemaError(
      `Symbol "${placeholder.name}" is already bound to "${placeholder.target}"`,
    );
  }
  const fullName = qualifiedName(node);
  if (placeholder.name !== fullName) {
    throw new SchemaReferenceError(
      `Symbolic name "${placeholder.name}" does not match the name of the schema it references ("${fullName}")`,
      SchemaErrorCode.SYMBOLIC_NAME_MISMATCH,
      placeholder.name,
    );
  }
  placeholder.target = fullName;
  Object.freeze(placeholder);
}

/**
 * Value identifying which union branch a node occupies.
 * Symbolic nodes use their stored name, which equals the qualified name of
 * the type they resolve to.
 */
export function discriminator(node: SchemaNode): string {
  switch (node.kind) {
    case "record":
    case "enum":
    case "fixed":
    case "symbolic":
      return qualifiedName(node);
    default:
      return node.kind;
  }
}

/**
 * Freeze a finished node and the lists it owns.
 * Children are left alone: they were frozen when they finished, and pending
 * symbolic placeholders must stay writable until bound.
 */
export function freezeNode<T extends SchemaNode>(node: T): T {
  switch (node.kind) {
    case "record":
      Object.freeze(node.children);
      Object.freeze(node.fieldNames);
      if (node.fieldDetails) Object.freeze(node.fieldDetails);
      if (node.aliases) Object.freeze(node.aliases);
      break;
    case "enum":
      Object.freeze(node.symbols);
      if (node.aliases) Object.freeze(node.aliases);
      break;
    case "array":
    case "map":
    case "union":
      Object.freeze(node.children);
      break;
    case "fixed":
      if (node.aliases) Object.freeze(node.aliases);
      break;
    case "symbolic":
      // bound later by bindSymbolic
      return node;
    default:
      break;
  }
  return Object.freeze(node);
}

// ============================================================================
// IR Builders
// ============================================================================

interface NamedOptions {
  namespace?: string;
  doc?: string;
  aliases?: string[];
}

export interface FieldSpec extends FieldDetails {
  name: string;
  type: SchemaNode;
}

const primitive = <K extends PrimitiveKind>(kind: K): PrimitiveNode<K> => ({
  kind,
});

/**
 * Convenience builders for creating SchemaNode values.
 * They do not validate; run `assertValid` on the result where that matters.
 */
export const ir = {
  primitive,

  null: () => primitive("null"),
  boolean: () => primitive("boolean"),
  int: () => primitive("int"),
  long: () => primitive("long"),
  float: () => primitive("float"),
  double: () => primitive("double"),
  string: () => primitive("string"),
  bytes: () => primitive("bytes"),

  record: (
    name: string,
    fields: FieldSpec[],
    options: NamedOptions = {},
  ): RecordNode => {
    const hasDetails = fields.some(
      (f) => f.doc !== undefined || f.default !== undefined,
    );
    return {
      kind: "record",
      name,
      namespace: options.namespace ?? "",
      doc: options.doc,
      aliases: options.aliases,
      children: fields.map((f) => f.type),
      fieldNames: fields.map((f) => f.name),
      fieldDetails: hasDetails
        ? fields.map(({ doc, default: value }) => ({ doc, default: value }))
        : undefined,
    };
  },

  enum: (
    name: string,
    symbols: string[],
    options: NamedOptions = {},
  ): EnumNode => ({
    kind: "enum",
    name,
    namespace: options.namespace ?? "",
    doc: options.doc,
    aliases: options.aliases,
    symbols,
  }),

  fixed: (name: string, size: number, options: NamedOptions = {}): FixedNode => ({
    kind: "fixed",
    name,
    namespace: options.namespace ?? "",
    doc: options.doc,
    aliases: options.aliases,
    size,
  }),

  array: (items: SchemaNode): ArrayNode => ({ kind: "array", children: [items] }),

  /** The key is always the string primitive */
  map: (values: SchemaNode): MapNode => ({
    kind: "map",
    children: [primitive("string"), values],
  }),

  union: (branches: SchemaNode[]): UnionNode => ({
    kind: "union",
    children: branches,
  }),

  symbolic: (name: string, target?: string): SymbolicNode => ({
    kind: "symbolic",
    name,
    target,
  }),
};
