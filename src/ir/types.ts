/**
 * Schema IR node model
 *
 * Every schema type is one `SchemaNode`, discriminated by `kind`. Nodes are
 * plain objects shared by every parent that reaches them; a `symbolic` node
 * stands in for a named type elsewhere in the graph and refers to it by
 * registry key, so the owning graph never contains a cycle.
 */

// ============================================================================
// Kinds
// ============================================================================

export const PRIMITIVE_KINDS = [
  "null",
  "boolean",
  "int",
  "long",
  "float",
  "double",
  "string",
  "bytes",
] as const;

export const NAMED_KINDS = ["record", "enum", "fixed"] as const;

export const NODE_KINDS = [
  ...PRIMITIVE_KINDS,
  ...NAMED_KINDS,
  "array",
  "map",
  "union",
  "symbolic",
] as const;

export type PrimitiveKind = (typeof PRIMITIVE_KINDS)[number];
export type NamedKind = (typeof NAMED_KINDS)[number];
export type NodeKind = (typeof NODE_KINDS)[number];

// ============================================================================
// Nodes
// ============================================================================

export interface PrimitiveNode<K extends PrimitiveKind = PrimitiveKind> {
  kind: K;
}

interface NamedNodeBase {
  /** Simple name, without namespace */
  name: string;
  /** Empty string when the type lives in the null namespace */
  namespace: string;
  doc?: string;
  aliases?: readonly string[];
}

/** Per-field details the wire format carries besides name and type */
export interface FieldDetails {
  doc?: string;
  default?: unknown;
}

export interface RecordNode extends NamedNodeBase {
  kind: "record";
  /** Field types, in declaration order */
  children: readonly SchemaNode[];
  /** Field names, parallel to `children` */
  fieldNames: readonly string[];
  /** Optional field details, parallel to `children` */
  fieldDetails?: readonly FieldDetails[];
}

export interface EnumNode extends NamedNodeBase {
  kind: "enum";
  symbols: readonly string[];
}

export interface FixedNode extends NamedNodeBase {
  kind: "fixed";
  size: number;
}

export interface ArrayNode {
  kind: "array";
  /** Exactly one child: the item type */
  children: readonly SchemaNode[];
}

export interface MapNode {
  kind: "map";
  /** Exactly two children: the string key, then the value type */
  children: readonly SchemaNode[];
}

export interface UnionNode {
  kind: "union";
  /** Branches in wire order; the branch index is the position here */
  children: readonly SchemaNode[];
}

export interface SymbolicNode {
  kind: "symbolic";
  /** Fully qualified name of the referenced type */
  name: string;
  /** Registry key of the resolved type; unset while the type is being built */
  target?: string;
}

export type NamedNode = RecordNode | EnumNode | FixedNode;
export type CompoundNode = RecordNode | ArrayNode | MapNode | UnionNode;

export type SchemaNode =
  | PrimitiveNode
  | RecordNode
  | EnumNode
  | FixedNode
  | ArrayNode
  | MapNode
  | UnionNode
  | SymbolicNode;

// ============================================================================
// Type Guards
// ============================================================================

const primitiveKinds: ReadonlySet<string> = new Set(PRIMITIVE_KINDS);
const namedKinds: ReadonlySet<string> = new Set(NAMED_KINDS);
const nodeKinds: ReadonlySet<string> = new Set(NODE_KINDS);

export function isNodeKind(value: string): value is NodeKind {
  return nodeKinds.has(value);
}

export function isPrimitiveKind(value: string): value is PrimitiveKind {
  return primitiveKinds.has(value);
}

export function isPrimitive(node: SchemaNode): node is PrimitiveNode {
  return primitiveKinds.has(node.kind);
}

export function isNamed(node: SchemaNode): node is NamedNode {
  return namedKinds.has(node.kind);
}

export function isCompound(node: SchemaNode): node is CompoundNode {
  return (
    node.kind === "record" ||
    node.kind === "array" ||
    node.kind === "map" ||
    node.kind === "union"
  );
}

export function isRecord(node: SchemaNode): node is RecordNode {
  return node.kind === "record";
}

export function isEnum(node: SchemaNode): node is EnumNode {
  return node.kind === "enum";
}

export function isFixed(node: SchemaNode): node is FixedNode {
  return node.kind === "fixed";
}

export function isArray(node: SchemaNode): node is ArrayNode {
  return node.kind === "array";
}

export function isMap(node: SchemaNode): node is MapNode {
  return node.kind === "map";
}

export function isUnion(node: SchemaNode): node is UnionNode {
  return node.kind === "union";
}

export function isSymbolic(node: SchemaNode): node is SymbolicNode {
  return node.kind === "symbolic";
}
