/**
 * Schema Intermediate Representation (IR)
 *
 * The builder produces this graph and the generators walk it.
 */

export {
  bindSymbolic,
  childAt,
  childCount,
  childrenOf,
  discriminator,
  fixedSize,
  freezeNode,
  ir,
  itemsOf,
  joinName,
  qualifiedName,
  resolve,
  splitName,
  valuesOf,
} from "./node";
export { printSchema, schemaFileName, toSchemaJson } from "./printer";
export { NamedTypeRegistry } from "./registry";
export {
  isArray,
  isCompound,
  isEnum,
  isFixed,
  isMap,
  isNamed,
  isNodeKind,
  isPrimitive,
  isPrimitiveKind,
  isRecord,
  isSymbolic,
  isUnion,
  NAMED_KINDS,
  NODE_KINDS,
  PRIMITIVE_KINDS,
} from "./types";
export {
  assertValid,
  describeNode,
  findValidationIssue,
  isValid,
} from "./validate";

export type { FieldSpec } from "./node";
export type { PrintOptions, SchemaJson } from "./printer";
export type {
  ArrayNode,
  CompoundNode,
  EnumNode,
  FieldDetails,
  FixedNode,
  MapNode,
  NamedKind,
  NamedNode,
  NodeKind,
  PrimitiveKind,
  PrimitiveNode,
  RecordNode,
  SchemaNode,
  SymbolicNode,
  UnionNode,
} from "./types";
