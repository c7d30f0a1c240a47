/**
 * Generator types
 *
 * Options accepted by `generate`, and the contract every target emitter
 * implements.
 */

import * as z from "zod";

import type { NamedNode, SchemaNode, SymbolicNode } from "@/ir";
import type { GeneratorSession } from "./session";

// ============================================================================
// Options
// ============================================================================

/**
 * Output language of a generation run
 *
 * - "typescript" - interfaces, enums, union classes and codec functions
 * - "zod" - zod schemas with inferred types, declarations only
 */
export const generatorTargetSchema = z.enum(["typescript", "zod"]);

export type GeneratorTarget = z.infer<typeof generatorTargetSchema>;

/**
 * How named types are spelled in the output
 *
 * - "preserve" - the schema's simple name as written
 * - "pascal" - the simple name converted to PascalCase
 */
export const typeNamingSchema = z.enum(["preserve", "pascal"]);

export type TypeNaming = z.infer<typeof typeNamingSchema>;

/**
 * Replacement type names for primitives, by primitive kind
 */
export const primitiveOverridesSchema = z.object({
  null: z.string().min(1).optional(),
  boolean: z.string().min(1).optional(),
  int: z.string().min(1).optional(),
  long: z.string().min(1).optional(),
  float: z.string().min(1).optional(),
  double: z.string().min(1).optional(),
  string: z.string().min(1).optional(),
  bytes: z.string().min(1).optional(),
});

export type PrimitiveOverrides = z.infer<typeof primitiveOverridesSchema>;

export const generatorOptionsSchema = z.object({
  target: generatorTargetSchema.default("typescript"),
  /** Wrap every declaration in `export namespace <namespace> { ... }` */
  namespace: z.string().min(1).optional(),
  /** Schema file the input came from; names unions and the header */
  schemaFile: z.string().optional(),
  /** Prefix for union type names, instead of one derived from `schemaFile` */
  unionPrefix: z.string().min(1).optional(),
  /** Module the generated codecs import `Encoder` and `Decoder` from */
  includePrefix: z.string().min(1).default("wiregen/runtime"),
  /** Use the union type directly instead of a `<Record>_<field>_t` alias */
  noUnionTypedef: z.boolean().default(false),
  /** Emit type declarations without encode/decode functions */
  declarationsOnly: z.boolean().default(false),
  typeNaming: typeNamingSchema.default("preserve"),
  primitives: primitiveOverridesSchema.optional(),
  /** Start the output with the generated-file banner */
  banner: z.boolean().default(true),
});

/**
 * The normalized options used internally (after parsing)
 */
export type GeneratorOptions = z.output<typeof generatorOptionsSchema>;

/**
 * Options as callers write them (before defaults applied)
 */
export type GeneratorOptionsInput = z.input<typeof generatorOptionsSchema>;

// ============================================================================
// Emitter Contract
// ============================================================================

/**
 * How a generated type is referred to from other generated code
 */
export interface TypeRef {
  /** Type expression (typescript) or schema expression (zod) */
  code: string;
  /** Refers to a type whose declaration is not complete yet */
  forward: boolean;
}

/**
 * A node with symbolic references already followed
 */
export type ResolvedNode = Exclude<SchemaNode, SymbolicNode>;

export interface Emitter {
  readonly target: GeneratorTarget;

  /** Whether this target can emit encode/decode functions */
  readonly supportsCodecs: boolean;

  /**
   * Declare `node` once its children are declared, writing any
   * declarations through `session.declare` and `session.defer`, and return
   * how the rest of the output refers to it.
   */
  declare(
    node: ResolvedNode,
    children: readonly TypeRef[],
    session: GeneratorSession,
  ): TypeRef;

  /** Refer to a named type whose declaration is still in progress */
  forwardReference(node: NamedNode, session: GeneratorSession): string;

  /**
   * Give an anonymous root (a primitive, array or map) a name of its own.
   * Called once, after the whole graph is declared.
   */
  declareRoot(root: ResolvedNode, ref: TypeRef, session: GeneratorSession): void;

  /** Assemble the final file from the session's collected blocks */
  render(session: GeneratorSession): string;
}

export interface GeneratedOutput {
  /** The generated source text */
  content: string;
  /** Warnings raised while generating (deduplicated) */
  warnings: string[];
  /** Names of declared types, in declaration order */
  declaredTypes: string[];
}
