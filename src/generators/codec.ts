/**
 * Codec walk
 *
 * Produces encode/decode functions for every record, enum, fixed and union
 * the declaration walk emitted, reusing the names it chose. Generated code
 * only calls the `Encoder`/`Decoder` runtime contract.
 */

import { InternalSchemaError } from "@/errors";
import { itemsOf, valuesOf } from "@/ir";
import { createWriter } from "@/utils/writer";
import {
  getSafePropertyName,
  propertyAccess,
  toDecoderName,
  toEncoderName,
} from "@/utils/naming";

import type {
  EnumNode,
  FixedNode,
  PrimitiveKind,
  RecordNode,
  SchemaNode,
  UnionNode,
} from "@/ir";
import type { GeneratorSession } from "./session";
import type { ResolvedNode } from "./types";

/**
 * How one type is written and read, as expressions over `enc` and `dec`
 */
interface CodecExpr {
  encode(value: string): string;
  decode: string;
}

const PRIMITIVE_METHODS: Record<PrimitiveKind, string> = {
  null: "Null",
  boolean: "Boolean",
  int: "Int",
  long: "Long",
  float: "Float",
  double: "Double",
  string: "String",
  bytes: "Bytes",
};

/**
 * Accessor suffix of each union branch, shared by the union declaration
 * and its codec
 */
export type BranchAccessors = readonly string[];

export interface CodecContext {
  session: GeneratorSession;
  /** Accessor suffixes per union, from the declaration walk */
  accessors: ReadonlyMap<UnionNode, BranchAccessors>;
}

// ============================================================================
// Expressions
// ============================================================================

function declaredName(ctx: CodecContext, node: ResolvedNode): string {
  const ref = ctx.session.done.get(node);
  if (!ref) {
    throw new InternalSchemaError(`No declaration for ${node.kind} type`);
  }
  return ref.code;
}

function codecFor(ctx: CodecContext, node: SchemaNode): CodecExpr {
  const resolved = ctx.session.resolve(node);
  switch (resolved.kind) {
    case "record":
    case "enum":
    case "fixed":
    case "union": {
      const name = declaredName(ctx, resolved);
      return {
        encode: (value) => `${toEncoderName(name)}(enc, ${value})`,
        decode: `${toDecoderName(name)}(dec)`,
      };
    }
    case "array": {
      const item = codecFor(ctx, itemsOf(resolved));
      return {
        encode: (value) =>
          `encodeArrayOf(enc, ${value}, (item) => ${item.encode("item")})`,
        decode: `decodeArrayOf(dec, () => ${item.decode})`,
      };
    }
    case "map": {
      const entry = codecFor(ctx, valuesOf(resolved));
      return {
        encode: (value) =>
          `encodeMapOf(enc, ${value}, (entry) => ${entry.encode("entry")})`,
        decode: `decodeMapOf(dec, () => ${entry.decode})`,
      };
    }
    case "null":
      return { encode: () => "enc.writeNull()", decode: "dec.readNull()" };
    default: {
      const method = PRIMITIVE_METHODS[resolved.kind];
      return {
        encode: (value) => `enc.write${method}(${value})`,
        decode: `dec.read${method}()`,
      };
    }
  }
}

// ============================================================================
// Functions per kind
// ============================================================================

function recordCodec(ctx: CodecContext, node: RecordNode, name: string): string {
  const writer = createWriter();

  writer
    .write(`export function ${toEncoderName(name)}(enc: Encoder, value: ${name}): void`)
    .block(() => {
      node.children.forEach((child, index) => {
        const field = node.fieldNames[index] ?? "";
        const access = propertyAccess("value", field);
        writer.writeLine(`${codecFor(ctx, child).encode(access)};`);
      });
    });
  writer.blankLine();

  writer
    .write(`export function ${toDecoderName(name)}(dec: Decoder): ${name}`)
    .block(() => {
      writer.write("return ").inlineBlock(() => {
        node.children.forEach((child, index) => {
          const field = node.fieldNames[index] ?? "";
          writer.writeLine(
            `${getSafePropertyName(field)}: ${codecFor(ctx, child).decode},`,
          );
        });
      });
      writer.write(";");
    });

  return writer.toString().trimEnd();
}

function enumCodec(node: EnumNode, name: string): string {
  const writer = createWriter();
  const count = node.symbols.length;

  writer
    .write(`export function ${toEncoderName(name)}(enc: Encoder, value: ${name}): void`)
    .block(() => {
      writer.writeLine("enc.writeEnum(value);");
    });
  writer.blankLine();

  writer
    .write(`export function ${toDecoderName(name)}(dec: Decoder): ${name}`)
    .block(() => {
      writer.writeLine("const ordinal = dec.readEnum();");
      writer.write(`if (ordinal < 0 || ordinal >= ${count})`).block(() => {
        writer.writeLine(
          "throw new RangeError(`Enum ordinal out of range: ${ordinal}`);",
        );
      });
      writer.writeLine("return ordinal;");
    });

  return writer.toString().trimEnd();
}

function fixedCodec(node: FixedNode, name: string): string {
  const writer = createWriter();

  writer
    .write(`export function ${toEncoderName(name)}(enc: Encoder, value: ${name}): void`)
    .block(() => {
      writer.write(`if (value.length !== ${node.size})`).block(() => {
        writer.writeLine(
          `throw new RangeError(\`${name} must be ${node.size} bytes, got \${value.length}\`);`,
        );
      });
      writer.writeLine("enc.writeFixed(value);");
    });
  writer.blankLine();

  writer
    .write(`export function ${toDecoderName(name)}(dec: Decoder): ${name}`)
    .block(() => {
      writer.writeLine(`return dec.readFixed(${node.size});`);
    });

  return writer.toString().trimEnd();
}

function unionCodec(ctx: CodecContext, node: UnionNode, name: string): string {
  const writer = createWriter();
  const accessors = ctx.accessors.get(node);
  if (!accessors) {
    throw new InternalSchemaError(`No branch accessors for union ${name}`);
  }
  const outOfRange = (index: string) =>
    `throw new RangeError(\`Union index too large: \${${index}}\`);`;

  writer
    .write(`export function ${toEncoderName(name)}(enc: Encoder, value: ${name}): void`)
    .block(() => {
      writer.write("switch (value.idx)").block(() => {
        node.children.forEach((branch, index) => {
          writer.writeLine(`case ${index}:`).indent(() => {
            writer.writeLine(`enc.writeUnionIndex(${index});`);
            const codec = codecFor(ctx, branch);
            const accessor = accessors[index] ?? "";
            const isNull = ctx.session.resolve(branch).kind === "null";
            writer.writeLine(
              `${codec.encode(isNull ? "null" : `value.get${accessor}()`)};`,
            );
            writer.writeLine("break;");
          });
        });
        writer.writeLine("default:").indent(() => {
          writer.writeLine(outOfRange("value.idx"));
        });
      });
    });
  writer.blankLine();

  writer
    .write(`export function ${toDecoderName(name)}(dec: Decoder): ${name}`)
    .block(() => {
      writer.writeLine("const idx = dec.readUnionIndex();");
      writer.write("switch (idx)").block(() => {
        node.children.forEach((branch, index) => {
          const codec = codecFor(ctx, branch);
          const accessor = accessors[index] ?? "";
          writer.writeLine(`case ${index}:`).indent(() => {
            if (ctx.session.resolve(branch).kind === "null") {
              writer.writeLine(`${codec.decode};`);
              writer.writeLine(`return ${name}.ofNull();`);
            } else {
              writer.writeLine(`return ${name}.of${accessor}(${codec.decode});`);
            }
          });
        });
        writer.writeLine("default:").indent(() => {
          writer.writeLine(outOfRange("idx"));
        });
      });
    });

  return writer.toString().trimEnd();
}

// ============================================================================
// Helpers emitted into generated code
// ============================================================================

const ARRAY_HELPERS = `function encodeArrayOf<T>(enc: Encoder, items: readonly T[], encodeItem: (item: T) => void): void {
  enc.writeArrayStart(items.length);
  for (const item of items) {
    encodeItem(item);
  }
  enc.writeArrayEnd();
}

function decodeArrayOf<T>(dec: Decoder, decodeItem: () => T): T[] {
  const count = dec.readArrayStart();
  const items: T[] = [];
  for (let i = 0; i < count; i++) {
    items.push(decodeItem());
  }
  dec.readArrayEnd();
  return items;
}`;

const MAP_HELPERS = `function encodeMapOf<T>(enc: Encoder, entries: Record<string, T>, encodeValue: (value: T) => void): void {
  const pairs = Object.entries(entries);
  enc.writeMapStart(pairs.length);
  for (const [key, value] of pairs) {
    enc.writeString(key);
    encodeValue(value);
  }
  enc.writeMapEnd();
}

function decodeMapOf<T>(dec: Decoder, decodeValue: () => T): Record<string, T> {
  const count = dec.readMapStart();
  const entries: Record<string, T> = {};
  for (let i = 0; i < count; i++) {
    const key = dec.readString();
    // "__proto__" is an ordinary key on the wire
    Object.defineProperty(entries, key, {
      value: decodeValue(),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  dec.readMapEnd();
  return entries;
}`;

function usesKind(ctx: CodecContext, kind: "array" | "map"): boolean {
  for (const node of ctx.session.done.keys()) {
    if (node.kind === kind) return true;
  }
  return false;
}

// ============================================================================
// Entry
// ============================================================================

/**
 * Encode/decode blocks for everything the declaration walk emitted, in
 * declaration order, followed by the array and map helpers they use
 */
export function emitCodecs(ctx: CodecContext): string[] {
  const blocks: string[] = [];

  for (const [node, ref] of ctx.session.done) {
    switch (node.kind) {
      case "record":
        blocks.push(recordCodec(ctx, node, ref.code));
        break;
      case "enum":
        blocks.push(enumCodec(node, ref.code));
        break;
      case "fixed":
        blocks.push(fixedCodec(node, ref.code));
        break;
      case "union":
        blocks.push(unionCodec(ctx, node, ref.code));
        break;
      default:
        break;
    }
  }

  const { rootName } = ctx.session;
  if (rootName !== undefined) {
    const codec = codecFor(ctx, ctx.session.root);
    blocks.push(
      [
        `export function ${toEncoderName(rootName)}(enc: Encoder, value: ${rootName}): void {`,
        `  ${codec.encode("value")};`,
        "}",
        "",
        `export function ${toDecoderName(rootName)}(dec: Decoder): ${rootName} {`,
        `  return ${codec.decode};`,
        "}",
      ].join("\n"),
    );
  }

  if (usesKind(ctx, "array")) blocks.push(ARRAY_HELPERS);
  if (usesKind(ctx, "map")) blocks.push(MAP_HELPERS);

  return blocks;
}
