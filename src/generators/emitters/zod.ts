/**
 * Zod emitter
 *
 * Converts the schema graph to zod validation code. Recursive references
 * are written as getters so a schema can refer to one declared after it.
 */

import {
  getSafePropertyName,
  toNamespacePath,
  toSchemaName,
} from "@/utils/naming";
import {
  createWriter,
  writeBlocks,
  writeDocComment,
  writeHeader,
} from "@/utils/writer";
import { childRef } from "../session";

import type { EnumNode, FixedNode, PrimitiveKind, RecordNode } from "@/ir";
import type { GeneratorSession } from "../session";
import type { Emitter, TypeRef } from "../types";

const PRIMITIVE_SCHEMAS: Record<PrimitiveKind, string> = {
  null: "z.null()",
  boolean: "z.boolean()",
  int: "z.number().int()",
  long: "z.bigint()",
  float: "z.number()",
  double: "z.number()",
  string: "z.string()",
  bytes: "z.instanceof(Uint8Array)",
};

function deferTypeInference(
  session: GeneratorSession,
  typeName: string,
  schemaName: string,
): void {
  session.defer(
    () => `export type ${typeName} = z.infer<typeof ${schemaName}>;`,
  );
}

// ============================================================================
// Declarations
// ============================================================================

function declareRecord(
  node: RecordNode,
  children: readonly TypeRef[],
  session: GeneratorSession,
): TypeRef {
  const name = session.typeName(node);
  const schemaName = toSchemaName(name);
  const writer = createWriter();

  writeDocComment(writer, node.doc);
  writer.write(`export const ${schemaName} = z.object(`).inlineBlock(() => {
    node.fieldNames.forEach((field, index) => {
      const ref = childRef(children, index);
      const key = getSafePropertyName(field);
      writeDocComment(writer, node.fieldDetails?.[index]?.doc);
      if (ref.forward) {
        writer.write(`get ${key}() `).inlineBlock(() => {
          writer.writeLine(`return ${ref.code};`);
        });
        writer.write(",").newLine();
      } else {
        writer.writeLine(`${key}: ${ref.code},`);
      }
    });
  });
  writer.write(");");

  session.declare(name, writer.toString().trimEnd());
  deferTypeInference(session, name, schemaName);
  return { code: schemaName, forward: false };
}

function declareEnum(node: EnumNode, session: GeneratorSession): TypeRef {
  const name = session.typeName(node);
  const schemaName = toSchemaName(name);
  const writer = createWriter();
  const symbols = node.symbols.map((symbol) => JSON.stringify(symbol));

  writeDocComment(writer, node.doc);
  writer.writeLine(`export const ${schemaName} = z.enum([${symbols.join(", ")}]);`);

  session.declare(name, writer.toString().trimEnd());
  deferTypeInference(session, name, schemaName);
  return { code: schemaName, forward: false };
}

function declareFixed(node: FixedNode, session: GeneratorSession): TypeRef {
  const name = session.typeName(node);
  const schemaName = toSchemaName(name);
  const writer = createWriter();

  writeDocComment(writer, node.doc);
  writer.writeLine(
    `export const ${schemaName} = z.instanceof(Uint8Array).refine((value) => value.length === ${node.size}, { message: "Expected ${node.size} bytes" });`,
  );

  session.declare(name, writer.toString().trimEnd());
  deferTypeInference(session, name, schemaName);
  return { code: schemaName, forward: false };
}

// ============================================================================
// Zod Emitter
// ============================================================================

export function createZodEmitter(): Emitter {
  return {
    target: "zod",
    supportsCodecs: false,

    declare(node, children, session): TypeRef {
      switch (node.kind) {
        case "record":
          return declareRecord(node, children, session);

        case "enum":
          return declareEnum(node, session);

        case "fixed":
          return declareFixed(node, session);

        case "array": {
          const items = childRef(children, 0);
          return { code: `z.array(${items.code})`, forward: items.forward };
        }

        case "map": {
          const values = childRef(children, 1);
          return {
            code: `z.record(z.string(), ${values.code})`,
            forward: values.forward,
          };
        }

        case "union": {
          const forward = children.some((child) => child.forward);
          if (children.length === 1) {
            return { code: childRef(children, 0).code, forward };
          }
          const options = children.map((child) => child.code).join(", ");
          return { code: `z.union([${options}])`, forward };
        }

        default:
          return { code: PRIMITIVE_SCHEMAS[node.kind], forward: false };
      }
    },

    forwardReference(node, session): string {
      return toSchemaName(session.typeName(node));
    },

    declareRoot(_root, ref, session): void {
      const name = session.uniqueName("Root");
      const schemaName = toSchemaName(name);
      session.rootName = name;
      session.declare(name, `export const ${schemaName} = ${ref.code};`);
      deferTypeInference(session, name, schemaName);
    },

    render(session): string {
      const { options } = session;
      const writer = createWriter();

      if (options.primitives) {
        session.warn("Primitive type overrides do not apply to the zod target");
      }

      if (options.banner) {
        writeHeader(writer, { source: options.schemaFile });
      }
      writer.writeLine('import * as z from "zod";');
      writer.blankLine();

      const writeBody = () => {
        writeBlocks(writer, "Zod Schemas", session.declarationBlocks);
        writeBlocks(
          writer,
          "TypeScript Types (inferred from Zod schemas)",
          session.flushDeferred(),
        );
      };

      if (options.namespace) {
        writer
          .write(`export namespace ${toNamespacePath(options.namespace)}`)
          .block(writeBody);
      } else {
        writeBody();
      }

      return `${writer.toString().trimEnd()}\n`;
    },
  };
}
