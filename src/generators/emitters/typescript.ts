/**
 * TypeScript emitter
 *
 * Records become interfaces, enums numeric enums, fixed types `Uint8Array`
 * aliases. Each union becomes an interface declared with the other types
 * plus an implementation class and factory written once the graph walk is
 * over. Encode/decode functions follow unless `declarationsOnly` is set.
 */

import { isNamed, qualifiedName } from "@/ir";
import {
  createWriter,
  writeBlocks,
  writeDocComment,
  writeHeader,
} from "@/utils/writer";
import {
  canonicalName,
  capitalize,
  getSafePropertyName,
  toFieldAliasName,
  toNamespacePath,
  toSafeIdentifier,
} from "@/utils/naming";
import { emitCodecs } from "../codec";
import { childRef } from "../session";

import type {
  EnumNode,
  FixedNode,
  PrimitiveKind,
  RecordNode,
  UnionNode,
} from "@/ir";
import type { BranchAccessors } from "../codec";
import type { GeneratorSession } from "../session";
import type { Emitter, TypeRef } from "../types";

const PRIMITIVE_TYPES: Record<PrimitiveKind, string> = {
  null: "null",
  boolean: "boolean",
  int: "number",
  long: "bigint",
  float: "number",
  double: "number",
  string: "string",
  bytes: "Uint8Array",
};

// ============================================================================
// Declarations
// ============================================================================

function declareRecord(
  node: RecordNode,
  children: readonly TypeRef[],
  session: GeneratorSession,
): TypeRef {
  const name = session.typeName(node);

  const memberTypes = node.fieldNames.map((field, index) => {
    const ref = childRef(children, index);
    const child = node.children[index];
    if (
      child &&
      !session.options.noUnionTypedef &&
      session.resolve(child).kind === "union"
    ) {
      const alias = session.uniqueName(toFieldAliasName(name, field));
      session.declare(alias, `export type ${alias} = ${ref.code};`);
      return alias;
    }
    return ref.code;
  });

  const writer = createWriter();
  writeDocComment(writer, node.doc);
  writer.write(`export interface ${name}`).block(() => {
    node.fieldNames.forEach((field, index) => {
      writeDocComment(writer, node.fieldDetails?.[index]?.doc);
      writer.writeLine(`${getSafePropertyName(field)}: ${memberTypes[index]};`);
    });
  });
  session.declare(name, writer.toString().trimEnd());

  return { code: name, forward: false };
}

function declareEnum(node: EnumNode, session: GeneratorSession): TypeRef {
  const name = session.typeName(node);
  const writer = createWriter();
  writeDocComment(writer, node.doc);
  writer.write(`export enum ${name}`).block(() => {
    node.symbols.forEach((symbol, ordinal) => {
      writer.writeLine(`${getSafePropertyName(symbol)} = ${ordinal},`);
    });
  });
  session.declare(name, writer.toString().trimEnd());
  return { code: name, forward: false };
}

function declareFixed(node: FixedNode, session: GeneratorSession): TypeRef {
  const name = session.typeName(node);
  const writer = createWriter();
  const sizeNote = `Fixed size: ${node.size} bytes`;
  writeDocComment(writer, node.doc ? `${node.doc}\n\n${sizeNote}` : sizeNote);
  writer.writeLine(`export type ${name} = Uint8Array;`);
  session.declare(name, writer.toString().trimEnd());
  return { code: name, forward: false };
}

/**
 * Accessor suffix per branch: "Null", the primitive or container kind, or
 * the simple name of a named type. Named types whose simple names clash
 * use their qualified name instead, and a named type whose suffix is still
 * taken by another branch gets its kind appended (`String_Record`).
 */
export function branchAccessors(
  node: UnionNode,
  session: GeneratorSession,
): BranchAccessors {
  const branches = node.children.map((child) => session.resolve(child));
  const simple = branches.map((branch) =>
    isNamed(branch)
      ? capitalize(toSafeIdentifier(branch.name))
      : capitalize(branch.kind),
  );
  const preferred = branches.map((branch, index) => {
    const suffix = simple[index] ?? "";
    const clashes = simple.filter((other) => other === suffix).length > 1;
    return clashes && isNamed(branch)
      ? capitalize(canonicalName(qualifiedName(branch)))
      : suffix;
  });

  // Anonymous branches have distinct kinds, so their suffixes are final
  const used = new Set<string>();
  branches.forEach((branch, index) => {
    if (!isNamed(branch)) used.add(preferred[index] ?? "");
  });

  return branches.map((branch, index) => {
    const base = preferred[index] ?? "";
    if (!isNamed(branch)) {
      return base;
    }
    const marked = `${base}_${capitalize(branch.kind)}`;
    let accessor = used.has(base) ? marked : base;
    for (let n = 2; used.has(accessor); n++) {
      accessor = `${marked}${n}`;
    }
    used.add(accessor);
    return accessor;
  });
}

function unionInterface(
  name: string,
  node: UnionNode,
  children: readonly TypeRef[],
  accessors: BranchAccessors,
  session: GeneratorSession,
): string {
  const writer = createWriter();
  writer.write(`export interface ${name}`).block(() => {
    writer.writeLine("/** Index of the branch this value holds */");
    writer.writeLine("readonly idx: number;");
    node.children.forEach((child, index) => {
      const accessor = accessors[index] ?? "";
      if (session.resolve(child).kind === "null") {
        writer.writeLine(`is${accessor}(): boolean;`);
      } else {
        writer.writeLine(`get${accessor}(): ${childRef(children, index).code};`);
      }
    });
  });
  return writer.toString().trimEnd();
}

function unionImplementation(
  name: string,
  node: UnionNode,
  children: readonly TypeRef[],
  accessors: BranchAccessors,
  session: GeneratorSession,
): string {
  const writer = createWriter();
  const implName = `${name}Impl`;
  const isNullBranch = node.children.map(
    (child) => session.resolve(child).kind === "null",
  );

  writer.write(`class ${implName} implements ${name}`).block(() => {
    writer.writeLine("constructor(");
    writer.indent(() => {
      writer.writeLine("readonly idx: number,");
      writer.writeLine("private readonly value: unknown,");
    });
    writer.writeLine(") {}");

    node.children.forEach((_, index) => {
      const accessor = accessors[index] ?? "";
      writer.blankLine();
      if (isNullBranch[index]) {
        writer.write(`is${accessor}(): boolean`).block(() => {
          writer.writeLine(`return this.idx === ${index};`);
        });
        return;
      }
      const type = childRef(children, index).code;
      writer.write(`get${accessor}(): ${type}`).block(() => {
        writer.write(`if (this.idx !== ${index})`).block(() => {
          writer.writeLine(
            `throw new Error(\`${name} holds branch \${this.idx}, not ${index}\`);`,
          );
        });
        writer.writeLine(`return this.value as ${type};`);
      });
    });
  });
  writer.blankLine();

  writer.write(`export const ${name} = `).inlineBlock(() => {
    node.children.forEach((_, index) => {
      const accessor = accessors[index] ?? "";
      if (isNullBranch[index]) {
        writer.write(`of${accessor}(): ${name} `).inlineBlock(() => {
          writer.writeLine(`return new ${implName}(${index}, null);`);
        });
      } else {
        const type = childRef(children, index).code;
        writer.write(`of${accessor}(value: ${type}): ${name} `).inlineBlock(() => {
          writer.writeLine(`return new ${implName}(${index}, value);`);
        });
      }
      writer.write(",").newLine();
    });
  });
  writer.write(";");

  return writer.toString().trimEnd();
}

// ============================================================================
// TypeScript Emitter
// ============================================================================

export function createTypeScriptEmitter(): Emitter {
  const accessors = new Map<UnionNode, BranchAccessors>();

  return {
    target: "typescript",
    supportsCodecs: true,

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
          return { code: `${items.code}[]`, forward: items.forward };
        }

        case "map": {
          const values = childRef(children, 1);
          return {
            code: `Record<string, ${values.code}>`,
            forward: values.forward,
          };
        }

        case "union": {
          const name = session.nextUnionName();
          const branchNames = branchAccessors(node, session);
          accessors.set(node, branchNames);
          session.declare(
            name,
            unionInterface(name, node, children, branchNames, session),
          );
          session.defer(() =>
            unionImplementation(name, node, children, branchNames, session),
          );
          return { code: name, forward: false };
        }

        default:
          return {
            code: session.options.primitives?.[node.kind] ?? PRIMITIVE_TYPES[node.kind],
            forward: false,
          };
      }
    },

    forwardReference(node, session): string {
      return session.typeName(node);
    },

    declareRoot(_root, ref, session): void {
      const name = session.uniqueName("Root");
      session.rootName = name;
      session.declare(name, `export type ${name} = ${ref.code};`);
    },

    render(session): string {
      const { options } = session;
      const withCodecs = !options.declarationsOnly;
      const writer = createWriter();

      if (options.banner) {
        writeHeader(writer, { source: options.schemaFile });
      }
      if (withCodecs) {
        writer.writeLine(
          `import type { Decoder, Encoder } from ${JSON.stringify(options.includePrefix)};`,
        );
        writer.blankLine();
      }

      const writeBody = () => {
        writeBlocks(writer, "Types", session.declarationBlocks);
        writeBlocks(writer, "Union Implementations", session.flushDeferred());
        if (withCodecs) {
          writeBlocks(writer, "Codecs", emitCodecs({ session, accessors }));
        }
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
