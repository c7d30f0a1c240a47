/**
 * Compiler entry points
 *
 * JSON text (or an already parsed document) goes through the reader into a
 * fresh builder; every call owns its own builder and registry.
 */

import { readFile } from "node:fs/promises";

import { isSchemaError, SchemaErrorCode, StreamError } from "@/errors";
import { SchemaBuilder } from "./builder";
import { parseSchemaText, readSchema } from "./reader";

import type { SchemaError } from "@/errors";
import type { CompiledSchema } from "./builder";

export { SchemaBuilder } from "./builder";
export { parseSchemaText, readSchema } from "./reader";

export type { CompiledSchema } from "./builder";
export type { ChildMode, SchemaEventSink } from "./events";

/**
 * Result of `safeCompileSchema`, shaped like zod's `safeParse`
 */
export type SafeCompileResult =
  | { success: true; schema: CompiledSchema }
  | { success: false; error: SchemaError };

/**
 * Compile a schema from JSON text or a parsed JSON document
 * @throws SchemaError on the first problem found
 */
export function compileSchema(input: string | object): CompiledSchema {
  const document = typeof input === "string" ? parseSchemaText(input) : input;
  const builder = new SchemaBuilder();
  readSchema(document, builder);
  return builder.finish();
}

/**
 * Compile a schema, returning schema errors instead of throwing them.
 * Errors that are not schema errors still propagate.
 */
export function safeCompileSchema(input: string | object): SafeCompileResult {
  try {
    return { success: true, schema: compileSchema(input) };
  } catch (error) {
    if (isSchemaError(error)) {
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Read and compile a schema file
 * @throws StreamError when the file cannot be read
 */
export async function compileSchemaFile(path: string): Promise<CompiledSchema> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new StreamError(
      `Could not read schema file ${path}`,
      SchemaErrorCode.STREAM_UNAVAILABLE,
      { cause: error },
    );
  }
  return compileSchema(text);
}
