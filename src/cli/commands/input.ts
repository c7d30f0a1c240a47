import { readFile } from "node:fs/promises";
import { text } from "node:stream/consumers";

import { SchemaErrorCode, StreamError } from "@/errors";

/**
 * Read schema text from a file, or from stdin when `path` is "-"
 * @throws StreamError when the input cannot be read
 */
export async function readSchemaInput(path: string): Promise<string> {
  try {
    return path === "-" ? await text(process.stdin) : await readFile(path, "utf-8");
  } catch (error) {
    throw new StreamError(
      `Could not read schema from ${path === "-" ? "stdin" : path}`,
      SchemaErrorCode.STREAM_UNAVAILABLE,
      { cause: error },
    );
  }
}

/**
 * Message to print for a failed command
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
