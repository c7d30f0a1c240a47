import { mkdir, stat, writeFile } from "node:fs/promises";
import { basename, extname, join, relative, resolve } from "node:path";

import fg from "fast-glob";

import { compileSchemaFile } from "@/compiler";
import { generate } from "@/generators";
import { printSchema, schemaFileName } from "@/ir";
import { defaultLogger } from "@/utils/logger";
import { resolveEntryOptions } from "./config";

import type { CompiledSchema } from "@/compiler";
import type { WiregenLogger } from "@/utils/logger";
import type { SchemaEntryConfig, WiregenConfig } from "./config";

export interface GenerateOptions {
  config: WiregenConfig;
  /** Directory that `output` and schema inputs are relative to (default: process.cwd()) */
  cwd?: string;
  logger?: WiregenLogger;
}

/**
 * One file written by `generateFromConfig`
 */
export interface GeneratedFile {
  /** Schema entry name */
  schema: string;
  /** Absolute path of the schema file */
  input: string;
  /** Absolute path of the written file */
  output: string;
  declaredTypes: string[];
}

export interface GenerateResult {
  files: GeneratedFile[];
}

/**
 * Output file name for a schema file
 * e.g., "schemas/point.avsc" -> "point.ts"
 */
export function toOutputFileName(schemaPath: string): string {
  return `${basename(schemaPath, extname(schemaPath))}.ts`;
}

/**
 * Expand an entry's input into absolute schema file paths, sorted
 * @throws Error if nothing matches
 */
export async function resolveSchemaFiles(
  entry: SchemaEntryConfig,
  cwd: string,
): Promise<string[]> {
  const files = await fg(entry.input, { cwd, absolute: true, onlyFiles: true });
  if (files.length === 0) {
    throw new Error(`No schema files match "${entry.input}" for ${entry.name}`);
  }
  return files.sort();
}

/**
 * Main generation orchestrator
 * Compiles every schema file of every configured entry and writes one
 * source file per schema file
 *
 * Output structure:
 *   <output>/<entry-name>/
 *     └── <schema-file-stem>.ts
 */
export async function generateFromConfig(
  options: GenerateOptions,
): Promise<GenerateResult> {
  const { config, cwd = process.cwd(), logger = defaultLogger } = options;
  const outputDir = resolve(cwd, config.output);
  const files: GeneratedFile[] = [];

  for (const entry of config.schemas) {
    const entryDir = join(outputDir, entry.name);
    await mkdir(entryDir, { recursive: true });

    logger.start(`Generating ${entry.name}`);
    for (const input of await resolveSchemaFiles(entry, cwd)) {
      const schemaFile = relative(cwd, input);
      const compiled = await compileSchemaFile(input);
      const result = generate(
        compiled,
        resolveEntryOptions(config, entry, schemaFile),
      );

      for (const warning of result.warnings) {
        logger.warn(warning);
      }

      const output = join(entryDir, toOutputFileName(input));
      await writeFile(output, result.content, "utf-8");
      logger.success(`Generated ${relative(cwd, output)}`);

      files.push({
        schema: entry.name,
        input,
        output,
        declaredTypes: result.declaredTypes,
      });
    }
  }

  if (files.length > 0) {
    logger.box({
      title: "Generation Complete",
      message: `Generated ${files.length} file(s) from ${config.schemas.length} schema entr${config.schemas.length === 1 ? "y" : "ies"}\nOutput directory: ${relative(cwd, outputDir) || "."}`,
    });
  }

  return { files };
}

// =============================================================================
// Schema Files
// =============================================================================

/**
 * Write every named type of a compiled schema to `<fullname>.avsc` in
 * `outDir`, each as a self-contained canonical schema
 * @throws Error if `outDir` is not an existing directory
 */
export async function writeNamedSchemas(
  compiled: CompiledSchema,
  outDir: string,
): Promise<string[]> {
  const info = await stat(outDir).catch(() => undefined);
  if (!info?.isDirectory()) {
    throw new Error(`Output directory ${outDir} does not exist`);
  }

  const written: string[] = [];
  for (const [, node] of compiled.registry.entries()) {
    const path = join(outDir, schemaFileName(node));
    await writeFile(path, `${printSchema(node)}\n`, "utf-8");
    written.push(path);
  }
  return written;
}
