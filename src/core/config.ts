import { dirname } from "node:path";

import { loadConfig } from "c12";
import * as z from "zod";

import { ConfigError } from "@/errors";
import {
  generatorTargetSchema,
  primitiveOverridesSchema,
  typeNamingSchema,
} from "@/generators";

import type { GeneratorOptionsInput } from "@/generators";

/**
 * Options for loading the wiregen config
 */
export interface LoadConfigOptions {
  /** Path to the config file */
  configPath?: string;
}

/**
 * Result of loading the wiregen config
 */
export interface LoadConfigResult {
  /** The validated configuration */
  config: WiregenConfig;
  /** The resolved path to the config file */
  configPath: string;
}

// =============================================================================
// Schema Entry Configuration
// =============================================================================

/**
 * Name pattern for schema entries - lowercase alphanumeric with hyphens
 */
const schemaEntryNameSchema = z
  .string()
  .min(1, "Schema name is required")
  .regex(
    /^[a-z][a-z0-9-]*$/,
    "Schema name must be lowercase alphanumeric with hyphens, starting with a letter",
  );

/**
 * One schema (or glob of schemas) to generate code for.
 * Every option left out falls back to the top-level value.
 */
export const schemaEntrySchema = z.object({
  /** Directory name under `output` for this entry's files */
  name: schemaEntryNameSchema,
  /** Path or glob of JSON schema files, relative to the config file */
  input: z.string().min(1, "Schema input is required"),
  target: generatorTargetSchema.optional(),
  /** Wrap generated declarations in this TypeScript namespace */
  namespace: z.string().min(1).optional(),
  unionPrefix: z.string().min(1).optional(),
  includePrefix: z.string().min(1).optional(),
  noUnionTypedef: z.boolean().optional(),
  declarationsOnly: z.boolean().optional(),
  typeNaming: typeNamingSchema.optional(),
  primitives: primitiveOverridesSchema.optional(),
});

export type SchemaEntryConfig = z.infer<typeof schemaEntrySchema>;

// =============================================================================
// Unified Config Schema
// =============================================================================

export const wiregenConfigSchema = z
  .object({
    /** Output directory for generated files */
    output: z.string().default("./src/generated"),
    /** Default target for entries that do not set one */
    target: generatorTargetSchema.default("typescript"),
    /** Default runtime module for generated codecs */
    includePrefix: z.string().min(1).default("wiregen/runtime"),
    schemas: z
      .array(schemaEntrySchema)
      .min(1, "At least one schema must be configured"),
  })
  .refine(
    (config) =>
      new Set(config.schemas.map((s) => s.name)).size === config.schemas.length,
    {
      message: "Schema names must be unique",
      path: ["schemas"],
    },
  );

/**
 * The normalized configuration type used internally (after parsing)
 */
export type WiregenConfig = z.output<typeof wiregenConfigSchema>;

/**
 * Input configuration type (before defaults applied)
 */
export type WiregenConfigInput = z.input<typeof wiregenConfigSchema>;

/**
 * Config schema for validation
 */
export const configSchema = wiregenConfigSchema;

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Helper for defining a typed config
 */
export function defineConfig(config: WiregenConfigInput): WiregenConfigInput {
  return config;
}

/**
 * Validate a config object and apply defaults
 * @throws ConfigError listing every invalid field
 */
export function parseConfig(input: unknown, source = "configuration"): WiregenConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (e) => `${e.path.join(".")}: ${e.message}`,
    );
    throw new ConfigError(
      `Invalid configuration in ${source}:\n${issues.map((i) => `  - ${i}`).join("\n")}`,
      issues,
    );
  }
  return result.data;
}

/**
 * Load and validate the wiregen config file
 */
export async function loadWiregenConfig(
  options: LoadConfigOptions = {},
): Promise<LoadConfigResult> {
  // A config path is resolved from its own directory
  const cwd = options.configPath ? dirname(options.configPath) : undefined;

  const { config, configFile } = await loadConfig<WiregenConfigInput>({
    name: "wiregen",
    cwd,
    configFile: options.configPath,
    rcFile: false,
    globalRc: false,
  });

  if (!config || Object.keys(config).length === 0) {
    throw new ConfigError(
      `No configuration found. Run 'wiregen init' to create a config file, or specify a config file with --config.`,
    );
  }

  const configPath = configFile ?? options.configPath ?? "wiregen.config.ts";
  return {
    config: parseConfig(config, configPath),
    configPath,
  };
}

/**
 * Generator options for one entry, with top-level defaults filled in
 */
export function resolveEntryOptions(
  config: WiregenConfig,
  entry: SchemaEntryConfig,
  schemaFile: string,
): GeneratorOptionsInput {
  return {
    target: entry.target ?? config.target,
    namespace: entry.namespace,
    schemaFile,
    unionPrefix: entry.unionPrefix,
    includePrefix: entry.includePrefix ?? config.includePrefix,
    noUnionTypedef: entry.noUnionTypedef,
    declarationsOnly: entry.declarationsOnly,
    typeNaming: entry.typeNaming,
    primitives: entry.primitives,
  };
}

// =============================================================================
// Default Config Generator
// =============================================================================

/**
 * Answers collected by `wiregen init`
 */
export interface ConfigGenerationOptions {
  name: string;
  input: string;
  target: z.infer<typeof generatorTargetSchema>;
}

/**
 * Generate a config file from init answers
 */
export function generateConfigFromOptions(options: ConfigGenerationOptions): string {
  const targetLine =
    options.target === "typescript"
      ? `\t\t\t// target: "zod",`
      : `\t\t\ttarget: "${options.target}",`;

  return `import { defineConfig } from "wiregen"

export default defineConfig({
\toutput: "./src/generated",
\tschemas: [
\t\t{
\t\t\tname: "${options.name}",
\t\t\tinput: "${options.input}",
${targetLine}
\t\t\t// namespace: "${options.name.replace(/-/g, "_")}",
\t\t},
\t],
})
`;
}

/**
 * Generate a config file content
 */
export function generateDefaultConfig(): string {
  return generateConfigFromOptions({
    name: "schemas",
    input: "./schemas/**/*.avsc",
    target: "typescript",
  });
}
