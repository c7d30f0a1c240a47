// Public API for wiregen

// =============================================================================
// Config Helpers
// =============================================================================

export { defineConfig } from "./core/config";

// =============================================================================
// Compilation
// =============================================================================

export {
  compileSchema,
  compileSchemaFile,
  parseSchemaText,
  readSchema,
  safeCompileSchema,
  SchemaBuilder,
} from "./compiler";

// =============================================================================
// Code Generation
// =============================================================================

export {
  generate,
  GeneratorSession,
  getEmitter,
  parseGeneratorOptions,
  supportedTargets,
} from "./generators";
export { generateFromConfig, writeNamedSchemas } from "./core/generator";

// =============================================================================
// Schema Model
// =============================================================================

export {
  assertValid,
  discriminator,
  ir,
  isValid,
  NamedTypeRegistry,
  printSchema,
  qualifiedName,
  resolve,
  toSchemaJson,
} from "./ir";

// =============================================================================
// Errors
// =============================================================================

export {
  ConfigError,
  InternalSchemaError,
  isSchemaError,
  SchemaError,
  SchemaErrorCode,
  SchemaReferenceError,
  StreamError,
  StructuralError,
} from "./errors";

// =============================================================================
// Config Loading (for advanced usage)
// =============================================================================

export { configSchema, loadWiregenConfig } from "./core/config";

// =============================================================================
// Logger Utilities (for custom integrations)
// =============================================================================

export {
  createConsolaLogger,
  createPrefixedLogger,
  createSilentLogger,
} from "./utils/logger";

// =============================================================================
// Types
// =============================================================================

export type {
  CompiledSchema,
  SafeCompileResult,
  SchemaEventSink,
} from "./compiler";
export type {
  LoadConfigOptions,
  LoadConfigResult,
  SchemaEntryConfig,
  WiregenConfig,
  WiregenConfigInput,
} from "./core/config";
export type { GenerateOptions, GenerateResult, GeneratedFile } from "./core/generator";
export type {
  Emitter,
  GeneratedOutput,
  GeneratorOptions,
  GeneratorOptionsInput,
  GeneratorTarget,
  TypeRef,
} from "./generators";
export type { SchemaJson, SchemaNode } from "./ir";
export type { Decoder, Encoder } from "./runtime";
export type { WiregenLogger } from "./utils/logger";
