/**
 * Code generation entry point
 */

import { ConfigError } from "@/errors";
import { getEmitter } from "./emitters";
import { GeneratorSession } from "./session";
import { generatorOptionsSchema } from "./types";

import type { CompiledSchema } from "@/compiler";
import type {
  GeneratedOutput,
  GeneratorOptions,
  GeneratorOptionsInput,
} from "./types";

/**
 * Validate generator options and apply defaults
 * @throws ConfigError listing every invalid option
 */
export function parseGeneratorOptions(
  input: GeneratorOptionsInput = {},
): GeneratorOptions {
  const result = generatorOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (e) => `${e.path.join(".")}: ${e.message}`,
    );
    throw new ConfigError(
      `Invalid generator options:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
      issues,
    );
  }

  const options = result.data;
  const emitter = getEmitter(options.target);
  if (!emitter.supportsCodecs) {
    if (input.declarationsOnly === false) {
      throw new ConfigError(
        `The ${options.target} target emits declarations only; encode/decode functions are not available`,
      );
    }
    return { ...options, declarationsOnly: true };
  }
  return options;
}

/**
 * Generate source text for a compiled schema
 */
export function generate(
  compiled: CompiledSchema,
  input: GeneratorOptionsInput = {},
): GeneratedOutput {
  const options = parseGeneratorOptions(input);
  const emitter = getEmitter(options.target);
  const session = new GeneratorSession(compiled, options, emitter);

  if (options.primitives && !options.declarationsOnly) {
    session.warn(
      "Primitive type overrides change declared types only; generated codecs still read and write the runtime's types",
    );
  }

  session.run();
  const content = emitter.render(session);

  return {
    content,
    warnings: session.warnings,
    declaredTypes: session.declaredTypes,
  };
}

export { GeneratorSession } from "./session";
export {
  getEmitter,
  isGeneratorTarget,
  supportedTargets,
} from "./emitters";
export {
  generatorOptionsSchema,
  generatorTargetSchema,
  primitiveOverridesSchema,
  typeNamingSchema,
} from "./types";

export type {
  Emitter,
  GeneratedOutput,
  GeneratorOptions,
  GeneratorOptionsInput,
  GeneratorTarget,
  PrimitiveOverrides,
  ResolvedNode,
  TypeNaming,
  TypeRef,
} from "./types";
