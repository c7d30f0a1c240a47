import { generatorTargetSchema } from "../types";
import { createTypeScriptEmitter } from "./typescript";
import { createZodEmitter } from "./zod";

import type { Emitter, GeneratorTarget } from "../types";

/**
 * Emitter factories by target. Emitters keep per-run state, so every
 * generation run gets a fresh one.
 */
const emitterFactories: Record<GeneratorTarget, () => Emitter> = {
  typescript: createTypeScriptEmitter,
  zod: createZodEmitter,
};

/**
 * All targets `generate` accepts
 */
export const supportedTargets: readonly GeneratorTarget[] =
  generatorTargetSchema.options;

export function isGeneratorTarget(value: string): value is GeneratorTarget {
  return generatorTargetSchema.safeParse(value).success;
}

/**
 * Create an emitter for a target
 * @throws Error if the target is unknown
 */
export function getEmitter(target: GeneratorTarget): Emitter {
  if (!isGeneratorTarget(target)) {
    throw new Error(
      `Unknown generator target "${target}". Available targets: ${supportedTargets.join(", ")}`,
    );
  }
  return emitterFactories[target]();
}

export { createTypeScriptEmitter } from "./typescript";
export { createZodEmitter } from "./zod";
