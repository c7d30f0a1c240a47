import { writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import { defineCommand } from "citty";
import consola from "consola";

import { compileSchema } from "@/compiler";
import { loadWiregenConfig } from "@/core/config";
import { generateFromConfig } from "@/core/generator";
import { generate, isGeneratorTarget } from "@/generators";
import { errorMessage, readSchemaInput } from "./input";

import type { ArgsDef } from "citty";
import type { GeneratorOptionsInput } from "@/generators";

/**
 * Generator options from single-schema CLI flags
 * @throws Error for an unknown target
 */
export function getGeneratorOptions(args: {
  input: string;
  target?: string;
  namespace?: string;
  "include-prefix"?: string;
  "union-typedef"?: boolean;
  "declarations-only"?: boolean;
}): GeneratorOptionsInput {
  const { target } = args;
  if (target !== undefined && !isGeneratorTarget(target)) {
    throw new Error(`Unknown target "${target}"`);
  }
  return {
    target,
    namespace: args.namespace,
    schemaFile: args.input === "-" ? undefined : args.input,
    includePrefix: args["include-prefix"],
    noUnionTypedef: args["union-typedef"] === false,
    declarationsOnly: args["declarations-only"] || undefined,
  };
}

/**
 * Compile one schema and write the generated code to a file or stdout
 */
async function runSingle(args: Parameters<typeof getGeneratorOptions>[0] & {
  output?: string;
}): Promise<void> {
  const compiled = compileSchema(await readSchemaInput(args.input));
  const result = generate(compiled, getGeneratorOptions(args));

  for (const warning of result.warnings) {
    consola.warn(warning);
  }

  if (args.output) {
    await writeFile(args.output, result.content, "utf-8");
    consola.success(`Generated ${args.output}`);
  } else {
    process.stdout.write(result.content);
  }
}

/**
 * Flags of `wiregen generate`
 */
export const generateArgs = {
  config: {
    type: "string",
    alias: "c",
    description: "Path to config file",
  },
  input: {
    type: "string",
    alias: "i",
    description: "Schema file to compile instead of the config (- for stdin)",
  },
  output: {
    type: "string",
    alias: "o",
    description: "File to write with --input (default: stdout)",
  },
  target: {
    type: "string",
    alias: "t",
    description: "Output target with --input: typescript or zod",
  },
  namespace: {
    type: "string",
    alias: "n",
    description: "Wrap declarations in this namespace",
  },
  "include-prefix": {
    type: "string",
    description: "Module generated codecs import the runtime from",
  },
  "union-typedef": {
    type: "boolean",
    description: "Emit <Record>_<field>_t aliases for union fields (--no-union-typedef to skip)",
    default: true,
  },
  "declarations-only": {
    type: "boolean",
    description: "Emit type declarations without encode/decode functions",
    default: false,
  },
} satisfies ArgsDef;

export const generateCommand = defineCommand({
  meta: {
    name: "generate",
    description:
      "Generate TypeScript from the configured schemas, or from a single schema with --input",
  },
  args: generateArgs,
  async run({ args }) {
    try {
      const { input } = args;
      if (input) {
        await runSingle({ ...args, input });
        return;
      }

      consola.start("Loading configuration...");
      const { config, configPath } = await loadWiregenConfig({
        configPath: args.config,
      });
      consola.info(`Using ${configPath}`);

      await generateFromConfig({
        config,
        cwd: dirname(resolve(configPath)),
      });
    } catch (error) {
      consola.error(errorMessage(error));
      process.exit(1);
    }
  },
});
