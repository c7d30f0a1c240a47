import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";

import { defineCommand } from "citty";
import consola from "consola";

import {
  generateConfigFromOptions,
  generateDefaultConfig,
} from "@/core/config";
import { isGeneratorTarget } from "@/generators";

import type { ConfigGenerationOptions } from "@/core/config";

/**
 * Check if a prompt result is valid (not a symbol from Ctrl+C)
 */
function isValidPromptResult<T>(result: T | symbol): result is T {
  return typeof result !== "symbol";
}

/**
 * Run the interactive configuration prompts
 */
async function runInteractivePrompts(): Promise<ConfigGenerationOptions | null> {
  const target = await consola.prompt("What should be generated?", {
    type: "select",
    options: [
      {
        value: "typescript",
        label: "TypeScript",
        hint: "types and encode/decode functions",
      },
      { value: "zod", label: "Zod", hint: "validation schemas only" },
    ],
    initial: "typescript",
  });

  if (!isValidPromptResult(target) || !isGeneratorTarget(target)) {
    return null;
  }

  const name = await consola.prompt("Schema set name:", {
    type: "text",
    default: "schemas",
    placeholder: "schemas",
  });

  if (!isValidPromptResult(name) || !name) {
    return null;
  }

  // Validate name format
  const nameRegex = /^[a-z][a-z0-9-]*$/;
  if (!nameRegex.test(name)) {
    consola.error(
      "Schema set name must be lowercase alphanumeric with hyphens, starting with a letter.",
    );
    return null;
  }

  const input = await consola.prompt("Schema files glob pattern:", {
    type: "text",
    default: "./schemas/**/*.avsc",
    placeholder: "./schemas/**/*.avsc",
  });

  if (!isValidPromptResult(input) || !input) {
    return null;
  }

  return { name, input, target };
}

export const initCommand = defineCommand({
  meta: {
    name: "init",
    description: "Initialize a wiregen configuration file",
  },
  args: {
    force: {
      type: "boolean",
      alias: "f",
      description: "Overwrite existing config file",
      default: false,
    },
    skip: {
      type: "boolean",
      alias: "s",
      description: "Skip interactive prompts and generate a template config",
      default: false,
    },
  },
  async run({ args }) {
    const configPath = join(process.cwd(), "wiregen.config.ts");

    if (existsSync(configPath) && !args.force) {
      consola.error(
        `Config file already exists at ${configPath}. Use --force to overwrite.`,
      );
      process.exit(1);
    }

    let configContent: string;

    if (args.skip) {
      configContent = generateDefaultConfig();
    } else {
      const options = await runInteractivePrompts();

      if (!options) {
        consola.info("Configuration cancelled.");
        process.exit(0);
      }

      configContent = generateConfigFromOptions(options);
    }

    await writeFile(configPath, configContent, "utf-8");

    consola.success("Created wiregen.config.ts");
    consola.info("Next steps:");
    consola.info("  1. Put your .avsc schema files where the input glob finds them");
    consola.info("  2. Run `wiregen generate` to generate TypeScript code");
  },
});
