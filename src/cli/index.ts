import { defineCommand, runMain } from "citty";

import { generateCommand } from "./commands/generate";
import { initCommand } from "./commands/init";
import { schemaCommand } from "./commands/schema";

const main = defineCommand({
  meta: {
    name: "wiregen",
    version: "0.1.0",
    description: "Compile data schemas and generate TypeScript types and codecs",
  },
  subCommands: {
    init: initCommand,
    generate: generateCommand,
    schema: schemaCommand,
  },
});

export function run() {
  runMain(main);
}
