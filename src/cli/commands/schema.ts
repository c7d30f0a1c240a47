import { defineCommand } from "citty";
import consola from "consola";

import { compileSchema } from "@/compiler";
import { writeNamedSchemas } from "@/core/generator";
import { printSchema } from "@/ir";
import { errorMessage, readSchemaInput } from "./input";

export const schemaCommand = defineCommand({
  meta: {
    name: "schema",
    description:
      "Compile a schema and print its canonical JSON, or write one file per named type",
  },
  args: {
    input: {
      type: "positional",
      description: "Schema file (- or omitted for stdin)",
      required: false,
    },
    outDir: {
      type: "positional",
      description: "Existing directory to write <fullname>.avsc files into",
      required: false,
    },
    indent: {
      type: "string",
      description: "Indentation of printed JSON (0 for one line)",
      default: "2",
    },
  },
  async run({ args }) {
    try {
      const input = args.input || "-";
      const compiled = compileSchema(await readSchemaInput(input));

      if (args.outDir) {
        const written = await writeNamedSchemas(compiled, args.outDir);
        consola.success(`Wrote ${written.length} schema file(s) to ${args.outDir}`);
        return;
      }

      const indent = Number.parseInt(args.indent, 10);
      process.stdout.write(
        `${printSchema(compiled.root, { indent: Number.isNaN(indent) ? 2 : indent })}\n`,
      );
    } catch (error) {
      consola.error(errorMessage(error));
      process.exit(1);
    }
  },
});
