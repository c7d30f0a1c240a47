import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { compileSchema } from "@/compiler";
import { createSilentLogger } from "@/utils/logger";
import { parseConfig } from "./config";
import {
  generateFromConfig,
  resolveSchemaFiles,
  toOutputFileName,
  writeNamedSchemas,
} from "./generator";

const pointSchema = JSON.stringify({
  type: "record",
  name: "Point",
  fields: [
    { name: "x", type: "int" },
    { name: "y", type: ["null", "int"] },
  ],
});

const colorSchema = JSON.stringify({
  type: "enum",
  name: "Color",
  symbols: ["RED", "GREEN"],
});

describe("toOutputFileName", () => {
  it("replaces the schema extension with .ts", () => {
    expect(toOutputFileName("schemas/point.avsc")).toBe("point.ts");
    expect(toOutputFileName("/abs/user-event.json")).toBe("user-event.ts");
  });
});

describe("generator", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "wiregen-generate-"));
    await mkdir(join(testDir, "schemas"));
    await writeFile(join(testDir, "schemas", "point.avsc"), pointSchema, "utf-8");
    await writeFile(join(testDir, "schemas", "color.avsc"), colorSchema, "utf-8");
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  // ===========================================================================
  // Schema files
  // ===========================================================================

  describe("resolveSchemaFiles", () => {
    it("expands globs to sorted absolute paths", async () => {
      const files = await resolveSchemaFiles(
        { name: "geo", input: "./schemas/*.avsc" },
        testDir,
      );
      expect(files).toEqual([
        join(testDir, "schemas", "color.avsc"),
        join(testDir, "schemas", "point.avsc"),
      ]);
    });

    it("throws when nothing matches", async () => {
      await expect(
        resolveSchemaFiles({ name: "geo", input: "./missing/*.avsc" }, testDir),
      ).rejects.toThrow('No schema files match "./missing/*.avsc" for geo');
    });
  });

  // ===========================================================================
  // Generation
  // ===========================================================================

  describe("generateFromConfig", () => {
    it("writes one file per schema file under the entry directory", async () => {
      const config = parseConfig({
        output: "./out",
        schemas: [{ name: "geo", input: "./schemas/*.avsc" }],
      });

      const { files } = await generateFromConfig({
        config,
        cwd: testDir,
        logger: createSilentLogger(),
      });

      expect(files.map((file) => file.output)).toEqual([
        join(testDir, "out", "geo", "color.ts"),
        join(testDir, "out", "geo", "point.ts"),
      ]);
      expect(files[1]?.declaredTypes).toEqual([
        "point_avsc_Union__0__",
        "Point_y_t",
        "Point",
      ]);

      const content = await readFile(join(testDir, "out", "geo", "point.ts"), "utf-8");
      expect(content).toContain("// Source: schemas/point.avsc");
      expect(content).toContain("export interface Point {");
    });

    it("applies entry options", async () => {
      const config = parseConfig({
        output: "./out",
        schemas: [
          {
            name: "colors",
            input: "./schemas/color.avsc",
            target: "zod",
            namespace: "palette",
          },
        ],
      });

      await generateFromConfig({ config, cwd: testDir, logger: createSilentLogger() });

      const content = await readFile(
        join(testDir, "out", "colors", "color.ts"),
        "utf-8",
      );
      expect(content).toContain("export namespace palette {");
      expect(content).toContain('export const colorSchema = z.enum(["RED", "GREEN"]);');
    });

    it("logs progress and a summary", async () => {
      const logger = {
        ...createSilentLogger(),
        start: vi.fn(),
        success: vi.fn(),
        box: vi.fn(),
      };
      const config = parseConfig({
        output: "./out",
        schemas: [{ name: "geo", input: "./schemas/point.avsc" }],
      });

      await generateFromConfig({ config, cwd: testDir, logger });

      expect(logger.start).toHaveBeenCalledWith("Generating geo");
      expect(logger.success).toHaveBeenCalledWith(
        `Generated ${join("out", "geo", "point.ts")}`,
      );
      expect(logger.box).toHaveBeenCalledWith({
        title: "Generation Complete",
        message: "Generated 1 file(s) from 1 schema entry\nOutput directory: out",
      });
    });

    it("forwards generator warnings to the logger", async () => {
      const logger = { ...createSilentLogger(), warn: vi.fn() };
      const config = parseConfig({
        output: "./out",
        schemas: [
          {
            name: "geo",
            input: "./schemas/point.avsc",
            primitives: { int: "Int32" },
          },
        ],
      });

      await generateFromConfig({ config, cwd: testDir, logger });

      expect(logger.warn).toHaveBeenCalledWith(
        "Primitive type overrides change declared types only; generated codecs still read and write the runtime's types",
      );
    });

    it("stops at the first schema that fails to compile", async () => {
      await writeFile(join(testDir, "schemas", "broken.avsc"), "{", "utf-8");
      const config = parseConfig({
        output: "./out",
        schemas: [{ name: "geo", input: "./schemas/broken.avsc" }],
      });

      await expect(
        generateFromConfig({ config, cwd: testDir, logger: createSilentLogger() }),
      ).rejects.toThrow("Schema is not valid JSON");
    });
  });

  // ===========================================================================
  // Named schema files
  // ===========================================================================

  describe("writeNamedSchemas", () => {
    it("writes one canonical file per named type", async () => {
      const compiled = compileSchema({
        type: "record",
        name: "Pixel",
        namespace: "gfx",
        fields: [
          { name: "color", type: { type: "enum", name: "Color", symbols: ["RED"] } },
        ],
      });
      const outDir = join(testDir, "named");
      await mkdir(outDir);

      const written = await writeNamedSchemas(compiled, outDir);

      expect(written).toEqual([
        join(outDir, "gfx.Color.avsc"),
        join(outDir, "gfx.Pixel.avsc"),
      ]);
      expect(await readFile(join(outDir, "gfx.Color.avsc"), "utf-8")).toBe(
        '{\n  "type": "enum",\n  "name": "Color",\n  "namespace": "gfx",\n  "symbols": [\n    "RED"\n  ]\n}\n',
      );
    });

    it("throws when the output directory does not exist", async () => {
      const outDir = join(testDir, "absent");
      await expect(
        writeNamedSchemas(compileSchema('"int"'), outDir),
      ).rejects.toThrow(`Output directory ${outDir} does not exist`);
    });
  });
});
