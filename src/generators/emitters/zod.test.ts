import { describe, expect, it } from "vitest";

import { compileSchema } from "@/compiler";
import { fn, loadGenerated, member } from "@/test/generated";
import { generate } from "../index";

import type { GeneratorOptionsInput } from "../types";

function generateZod(schema: string | object, options: GeneratorOptionsInput = {}) {
  return generate(compileSchema(schema), { target: "zod", ...options });
}

function succeeds(schema: unknown, value: unknown): unknown {
  const result = fn(schema, "safeParse")(value);
  return member(result, "success");
}

const linkedList = {
  type: "record",
  name: "Node",
  fields: [
    { name: "value", type: "int" },
    { name: "next", type: ["null", "Node"] },
  ],
};

describe("zod emitter", () => {
  // ===========================================================================
  // Output
  // ===========================================================================

  describe("output", () => {
    it("writes schemas and inferred types", () => {
      const { content } = generateZod(
        {
          type: "record",
          name: "Point",
          fields: [
            { name: "x", type: "int" },
            { name: "y", type: "double" },
          ],
        },
        { banner: false },
      );
      expect(content.startsWith('import * as z from "zod";\n\n')).toBe(true);
      expect(content).toContain(
        [
          "export const pointSchema = z.object({",
          "  x: z.number().int(),",
          "  y: z.number(),",
          "});",
        ].join("\n"),
      );
      expect(content).toContain("// TypeScript Types (inferred from Zod schemas)");
      expect(content).toContain("export type Point = z.infer<typeof pointSchema>;");
    });

    it("writes recursive references as getters", () => {
      const { content } = generateZod(linkedList);
      expect(content).toContain(
        [
          "export const nodeSchema = z.object({",
          "  value: z.number().int(),",
          "  get next() {",
          "    return z.union([z.null(), nodeSchema]);",
          "  },",
          "});",
        ].join("\n"),
      );
    });

    it("collapses a single-branch union to its branch", () => {
      const { content } = generateZod({
        type: "record",
        name: "Wrapper",
        fields: [{ name: "only", type: ["string"] }],
      });
      expect(content).toContain("  only: z.string(),");
    });

    it("names an anonymous root", () => {
      const { content, declaredTypes } = generateZod({ type: "array", items: "long" });
      expect(content).toContain("export const rootSchema = z.array(z.bigint());");
      expect(content).toContain("export type Root = z.infer<typeof rootSchema>;");
      expect(declaredTypes).toEqual(["Root"]);
    });

    it("never writes codecs", () => {
      const { content } = generateZod(linkedList);
      expect(content).not.toContain("encodeNode");
      expect(content).not.toContain("Encoder");
    });

    it("warns that primitive overrides do not apply", () => {
      const { warnings } = generateZod('"long"', { primitives: { long: "number" } });
      expect(warnings).toEqual([
        "Primitive type overrides do not apply to the zod target",
      ]);
    });
  });

  // ===========================================================================
  // Validation behavior
  // ===========================================================================

  describe("generated schemas", () => {
    it("validate recursive values", () => {
      const mod = loadGenerated(generateZod(linkedList).content);
      const schema = member(mod, "nodeSchema");

      expect(
        succeeds(schema, { value: 1, next: { value: 2, next: null } }),
      ).toBe(true);
      expect(succeeds(schema, { value: 1, next: { value: "2", next: null } })).toBe(
        false,
      );
    });

    it("validate enums, fixed sizes, maps and bytes", () => {
      const mod = loadGenerated(
        generateZod({
          type: "record",
          name: "Packet",
          fields: [
            { name: "kind", type: { type: "enum", name: "Kind", symbols: ["PING", "PONG"] } },
            { name: "id", type: { type: "fixed", name: "PacketId", size: 2 } },
            { name: "headers", type: { type: "map", values: "string" } },
            { name: "body", type: ["null", "bytes"] },
          ],
        }).content,
      );
      const schema = member(mod, "packetSchema");
      const valid = {
        kind: "PING",
        id: new Uint8Array(2),
        headers: { host: "example.test" },
        body: new Uint8Array([1]),
      };

      expect(succeeds(schema, valid)).toBe(true);
      expect(succeeds(schema, { ...valid, kind: "PANG" })).toBe(false);
      expect(succeeds(schema, { ...valid, id: new Uint8Array(3) })).toBe(false);
      expect(succeeds(schema, { ...valid, headers: { host: 1 } })).toBe(false);
      expect(succeeds(schema, { ...valid, body: null })).toBe(true);
    });

    it("validate inside a namespace", () => {
      const mod = loadGenerated(
        generateZod({ type: "fixed", name: "Hash", size: 1 }, { namespace: "wire" }).content,
      );
      const schema = member(member(mod, "wire"), "hashSchema");
      expect(succeeds(schema, new Uint8Array(1))).toBe(true);
    });
  });
});
