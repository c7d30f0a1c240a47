import { fileURLToPath } from "node:url";

import { describe, expect, it } from "vitest";

import { SchemaErrorCode, StreamError } from "@/errors";
import { compileSchema, compileSchemaFile, safeCompileSchema } from "./index";

const fixture = (name: string) =>
  fileURLToPath(new URL(`../test/fixtures/${name}`, import.meta.url));

describe("compileSchema", () => {
  it("compiles JSON text", () => {
    const { root } = compileSchema('"bytes"');
    expect(root).toEqual({ kind: "bytes" });
  });

  it("compiles a parsed document", () => {
    const { registry } = compileSchema({
      type: "enum",
      name: "Color",
      symbols: ["RED"],
    });
    expect(registry.names()).toEqual(["Color"]);
  });

  it("gives every call its own registry", () => {
    const schema = { type: "fixed", name: "Hash", size: 4 };
    expect(() => {
      compileSchema(schema);
      compileSchema(schema);
    }).not.toThrow();
  });

  it("keeps an explicit null namespace inside a namespaced type", () => {
    const { registry } = compileSchema({
      type: "record",
      name: "A",
      namespace: "ns",
      fields: [
        {
          name: "b",
          type: {
            type: "record",
            name: "B",
            namespace: "",
            fields: [{ name: "x", type: "int" }],
          },
        },
        {
          name: "c",
          type: {
            type: "record",
            name: "C",
            namespace: "other",
            fields: [{ name: "b", type: "B" }],
          },
        },
      ],
    });
    expect(registry.names()).toEqual(["B", "other.C", "ns.A"]);
    const c = registry.lookup("other.C");
    expect(c?.kind === "record" && c.children[0]).toBe(registry.lookup("B"));
  });

  it("throws schema errors", () => {
    expect(() => compileSchema('["int", "int"]')).toThrow(
      'Invalid union: branches 0 and 1 are both "int"',
    );
  });
});

describe("safeCompileSchema", () => {
  it("returns the compiled schema on success", () => {
    const result = safeCompileSchema('"int"');
    expect(result.success).toBe(true);
  });

  it("returns schema errors instead of throwing", () => {
    const result = safeCompileSchema("{oops");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(SchemaErrorCode.INVALID_JSON);
    }
  });

  it("returns reference errors", () => {
    const result = safeCompileSchema({ type: "array", items: "Missing" });
    if (result.success) throw new Error("Expected failure");
    expect(result.error.kind).toBe("reference");
    expect(result.error.code).toBe(SchemaErrorCode.UNDEFINED_TYPE);
  });
});

describe("compileSchemaFile", () => {
  it("compiles a schema file", async () => {
    const { registry } = await compileSchemaFile(fixture("event.avsc"));
    expect(registry.names()).toEqual([
      "com.example.events.EventId",
      "com.example.events.Kind",
      "com.example.events.Event",
    ]);
  });

  it("keeps docs and namespaces from the file", async () => {
    const { root, registry } = await compileSchemaFile(fixture("point.avsc"));
    expect(registry.names()).toEqual(["geo.Point"]);
    expect(root).toMatchObject({ namespace: "geo", doc: "A point on the plane" });
  });

  it("compiles a recursive schema file", async () => {
    const { root, registry } = await compileSchemaFile(fixture("linked-list.avsc"));
    expect(registry.lookup("Node")).toBe(root);
  });

  it("throws a StreamError for a missing file", async () => {
    const path = fixture("missing.avsc");
    await expect(compileSchemaFile(path)).rejects.toThrow(StreamError);
    await expect(compileSchemaFile(path)).rejects.toThrow(
      `Could not read schema file ${path}`,
    );
  });
});
