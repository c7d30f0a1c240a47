import { describe, expect, it } from "vitest";

import {
  InternalSchemaError,
  SchemaErrorCode,
  SchemaReferenceError,
  StructuralError,
} from "@/errors";
import { resolve } from "@/ir";
import { SchemaBuilder } from "./builder";

import type { RecordNode, SchemaNode } from "@/ir";

function expectRecord(node: SchemaNode): RecordNode {
  if (node.kind !== "record") {
    throw new Error(`Expected a record, got ${node.kind}`);
  }
  return node;
}

function buildPoint(builder: SchemaBuilder): void {
  builder.startType();
  builder.setKind("record");
  builder.setName("Point");
  builder.expectFields();
  builder.addFieldName("x");
  builder.addNamedReference("int");
  builder.addFieldName("y");
  builder.addNamedReference("int");
  builder.stopType();
}

function thrownBy(action: () => void): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error("Expected an error");
}

describe("SchemaBuilder", () => {
  // ===========================================================================
  // Building types
  // ===========================================================================

  describe("building types", () => {
    it("builds a primitive root", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("int");
      builder.stopType();

      const { root, registry } = builder.finish();
      expect(root).toEqual({ kind: "int" });
      expect(registry.size).toBe(0);
    });

    it("builds a record and registers it", () => {
      const builder = new SchemaBuilder();
      buildPoint(builder);

      const { root, registry } = builder.finish();
      const record = expectRecord(root);
      expect(record.fieldNames).toEqual(["x", "y"]);
      expect(record.children).toEqual([{ kind: "int" }, { kind: "int" }]);
      expect(registry.names()).toEqual(["Point"]);
      expect(registry.lookup("Point")).toBe(root);
    });

    it("freezes finished types", () => {
      const builder = new SchemaBuilder();
      buildPoint(builder);
      const record = expectRecord(builder.finish().root);
      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(record.fieldNames)).toBe(true);
    });

    it("keys maps by string", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("map");
      builder.expectValues();
      builder.addNamedReference("long");
      builder.stopType();

      expect(builder.finish().root).toEqual({
        kind: "map",
        children: [{ kind: "string" }, { kind: "long" }],
      });
    });

    it("records field docs and defaults on the last field", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("record");
      builder.setName("Counter");
      builder.expectFields();
      builder.addFieldName("count");
      builder.setFieldDoc("How many");
      builder.setFieldDefault(0);
      builder.addNamedReference("int");
      builder.addFieldName("label");
      builder.addNamedReference("string");
      builder.stopType();

      const record = expectRecord(builder.finish().root);
      expect(record.fieldDetails).toEqual([{ doc: "How many", default: 0 }, {}]);
    });
  });

  // ===========================================================================
  // Names and namespaces
  // ===========================================================================

  describe("names and namespaces", () => {
    it("takes the namespace from a dotted name over an explicit one", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("fixed");
      builder.setName("com.acme.Hash");
      builder.setNamespace("other");
      builder.setSize(4);
      builder.stopType();

      expect(builder.finish().registry.names()).toEqual(["com.acme.Hash"]);
    });

    it("passes a namespace down to nested named types", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("record");
      builder.setName("Outer");
      builder.setNamespace("com.acme");
      builder.expectFields();
      builder.addFieldName("hash");
      builder.startType();
      builder.setKind("fixed");
      builder.setName("Hash");
      builder.setSize(4);
      builder.stopType();
      builder.addFieldName("copy");
      builder.addNamedReference("Hash");
      builder.stopType();

      const { root, registry } = builder.finish();
      expect(registry.names()).toEqual(["com.acme.Hash", "com.acme.Outer"]);
      const record = expectRecord(root);
      expect(record.children[1]).toBe(registry.lookup("com.acme.Hash"));
    });

    it("falls back to the null namespace for short references", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("union");
      builder.expectBranches();
      builder.startType();
      builder.setKind("enum");
      builder.setName("Color");
      builder.addSymbol("RED");
      builder.stopType();
      builder.startType();
      builder.setKind("record");
      builder.setName("Paint");
      builder.setNamespace("art");
      builder.expectFields();
      builder.addFieldName("color");
      builder.addNamedReference("Color");
      builder.stopType();
      builder.stopType();

      const { registry } = builder.finish();
      const paint = registry.lookup("art.Paint");
      expect(paint && expectRecord(paint).children[0]).toBe(registry.lookup("Color"));
    });
  });

  // ===========================================================================
  // References
  // ===========================================================================

  describe("references", () => {
    it("binds a reference to an open type when that type closes", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("record");
      builder.setName("Node");
      builder.expectFields();
      builder.addFieldName("next");
      builder.startType();
      builder.setKind("union");
      builder.expectBranches();
      builder.addNamedReference("null");
      builder.addNamedReference("Node");
      builder.stopType();
      builder.stopType();

      const { root, registry } = builder.finish();
      const union = expectRecord(root).children[0];
      if (union?.kind !== "union") throw new Error("Expected a union");
      const placeholder = union.children[1];
      expect(placeholder).toEqual({ kind: "symbolic", name: "Node", target: "Node" });
      expect(placeholder && resolve(placeholder, registry)).toBe(root);
    });

    it("binds references between mutually recursive types", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("record");
      builder.setName("A");
      builder.expectFields();
      builder.addFieldName("b");
      builder.startType();
      builder.setKind("union");
      builder.expectBranches();
      builder.addNamedReference("null");
      builder.startType();
      builder.setKind("record");
      builder.setName("B");
      builder.expectFields();
      builder.addFieldName("a");
      builder.startType();
      builder.setKind("union");
      builder.expectBranches();
      builder.addNamedReference("null");
      builder.addNamedReference("A");
      builder.stopType();
      builder.stopType();
      builder.stopType();
      builder.stopType();

      const { root, registry } = builder.finish();
      expect(registry.names()).toEqual(["B", "A"]);

      const outer = expectRecord(root).children[0];
      if (outer?.kind !== "union") throw new Error("Expected a union");
      const b = outer.children[1];
      expect(b).toBe(registry.lookup("B"));

      const inner = b && expectRecord(b).children[0];
      if (inner?.kind !== "union") throw new Error("Expected a union");
      const back = inner.children[1];
      expect(back).toEqual({ kind: "symbolic", name: "A", target: "A" });
      expect(back && resolve(back, registry)).toBe(root);
    });

    it("rejects a union naming the same open type twice", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("record");
      builder.setName("A");
      builder.expectFields();
      builder.addFieldName("u");
      builder.startType();
      builder.setKind("union");
      builder.expectBranches();
      builder.addNamedReference("A");
      builder.addNamedReference("A");

      expect(thrownBy(() => builder.stopType())).toMatchObject({
        code: SchemaErrorCode.DUPLICATE_BRANCH,
      });
    });

    it("rejects a union naming the same finished type twice", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("record");
      builder.setName("R");
      builder.expectFields();
      builder.addFieldName("hash");
      builder.startType();
      builder.setKind("fixed");
      builder.setName("Hash");
      builder.setSize(4);
      builder.stopType();
      builder.addFieldName("u");
      builder.startType();
      builder.setKind("union");
      builder.expectBranches();
      builder.addNamedReference("Hash");
      builder.addNamedReference("Hash");

      const error = thrownBy(() => builder.stopType());
      expect(error).toBeInstanceOf(StructuralError);
      expect(error).toMatchObject({ code: SchemaErrorCode.DUPLICATE_BRANCH });
    });

    it("throws for an undefined name", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("array");
      builder.expectItems();

      expect(() => builder.addNamedReference("Missing")).toThrow(SchemaReferenceError);
      expect(() => builder.addNamedReference("Missing")).toThrow(
        "Undefined type: Missing",
      );
    });

    it("reports a reference that no closed type matched", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("record");
      builder.setName("A");
      builder.expectFields();
      builder.addFieldName("self");
      builder.addNamedReference("A");
      // the type closes under another name, leaving the reference to "A" unbound
      builder.setNamespace("ns");
      builder.stopType();

      expect(() => builder.finish()).toThrow('Reference to "A" was never resolved');
    });
  });

  // ===========================================================================
  // Errors
  // ===========================================================================

  describe("errors", () => {
    it("rejects a type that breaks its invariants", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("enum");
      builder.setName("Color");
      builder.addSymbol("RED");
      builder.addSymbol("RED");

      expect(() => builder.stopType()).toThrow(StructuralError);
    });

    it("rejects a fixed type without a size", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("fixed");
      builder.setName("Hash");

      expect(() => builder.stopType()).toThrow(
        'fixed "Hash" needs exactly one size, got 0',
      );
    });

    it("rejects a type that never got a kind", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setName("Mystery");

      try {
        builder.stopType();
      } catch (error) {
        expect(error).toMatchObject({
          code: SchemaErrorCode.UNKNOWN_KIND,
          message: 'Type "Mystery" has no type',
        });
        return;
      }
      throw new Error("Expected an error");
    });

    it("rejects changing the kind of a type", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("int");
      expect(() => builder.setKind("long")).toThrow(
        'Type kind already set to "int", cannot change it to "long"',
      );
    });

    it("rejects children on a type that takes none", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("record");
      builder.setName("R");
      expect(() => builder.addNamedReference("int")).toThrow(
        "Cannot add int to a record that expects no children",
      );
    });

    it("rejects field details before a field name", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("record");
      expect(() => builder.setFieldDoc("orphan")).toThrow(InternalSchemaError);
    });

    it("rejects events with no open type", () => {
      expect(() => new SchemaBuilder().stopType()).toThrow(
        "stopType called with no open type",
      );
      expect(() => new SchemaBuilder().setName("X")).toThrow(
        "setName called with no open type",
      );
    });

    it("rejects finishing with open types or nothing built", () => {
      const open = new SchemaBuilder();
      open.startType();
      expect(() => open.finish()).toThrow("1 type(s) still open at end of input");

      expect(() => new SchemaBuilder().finish()).toThrow("No type was defined");
    });

    it("rejects a second top-level type", () => {
      const builder = new SchemaBuilder();
      builder.startType();
      builder.setKind("int");
      builder.stopType();
      builder.startType();
      builder.setKind("string");
      expect(() => builder.stopType()).toThrow(
        "A second top-level type (string) follows the root",
      );
    });
  });
});
