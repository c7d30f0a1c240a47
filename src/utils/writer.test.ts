import { describe, expect, it } from "vitest";

import {
  createWriter,
  writeBlocks,
  writeDocComment,
  writeHeader,
  writeSectionComment,
} from "./writer";

const RULE = `// ${"=".repeat(76)}`;

describe("writeHeader", () => {
  it("writes the banner with the source file", () => {
    const writer = createWriter();
    writeHeader(writer, { source: "schemas/point.avsc" });
    expect(writer.toString()).toBe(
      "/* eslint-disable */\n" +
        "// This file was generated by wiregen. Do not edit it by hand.\n" +
        "// Source: schemas/point.avsc\n\n",
    );
  });

  it("leaves out the source line without a source", () => {
    const writer = createWriter();
    writeHeader(writer);
    expect(writer.toString()).not.toContain("Source");
  });
});

describe("writeSectionComment", () => {
  it("writes a titled divider", () => {
    const writer = createWriter();
    writeSectionComment(writer, "Types");
    expect(writer.toString()).toBe(`${RULE}\n// Types\n${RULE}\n\n`);
  });
});

describe("writeDocComment", () => {
  it("writes a single line doc on one line", () => {
    const writer = createWriter();
    writeDocComment(writer, "A point");
    expect(writer.toString()).toBe("/** A point */\n");
  });

  it("writes multi-line docs as a block", () => {
    const writer = createWriter();
    writeDocComment(writer, "First line\n\nThird line");
    expect(writer.toString()).toBe("/**\n * First line\n *\n * Third line\n */\n");
  });

  it("escapes comment terminators", () => {
    const writer = createWriter();
    writeDocComment(writer, "ends */ early");
    expect(writer.toString()).toBe("/** ends *\\/ early */\n");
  });

  it("writes nothing for a missing doc", () => {
    const writer = createWriter();
    writeDocComment(writer, undefined);
    writeDocComment(writer, "");
    expect(writer.toString()).toBe("");
  });
});

describe("writeBlocks", () => {
  it("separates blocks with blank lines under a divider", () => {
    const writer = createWriter();
    writeBlocks(writer, "Types", ["type A = 1;", "type B = 2;"]);
    expect(writer.toString()).toBe(
      `${RULE}\n// Types\n${RULE}\n\ntype A = 1;\n\ntype B = 2;\n\n`,
    );
  });

  it("writes nothing for no blocks", () => {
    const writer = createWriter();
    writeBlocks(writer, "Types", []);
    expect(writer.toString()).toBe("");
  });
});
