import CodeBlockWriter from "code-block-writer";

export interface HeaderOptions {
  /** Schema file the output was generated from */
  source?: string;
}

/**
 * Create a writer configured for generated source files
 */
export function createWriter(): CodeBlockWriter {
  return new CodeBlockWriter({
    indentNumberOfSpaces: 2,
    useSingleQuote: false,
    newLine: "\n",
  });
}

/**
 * Write the banner every generated file starts with
 */
export function writeHeader(
  writer: CodeBlockWriter,
  options: HeaderOptions = {},
): void {
  writer.writeLine("/* eslint-disable */");
  writer.writeLine("// This file was generated by wiregen. Do not edit it by hand.");
  if (options.source) {
    writer.writeLine(`// Source: ${options.source}`);
  }
  writer.blankLine();
}

/**
 * Write a section divider
 * e.g., "// ============...\n// Types\n// ============..."
 */
export function writeSectionComment(writer: CodeBlockWriter, title: string): void {
  const rule = `// ${"=".repeat(76)}`;
  writer.writeLine(rule);
  writer.writeLine(`// ${title}`);
  writer.writeLine(rule);
  writer.blankLine();
}

/**
 * Write `doc` as a JSDoc comment; nothing is written for an empty doc
 */
export function writeDocComment(writer: CodeBlockWriter, doc: string | undefined): void {
  if (!doc) return;
  const lines = doc.replace(/\*\//g, "*\\/").split(/\r?\n/);
  if (lines.length === 1) {
    writer.writeLine(`/** ${lines[0]} */`);
    return;
  }
  writer.writeLine("/**");
  for (const line of lines) {
    writer.writeLine(line ? ` * ${line}` : " *");
  }
  writer.writeLine(" */");
}

/**
 * Write blocks under a section comment, separated by blank lines
 */
export function writeBlocks(
  writer: CodeBlockWriter,
  title: string,
  blocks: readonly string[],
): void {
  if (blocks.length === 0) return;
  writeSectionComment(writer, title);
  for (const block of blocks) {
    writer.writeLine(block);
    writer.blankLine();
  }
}
