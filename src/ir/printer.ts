/**
 * Schema printer
 *
 * Converts a compiled IR back into its canonical JSON schema form. A named
 * type is written in full the first time it is reached and by qualified
 * name afterwards, so the output can be compiled again.
 */

import { joinName, qualifiedName } from "./node";

import type { NamedNode, SchemaNode } from "./types";

export type SchemaJson = string | SchemaJson[] | Record<string, unknown>;

export interface PrintOptions {
  /** Indentation for JSON.stringify; 0 produces a single line (default: 2) */
  indent?: number;
}

/**
 * An empty namespace is written only where it differs from the enclosing
 * one, since leaving it out would inherit the enclosing namespace
 */
function namedHeader(node: NamedNode, enclosing: string): Record<string, unknown> {
  const header: Record<string, unknown> = {
    type: node.kind,
    name: node.name,
  };
  if (node.namespace || enclosing) header.namespace = node.namespace;
  if (node.doc !== undefined) header.doc = node.doc;
  if (node.aliases && node.aliases.length > 0) header.aliases = [...node.aliases];
  return header;
}

/**
 * Convert a node to its JSON schema value
 */
export function toSchemaJson(node: SchemaNode): SchemaJson {
  const written = new Set<string>();

  function visit(n: SchemaNode, enclosing: string): SchemaJson {
    switch (n.kind) {
      case "symbolic":
        return n.name;

      case "record":
      case "enum":
      case "fixed": {
        const fullName = qualifiedName(n);
        if (written.has(fullName)) {
          return fullName;
        }
        written.add(fullName);
        const header = namedHeader(n, enclosing);

        if (n.kind === "enum") {
          return { ...header, symbols: [...n.symbols] };
        }
        if (n.kind === "fixed") {
          return { ...header, size: n.size };
        }

        const fields = n.fieldNames.map((name, index) => {
          const field: Record<string, unknown> = { name };
          const details = n.fieldDetails?.[index];
          if (details?.doc !== undefined) field.doc = details.doc;
          const child = n.children[index];
          field.type = child ? visit(child, n.namespace) : null;
          if (details?.default !== undefined) field.default = details.default;
          return field;
        });
        return { ...header, fields };
      }

      case "array": {
        const [items] = n.children;
        return { type: "array", items: items ? visit(items, enclosing) : null };
      }

      case "map": {
        const values = n.children[1];
        return { type: "map", values: values ? visit(values, enclosing) : null };
      }

      case "union":
        return n.children.map((child) => visit(child, enclosing));

      default:
        return n.kind;
    }
  }

  return visit(node, "");
}

/**
 * Print a node as canonical JSON text
 */
export function printSchema(node: SchemaNode, options: PrintOptions = {}): string {
  const { indent = 2 } = options;
  return JSON.stringify(toSchemaJson(node), null, indent || undefined);
}

/**
 * File name used when writing one schema file per named type
 * e.g., namespace "com.acme", name "Point" -> "com.acme.Point.avsc"
 */
export function schemaFileName(node: NamedNode): string {
  return `${joinName(node.namespace, node.name)}.avsc`;
}
