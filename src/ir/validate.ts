/**
 * Structural invariants per node kind
 */

import { SchemaErrorCode, StructuralError } from "@/errors";

import { discriminator, qualifiedName } from "./node";

import type { SchemaErrorCodeType } from "@/errors";
import type { SchemaNode } from "./types";

/**
 * Short human-readable label for a node, used in error messages
 * e.g., `record "com.acme.Point"`, `union`
 */
export function describeNode(node: SchemaNode): string {
  switch (node.kind) {
    case "record":
    case "enum":
    case "fixed":
    case "symbolic":
      return `${node.kind} "${qualifiedName(node) || "<anonymous>"}"`;
    default:
      return node.kind;
  }
}

function issue(
  node: SchemaNode,
  code: SchemaErrorCodeType,
  detail: string,
): StructuralError {
  return new StructuralError(`Invalid ${describeNode(node)}: ${detail}`, code);
}

function firstDuplicate(values: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) return value;
    seen.add(value);
  }
  return undefined;
}

/**
 * Find the first invariant the node breaks, if any.
 * Only the node itself is checked; children were checked when they finished.
 */
export function findValidationIssue(
  node: SchemaNode,
): StructuralError | undefined {
  switch (node.kind) {
    case "record": {
      if (!node.name) {
        return issue(node, SchemaErrorCode.MISSING_NAME, "a name is required");
      }
      if (node.children.length === 0) {
        return issue(
          node,
          SchemaErrorCode.EMPTY_RECORD,
          "a record needs at least one field",
        );
      }
      if (node.children.length !== node.fieldNames.length) {
        return issue(
          node,
          SchemaErrorCode.FIELD_COUNT_MISMATCH,
          `${node.children.length} field types but ${node.fieldNames.length} field names`,
        );
      }
      if (
        node.fieldDetails &&
        node.fieldDetails.length !== node.fieldNames.length
      ) {
        return issue(
          node,
          SchemaErrorCode.FIELD_COUNT_MISMATCH,
          `${node.fieldDetails.length} field details for ${node.fieldNames.length} fields`,
        );
      }
      const duplicate = firstDuplicate(node.fieldNames);
      if (duplicate !== undefined) {
        return issue(
          node,
          SchemaErrorCode.DUPLICATE_FIELD,
          `cannot add duplicate name: ${duplicate}`,
        );
      }
      return undefined;
    }

    case "enum": {
      if (!node.name) {
        return issue(node, SchemaErrorCode.MISSING_NAME, "a name is required");
      }
      if (node.symbols.length === 0) {
        return issue(
          node,
          SchemaErrorCode.EMPTY_ENUM,
          "an enum needs at least one symbol",
        );
      }
      const duplicate = firstDuplicate(node.symbols);
      if (duplicate !== undefined) {
        return issue(
          node,
          SchemaErrorCode.DUPLICATE_SYMBOL,
          `cannot add duplicate name: ${duplicate}`,
        );
      }
      return undefined;
    }

    case "fixed":
      if (!node.name) {
        return issue(node, SchemaErrorCode.MISSING_NAME, "a name is required");
      }
      if (!Number.isInteger(node.size) || node.size < 0) {
        return issue(
          node,
          SchemaErrorCode.INVALID_SIZE,
          `size must be a non-negative integer, got ${node.size}`,
        );
      }
      return undefined;

    case "array":
      if (node.children.length !== 1) {
        return issue(
          node,
          SchemaErrorCode.ARRAY_ARITY,
          `expected exactly one item type, got ${node.children.length}`,
        );
      }
      return undefined;

    case "map": {
      if (node.children.length !== 2) {
        return issue(
          node,
          SchemaErrorCode.MAP_ARITY,
          `expected a key and a value type, got ${node.children.length} types`,
        );
      }
      const key = node.children[0];
      if (key?.kind !== "string") {
        return issue(
          node,
          SchemaErrorCode.MAP_KEY,
          `map keys must be strings, got ${key?.kind}`,
        );
      }
      return undefined;
    }

    case "union": {
      if (node.children.length === 0) {
        return issue(
          node,
          SchemaErrorCode.EMPTY_UNION,
          "a union needs at least one branch",
        );
      }
      const seen = new Map<string, number>();
      for (const [index, branch] of node.children.entries()) {
        if (branch.kind === "union") {
          return issue(
            node,
            SchemaErrorCode.NESTED_UNION,
            `branch ${index} is itself a union`,
          );
        }
        const key = discriminator(branch);
        const previous = seen.get(key);
        if (previous !== undefined) {
          return issue(
            node,
            SchemaErrorCode.DUPLICATE_BRANCH,
            `branches ${previous} and ${index} are both "${key}"`,
          );
        }
        seen.set(key, index);
      }
      return undefined;
    }

    case "symbolic":
      if (!node.name) {
        return issue(node, SchemaErrorCode.MISSING_NAME, "a name is required");
      }
      return undefined;

    default:
      return undefined;
  }
}

/**
 * Check the node's structural invariants
 */
export function isValid(node: SchemaNode): boolean {
  return findValidationIssue(node) === undefined;
}

/**
 * Check the node's structural invariants, failing fast
 * @throws StructuralError describing the first broken invariant
 */
export function assertValid(node: SchemaNode): void {
  const error = findValidationIssue(node);
  if (error) {
    throw error;
  }
}
