/**
 * JSON schema reader
 *
 * Walks a parsed JSON schema document and replays it as builder events.
 * Strings are type references, arrays are unions and objects carry a
 * "type" attribute.
 */

import { SchemaErrorCode, StreamError, StructuralError } from "@/errors";
import { isPrimitiveKind } from "@/ir";

import type { SchemaEventSink } from "./events";

type JsonObject = { [key: string]: unknown };

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(message: string): StructuralError {
  return new StructuralError(message, SchemaErrorCode.INVALID_SCHEMA);
}

function requireString(obj: JsonObject, key: string, context: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw invalid(`${context}: "${key}" must be a string`);
  }
  return value;
}

function optionalString(
  obj: JsonObject,
  key: string,
  context: string,
): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw invalid(`${context}: "${key}" must be a string`);
  }
  return value;
}

function stringList(obj: JsonObject, key: string, context: string): string[] {
  const value = obj[key];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
    throw invalid(`${context}: "${key}" must be an array of strings`);
  }
  return value;
}

/**
 * Parse schema text as JSON
 * @throws StreamError when the text is not valid JSON
 */
export function parseSchemaText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new StreamError(
      `Schema is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      SchemaErrorCode.INVALID_JSON,
      { cause: error },
    );
  }
}

/**
 * Replay a JSON schema document as events on `sink`
 */
export function readSchema(document: unknown, sink: SchemaEventSink): void {
  // A bare primitive name at the top level has no enclosing type to
  // reference from, so it becomes a type of its own.
  if (typeof document === "string" && isPrimitiveKind(document)) {
    sink.startType();
    sink.setKind(document);
    sink.stopType();
    return;
  }
  if (typeof document === "string") {
    throw invalid(`Top-level type "${document}" refers to an undefined type`);
  }
  visit(document, sink);
}

function visit(value: unknown, sink: SchemaEventSink): void {
  if (typeof value === "string") {
    sink.addNamedReference(value);
    return;
  }

  if (Array.isArray(value)) {
    sink.startType();
    sink.setKind("union");
    sink.expectBranches();
    for (const branch of value) {
      visit(branch, sink);
    }
    sink.stopType();
    return;
  }

  if (!isJsonObject(value)) {
    throw invalid(`Expected a type name, union or object, got ${JSON.stringify(value)}`);
  }

  const type = value.type;

  // {"type": {...}} and {"type": [...]} wrap another type
  if (typeof type !== "string") {
    if (type === undefined) {
      throw invalid(`Type definition is missing "type": ${JSON.stringify(value)}`);
    }
    visit(type, sink);
    return;
  }

  if (isPrimitiveKind(type)) {
    sink.startType();
    sink.setKind(type);
    sink.stopType();
    return;
  }

  switch (type) {
    case "record":
    case "error":
      visitRecord(value, sink);
      return;
    case "enum":
      visitEnum(value, sink);
      return;
    case "fixed":
      visitFixed(value, sink);
      return;
    case "array":
      sink.startType();
      sink.setKind("array");
      sink.expectItems();
      visit(value.items, sink);
      sink.stopType();
      return;
    case "map":
      sink.startType();
      sink.setKind("map");
      sink.expectValues();
      visit(value.values, sink);
      sink.stopType();
      return;
    default:
      // {"type": "com.acme.Point"} references a named type
      sink.addNamedReference(type);
  }
}

function startNamed(
  value: JsonObject,
  kind: "record" | "enum" | "fixed",
  sink: SchemaEventSink,
): string {
  const name = requireString(value, "name", kind);
  const context = `${kind} "${name}"`;

  sink.startType();
  sink.setKind(kind);
  sink.setName(name);
  const namespace = optionalString(value, "namespace", context);
  if (namespace !== undefined) sink.setNamespace(namespace);
  const doc = optionalString(value, "doc", context);
  if (doc !== undefined) sink.setDoc(doc);
  for (const alias of stringList(value, "aliases", context)) {
    sink.addAlias(alias);
  }
  return context;
}

function visitRecord(value: JsonObject, sink: SchemaEventSink): void {
  const context = startNamed(value, "record", sink);
  const fields = value.fields;
  if (!Array.isArray(fields)) {
    throw invalid(`${context}: "fields" must be an array`);
  }

  sink.expectFields();
  for (const field of fields) {
    if (!isJsonObject(field)) {
      throw invalid(`${context}: each field must be an object`);
    }
    const fieldName = requireString(field, "name", `${context} field`);
    const fieldContext = `${context} field "${fieldName}"`;
    sink.addFieldName(fieldName);
    const doc = optionalString(field, "doc", fieldContext);
    if (doc !== undefined) sink.setFieldDoc(doc);
    if (field.default !== undefined) sink.setFieldDefault(field.default);
    if (field.type === undefined) {
      throw invalid(`${fieldContext}: "type" is required`);
    }
    visit(field.type, sink);
  }
  sink.stopType();
}

function visitEnum(value: JsonObject, sink: SchemaEventSink): void {
  const context = startNamed(value, "enum", sink);
  if (!Array.isArray(value.symbols)) {
    throw invalid(`${context}: "symbols" must be an array`);
  }
  for (const symbol of stringList(value, "symbols", context)) {
    sink.addSymbol(symbol);
  }
  sink.stopType();
}

function visitFixed(value: JsonObject, sink: SchemaEventSink): void {
  const context = startNamed(value, "fixed", sink);
  const size = value.size;
  if (size !== undefined) {
    if (typeof size !== "number") {
      throw invalid(`${context}: "size" must be a number`);
    }
    sink.setSize(size);
  }
  sink.stopType();
}
