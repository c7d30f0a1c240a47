/**
 * Convert a string to PascalCase
 */
export function toPascalCase(str: string): string {
  return str
    .replace(/[-_\s]+(.)?/g, (_, c: string | undefined) =>
      c ? c.toUpperCase() : "",
    )
    .replace(/^(.)/, (c) => c.toUpperCase());
}

/**
 * Convert a string to camelCase
 */
export function toCamelCase(str: string): string {
  const pascal = toPascalCase(str);
  return pascal.charAt(0).toLowerCase() + pascal.slice(1);
}

/**
 * Upper-case the first character and leave the rest alone
 * e.g., "point" -> "Point", "com_acme_Point" -> "Com_acme_Point"
 */
export function capitalize(str: string): string {
  return str.charAt(0).toUpperCase() + str.slice(1);
}

/**
 * Replace every character that cannot appear in an identifier with "_"
 * e.g., "schemas/point.avsc" -> "schemas_point_avsc"
 */
export function canonicalName(str: string): string {
  return str.replace(/[^A-Za-z0-9]/g, "_");
}

// ============================================================================
// Generated Name Utilities
// ============================================================================

/**
 * Name of the n-th union declared in one generation run
 * e.g., ("point_avsc", 0) -> "point_avsc_Union__0__", (undefined, 2) -> "Union__2__"
 */
export function toUnionTypeName(prefix: string | undefined, index: number): string {
  return prefix ? `${prefix}_Union__${index}__` : `Union__${index}__`;
}

/**
 * Alias name for a union-typed record field
 * e.g., ("Node", "next") -> "Node_next_t"
 */
export function toFieldAliasName(recordName: string, fieldName: string): string {
  return `${recordName}_${canonicalName(fieldName)}_t`;
}

/**
 * Convert a type name to a schema variable name
 * e.g., "User" -> "userSchema", "CreateUserRequest" -> "createUserRequestSchema"
 */
export function toSchemaName(typeName: string): string {
  const camelCase = typeName.charAt(0).toLowerCase() + typeName.slice(1);
  return `${camelCase}Schema`;
}

export function toEncoderName(typeName: string): string {
  return `encode${capitalize(typeName)}`;
}

export function toDecoderName(typeName: string): string {
  return `decode${capitalize(typeName)}`;
}

// ============================================================================
// Identifier Utilities
// ============================================================================

const RESERVED_WORDS: ReadonlySet<string> = new Set([
  "any",
  "boolean",
  "break",
  "case",
  "catch",
  "class",
  "const",
  "continue",
  "debugger",
  "default",
  "delete",
  "do",
  "else",
  "enum",
  "export",
  "extends",
  "false",
  "finally",
  "for",
  "function",
  "if",
  "implements",
  "import",
  "in",
  "instanceof",
  "interface",
  "let",
  "never",
  "new",
  "null",
  "number",
  "object",
  "package",
  "private",
  "protected",
  "public",
  "return",
  "static",
  "string",
  "super",
  "switch",
  "symbol",
  "this",
  "throw",
  "true",
  "try",
  "typeof",
  "undefined",
  "unknown",
  "var",
  "void",
  "while",
  "with",
  "yield",
]);

/**
 * Globals and imports generated code refers to; a declared type must not
 * shadow them
 */
export const GENERATED_CODE_GLOBALS: readonly string[] = [
  "Array",
  "BigInt",
  "Boolean",
  "Decoder",
  "Encoder",
  "Error",
  "Number",
  "Object",
  "RangeError",
  "Record",
  "String",
  "Uint8Array",
  "z",
];

/**
 * Check if a property name is a valid JavaScript identifier
 * If not, it needs to be quoted in object literals
 */
export function isValidIdentifier(name: string): boolean {
  return /^[a-zA-Z_$][a-zA-Z0-9_$]*$/.test(name);
}

/**
 * Get a safe property name for use in object literals
 * Quotes the name if it's not a valid identifier
 */
export function getSafePropertyName(name: string): string {
  return isValidIdentifier(name) ? name : JSON.stringify(name);
}

/**
 * Property access expression for `name` on `target`
 * e.g., ("value", "x") -> "value.x", ("value", "x-y") -> 'value["x-y"]'
 */
export function propertyAccess(target: string, name: string): string {
  return isValidIdentifier(name)
    ? `${target}.${name}`
    : `${target}[${JSON.stringify(name)}]`;
}

/**
 * Make a declared type or value name usable as an identifier
 * e.g., "class" -> "class_", "my-type" -> "my_type"
 */
export function toSafeIdentifier(name: string): string {
  const cleaned = isValidIdentifier(name) ? name : canonicalName(name);
  const leading = /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
  return RESERVED_WORDS.has(leading) ? `${leading}_` : leading;
}

/**
 * Dotted namespace with every segment made a valid identifier
 * e.g., "com.acme-corp" -> "com.acme_corp"
 */
export function toNamespacePath(namespace: string): string {
  return namespace.split(".").map(toSafeIdentifier).join(".");
}
