import type { NodeKind } from "@/ir";

/**
 * Where finished child types go on the enclosing type
 *
 * - "fields" - record fields, paired with the preceding field name
 * - "branches" - union branches
 * - "items" - the array item type
 * - "values" - the map value type
 */
export type ChildMode = "fields" | "branches" | "items" | "values";

/**
 * Structural events produced by a schema reader.
 *
 * Calls must nest strictly: every `startType` is closed by one `stopType`,
 * and attribute calls apply to the innermost open type.
 */
export interface SchemaEventSink {
  startType(): void;
  setKind(kind: NodeKind): void;
  setName(name: string): void;
  setNamespace(namespace: string): void;
  setSize(size: number): void;
  setDoc(doc: string): void;
  addAlias(alias: string): void;
  addSymbol(symbol: string): void;
  addFieldName(name: string): void;
  setFieldDoc(doc: string): void;
  setFieldDefault(value: unknown): void;
  expectFields(): void;
  expectBranches(): void;
  expectItems(): void;
  expectValues(): void;
  addNamedReference(name: string): void;
  stopType(): void;
}
