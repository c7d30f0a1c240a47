/**
 * Schema builder
 *
 * Consumes structural events and produces a single validated root node.
 * Types under construction live on an explicit frame stack; namespaces set
 * on named types live on a side stack and qualify short references made
 * before the type closes.
 */

import {
  InternalSchemaError,
  SchemaErrorCode,
  SchemaReferenceError,
  StructuralError,
} from "@/errors";
import {
  assertValid,
  bindSymbolic,
  describeNode,
  freezeNode,
  ir,
  isNamed,
  isPrimitiveKind,
  joinName,
  NamedTypeRegistry,
  splitName,
} from "@/ir";

import type {
  FieldDetails,
  NamedNode,
  NodeKind,
  SchemaNode,
  SymbolicNode,
} from "@/ir";
import type { ChildMode, SchemaEventSink } from "./events";

/**
 * Result of a successful compilation: the root type and the table of every
 * named type reachable from it
 */
export interface CompiledSchema {
  root: SchemaNode;
  registry: NamedTypeRegistry;
}

/**
 * A type under construction. Attributes are collected as lists so that
 * "present exactly once" can be checked when the frame closes.
 */
interface Frame {
  kind?: NodeKind;
  names: string[];
  namespace?: string;
  /** Namespace from a dotted name; an explicit namespace attribute does not override it */
  namespaceFromName: boolean;
  /** Namespace in effect where the frame was opened */
  inheritedNamespace: string;
  pushedNamespace: boolean;
  sizes: number[];
  symbols: string[];
  fieldNames: string[];
  fieldDetails: FieldDetails[];
  doc?: string;
  aliases: string[];
  mode?: ChildMode;
  children: SchemaNode[];
}

const MODE_KIND: Record<ChildMode, NodeKind> = {
  fields: "record",
  branches: "union",
  items: "array",
  values: "map",
};

const NAMED_FRAME_KINDS: ReadonlySet<NodeKind> = new Set([
  "record",
  "enum",
  "fixed",
]);

export class SchemaBuilder implements SchemaEventSink {
  private readonly stack: Frame[] = [];
  private readonly namespaceStack: string[] = [];
  private readonly registry = new NamedTypeRegistry();
  /** Placeholders waiting for an open named type to close, by qualified name */
  private readonly pending = new Map<string, SymbolicNode[]>();
  private root: SchemaNode | undefined;

  // ==========================================================================
  // Frame lifecycle
  // ==========================================================================

  startType(): void {
    this.stack.push({
      names: [],
      namespaceFromName: false,
      inheritedNamespace: this.currentNamespace(),
      pushedNamespace: false,
      sizes: [],
      symbols: [],
      fieldNames: [],
      fieldDetails: [],
      aliases: [],
      children: [],
    });
  }

  stopType(): void {
    const frame = this.stack.pop();
    if (!frame) {
      throw new InternalSchemaError("stopType called with no open type");
    }
    if (frame.pushedNamespace) {
      this.namespaceStack.pop();
    }

    const node = this.materialize(frame);

    if (isNamed(node)) {
      const fullName = this.registry.define(node);
      const placeholders = this.pending.get(fullName) ?? [];
      for (const placeholder of placeholders) {
        bindSymbolic(placeholder, node);
      }
      this.pending.delete(fullName);
    }

    this.attach(node);
  }

  /**
   * Finish the build
   * @throws when types are still open, no type was built, or a forward
   *   reference was never matched
   */
  finish(): CompiledSchema {
    if (this.stack.length > 0) {
      throw new InternalSchemaError(
        `${this.stack.length} type(s) still open at end of input`,
      );
    }
    const [unbound] = this.pending.keys();
    if (unbound !== undefined) {
      throw new SchemaReferenceError(
        `Reference to "${unbound}" was never resolved`,
        SchemaErrorCode.UNBOUND_REFERENCE,
        unbound,
      );
    }
    if (!this.root) {
      throw new InternalSchemaError("No type was defined");
    }
    return { root: this.root, registry: this.registry };
  }

  // ==========================================================================
  // Attributes
  // ==========================================================================

  setKind(kind: NodeKind): void {
    const frame = this.top("setKind");
    if (frame.kind !== undefined) {
      throw new InternalSchemaError(
        `Type kind already set to "${frame.kind}", cannot change it to "${kind}"`,
      );
    }
    if (kind === "symbolic") {
      throw new InternalSchemaError(
        "Symbolic types are created with addNamedReference",
      );
    }
    if (frame.mode && MODE_KIND[frame.mode] !== kind) {
      throw new InternalSchemaError(
        `A ${kind} cannot take ${frame.mode}`,
      );
    }
    frame.kind = kind;
  }

  setName(name: string): void {
    const frame = this.top("setName");
    if (name.includes(".")) {
      const parts = splitName(name);
      frame.names.push(parts.name);
      this.applyNamespace(frame, parts.namespace);
      frame.namespaceFromName = true;
      return;
    }
    frame.names.push(name);
  }

  setNamespace(namespace: string): void {
    const frame = this.top("setNamespace");
    if (frame.namespaceFromName) {
      return;
    }
    this.applyNamespace(frame, namespace);
  }

  setSize(size: number): void {
    this.top("setSize").sizes.push(size);
  }

  setDoc(doc: string): void {
    this.top("setDoc").doc = doc;
  }

  addAlias(alias: string): void {
    this.top("addAlias").aliases.push(alias);
  }

  addSymbol(symbol: string): void {
    this.top("addSymbol").symbols.push(symbol);
  }

  addFieldName(name: string): void {
    const frame = this.top("addFieldName");
    frame.fieldNames.push(name);
    frame.fieldDetails.push({});
  }

  setFieldDoc(doc: string): void {
    this.lastField("setFieldDoc").doc = doc;
  }

  setFieldDefault(value: unknown): void {
    this.lastField("setFieldDefault").default = value;
  }

  expectFields(): void {
    this.setMode("fields");
  }

  expectBranches(): void {
    this.setMode("branches");
  }

  expectItems(): void {
    this.setMode("items");
  }

  expectValues(): void {
    this.setMode("values");
  }

  // ==========================================================================
  // References
  // ==========================================================================

  /**
   * Attach a reference to a type by name.
   *
   * Primitive names produce the primitive. A name matching an open type
   * produces a placeholder that is bound when that type closes; a name
   * matching a completed type attaches the completed node itself.
   *
   * @throws SchemaReferenceError when no open or completed type matches
   */
  addNamedReference(name: string): void {
    this.top("addNamedReference");

    if (isPrimitiveKind(name)) {
      this.attach(freezeNode(ir.primitive(name)));
      return;
    }

    for (const candidate of this.candidateNames(name)) {
      if (this.isOpen(candidate)) {
        const placeholder = ir.symbolic(candidate);
        const waiting = this.pending.get(candidate);
        if (waiting) {
          waiting.push(placeholder);
        } else {
          this.pending.set(candidate, [placeholder]);
        }
        this.attach(placeholder);
        return;
      }

      const completed = this.registry.lookup(candidate);
      if (completed) {
        this.attach(completed);
        return;
      }
    }

    throw new SchemaReferenceError(
      `Undefined type: ${name}`,
      SchemaErrorCode.UNDEFINED_TYPE,
      name,
    );
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private top(event: string): Frame {
    const frame = this.stack[this.stack.length - 1];
    if (!frame) {
      throw new InternalSchemaError(`${event} called with no open type`);
    }
    return frame;
  }

  private lastField(event: string): FieldDetails {
    const details = this.top(event).fieldDetails;
    const last = details[details.length - 1];
    if (!last) {
      throw new InternalSchemaError(`${event} called before addFieldName`);
    }
    return last;
  }

  private setMode(mode: ChildMode): void {
    const frame = this.top("expect " + mode);
    if (frame.kind !== undefined && MODE_KIND[mode] !== frame.kind) {
      throw new InternalSchemaError(`A ${frame.kind} cannot take ${mode}`);
    }
    frame.mode = mode;
  }

  private currentNamespace(): string {
    return this.namespaceStack[this.namespaceStack.length - 1] ?? "";
  }

  private applyNamespace(frame: Frame, namespace: string): void {
    if (frame.pushedNamespace) {
      this.namespaceStack[this.namespaceStack.length - 1] = namespace;
    } else {
      this.namespaceStack.push(namespace);
      frame.pushedNamespace = true;
    }
    frame.namespace = namespace;
  }

  /** Qualified names a reference may denote, most specific first */
  private candidateNames(name: string): string[] {
    if (name.includes(".")) {
      return [name];
    }
    const namespace = this.currentNamespace();
    return namespace ? [joinName(namespace, name), name] : [name];
  }

  private frameName(frame: Frame): string | undefined {
    const [name] = frame.names;
    if (name === undefined) return undefined;
    return joinName(frame.namespace ?? frame.inheritedNamespace, name);
  }

  private isOpen(fullName: string): boolean {
    return this.stack.some(
      (frame) =>
        (frame.kind === undefined || NAMED_FRAME_KINDS.has(frame.kind)) &&
        this.frameName(frame) === fullName,
    );
  }

  private attach(node: SchemaNode): void {
    const frame = this.stack[this.stack.length - 1];
    if (!frame) {
      if (this.root) {
        throw new InternalSchemaError(
          `A second top-level type (${describeNode(node)}) follows the root`,
        );
      }
      this.root = node;
      return;
    }
    if (!frame.mode) {
      throw new InternalSchemaError(
        `Cannot add ${describeNode(node)} to a ${frame.kind ?? "type"} that expects no children`,
      );
    }
    frame.children.push(node);
  }

  /**
   * Turn a closed frame into a frozen node, checking its invariants
   */
  private materialize(frame: Frame): SchemaNode {
    const { kind } = frame;
    if (kind === undefined) {
      throw new StructuralError(
        `Type "${this.frameName(frame) ?? "<anonymous>"}" has no type`,
        SchemaErrorCode.UNKNOWN_KIND,
      );
    }

    let node: SchemaNode;
    switch (kind) {
      case "record":
      case "enum":
      case "fixed":
        node = this.materializeNamed(frame, kind);
        break;
      case "array":
        node = { kind, children: frame.children };
        break;
      case "map":
        node = { kind, children: [ir.string(), ...frame.children] };
        break;
      case "union":
        node = { kind, children: frame.children };
        break;
      case "symbolic":
        throw new InternalSchemaError(
          "Symbolic types are created with addNamedReference",
        );
      default:
        node = ir.primitive(kind);
        break;
    }

    assertValid(node);
    return freezeNode(node);
  }

  private materializeNamed(
    frame: Frame,
    kind: "record" | "enum" | "fixed",
  ): NamedNode {
    const label = this.frameName(frame) ?? "<anonymous>";
    const [name] = frame.names;
    if (name === undefined || frame.names.length !== 1) {
      throw new StructuralError(
        `A ${kind} needs exactly one name, got ${frame.names.length} (${label})`,
        SchemaErrorCode.MISSING_NAME,
      );
    }

    const base = {
      name,
      namespace: frame.namespace ?? frame.inheritedNamespace,
      doc: frame.doc,
      aliases: frame.aliases.length > 0 ? frame.aliases : undefined,
    };

    if (kind === "record") {
      const hasDetails = frame.fieldDetails.some(
        (d) => d.doc !== undefined || d.default !== undefined,
      );
      return {
        ...base,
        kind,
        children: frame.children,
        fieldNames: frame.fieldNames,
        fieldDetails: hasDetails ? frame.fieldDetails : undefined,
      };
    }

    if (kind === "enum") {
      return { ...base, kind, symbols: frame.symbols };
    }

    const [size] = frame.sizes;
    if (size === undefined || frame.sizes.length !== 1) {
      throw new StructuralError(
        `fixed "${label}" needs exactly one size, got ${frame.sizes.length}`,
        SchemaErrorCode.MISSING_SIZE,
      );
    }
    return { ...base, kind, size };
  }
}
