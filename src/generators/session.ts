/**
 * Generator session
 *
 * One session per `generate` call. Walks the schema graph depth-first,
 * declaring every distinct node once, children before parents. A named
 * type reached again while its own declaration is open is written as a
 * forward reference. Blocks that need the whole graph are deferred and
 * flushed once the walk is over.
 */

import { basename } from "node:path";

import { InternalSchemaError } from "@/errors";
import { childrenOf, isNamed, qualifiedName, resolve } from "@/ir";
import {
  canonicalName,
  GENERATED_CODE_GLOBALS,
  toPascalCase,
  toSafeIdentifier,
  toUnionTypeName,
} from "@/utils/naming";

import type { CompiledSchema } from "@/compiler";
import type { NamedNode, NamedTypeRegistry, SchemaNode } from "@/ir";
import type {
  Emitter,
  GeneratorOptions,
  ResolvedNode,
  TypeRef,
} from "./types";

/**
 * Reference to child `index`, as passed to `Emitter.declare`
 */
export function childRef(children: readonly TypeRef[], index: number): TypeRef {
  const ref = children[index];
  if (!ref) {
    throw new InternalSchemaError(`Missing child reference ${index}`);
  }
  return ref;
}

export class GeneratorSession {
  readonly root: SchemaNode;
  readonly registry: NamedTypeRegistry;
  /** Emitted nodes and how to refer to them */
  readonly done = new Map<ResolvedNode, TypeRef>();
  /** Qualified names of types referenced before their declaration finished */
  readonly forwardReferences = new Set<string>();
  /** Name given to an anonymous root, when the target declares one */
  rootName: string | undefined;

  private readonly inProgress = new Set<ResolvedNode>();
  private readonly declarations: string[] = [];
  private readonly deferred: Array<() => string> = [];
  private readonly declaredNames: string[] = [];
  private readonly typeNames = new Map<NamedNode, string>();
  private readonly usedNames = new Set<string>(GENERATED_CODE_GLOBALS);
  private readonly warningSet = new Set<string>();
  private readonly unionPrefix: string | undefined;
  private unionCounter = 0;

  constructor(
    compiled: CompiledSchema,
    readonly options: GeneratorOptions,
    private readonly emitter: Emitter,
  ) {
    this.root = compiled.root;
    this.registry = compiled.registry;
    this.unionPrefix =
      options.unionPrefix ??
      (options.schemaFile
        ? canonicalName(basename(options.schemaFile))
        : undefined);
  }

  // ==========================================================================
  // Graph walk
  // ==========================================================================

  resolve(node: SchemaNode): ResolvedNode {
    return resolve(node, this.registry);
  }

  /**
   * Declare `node` (and everything it reaches) if it has not been declared
   * yet, and return how to refer to it
   */
  emitType(node: SchemaNode): TypeRef {
    const resolved = this.resolve(node);

    const cached = this.done.get(resolved);
    if (cached) {
      return cached;
    }

    if (this.inProgress.has(resolved)) {
      if (!isNamed(resolved)) {
        throw new InternalSchemaError(
          `Cycle through anonymous ${resolved.kind} type`,
        );
      }
      this.forwardReferences.add(qualifiedName(resolved));
      return {
        code: this.emitter.forwardReference(resolved, this),
        forward: true,
      };
    }

    this.inProgress.add(resolved);
    try {
      const children = childrenOf(resolved).map((child) => this.emitType(child));
      const ref = this.emitter.declare(resolved, children, this);
      this.done.set(resolved, ref);
      return ref;
    } finally {
      this.inProgress.delete(resolved);
    }
  }

  /**
   * Walk the whole graph from the root
   */
  run(): void {
    const root = this.resolve(this.root);
    const ref = this.emitType(root);
    if (!isNamed(root) && root.kind !== "union") {
      this.emitter.declareRoot(root, ref, this);
    }
  }

  // ==========================================================================
  // Names
  // ==========================================================================

  /**
   * Output name of a named type, allocated on first request
   */
  typeName(node: NamedNode): string {
    const existing = this.typeNames.get(node);
    if (existing) {
      return existing;
    }

    const preferred = toSafeIdentifier(
      this.options.typeNaming === "pascal" ? toPascalCase(node.name) : node.name,
    );
    const fullName = qualifiedName(node);
    let name = preferred;
    if (this.usedNames.has(preferred)) {
      name = this.uniqueName(toSafeIdentifier(canonicalName(fullName)));
      this.warn(
        `Type "${fullName}" is emitted as "${name}" because "${preferred}" is already taken`,
      );
    }
    this.usedNames.add(name);
    this.typeNames.set(node, name);
    return name;
  }

  /**
   * Name for the next union, counting from 0 in declaration order
   */
  nextUnionName(): string {
    const name = toUnionTypeName(this.unionPrefix, this.unionCounter);
    this.unionCounter += 1;
    return this.uniqueName(name);
  }

  /**
   * Reserve `candidate`, or a numbered variant of it when it is taken
   */
  uniqueName(candidate: string): string {
    let name = candidate;
    for (let n = 2; this.usedNames.has(name); n++) {
      name = `${candidate}_${n}`;
    }
    this.usedNames.add(name);
    return name;
  }

  // ==========================================================================
  // Output blocks
  // ==========================================================================

  /**
   * Append a declaration block; `name` is recorded in `declaredTypes`
   */
  declare(name: string | undefined, block: string): void {
    if (name !== undefined) {
      this.declaredNames.push(name);
    }
    this.declarations.push(block);
  }

  /**
   * Queue a block to be produced after the graph walk
   */
  defer(block: () => string): void {
    this.deferred.push(block);
  }

  /**
   * Produce every deferred block in queue order. Blocks deferred while
   * flushing run in the same pass.
   */
  flushDeferred(): string[] {
    const blocks: string[] = [];
    for (let i = 0; i < this.deferred.length; i++) {
      const produce = this.deferred[i];
      if (produce) blocks.push(produce());
    }
    this.deferred.length = 0;
    return blocks;
  }

  get declarationBlocks(): readonly string[] {
    return this.declarations;
  }

  get declaredTypes(): string[] {
    return [...this.declaredNames];
  }

  // ==========================================================================
  // Warnings
  // ==========================================================================

  warn(message: string): void {
    this.warningSet.add(message);
  }

  get warnings(): string[] {
    return [...this.warningSet];
  }
}
