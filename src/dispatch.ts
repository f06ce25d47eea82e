import { DispatchError } from "./errors.js";
import { ValidatedNode } from "./node.js";
import type { SchemaRegistry } from "./schema.js";
import { didYouMean } from "./suggest.js";
import type { Kwargs, ParseStack, Schema, SchemaLogger } from "./types.js";

export type OperationImpl<K extends Kwargs, R> = (
  schema: Schema,
  node: ValidatedNode,
  stack: ParseStack,
  kwargs: K
) => R;

/**
 * A typed handle on an operation name with its kwargs contract. Handles
 * sharing a name address the same implementations.
 */
export class Operation<K extends Kwargs = Kwargs, R = unknown> {
  constructor(
    readonly name: string,
    readonly requires: readonly (keyof K & string)[]
  ) {}
}

export function defineOperation<K extends Kwargs = Kwargs, R = unknown>(
  name: string,
  options: { requires?: readonly (keyof K & string)[] } = {}
): Operation<K, R> {
  return new Operation<K, R>(name, options.requires ?? []);
}

// Implementations are stored with their kwargs and result types erased.
interface Binding {
  impl: OperationImpl<never, unknown>;
  requires: readonly string[];
}

export interface DispatcherOptions {
  /** Deepest node nesting a dispatch may reach, counting the root as 1. */
  maxDepth?: number;
  logger?: SchemaLogger;
}

/**
 * Flat, schema-keyed dispatch. The dispatcher never recurses by itself;
 * implementations walk into children through `dispatchChild`.
 */
export class Dispatcher {
  private readonly maxDepth?: number;
  private readonly logger: SchemaLogger;
  // schema name -> operation name -> implementation
  private readonly bySchema = new Map<string, Map<string, Binding>>();
  // operation name -> schema names implementing it
  private readonly byOperation = new Map<string, Set<string>>();

  constructor(
    readonly registry: SchemaRegistry,
    options: DispatcherOptions = {}
  ) {
    this.maxDepth = options.maxDepth;
    this.logger = options.logger ?? {};
  }

  /** Registers `impl` for every schema in `schemas`. */
  register<K extends Kwargs, R>(
    op: Operation<K, R>,
    schemas: string | readonly string[],
    impl: OperationImpl<K, R>
  ): this {
    const names = typeof schemas === "string" ? [schemas] : schemas;
    for (const name of names) {
      this.registry.lookup(name);
      if (this.bySchema.get(name)?.has(op.name)) {
        throw new DispatchError(
          "DuplicateOperation",
          `Operation '${op.name}' is already registered for schema '${name}'`
        );
      }
    }
    for (const name of names) {
      const table = this.bySchema.get(name) ?? new Map<string, Binding>();
      table.set(op.name, { impl, requires: op.requires });
      this.bySchema.set(name, table);
      const implementers = this.byOperation.get(op.name) ?? new Set<string>();
      implementers.add(name);
      this.byOperation.set(op.name, implementers);
    }
    return this;
  }

  has<K extends Kwargs, R>(op: Operation<K, R> | string, schema: string): boolean {
    const name = typeof op === "string" ? op : op.name;
    return this.bySchema.get(schema)?.has(name) ?? false;
  }

  /** Operation names, for one schema or across all of them. */
  operations(schema?: string): string[] {
    const names =
      schema === undefined ? this.byOperation.keys() : this.bySchema.get(schema)?.keys() ?? [];
    return Array.from(names).sort();
  }

  dispatch<K extends Kwargs, R>(
    op: Operation<K, R>,
    node: ValidatedNode,
    stack: ParseStack,
    kwargs: K
  ): R {
    const depth = stack.length + 1;
    if (this.maxDepth !== undefined && depth > this.maxDepth) {
      throw new DispatchError(
        "DepthExceeded",
        `Dispatching '${op.name}' reached depth ${depth}, above the maximum of ${this.maxDepth}`
      );
    }

    const schema = this.registry.lookup(node.schema);
    const binding = this.bySchema.get(schema.name)?.get(op.name);
    if (!binding) {
      throw new DispatchError(
        "UnknownOperation",
        `Schema '${schema.name}' has no implementation of '${op.name}'`,
        this.suggestFor(op.name, schema.name)
      );
    }

    const required = new Set<string>([...binding.requires, ...op.requires]);
    const missing = Array.from(required).filter((key) => !(key in kwargs));
    if (missing.length > 0) {
      throw new DispatchError(
        "MissingArgument",
        `Operation '${op.name}' requires the kwargs ${missing.map((k) => `'${k}'`).join(", ")}`
      );
    }

    this.logger.debug?.(`dispatch ${op.name} on ${schema.name} at depth ${depth}`);
    return this.implementation<K, R>(binding)(schema, node, stack, kwargs);
  }

  /** Dispatches on the node held by `field`, with `node` pushed onto the stack. */
  dispatchChild<K extends Kwargs, R>(
    op: Operation<K, R>,
    node: ValidatedNode,
    field: string,
    stack: ParseStack,
    kwargs: K
  ): R {
    const child = node.get(field);
    if (!(child instanceof ValidatedNode)) {
      throw new DispatchError(
        "NotANode",
        `Field '${field}' of schema '${node.schema}' does not hold a node`
      );
    }
    return this.dispatch(op, child, [...stack, node], kwargs);
  }

  // The handle's declared types stand for every implementation of its name.
  private implementation<K extends Kwargs, R>(binding: Binding): OperationImpl<K, R> {
    return binding.impl as OperationImpl<K, R>;
  }

  private suggestFor(operation: string, schema: string): string | undefined {
    const close = didYouMean(operation, this.bySchema.get(schema)?.keys() ?? []);
    if (close) return close;
    const implemented = this.byOperation.get(operation);
    return implemented
      ? `'${operation}' is implemented for: ${Array.from(implemented).sort().join(", ")}.`
      : undefined;
  }
}
