import type { FieldValue, JsonValue, NodeView } from "./types.js";

export interface SerializeOptions {
  /**
   * `none` keeps every value, `defaulted` leaves out values that came from a
   * default, `compact` leaves out only defaulted values of fields declared
   * with `omitWhenDefault`.
   */
  omit?: "none" | "defaulted" | "compact";
}

/**
 * Writes `key` as an own enumerable property, so that `__proto__` read from
 * JSON input stays a key instead of replacing the prototype.
 */
export function setEntry<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * A schema-conformant, defaulted tree node. Values are kept in declaration
 * order; child nodes are owned exclusively by their parent.
 */
export class ValidatedNode implements NodeView {
  readonly schema: string;
  readonly defaulted: ReadonlySet<string>;
  /** Discriminator written as `type` when the schema belongs to a choice group. */
  readonly choiceType?: string;
  private readonly values: ReadonlyMap<string, FieldValue>;
  private readonly compactable: ReadonlySet<string>;

  constructor(
    schema: string,
    values: Iterable<readonly [string, FieldValue]>,
    defaulted: Iterable<string> = [],
    options: { choiceType?: string; compactable?: Iterable<string> } = {}
  ) {
    this.schema = schema;
    this.values = new Map(values);
    this.defaulted = new Set(defaulted);
    this.choiceType = options.choiceType;
    this.compactable = new Set(options.compactable ?? []);
    Object.freeze(this);
  }

  get(field: string): FieldValue | undefined {
    return this.values.get(field);
  }

  has(field: string): boolean {
    return this.values.has(field);
  }

  isDefaulted(field: string): boolean {
    return this.defaulted.has(field);
  }

  /** The child node stored under `field`, or null when the field holds no node. */
  child(field: string): ValidatedNode | null {
    const value = this.values.get(field);
    return value instanceof ValidatedNode ? value : null;
  }

  keys(): string[] {
    return Array.from(this.values.keys());
  }

  entries(): Array<[string, FieldValue]> {
    return Array.from(this.values.entries());
  }

  /** Plain-object copy of the values, children included, in declaration order. */
  serialize(options: SerializeOptions = {}): Record<string, JsonValue> {
    const omit = options.omit ?? "none";
    const out: Record<string, JsonValue> = {};
    if (this.choiceType !== undefined) out.type = this.choiceType;
    for (const [key, value] of this.values) {
      if (this.defaulted.has(key)) {
        if (omit === "defaulted") continue;
        if (omit === "compact" && this.compactable.has(key)) continue;
      }
      setEntry(out, key, serializeValue(value, options));
    }
    return out;
  }

  toJSON(): Record<string, JsonValue> {
    return this.serialize();
  }
}

export function serializeValue(
  value: FieldValue,
  options: SerializeOptions = {}
): JsonValue {
  if (value instanceof ValidatedNode) return value.serialize(options);
  if (Array.isArray(value)) return value.map((item) => serializeValue(item, options));
  if (typeof value === "object" && value !== null) {
    const out: Record<string, JsonValue> = {};
    for (const [key, child] of Object.entries(value)) {
      setEntry(out, key, serializeValue(child, options));
    }
    return out;
  }
  return value;
}

/** Counts nodes in the subtree rooted at `node`, itself included. */
export function countNodes(node: ValidatedNode): number {
  let total = 1;
  const visit = (value: FieldValue): void => {
    if (value instanceof ValidatedNode) {
      total += countNodes(value);
    } else if (Array.isArray(value)) {
      value.forEach(visit);
    } else if (typeof value === "object" && value !== null) {
      Object.values(value).forEach(visit);
    }
  };
  for (const [, value] of node.entries()) visit(value);
  return total;
}

/**
 * A node under construction. Exposed on the parse stack so context
 * generators of descendants can read the fields resolved so far.
 */
export class NodeDraft implements NodeView {
  readonly schema: string;
  private readonly values = new Map<string, FieldValue>();
  private readonly defaultedFields = new Set<string>();

  constructor(schema: string) {
    this.schema = schema;
  }

  get(field: string): FieldValue | undefined {
    return this.values.get(field);
  }

  has(field: string): boolean {
    return this.values.has(field);
  }

  set(field: string, value: FieldValue, defaulted: boolean): void {
    this.values.set(field, value);
    if (defaulted) this.defaultedFields.add(field);
    else this.defaultedFields.delete(field);
  }

  isDefaulted(field: string): boolean {
    return this.defaultedFields.has(field);
  }

  /** Resolved values of the given fields, in the given order. */
  snapshot(fields: readonly string[]): Record<string, FieldValue> {
    const out: Record<string, FieldValue> = {};
    for (const name of fields) {
      const value = this.values.get(name);
      if (value !== undefined) out[name] = value;
    }
    return out;
  }

  finish(
    order: readonly string[],
    options: { choiceType?: string; compactable?: readonly string[] } = {}
  ): ValidatedNode {
    const ordered: Array<[string, FieldValue]> = [];
    for (const name of order) {
      const value = this.values.get(name);
      if (value !== undefined) ordered.push([name, value]);
    }
    return new ValidatedNode(
      this.schema,
      ordered,
      order.filter((name) => this.defaultedFields.has(name)),
      options
    );
  }
}
