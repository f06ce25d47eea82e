import { FieldBuilder } from "./field.builder.js";
import { createDefaultFieldKinds, FieldKindRegistry } from "./field.kinds.js";
import { SchemaError, UnresolvedReferenceError } from "./errors.js";
import { didYouMean } from "./suggest.js";
import type {
  FieldSpec,
  FreezeResult,
  Schema,
  SchemaLogger,
  SchemaMeta,
  UnresolvedReference,
  ValidateOptions,
  ValidationResult,
} from "./types.js";
import { validateSemVer } from "./validation/version.SEMVER2.0.0.js";
import { validate } from "./validate.js";

/** Field builders keyed by field name; key order is declaration order. */
export type SchemaShape = Record<string, FieldBuilder>;

export interface SchemaRegistryOptions {
  /** Kinds available to this registry's schemas. Defaults to the built-ins. */
  kinds?: FieldKindRegistry;
  logger?: SchemaLogger;
}

const defaultLogger: SchemaLogger = {
  warn: (msg) => console.warn(msg),
};

class RegisteredSchema implements Schema {
  private readonly byName: ReadonlyMap<string, FieldSpec>;

  constructor(
    readonly name: string,
    readonly fields: readonly FieldSpec[],
    readonly meta: Readonly<SchemaMeta>
  ) {
    this.byName = new Map(fields.map((spec) => [spec.name, spec]));
    Object.freeze(this.fields);
    Object.freeze(this.meta);
  }

  field(name: string): FieldSpec | undefined {
    return this.byName.get(name);
  }
}

function toFieldSpecs(fields: SchemaShape | readonly FieldSpec[]): FieldSpec[] {
  if (Array.isArray(fields)) return [...fields];
  return Object.entries(fields).map(([name, builder]) => builder.build(name));
}

// Every spec a field carries, including list items and mapping/either variants.
function* walkSpecs(spec: FieldSpec): Generator<FieldSpec> {
  yield spec;
  const { item, key, value, primitive, complex } = spec.constraints;
  for (const nested of [item, key, value, primitive, complex]) {
    if (nested) yield* walkSpecs(nested);
  }
}

/**
 * Process-wide table of schemas with two phases. While open, schemas may
 * be registered and may reference names that do not exist yet. `freeze()`
 * checks every reference at once; after that the registry is read-only.
 */
export class SchemaRegistry {
  readonly kinds: FieldKindRegistry;
  readonly logger: SchemaLogger;
  private readonly schemas = new Map<string, RegisteredSchema>();
  // choice group -> discriminator -> schema name
  private readonly choices = new Map<string, Map<string, string>>();
  private frozen = false;

  constructor(options: SchemaRegistryOptions = {}) {
    this.kinds = options.kinds ?? createDefaultFieldKinds();
    this.logger = options.logger ?? defaultLogger;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  register(
    name: string,
    fields: SchemaShape | readonly FieldSpec[],
    meta: SchemaMeta = {}
  ): Schema {
    if (this.frozen) {
      throw new SchemaError(
        "RegistryFrozen",
        `Cannot register schema '${name}': the registry is frozen`
      );
    }
    if (this.schemas.has(name)) {
      throw new SchemaError("DuplicateSchema", `Schema '${name}' is already registered`);
    }

    const specs = toFieldSpecs(fields);
    const seen = new Set<string>();
    for (const spec of specs) {
      if (seen.has(spec.name)) {
        throw new SchemaError(
          "DuplicateField",
          `Field '${spec.name}' is declared twice in schema '${name}'`
        );
      }
      seen.add(spec.name);
    }

    if (meta.version !== undefined && !validateSemVer(meta.version)) {
      throw new SchemaError(
        "InvalidSchema",
        `Schema '${name}' has an invalid version '${meta.version}'`,
        "Use a semantic version such as '1.0.0'."
      );
    }

    if (meta.choice) {
      const { group, type } = meta.choice;
      const members = this.choices.get(group) ?? new Map<string, string>();
      const existing = members.get(type);
      if (existing !== undefined) {
        throw new SchemaError(
          "InvalidSchema",
          `Choice group '${group}' already has a member of type '${type}' (schema '${existing}')`
        );
      }
      members.set(type, name);
      this.choices.set(group, members);
    }

    const schema = new RegisteredSchema(name, specs, { ...meta });
    this.schemas.set(name, schema);
    this.logger.debug?.(`Registered schema ${name} with ${specs.length} fields`);
    return schema;
  }

  /**
   * Resolves every node target, choice group and field kind. All problems
   * are collected before returning; the registry only freezes when there
   * are none.
   */
  freeze(): FreezeResult {
    if (this.frozen) return { ok: true, unresolved: [] };

    const unresolved: UnresolvedReference[] = [];
    for (const schema of this.schemas.values()) {
      const shortform = schema.meta.shortform ? [schema.meta.shortform.field] : [];
      for (const top of [...schema.fields, ...shortform]) {
        for (const spec of walkSpecs(top)) {
          const ref = { schema: schema.name, field: top.name };
          if (!this.kinds.has(spec.kind)) {
            unresolved.push({ ...ref, kind: "kind", target: spec.kind });
          }
          const { target, choice } = spec.constraints;
          if (spec.kind === "node" && target !== undefined && !this.schemas.has(target)) {
            unresolved.push({ ...ref, kind: "schema", target });
          }
          if (spec.kind === "choice" && choice !== undefined && !this.choices.has(choice)) {
            unresolved.push({ ...ref, kind: "choice", target: choice });
          }
        }
      }
    }

    if (unresolved.length > 0) {
      this.logger.warn?.(
        `Schema registry has ${unresolved.length} unresolved reference(s): ${unresolved
          .map((ref) => ref.target)
          .join(", ")}`
      );
      return { ok: false, unresolved };
    }

    this.frozen = true;
    this.logger.debug?.(`Schema registry frozen with ${this.schemas.size} schemas`);
    return { ok: true, unresolved: [] };
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  lookup(name: string): Schema {
    const schema = this.schemas.get(name);
    if (!schema) {
      throw new SchemaError(
        "SchemaNotFound",
        `Schema '${name}' is not registered`,
        didYouMean(name, this.schemas.keys())
      );
    }
    return schema;
  }

  /** Registered schemas in registration order. */
  list(): Schema[] {
    return Array.from(this.schemas.values());
  }

  hasChoice(group: string): boolean {
    return this.choices.has(group);
  }

  /** Discriminator → schema name for every member of a choice group. */
  choiceMembers(group: string): ReadonlyMap<string, string> {
    return this.choices.get(group) ?? new Map<string, string>();
  }

  choiceGroups(): string[] {
    return Array.from(this.choices.keys());
  }

  validate(raw: unknown, schemaName: string, options: ValidateOptions = {}): ValidationResult {
    return validate(this, raw, schemaName, options);
  }
}

/** Registers all schemas in order and freezes, throwing on the first unresolved batch. */
export function createRegistry(
  define: (registry: SchemaRegistry) => void,
  options: SchemaRegistryOptions = {}
): SchemaRegistry {
  const registry = new SchemaRegistry(options);
  define(registry);
  const result = registry.freeze();
  if (!result.ok) {
    throw new UnresolvedReferenceError(result.unresolved);
  }
  return registry;
}
