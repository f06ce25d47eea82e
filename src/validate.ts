import { type IssueDraft, previewValue, SchemaError } from "./errors.js";
import type { KindContext } from "./field.kinds.js";
import { NodeDraft, type ValidatedNode } from "./node.js";
import type { SchemaRegistry } from "./schema.js";
import { didYouMean } from "./suggest.js";
import type {
  ErrorMode,
  FieldSpec,
  FieldValue,
  Kwargs,
  ParseStack,
  Schema,
  UnknownFieldPolicy,
  ValidateOptions,
  ValidationErrorKind,
  ValidationIssue,
  ValidationResult,
} from "./types.js";

export const DEFAULT_MAX_DEPTH = 512;

interface RunConfig {
  unknownFields: UnknownFieldPolicy;
  errors: ErrorMode;
  maxDepth: number;
}

interface Pending {
  raw: unknown;
  defaulted: boolean;
}

// Trial runs keep their warnings until the caller accepts their result.
interface WarningSink {
  warn(message: string): void;
  debug(message: string): void;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readKey(record: Record<string, unknown>, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

function mergeKwargs(base: Kwargs, overrides?: Kwargs): Kwargs {
  return overrides ? { ...base, ...overrides } : base;
}

// List items and mapping entries extend the last segment: `a.items[0]`.
function appendLabel(path: readonly string[], label: string): readonly string[] {
  if (label === "") return path;
  const last = path[path.length - 1];
  return last === undefined ? [label] : [...path.slice(0, -1), `${last}${label}`];
}

function quoteList(values: Iterable<string>): string {
  return Array.from(values, (v) => `'${v}'`).join(", ");
}

/**
 * One top-level validation call. Issues accumulate on the run; nodes are
 * built bottom-up and only returned for subtrees that recorded none.
 */
class ValidationRun {
  readonly issues: ValidationIssue[] = [];
  /** Warnings held back by a trial run. */
  readonly heldWarnings: string[] = [];

  constructor(
    private readonly registry: SchemaRegistry,
    private readonly config: RunConfig,
    private readonly trial = false
  ) {}

  private get log(): WarningSink {
    if (this.trial) {
      return { warn: (message) => this.heldWarnings.push(message), debug: () => undefined };
    }
    const { logger } = this.registry;
    return {
      warn: (message) => logger.warn?.(message),
      debug: (message) => logger.debug?.(message),
    };
  }

  get halted(): boolean {
    return this.config.errors === "fail_fast" && this.issues.length > 0;
  }

  /** A run with its own issue list, for trying candidates without reporting. */
  fork(): ValidationRun {
    return new ValidationRun(this.registry, this.config, true);
  }

  /** Takes over the warnings of an accepted trial run. */
  adopt(trial: ValidationRun): void {
    for (const message of trial.heldWarnings) this.log.warn(message);
  }

  private report(
    path: readonly string[],
    kind: ValidationErrorKind,
    message: string,
    suggestion?: string,
    raw?: unknown
  ): void {
    if (this.halted) return;
    const issue: ValidationIssue = { path: [...path], kind, message };
    if (suggestion !== undefined) issue.suggestion = suggestion;
    if (raw !== undefined) issue.received = previewValue(raw);
    this.issues.push(issue);
  }

  private reportDraft(path: readonly string[], draft: IssueDraft, raw: unknown): void {
    this.report(path, draft.kind, draft.message, draft.suggestion, raw);
  }

  node(
    raw: unknown,
    schemaName: string,
    path: readonly string[],
    stack: ParseStack,
    kwargs: Kwargs,
    depth: number
  ): ValidatedNode | undefined {
    if (this.halted) return undefined;
    if (!this.registry.has(schemaName)) {
      this.report(
        path,
        "SchemaNotFound",
        `the schema '${schemaName}' is not registered`,
        didYouMean(
          schemaName,
          this.registry.list().map((s) => s.name)
        )
      );
      return undefined;
    }
    const schema = this.registry.lookup(schemaName);
    if (depth > this.config.maxDepth) {
      this.report(
        path,
        "ConstraintViolation",
        `the tree is nested deeper than the maximum depth of ${this.config.maxDepth}`
      );
      return undefined;
    }

    const missingArgs = (schema.meta.requires ?? []).filter((name) => !(name in kwargs));
    if (missingArgs.length > 0) {
      throw new SchemaError(
        "MissingArgument",
        `Schema '${schema.name}' requires the kwargs ${quoteList(missingArgs)}`
      );
    }

    const record = this.expand(raw, schema, path, stack, kwargs, depth);
    if (record === undefined) return undefined;
    return this.fields(record, schema, path, stack, kwargs, depth);
  }

  // Turns the raw value into the record to validate, applying the shortform.
  private expand(
    raw: unknown,
    schema: Schema,
    path: readonly string[],
    stack: ParseStack,
    kwargs: Kwargs,
    depth: number
  ): Record<string, unknown> | undefined {
    if (isPlainObject(raw)) return raw;
    const shortform = schema.meta.shortform;
    if (!shortform) {
      this.report(
        path,
        "TypeMismatch",
        `the value must be an object matching schema '${schema.name}'`,
        `Provide an object with the fields of '${schema.name}': ${schema.fields
          .map((f) => f.name)
          .join(", ")}.`,
        raw
      );
      return undefined;
    }
    const value = this.value(
      shortform.field,
      raw,
      [...path, `${schema.name}.${shortform.field.name}`],
      stack,
      kwargs,
      depth
    );
    return value === undefined ? undefined : shortform.expand(value);
  }

  private fields(
    record: Record<string, unknown>,
    schema: Schema,
    path: readonly string[],
    stack: ParseStack,
    kwargs: Kwargs,
    depth: number
  ): ValidatedNode | undefined {
    const issuesBefore = this.issues.length;
    const segment = (name: string) => [...path, `${schema.name}.${name}`];
    const { meta } = schema;

    const accepted = new Set<string>([
      ...schema.fields.map((f) => f.name),
      ...(meta.dropFields ?? []),
    ]);
    if (meta.choice) {
      accepted.add("type");
      const type = readKey(record, "type");
      if (type !== undefined && type !== meta.choice.type) {
        this.report(
          segment("type"),
          "ConstraintViolation",
          `the type ${JSON.stringify(type)} does not match schema '${schema.name}'`,
          `Use the type '${meta.choice.type}'.`,
          type
        );
      }
    }
    for (const key of Object.keys(record)) {
      if (accepted.has(key)) continue;
      if (this.config.unknownFields === "strict") {
        this.report(
          segment(key),
          "UnknownField",
          `the field '${key}' is not declared by schema '${schema.name}'`,
          didYouMean(
            key,
            schema.fields.map((f) => f.name)
          ),
          record[key]
        );
      } else {
        this.log.debug(`Ignoring unknown field ${schema.name}.${key}`);
      }
    }

    const draft = new NodeDraft(schema.name);
    const pending = new Map<number, Pending>();
    const supplied = new Set<string>();
    const childStack: ParseStack = [...stack, draft];

    const resolve = (spec: FieldSpec, raw: unknown, defaulted: boolean) => {
      const value = this.value(spec, raw, segment(spec.name), childStack, kwargs, depth);
      if (value !== undefined) draft.set(spec.name, value, defaulted);
    };

    // Explicit primitives and static defaults.
    schema.fields.forEach((spec, index) => {
      if (this.halted) return;
      let entry: Pending;
      const raw = readKey(record, spec.name);
      if (raw !== undefined) {
        supplied.add(spec.name);
        if (spec.deprecated !== undefined) {
          this.log.warn(`${schema.name}.${spec.name} is deprecated: ${spec.deprecated}`);
        }
        entry = { raw, defaulted: false };
      } else if (spec.default?.source === "static") {
        const fallback = spec.default.value;
        entry = { raw: typeof fallback === "function" ? fallback() : fallback, defaulted: true };
      } else {
        return;
      }
      if (entry.raw !== null && this.registry.kinds.isNested(spec.kind)) {
        pending.set(index, entry);
      } else {
        resolve(spec, entry.raw, entry.defaulted);
      }
    });

    // Nested values and context defaults, in declaration order. A generator
    // sees the fields declared before it; children see the generated values
    // of fields declared before them.
    schema.fields.forEach((spec, index) => {
      if (this.halted) return;
      const entry = pending.get(index);
      if (entry) {
        resolve(spec, entry.raw, entry.defaulted);
        return;
      }
      if (supplied.has(spec.name) || spec.default?.source !== "context") return;
      const siblings = draft.snapshot(schema.fields.slice(0, index).map((f) => f.name));
      const generated = spec.default.generate({ stack, siblings, kwargs, field: spec });
      resolve(spec, generated, true);
    });

    for (const spec of schema.fields) {
      if (spec.required && !supplied.has(spec.name) && spec.default === undefined) {
        this.report(
          segment(spec.name),
          "MissingField",
          `the required field '${spec.name}' is missing`,
          spec.help ? `Add '${spec.name}': ${spec.help}` : undefined
        );
      }
    }

    if (this.issues.length > issuesBefore || this.halted) return undefined;

    const order = schema.fields.map((f) => f.name);
    if (meta.validator) {
      const verdict = meta.validator({ values: draft.snapshot(order), stack, kwargs });
      if (verdict !== true) {
        this.report(
          path,
          "ConstraintViolation",
          typeof verdict === "string" ? verdict : `the '${schema.name}' node failed its check`
        );
        return undefined;
      }
    }

    return draft.finish(order, {
      choiceType: meta.choice?.type,
      compactable: schema.fields.filter((f) => f.omitWhenDefault).map((f) => f.name),
    });
  }

  choice(
    raw: unknown,
    group: string,
    path: readonly string[],
    stack: ParseStack,
    kwargs: Kwargs,
    depth: number
  ): ValidatedNode | undefined {
    if (this.halted) return undefined;
    const members = this.registry.choiceMembers(group);
    const types = Array.from(members.keys()).sort();
    const validTypes = `Valid types are: ${quoteList(types)}`;

    const type = isPlainObject(raw) ? readKey(raw, "type") : undefined;
    if (type !== undefined) {
      const target = typeof type === "string" ? members.get(type) : undefined;
      if (target === undefined) {
        this.report(
          path,
          "ConstraintViolation",
          `the type ${JSON.stringify(type)} is not valid for '${group}'. ${validTypes}`,
          typeof type === "string" ? didYouMean(type, types) : undefined,
          type
        );
        return undefined;
      }
      return this.node(raw, target, path, stack, kwargs, depth);
    }

    const candidates = Array.from(members.values());
    const only = candidates.length === 1 ? candidates[0] : undefined;
    if (only !== undefined) return this.node(raw, only, path, stack, kwargs, depth);

    if (isPlainObject(raw) && Object.keys(raw).length === 0) {
      this.report(
        path,
        "ConstraintViolation",
        `the object needs a 'type' field. ${validTypes}`,
        undefined,
        raw
      );
      return undefined;
    }

    // No discriminator: accept the one member the value validates against.
    // Generators of every candidate run; only the accepted one's warnings are logged.
    const matches: Array<{ node: ValidatedNode; trial: ValidationRun }> = [];
    for (const candidate of candidates) {
      const trial = this.fork();
      const node = trial.node(raw, candidate, path, stack, kwargs, depth);
      if (node && trial.issues.length === 0) matches.push({ node, trial });
    }
    const [match] = matches;
    if (match !== undefined && matches.length === 1) {
      this.adopt(match.trial);
      return match.node;
    }
    this.report(
      path,
      "ConstraintViolation",
      matches.length === 0
        ? `the value does not match any '${group}' type. ${validTypes}`
        : `the value matches several '${group}' types: ${quoteList(
            matches.map(({ node }) => node.choiceType ?? node.schema)
          )}`,
      "Add a 'type' field to pick one.",
      raw
    );
    return undefined;
  }

  value(
    spec: FieldSpec,
    raw: unknown,
    path: readonly string[],
    stack: ParseStack,
    kwargs: Kwargs,
    depth: number
  ): FieldValue | undefined {
    if (this.halted) return undefined;
    if (raw === null && !this.registry.kinds.acceptsNull(spec.kind)) {
      if (spec.nullable) return null;
      this.report(
        path,
        "TypeMismatch",
        "the value must not be null",
        spec.default ? "Leave the field out to use its default." : undefined
      );
      return undefined;
    }
    if (raw === undefined) {
      this.report(path, "TypeMismatch", "the value is missing");
      return undefined;
    }

    const result = this.registry.kinds.validate(
      spec.kind,
      spec,
      raw,
      this.context(spec, path, stack, kwargs, depth)
    );
    if (!result.ok) {
      for (const issue of result.issues) this.reportDraft(path, issue, raw);
      return undefined;
    }

    const check = spec.constraints.validator;
    if (check) {
      const verdict = check(result.value);
      if (verdict !== true) {
        this.report(
          path,
          "ConstraintViolation",
          typeof verdict === "string" ? verdict : "the value failed its check",
          undefined,
          raw
        );
        return undefined;
      }
    }
    return result.value;
  }

  private context(
    spec: FieldSpec,
    path: readonly string[],
    stack: ParseStack,
    kwargs: Kwargs,
    depth: number
  ): KindContext {
    const fieldKwargs = mergeKwargs(kwargs, spec.kwargs);
    const run = this;
    return {
      path,
      kwargs: fieldKwargs,
      get halted() {
        return run.halted;
      },
      node: (raw, schema, overrides) =>
        this.node(raw, schema, path, stack, mergeKwargs(fieldKwargs, overrides), depth + 1),
      choice: (raw, group, overrides) =>
        this.choice(raw, group, path, stack, mergeKwargs(fieldKwargs, overrides), depth + 1),
      value: (itemSpec, raw, label) =>
        this.value(itemSpec, raw, appendLabel(path, label), stack, fieldKwargs, depth),
    };
  }
}

/**
 * Validates `raw` against the schema `schemaName`, filling static and
 * context defaults. The result carries a node only when no issue was
 * recorded anywhere in the tree.
 */
export function validate(
  registry: SchemaRegistry,
  raw: unknown,
  schemaName: string,
  options: ValidateOptions = {}
): ValidationResult {
  if (!registry.isFrozen) {
    throw new SchemaError(
      "RegistryOpen",
      "The schema registry must be frozen before validating",
      "Call registry.freeze() once every schema is registered."
    );
  }
  const run = new ValidationRun(registry, {
    unknownFields: options.unknownFields ?? "lenient",
    errors: options.errors ?? "batch",
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
  });
  const stack = options.stack ?? [];
  const node = run.node(raw, schemaName, [], stack, options.kwargs ?? {}, 1);
  if (node && run.issues.length === 0) {
    return { valid: true, value: node, errors: [] };
  }
  return { valid: false, errors: run.issues };
}
