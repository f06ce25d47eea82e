import {
  constraintViolation,
  type IssueDraft,
  typeMismatch,
} from "./errors.js";
import { setEntry, type ValidatedNode } from "./node.js";
import { didYouMean, nearestBound } from "./suggest.js";
import type {
  FieldKind,
  FieldSpec,
  FieldValue,
  JsonValue,
  Kwargs,
} from "./types.js";
import {
  validateIdentifier,
  validateRegexPattern,
} from "./validation/index.js";

/** What a kind validator may ask of the running validation. */
export interface KindContext {
  readonly path: readonly string[];
  readonly kwargs: Kwargs;
  /** True once a fail-fast run has recorded its first issue. */
  readonly halted: boolean;
  /** Validates a nested node; its issues are recorded on the run. */
  node(raw: unknown, schema: string, kwargs?: Kwargs): ValidatedNode | undefined;
  /** Validates a nested node picked from a choice group by its `type`. */
  choice(raw: unknown, group: string, kwargs?: Kwargs): ValidatedNode | undefined;
  /**
   * Validates `raw` against another spec (list items, mapping entries,
   * either variants). `label` is appended to the current path segment.
   */
  value(spec: FieldSpec, raw: unknown, label: string): FieldValue | undefined;
}

export type KindResult =
  | { ok: true; value: FieldValue }
  | { ok: false; issues: readonly IssueDraft[] };

export type KindValidator = (
  raw: unknown,
  spec: FieldSpec,
  ctx: KindContext
) => KindResult;

export interface FieldKindDefinition {
  validate: KindValidator;
  /** Values of this kind may contain nodes, so they are validated in the parent's second pass. */
  nested?: boolean;
  /** The kind turns `null` into a value itself, whether or not the field is nullable. */
  acceptsNull?: boolean;
  /** One-line description of what the field accepts, for generated documentation. */
  describe?: (spec: FieldSpec) => string;
}

const ok = (value: FieldValue): KindResult => ({ ok: true, value });
const fail = (...issues: IssueDraft[]): KindResult => ({ ok: false, issues });
// Nested validation already recorded its own issues.
const nestedFailure: KindResult = { ok: false, issues: [] };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function quoteList(values: readonly string[]): string {
  return values.map((v) => `'${v}'`).join(", ");
}

function numericStringHint(raw: unknown): string | undefined {
  if (typeof raw !== "string" || raw.trim() === "") return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed)
    ? `Use the number ${parsed} instead of the string "${raw}".`
    : undefined;
}

function checkRange(value: number, spec: FieldSpec): KindResult {
  const { min, max } = spec.constraints;
  const bound = nearestBound(value, min, max);
  if (bound === undefined) return ok(value);
  const side = value < bound ? "below the minimum" : "above the maximum";
  return fail(
    constraintViolation(
      `the value ${value} is ${side} of ${bound}`,
      `The closest allowed value is ${bound}.`
    )
  );
}

function describeRange(noun: string, spec: FieldSpec): string {
  const { min, max } = spec.constraints;
  if (min !== undefined && max !== undefined) return `${noun} in the range [${min} ; ${max}].`;
  if (min !== undefined) return `${noun} with minimum value ${min}.`;
  if (max !== undefined) return `${noun} with maximum value ${max}.`;
  return `${noun} value.`;
}

function checkLength(
  length: number,
  spec: FieldSpec,
  unit: "character" | "element"
): IssueDraft | undefined {
  const { minLength, maxLength } = spec.constraints;
  const plural = (n: number) => `${n} ${unit}${n === 1 ? "" : "s"}`;
  if (minLength !== undefined && length < minLength) {
    const short = minLength - length;
    return constraintViolation(
      unit === "character"
        ? `the value is below the minimum length of ${plural(minLength)} by ${plural(short)}`
        : `the list must have at least ${plural(minLength)}`,
      `Add at least ${plural(short)}.`
    );
  }
  if (maxLength !== undefined && length > maxLength) {
    const over = length - maxLength;
    return constraintViolation(
      unit === "character"
        ? `the value exceeds the maximum length of ${plural(maxLength)} by ${plural(over)}`
        : `the list must have at most ${plural(maxLength)}`,
      `Remove at least ${plural(over)}.`
    );
  }
  return undefined;
}

function checkString(raw: unknown, spec: FieldSpec): KindResult {
  if (typeof raw !== "string") {
    return fail(
      typeMismatch(
        "the value must be a string",
        typeof raw === "number" || typeof raw === "boolean"
          ? `Use the string "${String(raw)}".`
          : undefined
      )
    );
  }
  const lengthIssue = checkLength(raw.length, spec, "character");
  if (lengthIssue) return fail(lengthIssue);
  const { pattern } = spec.constraints;
  if (pattern && !pattern.test(raw)) {
    return fail(constraintViolation(`the value does not match the pattern ${pattern}`));
  }
  return ok(raw);
}

function toJsonValue(raw: unknown, seen: Set<object>): JsonValue | undefined {
  if (raw === null || typeof raw === "string" || typeof raw === "boolean") return raw;
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : undefined;
  if (typeof raw !== "object") return undefined;
  if (seen.has(raw)) return undefined;
  seen.add(raw);
  try {
    if (Array.isArray(raw)) {
      const out: JsonValue[] = [];
      for (const item of raw) {
        const copy = toJsonValue(item, seen);
        if (copy === undefined) return undefined;
        out.push(copy);
      }
      Object.freeze(out);
      return out;
    }
    const proto: unknown = Object.getPrototypeOf(raw);
    if (proto !== Object.prototype && proto !== null) return undefined;
    const out: Record<string, JsonValue> = {};
    for (const key of Object.keys(raw).sort()) {
      const copy = toJsonValue(Reflect.get(raw, key), seen);
      if (copy === undefined) return undefined;
      setEntry(out, key, copy);
    }
    Object.freeze(out);
    return out;
  } finally {
    seen.delete(raw);
  }
}

function sanitizeIdentifier(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9_$]/g, "_");
  return /^[0-9]/.test(cleaned) || cleaned === "" ? `_${cleaned}` : cleaned;
}

export const builtinFieldKinds: ReadonlyMap<FieldKind, FieldKindDefinition> = new Map<
  FieldKind,
  FieldKindDefinition
>([
  [
    "number",
    {
      validate(raw, spec) {
        if (typeof raw !== "number") {
          return fail(typeMismatch("the value must be a number", numericStringHint(raw)));
        }
        if (!Number.isFinite(raw)) {
          return fail(typeMismatch("the value must be a finite number"));
        }
        return checkRange(raw, spec);
      },
      describe: (spec) => `${describeRange("A number", spec)} Infinity and NaN are invalid.`,
    },
  ],
  [
    "integer",
    {
      validate(raw, spec) {
        if (typeof raw !== "number") {
          return fail(typeMismatch("the value must be an integer", numericStringHint(raw)));
        }
        if (!Number.isInteger(raw)) {
          const rounded = Number.isFinite(raw) ? Math.round(raw) : undefined;
          return fail(
            typeMismatch(
              "the value must be an integer",
              rounded === undefined ? undefined : `The closest integer is ${rounded}.`
            )
          );
        }
        return checkRange(raw, spec);
      },
      describe: (spec) => describeRange("An integer", spec),
    },
  ],
  [
    "string",
    {
      validate: (raw, spec) => checkString(raw, spec),
      describe(spec) {
        const { minLength, maxLength } = spec.constraints;
        if (minLength !== undefined && maxLength !== undefined) {
          return `A string with minimum length ${minLength} and maximum length ${maxLength}.`;
        }
        if (minLength !== undefined) return `A string with minimum length ${minLength}.`;
        if (maxLength !== undefined) return `A string with maximum length ${maxLength}.`;
        return "A string.";
      },
    },
  ],
  [
    "boolean",
    {
      validate(raw) {
        if (typeof raw === "boolean") return ok(raw);
        const hint =
          raw === "true" || raw === "false"
            ? `Use the boolean ${raw} instead of the string "${raw}".`
            : undefined;
        return fail(typeMismatch("the value must be a boolean", hint));
      },
      describe: () => "A boolean value.",
    },
  ],
  [
    "node",
    {
      nested: true,
      validate(raw, spec, ctx) {
        const target = spec.constraints.target;
        if (target === undefined) {
          return fail(typeMismatch("the field has no target schema"));
        }
        const child = ctx.node(raw, target, spec.kwargs);
        return child ? ok(child) : nestedFailure;
      },
      describe: (spec) => `An object: [[${spec.constraints.target ?? "?"}]].`,
    },
  ],
  [
    "choice",
    {
      nested: true,
      validate(raw, spec, ctx) {
        const group = spec.constraints.choice;
        if (group === undefined) {
          return fail(typeMismatch("the field has no choice group"));
        }
        const child = ctx.choice(raw, group, spec.kwargs);
        return child ? ok(child) : nestedFailure;
      },
      describe: (spec) => `One of the [[${spec.constraints.choice ?? "?"}]] objects.`,
    },
  ],
  [
    "list",
    {
      nested: true,
      validate(raw, spec, ctx) {
        if (!Array.isArray(raw)) return fail(typeMismatch("the value must be a list"));
        const lengthIssue = checkLength(raw.length, spec, "element");
        if (lengthIssue) return fail(lengthIssue);
        const item = spec.constraints.item;
        if (!item) return fail(typeMismatch("the list has no item type"));
        const out: FieldValue[] = [];
        let failed = false;
        for (let i = 0; i < raw.length; i++) {
          const value = ctx.value(item, raw[i], `[${i}]`);
          if (value === undefined) failed = true;
          else out.push(value);
          if (ctx.halted) break;
        }
        if (failed) return nestedFailure;
        Object.freeze(out);
        return ok(out);
      },
      describe(spec) {
        const { minLength } = spec.constraints;
        const base = "A list.";
        return minLength ? `${base} It must have at least ${minLength} element${minLength === 1 ? "" : "s"}.` : base;
      },
    },
  ],
  [
    "mapping",
    {
      nested: true,
      validate(raw, spec, ctx) {
        if (!isPlainObject(raw)) return fail(typeMismatch("the value must be an object"));
        const { key: keySpec, value: valueSpec } = spec.constraints;
        if (!keySpec || !valueSpec) {
          return fail(typeMismatch("the mapping has no key or value type"));
        }
        const out: Record<string, FieldValue> = {};
        let failed = false;
        for (const [rawKey, rawValue] of Object.entries(raw)) {
          const label = `[${JSON.stringify(rawKey)}]`;
          const key = ctx.value(keySpec, rawKey, label);
          const value = ctx.value(valueSpec, rawValue, label);
          if (typeof key !== "string" || value === undefined) {
            failed = true;
          } else if (Object.prototype.hasOwnProperty.call(out, key)) {
            return fail(
              constraintViolation(`after normalizing, the key '${key}' occurs more than once`)
            );
          } else {
            setEntry(out, key, value);
          }
          if (ctx.halted) break;
        }
        if (failed) return nestedFailure;
        const keys = Object.keys(out);
        if (keySpec.kind === "integerstring") keys.sort((a, b) => Number(a) - Number(b));
        else keys.sort();
        const sorted: Record<string, FieldValue> = {};
        for (const key of keys) {
          const value = out[key];
          if (value !== undefined) setEntry(sorted, key, value);
        }
        Object.freeze(sorted);
        return ok(sorted);
      },
      describe: () => "A mapping from strings to values.",
    },
  ],
  [
    "either",
    {
      nested: true,
      validate(raw, spec, ctx) {
        const { primitive, complex } = spec.constraints;
        if (!primitive || !complex) {
          return fail(typeMismatch("the field has no primitive or complex variant"));
        }
        const isPrimitive =
          typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean";
        const value = ctx.value(isPrimitive ? primitive : complex, raw, "");
        return value === undefined ? nestedFailure : ok(value);
      },
      describe: () => "Either a primitive value or its complex form.",
    },
  ],
  [
    "selection",
    {
      validate(raw, spec) {
        const options = spec.constraints.options ?? [];
        if (typeof raw !== "string") return fail(typeMismatch("the value must be a string"));
        if (options.includes(raw)) return ok(raw);
        return fail(
          constraintViolation(
            `the value '${raw}' is not valid. Valid values are: ${quoteList(options)}`,
            didYouMean(raw, options)
          )
        );
      },
      describe: (spec) =>
        `One of the following values: ${quoteList(spec.constraints.options ?? [])}`,
    },
  ],
  [
    "multiselection",
    {
      acceptsNull: true,
      validate(raw, spec) {
        const options = spec.constraints.options ?? [];
        const picked = raw === null ? [] : typeof raw === "string" ? [raw] : raw;
        const invalid = () =>
          `the value must be null, one of the following values or a list of them: ${quoteList(
            options
          )}`;
        if (!Array.isArray(picked)) return fail(typeMismatch(invalid()));
        const items: readonly unknown[] = picked;
        for (const item of items) {
          if (typeof item !== "string" || !options.includes(item)) {
            return fail(
              constraintViolation(
                invalid(),
                typeof item === "string" ? didYouMean(item, options) : undefined
              )
            );
          }
        }
        // Duplicates collapse and the options' own order wins.
        const out: FieldValue[] = options.filter((option) => items.includes(option));
        Object.freeze(out);
        return ok(out);
      },
      describe: (spec) =>
        `Null, one of the following values, or a list of any number of them: ${quoteList(
          spec.constraints.options ?? []
        )}`,
    },
  ],
  [
    "json",
    {
      validate(raw) {
        const copy = toJsonValue(raw, new Set());
        return copy === undefined
          ? fail(typeMismatch("the value must be JSON-serializable"))
          : ok(copy);
      },
      describe: () => "An arbitrary JSON-like value.",
    },
  ],
  [
    "identifier",
    {
      validate(raw, spec) {
        const base = checkString(raw, spec);
        if (!base.ok || typeof raw !== "string") return base;
        if (validateIdentifier(raw)) return ok(raw);
        return fail(
          constraintViolation(
            "the value is not a valid variable name",
            `Try '${sanitizeIdentifier(raw)}'.`
          )
        );
      },
      describe: () =>
        "A variable name: letters, digits, '_' and '$', not starting with a digit.",
    },
  ],
  [
    "regex",
    {
      validate(raw, spec) {
        const base = checkString(raw, spec);
        if (!base.ok || typeof raw !== "string") return base;
        return validateRegexPattern(raw)
          ? ok(raw)
          : fail(constraintViolation("the value is not a valid regular expression"));
      },
      describe: () => "A regular expression.",
    },
  ],
  [
    "integerstring",
    {
      validate(raw, spec) {
        const parsed =
          typeof raw === "string" && /^\s*[+-]?\d+\s*$/.test(raw) ? Number(raw) : undefined;
        if (parsed === undefined || !Number.isSafeInteger(parsed)) {
          return fail(
            typeMismatch(
              "the value must be a string that can be parsed into an integer",
              typeof raw === "number" && Number.isInteger(raw)
                ? `Use the string "${raw}".`
                : undefined
            )
          );
        }
        const ranged = checkRange(parsed, spec);
        // Normalized spelling: no padding, sign or leading zeros.
        return ranged.ok ? ok(String(parsed + 0)) : ranged;
      },
      describe: (spec) =>
        `${describeRange("An integer", spec)} It is given as a string, so it can be a mapping key.`,
    },
  ],
]);

/**
 * Catalog of field kinds. Adding a kind means registering a validator under
 * a new tag; registering under an existing tag replaces its behavior.
 */
export class FieldKindRegistry {
  private readonly kinds = new Map<FieldKind, FieldKindDefinition>();

  constructor(
    definitions: Iterable<readonly [FieldKind, FieldKindDefinition]> = builtinFieldKinds
  ) {
    for (const [kind, definition] of definitions) this.kinds.set(kind, definition);
  }

  register(kind: FieldKind, definition: FieldKindDefinition | KindValidator): this {
    this.kinds.set(
      kind,
      typeof definition === "function" ? { validate: definition } : definition
    );
    return this;
  }

  has(kind: FieldKind): boolean {
    return this.kinds.has(kind);
  }

  get(kind: FieldKind): FieldKindDefinition | undefined {
    return this.kinds.get(kind);
  }

  isNested(kind: FieldKind): boolean {
    return this.kinds.get(kind)?.nested === true;
  }

  acceptsNull(kind: FieldKind): boolean {
    return this.kinds.get(kind)?.acceptsNull === true;
  }

  list(): FieldKind[] {
    return Array.from(this.kinds.keys());
  }

  validate(kind: FieldKind, spec: FieldSpec, raw: unknown, ctx: KindContext): KindResult {
    const definition = this.kinds.get(kind);
    if (!definition) {
      return fail(
        typeMismatch(`unknown field kind '${kind}'`, didYouMean(kind, this.kinds.keys()))
      );
    }
    return definition.validate(raw, spec, ctx);
  }

  describe(spec: FieldSpec): string {
    return this.kinds.get(spec.kind)?.describe?.(spec) ?? `A value of kind '${spec.kind}'.`;
  }

  clone(): FieldKindRegistry {
    return new FieldKindRegistry(this.kinds);
  }
}

export function createDefaultFieldKinds(): FieldKindRegistry {
  return new FieldKindRegistry(builtinFieldKinds);
}
