import type {
  ContextGenerator,
  FieldValue,
  JsonValue,
  NodeView,
  ParseStack,
} from "./types.js";

/** The closest ancestor, or undefined at the root. */
export function parentOf(stack: ParseStack): NodeView | undefined {
  return stack[stack.length - 1];
}

/** The closest ancestor validated against `schema`. */
export function nearest(stack: ParseStack, schema: string): NodeView | undefined {
  for (let i = stack.length - 1; i >= 0; i--) {
    const node = stack[i];
    if (node?.schema === schema) return node;
  }
  return undefined;
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  if (typeof value === "object") {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) return false;
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

/**
 * Derives the value from a field of the parent node. Without `map` the
 * parent's value is copied when it is plain JSON; `fallback` is used at the
 * root or when the parent lacks the field.
 */
export function fromParent(
  field: string,
  map?: (value: FieldValue) => JsonValue,
  fallback: JsonValue = null
): ContextGenerator {
  return ({ stack }) => {
    const value = parentOf(stack)?.get(field);
    if (value === undefined) return fallback;
    if (map) return map(value);
    return isJsonValue(value) ? value : fallback;
  };
}

/** Reads a caller-supplied kwarg, falling back when it is absent or not JSON. */
export function fromKwarg(key: string, fallback: JsonValue = null): ContextGenerator {
  return ({ kwargs }) => {
    const value = kwargs[key];
    return value !== undefined && isJsonValue(value) ? value : fallback;
  };
}

/** One more than the parent's `field`; `root` when there is no numeric parent value. */
export function depthFrom(field: string, root = 1): ContextGenerator {
  return ({ stack }) => {
    const parentDepth = parentOf(stack)?.get(field);
    return typeof parentDepth === "number" ? parentDepth + 1 : root;
  };
}
