// tests/test-utils.ts
import { expect } from "vitest";
import { field } from "../src/field.js";
import type { ValidatedNode } from "../src/node.js";
import { createRegistry, type SchemaRegistry } from "../src/schema.js";
import type { JsonValue, SchemaLogger, ValidationIssue, ValidationResult } from "../src/types.js";

/** Logger that keeps every message, for asserting on warnings. */
export function recordingLogger(): SchemaLogger & { warnings: string[]; debugs: string[] } {
  const warnings: string[] = [];
  const debugs: string[] = [];
  return {
    warnings,
    debugs,
    warn: (msg) => warnings.push(msg),
    debug: (msg) => debugs.push(msg),
  };
}

/** The `node` schema: a value, a label and an optional link to the next node. */
export function linkedListRegistry(logger: SchemaLogger = recordingLogger()): SchemaRegistry {
  return createRegistry(
    (registry) => {
      registry.register("node", {
        field_1: field.number().default(0),
        field_2: field.string(),
        field_3: field.node("node").nullable().default(null),
      });
    },
    { logger }
  );
}

export function expectValid(result: ValidationResult): ValidatedNode {
  if (!result.valid) {
    console.error("Validation failed with errors:", result.errors);
    throw new Error("expected a valid result");
  }
  expect(result.errors).toEqual([]);
  return result.value;
}

export function expectInvalid(result: ValidationResult): readonly ValidationIssue[] {
  expect(result.valid).toBe(false);
  expect(result.value).toBeUndefined();
  return result.errors;
}

/** Runs `fn` and returns what it threw. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}

/**
 * Arithmetic expressions: `literal` (with a bare-number shortform), `sum` and
 * `negate` form the `expression` choice group; `program` holds one.
 */
export function expressionRegistry(): SchemaRegistry {
  return createRegistry((r) => {
    r.register(
      "literal",
      { value: field.number() },
      {
        choice: { group: "expression", type: "literal" },
        shortform: {
          field: field.number().build("value"),
          expand: (v): Record<string, JsonValue> => (typeof v === "number" ? { value: v } : {}),
        },
      }
    );
    r.register(
      "sum",
      { left: field.choice("expression"), right: field.choice("expression") },
      { choice: { group: "expression", type: "sum" } }
    );
    r.register(
      "negate",
      { operand: field.choice("expression") },
      { choice: { group: "expression", type: "negate" } }
    );
    r.register("program", { body: field.choice("expression") });
  });
}
