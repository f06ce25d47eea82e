import { describe, expect, it } from "vitest";
import { SchemaError } from "../src/errors.js";
import { field } from "../src/field.js";
import { createRegistry, SchemaRegistry } from "../src/schema.js";
import {
  expectInvalid,
  expectValid,
  expressionRegistry,
  recordingLogger,
  thrownBy,
} from "./test-utils.js";

describe("choice fields", () => {
  const registry = expressionRegistry();

  it("resolves members by their type discriminator", () => {
    const node = expectValid(
      registry.validate(
        {
          body: {
            type: "sum",
            left: { type: "literal", value: 1 },
            right: { type: "literal", value: 2 },
          },
        },
        "program"
      )
    );
    expect(node.child("body")?.schema).toBe("sum");
    expect(node.serialize()).toEqual({
      body: {
        type: "sum",
        left: { type: "literal", value: 1 },
        right: { type: "literal", value: 2 },
      },
    });
  });

  it("picks the only member a shortform value fits", () => {
    const node = expectValid(
      registry.validate({ body: { type: "sum", left: 1, right: 2 } }, "program")
    );
    expect(node.serialize()).toEqual({
      body: {
        type: "sum",
        left: { type: "literal", value: 1 },
        right: { type: "literal", value: 2 },
      },
    });
  });

  it("picks the only member an untyped object fits", () => {
    const node = expectValid(registry.validate({ body: { operand: 3 } }, "program"));
    expect(node.serialize()).toEqual({
      body: { type: "negate", operand: { type: "literal", value: 3 } },
    });
  });

  it("suggests the closest type for a misspelled discriminator", () => {
    const errors = expectInvalid(
      registry.validate({ body: { type: "summ", left: 1, right: 2 } }, "program")
    );
    expect(errors).toEqual([
      {
        path: ["program.body"],
        kind: "ConstraintViolation",
        message: `the type "summ" is not valid for 'expression'. Valid types are: 'literal', 'negate', 'sum'`,
        suggestion: "Did you mean 'sum'?",
        received: '"summ"',
      },
    ]);
  });

  it("lists the valid types for an empty object", () => {
    const errors = expectInvalid(registry.validate({ body: {} }, "program"));
    expect(errors).toEqual([
      {
        path: ["program.body"],
        kind: "ConstraintViolation",
        message: "the object needs a 'type' field. Valid types are: 'literal', 'negate', 'sum'",
        received: "{}",
      },
    ]);
  });

  it("reports issues inside a member under the member's fields", () => {
    const errors = expectInvalid(
      registry.validate(
        { body: { type: "negate", operand: { type: "literal", value: "x" } } },
        "program"
      )
    );
    expect(errors).toEqual([
      {
        path: ["program.body", "negate.operand", "literal.value"],
        kind: "TypeMismatch",
        message: "the value must be a number",
        received: '"x"',
      },
    ]);
  });

  it("rejects a value several members accept", () => {
    const shapes = createRegistry((r) => {
      r.register(
        "circle",
        { r: field.number().optional() },
        { choice: { group: "shape", type: "circle" } }
      );
      r.register(
        "square",
        { side: field.number().optional() },
        { choice: { group: "shape", type: "square" } }
      );
      r.register("drawing", { shape: field.choice("shape") });
    });
    const errors = expectInvalid(shapes.validate({ shape: { extra: 1 } }, "drawing"));
    expect(errors).toEqual([
      {
        path: ["drawing.shape"],
        kind: "ConstraintViolation",
        message: "the value matches several 'shape' types: 'circle', 'square'",
        suggestion: "Add a 'type' field to pick one.",
        received: '{"extra":1}',
      },
    ]);
  });

  it("checks the discriminator when a member is validated directly", () => {
    const errors = expectInvalid(registry.validate({ type: "sum", value: 1 }, "literal"));
    expect(errors).toEqual([
      {
        path: ["literal.type"],
        kind: "ConstraintViolation",
        message: `the type "sum" does not match schema 'literal'`,
        suggestion: "Use the type 'literal'.",
        received: '"sum"',
      },
    ]);
  });

  it("logs warnings only for the member an untyped value resolves to", () => {
    const logger = recordingLogger();
    const units = createRegistry(
      (r) => {
        r.register(
          "meters",
          { m: field.number(), legacy: field.string().optional().deprecated("use notes") },
          { choice: { group: "length", type: "meters" } }
        );
        r.register(
          "feet",
          { ft: field.number(), legacy: field.string().optional().deprecated("use notes") },
          { choice: { group: "length", type: "feet" } }
        );
        r.register("plan", { span: field.choice("length") });
      },
      { logger }
    );
    const plan = expectValid(units.validate({ span: { m: 3, legacy: "x" } }, "plan"));
    expect(plan.child("span")?.schema).toBe("meters");
    expect(logger.warnings).toEqual(["meters.legacy is deprecated: use notes"]);
  });

  it("refuses two members with the same type", () => {
    const open = new SchemaRegistry();
    open.register("a", {}, { choice: { group: "g", type: "t" } });
    const err = thrownBy(() => open.register("b", {}, { choice: { group: "g", type: "t" } }));
    expect(err).toBeInstanceOf(SchemaError);
    expect(err).toMatchObject({ code: "InvalidSchema" });
  });
});
