import { describe, expect, it } from "vitest";
import { defineOperation, Dispatcher } from "../src/dispatch.js";
import { DispatchError, SchemaError } from "../src/errors.js";
import { field } from "../src/field.js";
import { createRegistry } from "../src/schema.js";
import type { Kwargs } from "../src/types.js";
import { expectValid, expressionRegistry, thrownBy } from "./test-utils.js";

const chainRegistry = () =>
  createRegistry((r) => {
    r.register("node", {
      next: field.node("node").nullable().default(null),
      value: field.number().default(0),
    });
    r.register("other", { label: field.string().optional() });
  });

describe("Dispatcher", () => {
  const registry = chainRegistry();
  const depth = defineOperation<Kwargs, number>("depth");
  const dispatcher = new Dispatcher(registry);
  dispatcher.register(depth, "node", (_schema, node, stack, kwargs) =>
    node.get("next") === null ? 1 : 1 + dispatcher.dispatchChild(depth, node, "next", stack, kwargs)
  );

  const threeDeep = expectValid(registry.validate({ next: { next: { next: null } } }, "node"));
  const single = expectValid(registry.validate({ next: null }, "node"));

  it("recurses through implementations, never on its own", () => {
    expect(dispatcher.dispatch(depth, threeDeep, [], {})).toBe(3);
    expect(dispatcher.dispatch(depth, single, [], {})).toBe(1);
  });

  it("pushes the parent onto the stack for children", () => {
    const stackAtLeaf = defineOperation<Kwargs, string[]>("stackAtLeaf");
    dispatcher.register(stackAtLeaf, "node", (_schema, node, stack, kwargs) =>
      node.get("next") === null
        ? stack.map((ancestor) => ancestor.schema)
        : dispatcher.dispatchChild(stackAtLeaf, node, "next", stack, kwargs)
    );
    expect(dispatcher.dispatch(stackAtLeaf, threeDeep, [], {})).toEqual(["node", "node"]);
  });

  it("hands the schema and kwargs to the implementation", () => {
    const describeNode = defineOperation<{ prefix: string }, string>("describeNode", {
      requires: ["prefix"],
    });
    dispatcher.register(describeNode, "node", (schema, node, _stack, kwargs) =>
      `${kwargs.prefix}${schema.name}:${String(node.get("value"))}`
    );
    expect(dispatcher.dispatch(describeNode, single, [], { prefix: "> " })).toBe("> node:0");
  });

  it("throws UnknownOperation with a suggestion", () => {
    const dept = defineOperation("dept");
    const err = thrownBy(() => dispatcher.dispatch(dept, single, [], {}));
    expect(err).toBeInstanceOf(DispatchError);
    expect(err).toMatchObject({
      code: "UnknownOperation",
      suggestion: "Did you mean 'depth'?",
      message: "Schema 'node' has no implementation of 'dept' Did you mean 'depth'?",
    });
  });

  it("names the schemas that do implement a missing operation", () => {
    const other = expectValid(registry.validate({}, "other"));
    const err = thrownBy(() => dispatcher.dispatch(depth, other, [], {}));
    expect(err).toMatchObject({
      code: "UnknownOperation",
      suggestion: "'depth' is implemented for: node.",
    });
  });

  it("refuses a second implementation for the same schema", () => {
    const err = thrownBy(() => dispatcher.register(depth, "node", () => 0));
    expect(err).toBeInstanceOf(DispatchError);
    expect(err).toMatchObject({ code: "DuplicateOperation" });
  });

  it("addresses implementations by operation name", () => {
    const sameName = defineOperation<Kwargs, number>("depth");
    expect(dispatcher.has(sameName, "node")).toBe(true);
    expect(dispatcher.dispatch(sameName, threeDeep, [], {})).toBe(3);
    const err = thrownBy(() => dispatcher.register(sameName, "node", () => 0));
    expect(err).toMatchObject({
      code: "DuplicateOperation",
      message: "Operation 'depth' is already registered for schema 'node'",
    });
  });

  it("refuses implementations for unknown schemas", () => {
    const err = thrownBy(() => dispatcher.register(defineOperation("x"), "nope", () => 0));
    expect(err).toBeInstanceOf(SchemaError);
    expect(err).toMatchObject({ code: "SchemaNotFound" });
  });

  it("checks the operation's kwargs contract", () => {
    const scaled = defineOperation<{ factor?: number }, number>("scaled", {
      requires: ["factor"],
    });
    dispatcher.register(scaled, "node", (_schema, node, _stack, kwargs) => {
      const value = node.get("value");
      return typeof value === "number" ? value * (kwargs.factor ?? 1) : 0;
    });
    const err = thrownBy(() => dispatcher.dispatch(scaled, single, [], {}));
    expect(err).toMatchObject({
      code: "MissingArgument",
      message: "Operation 'scaled' requires the kwargs 'factor'",
    });
    const four = expectValid(registry.validate({ value: 4 }, "node"));
    expect(dispatcher.dispatch(scaled, four, [], { factor: 2 })).toBe(8);

    const untyped = defineOperation<Kwargs, number>("scaled");
    expect(thrownBy(() => dispatcher.dispatch(untyped, four, [], {}))).toMatchObject({
      code: "MissingArgument",
      message: "Operation 'scaled' requires the kwargs 'factor'",
    });
  });

  it("throws NotANode when the field holds no node", () => {
    const err = thrownBy(() => dispatcher.dispatchChild(depth, single, "next", [], {}));
    expect(err).toMatchObject({
      code: "NotANode",
      message: "Field 'next' of schema 'node' does not hold a node",
    });
  });

  it("stops at maxDepth", () => {
    const shallow = new Dispatcher(registry, { maxDepth: 2 });
    shallow.register(depth, "node", (_schema, node, stack, kwargs) =>
      node.get("next") === null ? 1 : 1 + shallow.dispatchChild(depth, node, "next", stack, kwargs)
    );
    const err = thrownBy(() => shallow.dispatch(depth, threeDeep, [], {}));
    expect(err).toMatchObject({
      code: "DepthExceeded",
      message: "Dispatching 'depth' reached depth 3, above the maximum of 2",
    });
  });

  it("lets implementation errors through unchanged", () => {
    const boom = new Error("boom");
    const fail = defineOperation("fail");
    dispatcher.register(fail, "node", () => {
      throw boom;
    });
    expect(thrownBy(() => dispatcher.dispatch(fail, single, [], {}))).toBe(boom);
  });

  it("keeps implementations separate per dispatcher", () => {
    const fresh = new Dispatcher(registry);
    expect(fresh.has(depth, "node")).toBe(false);
    expect(dispatcher.has(depth, "node")).toBe(true);
    expect(dispatcher.operations("node")).toContain("depth");
  });
});

describe("evaluating expressions", () => {
  it("shares one implementation across schemas and walks choice children", () => {
    const registry = expressionRegistry();
    const evaluate = defineOperation<Kwargs, number>("evaluate");
    const dispatcher = new Dispatcher(registry);
    dispatcher
      .register(evaluate, "literal", (_schema, node) => {
        const value = node.get("value");
        return typeof value === "number" ? value : Number.NaN;
      })
      .register(
        evaluate,
        "sum",
        (_schema, node, stack, kwargs) =>
          dispatcher.dispatchChild(evaluate, node, "left", stack, kwargs) +
          dispatcher.dispatchChild(evaluate, node, "right", stack, kwargs)
      )
      .register(
        evaluate,
        "negate",
        (_schema, node, stack, kwargs) =>
          -dispatcher.dispatchChild(evaluate, node, "operand", stack, kwargs)
      )
      .register(evaluate, ["program"], (_schema, node, stack, kwargs) =>
        dispatcher.dispatchChild(evaluate, node, "body", stack, kwargs)
      );

    const program = expectValid(
      registry.validate(
        { body: { type: "sum", left: 2, right: { type: "negate", operand: 5 } } },
        "program"
      )
    );
    expect(dispatcher.dispatch(evaluate, program, [], {})).toBe(-3);
    expect(dispatcher.operations()).toEqual(["evaluate"]);
  });
});
