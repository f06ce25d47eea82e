import { describe, expect, it } from "vitest";
import {
  depthFrom,
  fromKwarg,
  fromParent,
  isJsonValue,
  nearest,
  parentOf,
} from "../src/context.js";
import { field } from "../src/field.js";
import { ValidatedNode } from "../src/node.js";
import type { ContextArgs } from "../src/types.js";

const root = new ValidatedNode("document", [["lang", "en"]]);
const section = new ValidatedNode("section", [["depth", 2], ["title", "Intro"]]);

const args = (overrides: Partial<ContextArgs> = {}): ContextArgs => ({
  stack: [root, section],
  siblings: {},
  kwargs: {},
  field: field.string().build("value"),
  ...overrides,
});

describe("context helpers", () => {
  it("finds the parent and the nearest ancestor of a schema", () => {
    expect(parentOf([root, section])).toBe(section);
    expect(parentOf([])).toBeUndefined();
    expect(nearest([root, section], "document")).toBe(root);
    expect(nearest([root, section], "chapter")).toBeUndefined();
  });

  it("copies or maps a parent field", () => {
    expect(fromParent("title")(args())).toBe("Intro");
    expect(fromParent("title", (v) => `${String(v)}!`)(args())).toBe("Intro!");
    expect(fromParent("missing", undefined, "none")(args())).toBe("none");
    expect(fromParent("title")(args({ stack: [] }))).toBeNull();
  });

  it("reads kwargs with a fallback", () => {
    expect(fromKwarg("lang", "en")(args({ kwargs: { lang: "fr" } }))).toBe("fr");
    expect(fromKwarg("lang", "en")(args())).toBe("en");
    expect(fromKwarg("when", "never")(args({ kwargs: { when: new Date(0) } }))).toBe("never");
  });

  it("counts depth from the parent", () => {
    expect(depthFrom("depth")(args())).toBe(3);
    expect(depthFrom("depth")(args({ stack: [] }))).toBe(1);
    expect(depthFrom("depth", 0)(args({ stack: [root] }))).toBe(0);
  });

  it("recognizes plain JSON values", () => {
    expect(isJsonValue({ a: [1, "x", null, { b: false }] })).toBe(true);
    expect(isJsonValue(Number.NaN)).toBe(false);
    expect(isJsonValue(root)).toBe(false);
    expect(isJsonValue(undefined)).toBe(false);
  });
});
