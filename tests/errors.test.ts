import { describe, expect, it } from "vitest";
import { formatIssue, pathToString, previewValue, SchemaError } from "../src/errors.js";
import { closestMatch, didYouMean, levenshteinDistance } from "../src/suggest.js";

describe("issue formatting", () => {
  it("joins path segments and marks the root", () => {
    expect(pathToString(["node.field_3", "node.field_1"])).toBe("node.field_3 > node.field_1");
    expect(pathToString([])).toBe("(root)");
  });

  it("renders an issue on one line", () => {
    expect(
      formatIssue({
        path: ["bounded.value"],
        kind: "ConstraintViolation",
        message: "the value 5000 is above the maximum of 1000",
        suggestion: "The closest allowed value is 1000.",
      })
    ).toBe(
      "[ConstraintViolation] bounded.value: the value 5000 is above the maximum of 1000 The closest allowed value is 1000."
    );
  });

  it("shortens previews of large values", () => {
    expect(previewValue("x".repeat(150))).toBe(`"${"x".repeat(97)}..."`);
    expect(previewValue([1, 2, 3, 4, 5])).toBe('[1,2,3,"[2 more]"]');
    expect(previewValue({ a: { b: { c: 1 } } })).toBe('{"a":{"b":{"c":"..."}}}');
    expect(previewValue(undefined)).toBe("undefined");
  });

  it("appends the suggestion to the error message", () => {
    const err = new SchemaError("SchemaNotFound", "Schema 'x' is not registered", "Did you mean 'y'?");
    expect(err.message).toBe("Schema 'x' is not registered Did you mean 'y'?");
    expect(err.name).toBe("SchemaError");
  });
});

describe("suggestions", () => {
  it("measures edit distance", () => {
    expect(levenshteinDistance("kitten", "sitting")).toBe(3);
    expect(levenshteinDistance("", "abc")).toBe(3);
  });

  it("offers only close candidates", () => {
    expect(closestMatch("nmae", ["name", "age"])).toBe("name");
    expect(closestMatch("zzz", ["name"])).toBeUndefined();
    expect(didYouMean("Lenght", ["length", "width"])).toBe("Did you mean 'length'?");
    expect(didYouMean("x", [])).toBeUndefined();
  });
});
