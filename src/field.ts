import { FieldBuilder } from "./field.builder.js";
import type { FieldKind, JsonValue } from "./types.js";

export const field = {
  number: () => new FieldBuilder<number>("number"),
  integer: () => new FieldBuilder<number>("integer"),
  string: () => new FieldBuilder<string>("string"),
  boolean: () => new FieldBuilder<boolean>("boolean"),
  /** A nested node validated against the schema called `target`; may be the enclosing schema. */
  node: (target: string) =>
    new FieldBuilder<Record<string, JsonValue>>("node", { target }),
  /** A nested node drawn from a choice group, resolved by its `type` discriminator. */
  choice: (group: string) =>
    new FieldBuilder<Record<string, JsonValue>>("choice", { choice: group }),
  list: (item: FieldBuilder) =>
    new FieldBuilder<JsonValue[]>("list", { item: item.build("item") }),
  /** Keys are sorted; numerically when `key` is an `integerString`. */
  mapping: (key: FieldBuilder<string>, value: FieldBuilder) =>
    new FieldBuilder<Record<string, JsonValue>>("mapping", {
      key: key.build("key"),
      value: value.build("value"),
    }),
  /** A primitive shorthand, or the complex form when the value is an object or list. */
  either: (primitive: FieldBuilder, complex: FieldBuilder) =>
    new FieldBuilder("either", {
      primitive: primitive.build("primitive"),
      complex: complex.build("complex"),
    }),
  selection: <const U extends readonly string[]>(options: U) => {
    if (options.length === 0) {
      throw new Error("A selection needs at least one option.");
    }
    return new FieldBuilder<U[number]>("selection", { options });
  },
  /** Any number of the options; a single string or null is accepted too. */
  multiselection: <const U extends readonly string[]>(options: U) => {
    if (options.length === 0) {
      throw new Error("A multiple selection needs at least one option.");
    }
    return new FieldBuilder<U[number][]>("multiselection", { options }).default(() => []);
  },
  /** An integer spelled as a string, for mapping keys. */
  integerString: () => new FieldBuilder<string>("integerstring"),
  json: () => new FieldBuilder("json").nullable(),
  identifier: () =>
    new FieldBuilder<string>("identifier").description(
      "A name made of letters, digits, '_' and '$', not starting with a digit"
    ),
  regex: () =>
    new FieldBuilder<string>("regex").description("A regular expression"),
  /** A field of a custom kind registered on the schema registry's kinds. */
  custom: <T extends JsonValue = JsonValue>(
    kind: FieldKind,
    params: Readonly<Record<string, unknown>> = {}
  ) => new FieldBuilder<T>(kind, { params }),
};
