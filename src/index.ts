export { field } from "./field.js";
export * from "./field.builder.js";
export {
  builtinFieldKinds,
  createDefaultFieldKinds,
  FieldKindRegistry,
} from "./field.kinds.js";
export type {
  FieldKindDefinition,
  KindContext,
  KindResult,
  KindValidator,
} from "./field.kinds.js";
export { createRegistry, SchemaRegistry } from "./schema.js";
export type { SchemaRegistryOptions, SchemaShape } from "./schema.js";
export { DEFAULT_MAX_DEPTH, validate } from "./validate.js";
export { countNodes, NodeDraft, serializeValue, ValidatedNode } from "./node.js";
export type { SerializeOptions } from "./node.js";
export { depthFrom, fromKwarg, fromParent, isJsonValue, nearest, parentOf } from "./context.js";
export { defineOperation, Dispatcher, Operation } from "./dispatch.js";
export type { DispatcherOptions, OperationImpl } from "./dispatch.js";
export { describeRegistry, describeSchema, renderSchemaDescription } from "./describe.js";
export type {
  FieldDescription,
  RegistryDescription,
  SchemaDescription,
} from "./describe.js";
export * from "./errors.js";
export { closestMatch, didYouMean, levenshteinDistance } from "./suggest.js";
export type * from "./types.js";
export * from "./validation/index.js";
