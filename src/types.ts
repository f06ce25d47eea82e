import type { ValidatedNode } from "./node.js";

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A value stored on a validated node: a primitive, null, an owned child
 * node, or a list/mapping of those.
 */
export type FieldValue =
  | JsonPrimitive
  | ValidatedNode
  | FieldValue[]
  | { [key: string]: FieldValue };

/** Request-scoped parameters threaded from the top-level call. */
export type Kwargs = Readonly<Record<string, unknown>>;

export type BuiltinFieldKind =
  | "number"
  | "integer"
  | "string"
  | "boolean"
  | "node"
  | "choice"
  | "list"
  | "mapping"
  | "either"
  | "selection"
  | "multiselection"
  | "json"
  | "identifier"
  | "regex"
  | "integerstring";

// Custom kinds are plain tags registered on a FieldKindRegistry.
export type FieldKind = BuiltinFieldKind | (string & {});

export type UnknownFieldPolicy = "strict" | "lenient";

export type ErrorMode = "fail_fast" | "batch";

export interface SchemaLogger {
  debug?: (msg: string) => void;
  warn?: (msg: string) => void;
}

/**
 * Read access to a node on the parse stack. Both finished nodes and nodes
 * still under construction expose this view.
 */
export interface NodeView {
  readonly schema: string;
  get(field: string): FieldValue | undefined;
  has(field: string): boolean;
}

/** Ancestors of the node currently being validated or dispatched, root first. */
export type ParseStack = readonly NodeView[];

export interface ContextArgs {
  /** Ancestors, root first. The node under construction is not included. */
  stack: ParseStack;
  /** Fields of the node under construction that are already resolved. */
  siblings: Readonly<Record<string, FieldValue>>;
  kwargs: Kwargs;
  field: FieldSpec;
}

export type ContextGenerator = (args: ContextArgs) => JsonValue;

export type StaticDefault = JsonValue | (() => JsonValue);

export type FieldDefault =
  | { source: "static"; value: StaticDefault }
  | { source: "context"; generate: ContextGenerator };

export interface FieldConstraints {
  min?: number;
  max?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: RegExp;
  /** Schema name a `node` field validates against. */
  target?: string;
  /** Choice group a `choice` field resolves within. */
  choice?: string;
  /** Allowed values of a `selection` or `multiselection` field, in order. */
  options?: readonly string[];
  item?: FieldSpec;
  key?: FieldSpec;
  value?: FieldSpec;
  primitive?: FieldSpec;
  complex?: FieldSpec;
  /** Extra check run after the kind accepted the value. A string is the failure message. */
  validator?: (value: FieldValue) => boolean | string;
  /** Free-form parameters for custom kinds. */
  params?: Readonly<Record<string, unknown>>;
}

export interface FieldSpec {
  name: string;
  kind: FieldKind;
  required: boolean;
  nullable: boolean;
  default?: FieldDefault;
  constraints: FieldConstraints;
  help: string;
  /** Deprecation note; supplying the field logs a warning. */
  deprecated?: string;
  /** Overrides merged into the kwargs handed to nested nodes. */
  kwargs?: Kwargs;
  /** Leave the value out of compact serialization when it equals the default. */
  omitWhenDefault: boolean;
}

export interface ShortformSpec {
  field: FieldSpec;
  expand: (value: FieldValue) => Record<string, JsonValue>;
  help?: string;
}

export interface NodeCheckArgs {
  values: Readonly<Record<string, FieldValue>>;
  stack: ParseStack;
  kwargs: Kwargs;
}

export interface SchemaMeta {
  title?: string;
  description?: string;
  version?: string;
  /** Membership in a discriminated choice group. */
  choice?: { group: string; type: string };
  shortform?: ShortformSpec;
  /** Keys accepted on input and silently dropped. */
  dropFields?: readonly string[];
  /** kwargs names every validation of this schema must receive. */
  requires?: readonly string[];
  /** Node-level check; `false` or a message marks the node invalid. */
  validator?: (args: NodeCheckArgs) => boolean | string;
}

export interface Schema {
  readonly name: string;
  readonly fields: readonly FieldSpec[];
  readonly meta: Readonly<SchemaMeta>;
  field(name: string): FieldSpec | undefined;
}

export type ValidationErrorKind =
  | "SchemaNotFound"
  | "UnknownField"
  | "TypeMismatch"
  | "ConstraintViolation"
  | "MissingField";

export interface ValidationIssue {
  /** `schema.field` segments from the root. */
  path: readonly string[];
  kind: ValidationErrorKind;
  message: string;
  suggestion?: string;
  /** Shortened JSON preview of the offending value. */
  received?: string;
}

export type ValidationResult =
  | { valid: true; value: ValidatedNode; errors: readonly ValidationIssue[] }
  | { valid: false; value?: undefined; errors: readonly ValidationIssue[] };

export interface ValidateOptions {
  kwargs?: Kwargs;
  unknownFields?: UnknownFieldPolicy;
  errors?: ErrorMode;
  /** Deepest node nesting accepted before a ConstraintViolation. */
  maxDepth?: number;
  /** Ancestors to expose to context generators, e.g. when validating a subtree. */
  stack?: ParseStack;
}

export interface UnresolvedReference {
  schema: string;
  field: string;
  kind: "schema" | "choice" | "kind";
  target: string;
}

export type FreezeResult =
  | { ok: true; unresolved: readonly [] }
  | { ok: false; unresolved: readonly UnresolvedReference[] };
