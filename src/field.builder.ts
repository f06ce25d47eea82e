import type {
  ContextGenerator,
  FieldConstraints,
  FieldDefault,
  FieldKind,
  FieldSpec,
  FieldValue,
  JsonValue,
  Kwargs,
} from "./types.js";

const LENGTH_KINDS: readonly FieldKind[] = ["string", "identifier", "regex", "list"];
const RANGE_KINDS: readonly FieldKind[] = ["number", "integer", "integerstring"];

export class FieldBuilder<TInput extends JsonValue = JsonValue> {
  isRequired = true;
  isNullable = false;
  _default?: FieldDefault;
  _description: string = "";
  _deprecated?: string;
  _kwargs?: Kwargs;
  _omitWhenDefault = false;
  readonly constraints: FieldConstraints;

  constructor(
    public readonly kind: FieldKind,
    constraints: FieldConstraints = {}
  ) {
    this.constraints = { ...constraints };
  }

  required(): this {
    this.isRequired = true;
    return this;
  }

  optional(): this {
    this.isRequired = false;
    return this;
  }

  /** Accept `null` as a value. */
  nullable(): this {
    this.isNullable = true;
    return this;
  }

  /**
   * Static default used when the key is absent. A function is called once
   * per use, so every node gets its own copy.
   */
  default(value: TInput | null | (() => TInput | null)): this {
    this._default = { source: "static", value };
    // Supplying a default implies the value may be omitted at input time.
    this.isRequired = false;
    return this;
  }

  /**
   * Default computed from the ancestors, the fields declared before this
   * one and the caller's kwargs. Runs once the node's explicit and static
   * primitives and its earlier nested fields are known.
   */
  computed(generate: ContextGenerator): this {
    this._default = { source: "context", generate };
    this.isRequired = false;
    return this;
  }

  description(desc: string): this {
    this._description = desc;
    return this;
  }

  help(text: string): this {
    return this.description(text);
  }

  deprecated(note: string = "This field is deprecated."): this {
    this._deprecated = note;
    return this;
  }

  /** kwargs overrides handed to nested nodes validated through this field. */
  kwargs(overrides: Kwargs): this {
    this._kwargs = { ...this._kwargs, ...overrides };
    return this;
  }

  omitWhenDefault(): this {
    this._omitWhenDefault = true;
    return this;
  }

  validator(fn: (value: FieldValue) => boolean | string): this {
    const prevValidator = this.constraints.validator;
    this.constraints.validator = prevValidator
      ? (value) => {
          const first = prevValidator(value);
          return first === true ? fn(value) : first;
        }
      : fn;
    return this;
  }

  min(min: number): this {
    if (RANGE_KINDS.includes(this.kind)) {
      this.constraints.min = min;
    } else if (LENGTH_KINDS.includes(this.kind)) {
      this.constraints.minLength = min;
    } else {
      throw new Error(
        "Min is only supported on number, integer, string, or list fields."
      );
    }
    return this;
  }

  max(max: number): this {
    if (RANGE_KINDS.includes(this.kind)) {
      this.constraints.max = max;
    } else if (LENGTH_KINDS.includes(this.kind)) {
      this.constraints.maxLength = max;
    } else {
      throw new Error(
        "Max is only supported on number, integer, string, or list fields."
      );
    }
    return this;
  }

  pattern(regex: RegExp): this {
    if (this.kind !== "string") {
      throw new Error("Pattern is only supported on string fields.");
    }
    this.constraints.pattern = regex;
    return this;
  }

  params(params: Readonly<Record<string, unknown>>): this {
    this.constraints.params = { ...this.constraints.params, ...params };
    return this;
  }

  /** Freeze the builder's settings into the spec of the field called `name`. */
  build(name: string): FieldSpec {
    const { min, max, minLength, maxLength } = this.constraints;
    if (min !== undefined && max !== undefined && min > max) {
      throw new Error(`Field ${name}: the minimum is greater than the maximum`);
    }
    if (minLength !== undefined && maxLength !== undefined && minLength > maxLength) {
      throw new Error(
        `Field ${name}: the minimum length is greater than the maximum length`
      );
    }
    if (
      this._default?.source === "static" &&
      this._default.value === null &&
      !this.isNullable
    ) {
      throw new Error(`Field ${name} defaults to null but is not nullable`);
    }

    const spec: FieldSpec = {
      name,
      kind: this.kind,
      required: this.isRequired,
      nullable: this.isNullable,
      constraints: { ...this.constraints },
      help: this._description,
      omitWhenDefault: this._omitWhenDefault,
    };
    if (this._default) spec.default = this._default;
    if (this._deprecated !== undefined) spec.deprecated = this._deprecated;
    if (this._kwargs) spec.kwargs = { ...this._kwargs };
    return spec;
  }
}

export default FieldBuilder;
