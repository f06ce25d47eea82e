import type { SchemaRegistry } from "./schema.js";
import type { FieldKind, FieldSpec, JsonValue, Schema } from "./types.js";

export interface FieldDescription {
  name: string;
  kind: FieldKind;
  /** What the kind accepts, with the field's constraints filled in. */
  accepts: string;
  help: string;
  required: boolean;
  nullable: boolean;
  default?: { source: "static"; value: JsonValue } | { source: "context" };
  deprecated?: string;
  /** Schemas a value of this field may be validated against. */
  references: string[];
}

export interface SchemaDescription {
  name: string;
  title?: string;
  description?: string;
  version?: string;
  choice?: { group: string; type: string };
  fields: FieldDescription[];
  references: string[];
  /** Schemas with a field that may hold a node of this schema. */
  referencedBy: string[];
}

export interface RegistryDescription {
  schemas: SchemaDescription[];
  /** Choice group -> discriminator -> schema name. */
  choices: Record<string, Record<string, string>>;
  kinds: FieldKind[];
}

function fieldReferences(registry: SchemaRegistry, spec: FieldSpec): string[] {
  const out: string[] = [];
  const { target, choice, item, key, value, primitive, complex } = spec.constraints;
  if (spec.kind === "node" && target !== undefined) out.push(target);
  if (spec.kind === "choice" && choice !== undefined) {
    out.push(...registry.choiceMembers(choice).values());
  }
  for (const nested of [item, key, value, primitive, complex]) {
    if (nested) out.push(...fieldReferences(registry, nested));
  }
  return out;
}

function unique(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}

function describeField(registry: SchemaRegistry, spec: FieldSpec): FieldDescription {
  const out: FieldDescription = {
    name: spec.name,
    kind: spec.kind,
    accepts: registry.kinds.describe(spec),
    help: spec.help,
    required: spec.required,
    nullable: spec.nullable,
    references: unique(fieldReferences(registry, spec)),
  };
  if (spec.default?.source === "static") {
    const value = spec.default.value;
    out.default = { source: "static", value: typeof value === "function" ? value() : value };
  } else if (spec.default?.source === "context") {
    out.default = { source: "context" };
  }
  if (spec.deprecated !== undefined) out.deprecated = spec.deprecated;
  return out;
}

export function describeSchema(registry: SchemaRegistry, name: string): SchemaDescription {
  const schema = registry.lookup(name);
  const fields = schema.fields.map((spec) => describeField(registry, spec));
  const referencedBy = registry
    .list()
    .filter((other) =>
      other.fields.some((spec) => fieldReferences(registry, spec).includes(schema.name))
    )
    .map((other) => other.name);

  const out: SchemaDescription = {
    name: schema.name,
    fields,
    references: unique(fields.flatMap((f) => f.references)),
    referencedBy: unique(referencedBy),
  };
  const { title, description, version, choice } = schema.meta;
  if (title !== undefined) out.title = title;
  if (description !== undefined) out.description = description;
  if (version !== undefined) out.version = version;
  if (choice !== undefined) out.choice = { ...choice };
  return out;
}

/** Read-only export of the registry for documentation and visualization tools. */
export function describeRegistry(registry: SchemaRegistry): RegistryDescription {
  const choices: Record<string, Record<string, string>> = {};
  for (const group of registry.choiceGroups()) {
    choices[group] = Object.fromEntries(registry.choiceMembers(group));
  }
  return {
    schemas: registry.list().map((schema: Schema) => describeSchema(registry, schema.name)),
    choices,
    kinds: registry.kinds.list(),
  };
}

function formatDefault(field: FieldDescription): string {
  if (!field.default) return "";
  return field.default.source === "static"
    ? ` = ${JSON.stringify(field.default.value)}`
    : " = (computed)";
}

/** Plain-text summary: the title line, then one line per field. */
export function renderSchemaDescription(description: SchemaDescription): string {
  const lines = [
    description.title ? `${description.title} (${description.name})` : description.name,
  ];
  if (description.description) lines.push(description.description);
  for (const f of description.fields) {
    const flags = [f.kind, f.required ? "required" : "optional"];
    if (f.nullable) flags.push("nullable");
    if (f.deprecated !== undefined) flags.push("deprecated");
    lines.push(`- ${f.name} [${flags.join(", ")}]${formatDefault(f)}: ${f.help || f.accepts}`);
  }
  return lines.join("\n");
}
