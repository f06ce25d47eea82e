import { setEntry } from "./node.js";
import type {
  UnresolvedReference,
  ValidationErrorKind,
  ValidationIssue,
} from "./types.js";

export type SchemaErrorCode =
  | "DuplicateSchema"
  | "DuplicateField"
  | "InvalidSchema"
  | "RegistryFrozen"
  | "RegistryOpen"
  | "SchemaNotFound"
  | "UnresolvedReference"
  | "MissingArgument";

export type DispatchErrorCode =
  | "UnknownOperation"
  | "DuplicateOperation"
  | "MissingArgument"
  | "DepthExceeded"
  | "NotANode";

/** Thrown for mistakes in how schemas are declared or used. */
export class SchemaError extends Error {
  readonly code: SchemaErrorCode;
  readonly suggestion?: string;

  constructor(code: SchemaErrorCode, message: string, suggestion?: string) {
    super(suggestion ? `${message} ${suggestion}` : message);
    this.name = "SchemaError";
    this.code = code;
    this.suggestion = suggestion;
  }
}

export class UnresolvedReferenceError extends SchemaError {
  readonly unresolved: readonly UnresolvedReference[];

  constructor(unresolved: readonly UnresolvedReference[]) {
    super(
      "UnresolvedReference",
      `Unresolved references: ${unresolved
        .map((ref) => `${ref.schema}.${ref.field} -> ${ref.target}`)
        .join(", ")}`
    );
    this.name = "UnresolvedReferenceError";
    this.unresolved = unresolved;
  }
}

export class DispatchError extends Error {
  readonly code: DispatchErrorCode;
  readonly suggestion?: string;

  constructor(code: DispatchErrorCode, message: string, suggestion?: string) {
    super(suggestion ? `${message} ${suggestion}` : message);
    this.name = "DispatchError";
    this.code = code;
    this.suggestion = suggestion;
  }
}

/** An issue as reported by a field kind, before the validator adds its location. */
export interface IssueDraft {
  kind: Extract<ValidationErrorKind, "TypeMismatch" | "ConstraintViolation">;
  message: string;
  suggestion?: string;
}

export function typeMismatch(message: string, suggestion?: string): IssueDraft {
  return { kind: "TypeMismatch", message, suggestion };
}

export function constraintViolation(
  message: string,
  suggestion?: string
): IssueDraft {
  return { kind: "ConstraintViolation", message, suggestion };
}

export function pathToString(path: readonly string[]): string {
  return path.length === 0 ? "(root)" : path.join(" > ");
}

export function formatIssue(issue: ValidationIssue): string {
  let line = `[${issue.kind}] ${pathToString(issue.path)}: ${issue.message}`;
  if (issue.suggestion) line += ` ${issue.suggestion}`;
  return line;
}

const MAX_PREVIEW_FIELDS = 10;
const MAX_PREVIEW_ITEMS = 3;
const MAX_PREVIEW_STRING = 100;
const PREVIEW_DEPTH = 2;

function shorten(value: unknown, remainingDepth: number): unknown {
  if (typeof value === "string") {
    return value.length > MAX_PREVIEW_STRING
      ? `${value.slice(0, MAX_PREVIEW_STRING - 3)}...`
      : value;
  }
  if (Array.isArray(value)) {
    const items = value
      .slice(0, MAX_PREVIEW_ITEMS)
      .map((item) => (remainingDepth <= 0 ? "..." : shorten(item, remainingDepth - 1)));
    if (value.length > MAX_PREVIEW_ITEMS) {
      items.push(`[${value.length - MAX_PREVIEW_ITEMS} more]`);
    }
    return items;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value);
    if (entries.length > MAX_PREVIEW_FIELDS) {
      return `[an object with ${entries.length} fields]`;
    }
    const out: Record<string, unknown> = {};
    for (const [key, child] of entries) {
      setEntry(out, key, remainingDepth <= 0 ? "..." : shorten(child, remainingDepth - 1));
    }
    return out;
  }
  return value;
}

/** Size-bounded JSON rendering of a raw value for error reports. */
export function previewValue(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "number" && !Number.isFinite(value)) return String(value);
  try {
    return JSON.stringify(shorten(value, PREVIEW_DEPTH)) ?? String(value);
  } catch {
    return String(value);
  }
}
