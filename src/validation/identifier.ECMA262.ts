const RESERVED_WORDS = new Set([
  "break", "case", "catch", "class", "const", "continue", "debugger",
  "default", "delete", "do", "else", "export", "extends", "false",
  "finally", "for", "function", "if", "import", "in", "instanceof", "new",
  "null", "return", "super", "switch", "this", "throw", "true", "try",
  "typeof", "var", "void", "while", "with", "yield", "let", "static",
  "enum", "await", "implements", "package", "protected", "interface",
  "private", "public",
]);

/**
 * Validates that a string is usable as a variable name: ASCII letters,
 * digits, '_' and '$', not starting with a digit, not a reserved word.
 * Global Standard: ECMA-262 IdentifierName (ASCII subset).
 */
export function validateIdentifier(value: unknown): boolean {
  if (typeof value !== "string") return false;
  if (!/^[A-Za-z_$][A-Za-z0-9_$]*$/.test(value)) return false;
  return !RESERVED_WORDS.has(value);
}
