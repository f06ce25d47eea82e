/**
 * Validates that a string compiles as a regular expression pattern.
 * Global Standard: ECMA-262 RegExp pattern syntax.
 */
export const validateRegexPattern = (value: unknown): boolean => {
  if (typeof value !== "string") return false;
  try {
    new RegExp(value);
    return true;
  } catch {
    return false;
  }
};
