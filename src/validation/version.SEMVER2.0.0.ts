const NUMERIC = "0|[1-9]\\d*";
const PRERELEASE_ID = `(?:${NUMERIC}|\\d*[a-zA-Z-][0-9a-zA-Z-]*)`;
const BUILD_ID = "[0-9a-zA-Z-]+";

const SEMVER = new RegExp(
  `^(${NUMERIC})\\.(${NUMERIC})\\.(${NUMERIC})` +
    `(?:-(${PRERELEASE_ID}(?:\\.${PRERELEASE_ID})*))?` +
    `(?:\\+(${BUILD_ID}(?:\\.${BUILD_ID})*))?$`
);

/**
 * Checks the `version` of a schema's metadata, e.g. `1.4.0-rc.1+build.7`.
 * Global Standard: SemVer 2.0.0 (no leading zeros in numeric identifiers).
 */
export function validateSemVer(value: unknown): boolean {
  return typeof value === "string" && SEMVER.test(value);
}
