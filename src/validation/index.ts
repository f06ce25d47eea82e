export { validateIdentifier } from "./identifier.ECMA262.js";
export { validateRegexPattern } from "./regex.ECMA262.js";
export { validateSemVer } from "./version.SEMVER2.0.0.js";
