/**
 * Version module
 *
 * Semver parsing and precedence ordering for repository tags.
 */

export {
  getTagPrefix,
  parseVersion,
  formatVersion,
  compareVersions,
  isGreaterThan,
} from "./version";
export type { SemanticVersion, VersionParseError, VersionParseResult } from "./version.types";
