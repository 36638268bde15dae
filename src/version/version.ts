/**
 * Version utilities
 *
 * Thin wrapper over the semver package for parsing tags into structured
 * versions and ordering them by precedence.
 */

import semver from "semver";
import type { SemanticVersion, VersionParseResult } from "./version.types";

// Leading run of non-digit characters ("v", "release-") followed by the version
const TAG_PREFIX_REGEX = /^(\D*)(.*)$/;
const WHITESPACE_REGEX = /\s/;
const NUMERIC_IDENTIFIER_REGEX = /^\d+$/;

/**
 * Get the non-numeric prefix of a tag.
 *
 * @example getTagPrefix("v1.2.3") → "v"
 * @example getTagPrefix("release-1.2.3") → "release-"
 * @example getTagPrefix("1.2.3") → ""
 */
export function getTagPrefix(raw: string): string {
  return TAG_PREFIX_REGEX.exec(raw)?.[1] ?? "";
}

/**
 * Parse a raw tag into a structured semantic version.
 * The prefix is dropped; the remainder must be strict semver 2.0.0.
 *
 * @example parseVersion("v1.2.3-rc.1") → { success: true, data: { major: 1, minor: 2, patch: 3, prerelease: ["rc", 1], build: [] } }
 */
export function parseVersion(raw: string): VersionParseResult {
  if (raw.length === 0) {
    return { success: false, error: { raw, reason: "Empty tag" } };
  }
  if (WHITESPACE_REGEX.test(raw)) {
    return { success: false, error: { raw, reason: "Tag contains whitespace" } };
  }

  const prefix = getTagPrefix(raw);
  const rest = raw.slice(prefix.length);
  if (rest.length === 0) {
    return { success: false, error: { raw, reason: "No version number found" } };
  }

  const parsed = semver.parse(rest);
  if (!parsed) {
    return {
      success: false,
      error: { raw, reason: `"${rest}" is not a valid semantic version (expected MAJOR.MINOR.PATCH)` },
    };
  }

  // semver keeps numeric identifiers it cannot represent exactly as strings
  const prerelease: Array<string | number> = [];
  for (const identifier of parsed.prerelease) {
    if (typeof identifier === "number" || !NUMERIC_IDENTIFIER_REGEX.test(identifier)) {
      prerelease.push(identifier);
      continue;
    }
    const value = Number(identifier);
    if (!Number.isSafeInteger(value)) {
      return {
        success: false,
        error: { raw, reason: `Prerelease identifier ${identifier} exceeds ${Number.MAX_SAFE_INTEGER}` },
      };
    }
    prerelease.push(value);
  }

  return {
    success: true,
    data: {
      major: parsed.major,
      minor: parsed.minor,
      patch: parsed.patch,
      prerelease,
      build: [...parsed.build],
    },
  };
}

/**
 * Render a version in canonical form, prerelease and build included.
 *
 * @example formatVersion({ major: 1, minor: 0, patch: 0, prerelease: ["beta", 2], build: ["sha", "abc"] }) → "1.0.0-beta.2+sha.abc"
 */
export function formatVersion(version: SemanticVersion): string {
  const core = `${version.major}.${version.minor}.${version.patch}`;
  const prerelease = version.prerelease.length > 0 ? `-${version.prerelease.join(".")}` : "";
  const build = version.build.length > 0 ? `+${version.build.join(".")}` : "";
  return `${core}${prerelease}${build}`;
}

/**
 * Compare two versions by semver precedence. Build metadata is ignored.
 * Returns -1 if a < b, 0 if equal precedence, 1 if a > b.
 */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): -1 | 0 | 1 {
  return semver.compare(formatVersion(a), formatVersion(b));
}

/**
 * Check if version a has higher precedence than version b.
 */
export function isGreaterThan(a: SemanticVersion, b: SemanticVersion): boolean {
  return compareVersions(a, b) === 1;
}
