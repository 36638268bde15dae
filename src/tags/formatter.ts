import { getTagPrefix, type SemanticVersion } from "#/version";

/**
 * Render a version as a tag with an explicit prefix.
 * Prerelease and build are never included.
 *
 * @example formatTagWithPrefix("v", 0.1.0) → "v0.1.0"
 */
export function formatTagWithPrefix(prefix: string, version: SemanticVersion): string {
  return `${prefix}${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Render a version following the naming of an existing tag.
 *
 * @example formatTag("v1.2.0", 1.3.0) → "v1.3.0"
 * @example formatTag("1.2.0-rc.1", 1.2.1) → "1.2.1"
 */
export function formatTag(templateRaw: string, version: SemanticVersion): string {
  return formatTagWithPrefix(getTagPrefix(templateRaw), version);
}
