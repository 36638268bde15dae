/**
 * Versioning utilities
 *
 * Pure functions computing the next release version from the latest one.
 */

import type { SemanticVersion } from "#/version";
import { ErrorCodes, TaggrError } from "#/errors";
import { BUMP_KINDS, type BumpKind, type BumpSummary } from "./versioning.types";

function increment(value: number, component: BumpKind): number {
  if (value >= Number.MAX_SAFE_INTEGER) {
    throw new TaggrError(
      ErrorCodes.VERSION_OVERFLOW,
      `Cannot increment ${component} version ${value}: exceeds ${Number.MAX_SAFE_INTEGER}`,
      { details: { component, value } }
    );
  }
  return value + 1;
}

/**
 * Bump a version by the given kind.
 * The result is always a plain release: prerelease and build are dropped.
 *
 * @example bumpVersion(1.2.3-rc.1, "patch") → 1.2.4
 * @example bumpVersion(1.2.3, "minor") → 1.3.0
 * @example bumpVersion(1.2.3, "major") → 2.0.0
 */
export function bumpVersion(current: SemanticVersion, kind: BumpKind): SemanticVersion {
  switch (kind) {
    case "major":
      return release(increment(current.major, kind), 0, 0);
    case "minor":
      return release(current.major, increment(current.minor, kind), 0);
    case "patch":
      return release(current.major, current.minor, increment(current.patch, kind));
  }
}

function release(major: number, minor: number, patch: number): SemanticVersion {
  return { major, minor, patch, prerelease: [], build: [] };
}

/**
 * Parse user input into a bump kind (case-insensitive).
 * Returns null for anything else.
 */
export function parseBumpKind(input: string): BumpKind | null {
  const normalized = input.trim().toLowerCase();
  return BUMP_KINDS.find((kind) => kind === normalized) ?? null;
}

/**
 * Capitalized label used in prompts.
 *
 * @example bumpKindLabel("minor") → "Minor"
 */
export function bumpKindLabel(kind: BumpKind): string {
  return kind.charAt(0).toUpperCase() + kind.slice(1);
}

/**
 * Format a bump for display.
 *
 * @example formatBumpSummary({ previousTag: "v1.2.0", nextTag: "v1.3.0", kind: "minor" }) → "v1.2.0 → v1.3.0 (minor)"
 */
export function formatBumpSummary(summary: BumpSummary): string {
  return `${summary.previousTag} → ${summary.nextTag} (${summary.kind})`;
}
