/**
 * Versioning module types
 *
 * Types for computing the successor of a tagged version.
 */

export const BUMP_KINDS = ["major", "minor", "patch"] as const;

export type BumpKind = (typeof BUMP_KINDS)[number];

/**
 * Transition from the latest tag to the new one, for display
 */
export interface BumpSummary {
  previousTag: string;
  nextTag: string;
  kind: BumpKind;
}
