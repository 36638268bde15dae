/**
 * Version module types
 */

/**
 * Structured semantic version.
 * `prerelease` and `build` are empty when the tag carries none.
 */
export interface SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly prerelease: ReadonlyArray<string | number>;
  readonly build: ReadonlyArray<string>;
}

export interface VersionParseError {
  raw: string;
  reason: string;
}

export type VersionParseResult =
  | { success: true; data: SemanticVersion }
  | { success: false; error: VersionParseError };
