/**
 * Tag module types
 */

import type { SemanticVersion, VersionParseError } from "#/version";

/**
 * One scanned tag: either parsed or marked unparsable
 */
export type TagRecord =
  | { raw: string; parsed: true; version: SemanticVersion }
  | { raw: string; parsed: false; error: VersionParseError };

/**
 * Highest-precedence tag and its version
 */
export interface LatestTag {
  tag: string;
  version: SemanticVersion;
}

export interface NoTagsFound {
  type: "no-tags";
  message: string;
  scanned: number;
}

export type ScanResult =
  | { success: true; latest: LatestTag; records: TagRecord[] }
  | { success: false; error: NoTagsFound; records: TagRecord[] };
