/**
 * Tag scanner
 *
 * Selects the highest-precedence semantic version among raw repository tags.
 * Tags that do not parse are kept as records but never selected.
 */

import { isGreaterThan, parseVersion } from "#/version";
import type { LatestTag, ScanResult, TagRecord } from "./tags.types";

/**
 * Parse a single raw tag into a record.
 */
export function toTagRecord(raw: string): TagRecord {
  const result = parseVersion(raw);
  return result.success
    ? { raw, parsed: true, version: result.data }
    : { raw, parsed: false, error: result.error };
}

/**
 * Scan raw tags and select the latest version.
 * On equal precedence the first tag in input order wins.
 *
 * @example scanTags(["v1.0.0", "v1.2.0", "v1.1.5"]) → latest.tag === "v1.2.0"
 */
export function scanTags(rawTags: readonly string[]): ScanResult {
  const records = rawTags.map(toTagRecord);
  let latest: LatestTag | null = null;

  for (const record of records) {
    if (!record.parsed) continue;
    if (latest === null || isGreaterThan(record.version, latest.version)) {
      latest = { tag: record.raw, version: record.version };
    }
  }

  if (latest === null) {
    return {
      success: false,
      error: {
        type: "no-tags",
        message:
          rawTags.length === 0
            ? "Repository has no tags"
            : `None of the ${rawTags.length} tags is a semantic version`,
        scanned: rawTags.length,
      },
      records,
    };
  }

  return { success: true, latest, records };
}
