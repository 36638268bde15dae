/**
 * Tags module
 *
 * Latest-tag selection and tag rendering.
 */

export { scanTags, toTagRecord } from "./scanner";
export { formatTag, formatTagWithPrefix } from "./formatter";
export type { TagRecord, LatestTag, NoTagsFound, ScanResult } from "./tags.types";
