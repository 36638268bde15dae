export { runRelease, assertBranchAllowed } from "./release";
export type { ReleaseContext, ReleaseOptions, ReleaseOutcome, PlannedTag } from "./release.types";
