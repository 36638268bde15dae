/**
 * Release module types
 */

import type { Prompter, Repository } from "#/core";
import type { Logger } from "#/logger";
import type { TaggrConfig } from "#/schemas";
import type { SemanticVersion } from "#/version";
import type { BumpKind } from "#/versioning";

export interface ReleaseContext {
  repository: Repository;
  prompter: Prompter;
  config: TaggrConfig;
  logger: Logger;
}

export interface ReleaseOptions {
  /** Skip the branch check */
  force?: boolean;
  /** Bump kind chosen up front; prompts when absent */
  bump?: BumpKind;
  /** Answer yes to every confirmation */
  yes?: boolean;
  /** Compute the tag without creating it */
  dryRun?: boolean;
}

export interface PlannedTag {
  tag: string;
  version: SemanticVersion;
  previousTag: string | null;
  kind: BumpKind | null; // null for the initial tag
}

export type ReleaseOutcome =
  | ({ status: "created" } & PlannedTag)
  | ({ status: "dry-run" } & PlannedTag)
  | { status: "aborted"; reason: "declined" | "no-tags" };
