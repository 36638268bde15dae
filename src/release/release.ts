/**
 * Release flow
 *
 * One invocation: check the branch, scan tags, pick a bump, confirm, create the tag.
 * Nothing is written to the repository before the final step.
 */

import { ErrorCodes, TaggrError } from "#/errors";
import { formatTag, formatTagWithPrefix, scanTags, type LatestTag } from "#/tags";
import { formatVersion, parseVersion } from "#/version";
import { BUMP_KINDS, bumpVersion, formatBumpSummary } from "#/versioning";
import type { PlannedTag, ReleaseContext, ReleaseOptions, ReleaseOutcome } from "./release.types";

/**
 * Reject branches not listed in the configuration. A detached HEAD reads as "HEAD".
 */
export function assertBranchAllowed(context: ReleaseContext): void {
  const branch = context.repository.currentBranch();
  context.logger.debug(`Current branch: ${branch}`);

  if (!context.config.branches.includes(branch)) {
    throw new TaggrError(
      ErrorCodes.BRANCH_NOT_ALLOWED,
      `Branch "${branch}" is not one of ${context.config.branches.join(", ")}. Use --force to tag anyway.`,
      { details: { branch, allowed: context.config.branches } }
    );
  }
}

function planInitialTag(context: ReleaseContext): PlannedTag {
  const parsed = parseVersion(context.config.initialVersion);
  if (!parsed.success) {
    throw new TaggrError(ErrorCodes.CONFIG_INVALID, `Invalid initial version: ${parsed.error.reason}`);
  }

  return {
    tag: formatTagWithPrefix(context.config.tagPrefix, parsed.data),
    version: parsed.data,
    previousTag: null,
    kind: null,
  };
}

async function planBump(
  context: ReleaseContext,
  latest: LatestTag,
  options: ReleaseOptions
): Promise<PlannedTag> {
  context.logger.info(`Last tagged version: ${latest.tag} (${formatVersion(latest.version)})`);

  const kind = options.bump ?? (await context.prompter.selectBumpKind(BUMP_KINDS));
  context.logger.debug(`Bumping ${kind}`);

  const version = bumpVersion(latest.version, kind);
  const tag = formatTag(latest.tag, version);
  context.logger.info(formatBumpSummary({ previousTag: latest.tag, nextTag: tag, kind }));

  return { tag, version, previousTag: latest.tag, kind };
}

export async function runRelease(
  context: ReleaseContext,
  options: ReleaseOptions = {}
): Promise<ReleaseOutcome> {
  const { repository, prompter, logger, config } = context;

  if (options.force) {
    logger.debug("Branch check skipped (--force)");
  } else {
    assertBranchAllowed(context);
  }

  const tags = repository.listTags();
  logger.debug(`Found ${tags.length} tags reachable from HEAD`);

  const scan = scanTags(tags);
  for (const record of scan.records) {
    if (!record.parsed) {
      logger.debug(`Skipping tag ${record.raw}: ${record.error.reason}`);
    }
  }

  let planned: PlannedTag;
  let question: string;
  if (scan.success) {
    planned = await planBump(context, scan.latest, options);
    question = `Create new tag ${planned.tag}?`;
  } else {
    // Fall back to the configured initial version
    logger.warn(scan.error.message);
    planned = planInitialTag(context);
    question = `No semantic version tags found. Create initial tag ${planned.tag}?`;
  }

  if (repository.tagExists(planned.tag)) {
    throw new TaggrError(ErrorCodes.TAG_EXISTS, `Tag ${planned.tag} already exists`);
  }

  if (options.dryRun) {
    logger.info(`Dry run: would create tag ${planned.tag}`);
    return { status: "dry-run", ...planned };
  }

  const confirmed = options.yes || (await prompter.confirm(question, true));
  if (!confirmed) {
    logger.info("Aborting.");
    return { status: "aborted", reason: scan.success ? "declined" : "no-tags" };
  }

  repository.createTag(planned.tag, { message: config.message, annotated: config.annotated });
  logger.success(`Created tag ${planned.tag}`);

  return { status: "created", ...planned };
}
