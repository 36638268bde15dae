/**
 * taggr CLI
 *
 * Create the next semantic version tag of a git repository.
 */

import { resolve } from "path";
import { Command, Option } from "commander";
import { createGitRepository } from "#/git";
import { createNodeFileSystem, createNodeShell } from "#/core";
import { loadConfig } from "#/config";
import { isTaggrError } from "#/errors";
import { logger } from "#/logger";
import { createPrompter, createReadlineAsk } from "#/prompt";
import { runRelease, type ReleaseOutcome } from "#/release";
import { BUMP_KINDS, type BumpKind } from "#/versioning";

// Version injected at build time via tsup define
const version = process.env["CLI_VERSION"] ?? "0.0.0-dev";

export interface CliOptions {
  debug: number;
  force?: boolean;
  bump?: BumpKind;
  yes?: boolean;
  dryRun?: boolean;
  config?: string;
  quiet?: boolean;
}

export type CliAction = (workDir: string | undefined, options: CliOptions) => Promise<void>;

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function createProgram(action: CliAction): Command {
  const program = new Command();

  program
    .name("taggr")
    .description("Create the next semantic version tag of a git repository")
    .version(version)
    .argument("[work-dir]", "Directory of the git repository to tag (default: current directory)")
    .option("-d, --debug", "Increase log verbosity (repeat for trace output)", increaseVerbosity, 0)
    .option("-f, --force", "Allow tagging on a branch not listed in the configuration")
    .addOption(new Option("-b, --bump <kind>", "Version part to bump (skips the prompt)").choices(BUMP_KINDS))
    .option("-y, --yes", "Answer yes to confirmations")
    .option("-n, --dry-run", "Print the tag that would be created without creating it")
    .option("-c, --config <file>", "Configuration file (default: .taggr.yaml in the work directory)")
    .option("-q, --quiet", "Only print errors and the resulting tag")
    .action((workDir: string | undefined, options: CliOptions) => action(workDir, options));

  return program;
}

/**
 * Default action: wire the Node adapters into the release flow.
 */
export async function release(workDir: string | undefined, options: CliOptions): Promise<ReleaseOutcome> {
  logger.configure({ verbosity: options.debug, silent: options.quiet });

  const dir = resolve(workDir ?? process.cwd());
  const repository = createGitRepository(createNodeShell({ cwd: dir }));
  repository.verify();
  logger.info(`Repository location: ${dir}`);

  const config = loadConfig(createNodeFileSystem(), dir, options.config);
  logger.trace(`Configuration: ${JSON.stringify(config)}`);

  const ask = createReadlineAsk();
  try {
    return await runRelease(
      { repository, prompter: createPrompter(ask), config, logger },
      { force: options.force, bump: options.bump, yes: options.yes, dryRun: options.dryRun }
    );
  } finally {
    ask.close();
  }
}

export async function runCli(argv: string[]): Promise<number> {
  let verbose = false;
  const program = createProgram(async (workDir, options) => {
    verbose = options.debug > 0;
    const outcome = await release(workDir, options);
    if (options.quiet && outcome.status !== "aborted") {
      console.log(outcome.tag);
    }
  });

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (isTaggrError(error)) {
      logger.error(error.toUserString(verbose));
    } else {
      logger.error(error instanceof Error ? error.message : String(error));
    }
    return 1;
  }
}
