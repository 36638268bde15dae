/**
 * Git repository adapter
 *
 * Implements the repository interfaces on top of the git CLI.
 * All commands run through the injected ShellExecutor.
 */

import type { CreateTagOptions, Repository, ShellExecutor } from "#/core";
import { ErrorCodes, TaggrError, wrapError, type ErrorCode } from "#/errors";

function runGit(shell: ShellExecutor, args: string[], code: ErrorCode = ErrorCodes.GIT_COMMAND_FAILED): string {
  try {
    return shell.execFile("git", args);
  } catch (error) {
    throw wrapError(error, code, `git ${args.join(" ")} failed`);
  }
}

/**
 * Split command output into non-empty trimmed lines.
 */
export function parseLines(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function createGitRepository(shell: ShellExecutor): Repository {
  return {
    verify(): void {
      try {
        shell.execFile("git", ["rev-parse", "--is-inside-work-tree"]);
      } catch (error) {
        throw wrapError(error, ErrorCodes.NOT_A_REPOSITORY);
      }
    },

    currentBranch(): string {
      return runGit(shell, ["rev-parse", "--abbrev-ref", "HEAD"]).trim();
    },

    // Tags reachable from HEAD, in git's listing order
    listTags(): string[] {
      return parseLines(runGit(shell, ["tag", "--list", "--merged", "HEAD"]));
    },

    // Ref names cannot contain glob characters, so the pattern matches exactly
    tagExists(name: string): boolean {
      return parseLines(runGit(shell, ["tag", "--list", name])).includes(name);
    },

    createTag(name: string, options: CreateTagOptions): void {
      if (name.length === 0) {
        throw new TaggrError(ErrorCodes.TAG_WRITE_FAILED, "Tag name is empty");
      }
      const args = options.annotated ? ["tag", "-a", name, "-m", options.message] : ["tag", name];
      runGit(shell, args, ErrorCodes.TAG_WRITE_FAILED);
    },
  };
}
