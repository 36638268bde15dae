import { describe, test, expect } from "vitest";
import { createGitRepository, parseLines } from "./git";
import { createMockShellExecutor } from "#/test-utils/mocks";
import { ErrorCodes, TaggrError } from "#/errors";

describe("git", () => {
  describe("parseLines", () => {
    test("drops blank lines and trims", () => {
      expect(parseLines("v1.0.0\n\n v1.1.0 \r\n")).toEqual(["v1.0.0", "v1.1.0"]);
    });

    test("returns empty array for empty output", () => {
      expect(parseLines("")).toEqual([]);
    });
  });

  describe("createGitRepository", () => {
    test("lists tags reachable from HEAD", () => {
      const shell = createMockShellExecutor({
        "git tag --list --merged HEAD": "v1.0.0\nv1.1.0\nnightly\n",
      });
      const repo = createGitRepository(shell);

      expect(repo.listTags()).toEqual(["v1.0.0", "v1.1.0", "nightly"]);
      expect(shell.calls).toEqual([{ command: "git", args: ["tag", "--list", "--merged", "HEAD"] }]);
    });

    test("reads the current branch", () => {
      const shell = createMockShellExecutor({
        "git rev-parse --abbrev-ref HEAD": "main\n",
      });

      expect(createGitRepository(shell).currentBranch()).toBe("main");
    });

    test("checks whether a tag exists", () => {
      const shell = createMockShellExecutor({
        "git tag --list v1.0.0": "v1.0.0\n",
      });
      const repo = createGitRepository(shell);

      expect(repo.tagExists("v1.0.0")).toBe(true);
      expect(repo.tagExists("v2.0.0")).toBe(false);
      expect(shell.commands).toEqual(["git tag --list v1.0.0", "git tag --list v2.0.0"]);
    });

    test("creates annotated tags", () => {
      const shell = createMockShellExecutor();
      createGitRepository(shell).createTag("v1.3.0", { message: "Tag created by taggr", annotated: true });

      expect(shell.calls).toEqual([
        { command: "git", args: ["tag", "-a", "v1.3.0", "-m", "Tag created by taggr"] },
      ]);
    });

    test("creates lightweight tags", () => {
      const shell = createMockShellExecutor();
      createGitRepository(shell).createTag("1.0.1", { message: "unused", annotated: false });

      expect(shell.commands).toEqual(["git tag 1.0.1"]);
    });

    test("rejects empty tag names", () => {
      const shell = createMockShellExecutor();

      expect(() => createGitRepository(shell).createTag("", { message: "m", annotated: true })).toThrow(
        "Tag name is empty"
      );
      expect(shell.calls).toEqual([]);
    });

    test("wraps tag write failures", () => {
      const shell = createMockShellExecutor({
        git: new Error("fatal: tag 'v1.3.0' already exists"),
      });

      try {
        createGitRepository(shell).createTag("v1.3.0", { message: "m", annotated: true });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TaggrError);
        if (error instanceof TaggrError) {
          expect(error.code).toBe(ErrorCodes.TAG_WRITE_FAILED);
          expect(error.message).toBe("git tag -a v1.3.0 -m m failed");
          expect(error.cause?.message).toBe("fatal: tag 'v1.3.0' already exists");
        }
      }
    });

    test("wraps read failures as GIT_COMMAND_FAILED", () => {
      const shell = createMockShellExecutor({
        "git tag --list --merged HEAD": new Error("fatal: malformed object name HEAD"),
      });

      try {
        createGitRepository(shell).listTags();
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TaggrError);
        if (error instanceof TaggrError) {
          expect(error.code).toBe(ErrorCodes.GIT_COMMAND_FAILED);
        }
      }
    });

    test("verify reports NOT_A_REPOSITORY", () => {
      const shell = createMockShellExecutor({
        "git rev-parse --is-inside-work-tree": new Error("fatal: not a git repository"),
      });

      try {
        createGitRepository(shell).verify();
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TaggrError);
        if (error instanceof TaggrError) {
          expect(error.code).toBe(ErrorCodes.NOT_A_REPOSITORY);
          expect(error.message).toBe("Not a git repository");
        }
      }
    });

    test("verify passes inside a work tree", () => {
      const shell = createMockShellExecutor({ "git rev-parse --is-inside-work-tree": "true\n" });

      expect(() => createGitRepository(shell).verify()).not.toThrow();
    });
  });
});
