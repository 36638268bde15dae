import { describe, test, expect } from "vitest";
import { ErrorCodes, TaggrError, isTaggrError, wrapError } from "./errors";

describe("errors", () => {
  describe("TaggrError", () => {
    test("uses the default message for the code", () => {
      const error = new TaggrError(ErrorCodes.TAG_EXISTS);

      expect(error.message).toBe("Tag already exists");
      expect(error.code).toBe("TG_REPO_103");
      expect(error.name).toBe("TaggrError");
    });

    test("accepts a custom message", () => {
      const error = new TaggrError(ErrorCodes.TAG_EXISTS, "Tag v1.0.0 already exists");

      expect(error.message).toBe("Tag v1.0.0 already exists");
    });

    test("formats for display", () => {
      const error = new TaggrError(ErrorCodes.CONFIG_INVALID, "Invalid configuration", {
        details: ["branches: Required"],
        cause: new Error("boom"),
      });

      expect(error.toUserString()).toBe("[TG_CONFIG_201] Invalid configuration");
      expect(error.toUserString(true)).toBe(
        '[TG_CONFIG_201] Invalid configuration\nDetails: [\n  "branches: Required"\n]\nCaused by: boom'
      );
    });
  });

  describe("isTaggrError", () => {
    test("narrows TaggrError instances", () => {
      expect(isTaggrError(new TaggrError(ErrorCodes.INVALID_INPUT))).toBe(true);
      expect(isTaggrError(new Error("plain"))).toBe(false);
      expect(isTaggrError("string")).toBe(false);
    });
  });

  describe("wrapError", () => {
    test("returns TaggrError unchanged", () => {
      const original = new TaggrError(ErrorCodes.TAG_EXISTS);

      expect(wrapError(original, ErrorCodes.GIT_COMMAND_FAILED)).toBe(original);
    });

    test("wraps plain errors as cause", () => {
      const wrapped = wrapError(new Error("exit 128"), ErrorCodes.GIT_COMMAND_FAILED);

      expect(wrapped.code).toBe(ErrorCodes.GIT_COMMAND_FAILED);
      expect(wrapped.message).toBe("Git command failed");
      expect(wrapped.cause?.message).toBe("exit 128");
    });

    test("wraps non-error values", () => {
      const wrapped = wrapError("oops", ErrorCodes.INVALID_INPUT, "Bad answer");

      expect(wrapped.message).toBe("Bad answer");
      expect(wrapped.cause?.message).toBe("oops");
    });
  });
});
