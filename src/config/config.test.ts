import { describe, test, expect } from "vitest";
import { loadConfig, parseConfig, resolveConfigPath } from "./config";
import { createMockFileSystem } from "#/test-utils/mocks";
import { ErrorCodes, TaggrError } from "#/errors";

const DEFAULTS = {
  branches: ["main", "master"],
  initialVersion: "0.1.0",
  tagPrefix: "v",
  message: "Tag created by taggr",
  annotated: true,
};

function configError(run: () => unknown): { code: string; message: string; details: unknown } {
  try {
    run();
  } catch (error) {
    if (error instanceof TaggrError) {
      return { code: error.code, message: error.message, details: error.details };
    }
    throw error;
  }
  throw new Error("expected a configuration error");
}

describe("config", () => {
  describe("resolveConfigPath", () => {
    test("defaults to .taggr.yaml in the work directory", () => {
      expect(resolveConfigPath("/repo")).toBe("/repo/.taggr.yaml");
    });

    test("resolves relative files against the work directory", () => {
      expect(resolveConfigPath("/repo", "config/taggr.yaml")).toBe("/repo/config/taggr.yaml");
    });

    test("keeps absolute files", () => {
      expect(resolveConfigPath("/repo", "/etc/taggr.yaml")).toBe("/etc/taggr.yaml");
    });
  });

  describe("parseConfig", () => {
    test("fills defaults for empty content", () => {
      expect(parseConfig("")).toEqual(DEFAULTS);
    });

    test("reads all keys", () => {
      const content = `branches:
  - develop
initialVersion: 1.0.0
tagPrefix: ""
message: Release
annotated: false
`;
      expect(parseConfig(content)).toEqual({
        branches: ["develop"],
        initialVersion: "1.0.0",
        tagPrefix: "",
        message: "Release",
        annotated: false,
      });
    });

    test("rejects an empty branch list", () => {
      expect(configError(() => parseConfig("branches: []", "settings.yaml"))).toEqual({
        code: ErrorCodes.CONFIG_INVALID,
        message: "Invalid configuration in settings.yaml",
        details: ["branches: Array must contain at least 1 element(s)"],
      });
    });

    test("lists every schema problem with its path", () => {
      expect(configError(() => parseConfig("branches: main\nannotated: maybe\n")).details).toEqual([
        "branches: Expected array, received string",
        "annotated: Expected boolean, received string",
      ]);
    });

    test("rejects prefixed or prerelease initial versions", () => {
      for (const initialVersion of ["v1.0.0", "1.0.0-rc.1", "1.0"]) {
        expect(configError(() => parseConfig(`initialVersion: "${initialVersion}"`)).details).toEqual([
          "initialVersion: Must be a plain semantic version without prefix (e.g., 0.1.0)",
        ]);
      }
    });

    test("rejects prefixes with digits", () => {
      expect(configError(() => parseConfig(`tagPrefix: "r2-"`)).details).toEqual([
        "tagPrefix: Tag prefix must not contain digits or whitespace",
      ]);
    });

    test("rejects unknown keys", () => {
      expect(configError(() => parseConfig("branch: main")).details).toEqual([
        "Unrecognized key(s) in object: 'branch'",
      ]);
    });

    test("reports YAML syntax errors", () => {
      const error = configError(() => parseConfig("branches: [main"));

      expect(error.code).toBe(ErrorCodes.CONFIG_INVALID);
      expect(error.message).toBe("Invalid YAML syntax in .taggr.yaml");
      expect(Array.isArray(error.details) && error.details.length > 0).toBe(true);
    });
  });

  describe("loadConfig", () => {
    test("returns defaults when the file is missing", () => {
      const fs = createMockFileSystem();

      expect(loadConfig(fs, "/repo")).toEqual(DEFAULTS);
    });

    test("reads .taggr.yaml from the work directory", () => {
      const fs = createMockFileSystem({ "/repo/.taggr.yaml": "tagPrefix: release-\n" });

      expect(loadConfig(fs, "/repo")).toEqual({ ...DEFAULTS, tagPrefix: "release-" });
    });

    test("fails when an explicit file is missing", () => {
      const fs = createMockFileSystem();

      expect(() => loadConfig(fs, "/repo", "custom.yaml")).toThrow(
        "Configuration file not found: /repo/custom.yaml"
      );
    });

    test("throws CONFIG_INVALID with details", () => {
      const fs = createMockFileSystem({ "/repo/.taggr.yaml": "annotated: maybe\n" });

      try {
        loadConfig(fs, "/repo");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TaggrError);
        if (error instanceof TaggrError) {
          expect(error.code).toBe(ErrorCodes.CONFIG_INVALID);
          expect(error.message).toBe("Invalid configuration in /repo/.taggr.yaml");
          expect(error.details).toEqual(["annotated: Expected boolean, received string"]);
        }
      }
    });
  });
});
