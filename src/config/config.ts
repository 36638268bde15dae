/**
 * Configuration loading
 *
 * Reads the optional .taggr.yaml of a repository. A missing file yields the defaults.
 * Syntax and schema problems surface as CONFIG_INVALID with one detail line per problem.
 */

import { isAbsolute, join } from "path";
import { parseDocument } from "yaml";
import type { ZodIssue } from "zod";
import type { FileSystem } from "#/core";
import { ErrorCodes, TaggrError } from "#/errors";
import { TaggrConfigSchema, type TaggrConfig } from "#/schemas";

export const CONFIG_FILE = ".taggr.yaml";

/**
 * Resolve the configuration path: an explicit file relative to the work directory,
 * or .taggr.yaml inside it.
 */
export function resolveConfigPath(workDir: string, file?: string): string {
  if (!file) return join(workDir, CONFIG_FILE);
  return isAbsolute(file) ? file : join(workDir, file);
}

// "branches: Array must contain at least 1 element(s)"
function describeIssue({ path, message }: ZodIssue): string {
  return path.length > 0 ? `${path.join(".")}: ${message}` : message;
}

/**
 * Parse configuration content. Empty content yields the defaults.
 *
 * @example parseConfig("tagPrefix: release-\n").tagPrefix → "release-"
 */
export function parseConfig(content: string, filepath: string = CONFIG_FILE): TaggrConfig {
  const document = parseDocument(content);
  if (document.errors.length > 0) {
    throw new TaggrError(ErrorCodes.CONFIG_INVALID, `Invalid YAML syntax in ${filepath}`, {
      // The first line names the problem and its position; the rest is a source excerpt
      details: document.errors.map((error) => error.message.split("\n")[0] ?? error.message),
    });
  }

  const raw: unknown = document.toJS() ?? {};
  const result = TaggrConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new TaggrError(ErrorCodes.CONFIG_INVALID, `Invalid configuration in ${filepath}`, {
      details: result.error.issues.map(describeIssue),
    });
  }
  return result.data;
}

/**
 * Load configuration for a work directory.
 * An explicitly requested file must exist; the default one is optional.
 */
export function loadConfig(fs: FileSystem, workDir: string, file?: string): TaggrConfig {
  const path = resolveConfigPath(workDir, file);

  if (!fs.exists(path)) {
    if (file) {
      throw new TaggrError(ErrorCodes.CONFIG_INVALID, `Configuration file not found: ${path}`);
    }
    return TaggrConfigSchema.parse({});
  }

  return parseConfig(fs.readFile(path), path);
}
