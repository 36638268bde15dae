import { z } from "zod";
import { parseVersion } from "#/version";

export const DEFAULT_BRANCHES = ["main", "master"];
export const DEFAULT_INITIAL_VERSION = "0.1.0";
export const DEFAULT_TAG_PREFIX = "v";
export const DEFAULT_TAG_MESSAGE = "Tag created by taggr";

// Plain release version, no prefix, prerelease or build
export const InitialVersionSchema = z.string().refine(
  (value) => {
    const result = parseVersion(value);
    return (
      result.success &&
      !/^\D/.test(value) &&
      result.data.prerelease.length === 0 &&
      result.data.build.length === 0
    );
  },
  { message: "Must be a plain semantic version without prefix (e.g., 0.1.0)" }
);

// Tag prefix must not contain digits or whitespace, or it would be read back as part of the version
export const TagPrefixSchema = z.string().regex(/^[^\d\s]*$/, {
  message: "Tag prefix must not contain digits or whitespace",
});

// .taggr.yaml at the repository root
export const TaggrConfigSchema = z.object({
  branches: z.array(z.string().trim().min(1)).min(1).default(DEFAULT_BRANCHES),
  initialVersion: InitialVersionSchema.default(DEFAULT_INITIAL_VERSION),
  tagPrefix: TagPrefixSchema.default(DEFAULT_TAG_PREFIX),
  message: z.string().trim().min(1).default(DEFAULT_TAG_MESSAGE),
  annotated: z.boolean().default(true),
}).strict();
export type TaggrConfig = z.infer<typeof TaggrConfigSchema>;
export type TaggrConfigInput = z.input<typeof TaggrConfigSchema>;
