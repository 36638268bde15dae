/**
 * taggr
 *
 * Deterministic core for computing the next semantic version tag.
 * Portable, testable, dependency-injected.
 */

// Core interfaces and Node adapters
export * from "#/core";

// Errors
export * from "#/errors";

// Version parsing and ordering
export * from "#/version";

// Bump computation
export * from "#/versioning";

// Tag scanning and formatting
export * from "#/tags";

// Configuration (Zod schema, YAML loading)
export * from "#/schemas";
export * from "#/config";

// Adapters
export * from "#/git";
export * from "#/prompt";
export * from "#/logger";

// Release flow
export * from "#/release";
