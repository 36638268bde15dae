/**
 * Versioning module
 *
 * Computes the successor version for a requested bump kind.
 */

export * from "./versioning";
export * from "./versioning.types";
