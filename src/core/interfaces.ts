/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

import type { BumpKind } from "#/versioning";

export interface FileSystem {
  readFile(path: string): string;
  exists(path: string): boolean;
}

/**
 * Shell command executor using array-based arguments.
 * Arguments are passed directly to the executable without shell interpretation,
 * so tag names and messages never need quoting.
 * Returns stdout; throws on a non-zero exit.
 */
export interface ShellExecutor {
  execFile(command: string, args: string[]): string;
}

/**
 * Supplies the raw tag names of the repository, in listing order.
 */
export interface TagSource {
  listTags(): string[];
  /** Whether a tag exists anywhere in the repository, reachable or not */
  tagExists(name: string): boolean;
}

export interface CreateTagOptions {
  message: string;
  annotated: boolean;
}

/**
 * Creates a tag at the current commit.
 */
export interface TagSink {
  createTag(name: string, options: CreateTagOptions): void;
}

export interface BranchReader {
  currentBranch(): string;
}

export interface Repository extends TagSource, TagSink, BranchReader {
  verify(): void;
}

/**
 * Interactive questions asked during a release.
 */
export interface Prompter {
  selectBumpKind(choices: readonly BumpKind[]): Promise<BumpKind>;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
}
