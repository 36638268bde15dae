/**
 * Deterministic error codes for taggr
 *
 * Format: TG_<AREA>_<NUMBER>
 *
 * Areas:
 * - VERSION: version computation
 * - REPO: repository state and git commands
 * - CONFIG: configuration file
 * - INPUT: interactive input
 */

export const ErrorCodes = {
  // VERSION errors (001-099)
  VERSION_OVERFLOW: "TG_VERSION_001",

  // REPO errors (100-199)
  NOT_A_REPOSITORY: "TG_REPO_101",
  BRANCH_NOT_ALLOWED: "TG_REPO_102",
  TAG_EXISTS: "TG_REPO_103",
  GIT_COMMAND_FAILED: "TG_REPO_104",
  TAG_WRITE_FAILED: "TG_REPO_105",

  // CONFIG errors (200-299)
  CONFIG_INVALID: "TG_CONFIG_201",

  // INPUT errors (300-399)
  INVALID_INPUT: "TG_INPUT_301",
  PROMPT_CANCELLED: "TG_INPUT_302",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Default message for each error code
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.VERSION_OVERFLOW]: "Version component cannot be incremented any further",

  [ErrorCodes.NOT_A_REPOSITORY]: "Not a git repository",
  [ErrorCodes.BRANCH_NOT_ALLOWED]: "Tagging is not allowed on the current branch",
  [ErrorCodes.TAG_EXISTS]: "Tag already exists",
  [ErrorCodes.GIT_COMMAND_FAILED]: "Git command failed",
  [ErrorCodes.TAG_WRITE_FAILED]: "Failed to create tag",

  [ErrorCodes.CONFIG_INVALID]: "Configuration file is invalid",

  [ErrorCodes.INVALID_INPUT]: "Invalid input",
  [ErrorCodes.PROMPT_CANCELLED]: "Prompt cancelled",
};

/**
 * Structured error with deterministic error code
 */
export class TaggrError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public override readonly cause?: Error;

  constructor(code: ErrorCode, message?: string, options?: { details?: unknown; cause?: Error }) {
    super(message ?? ErrorMessages[code], { cause: options?.cause });

    this.name = "TaggrError";
    this.code = code;
    this.details = options?.details;
    this.cause = options?.cause;

    Error.captureStackTrace?.(this, TaggrError);
  }

  /**
   * Format error for user display
   */
  toUserString(verbose = false): string {
    const parts: string[] = [`[${this.code}] ${this.message}`];

    if (verbose && this.details) {
      parts.push(`\nDetails: ${JSON.stringify(this.details, null, 2)}`);
    }

    if (verbose && this.cause) {
      parts.push(`\nCaused by: ${this.cause.message}`);
    }

    return parts.join("");
  }
}

export function isTaggrError(error: unknown): error is TaggrError {
  return error instanceof TaggrError;
}

/**
 * Wrap an unknown error in a TaggrError
 */
export function wrapError(error: unknown, code: ErrorCode, message?: string): TaggrError {
  if (error instanceof TaggrError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new TaggrError(code, message, { cause });
}
