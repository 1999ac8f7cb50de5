/*
Purpose: error types shared by the index build and the CLI.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new GitError("..."); throw new UserFacingError({ code, title, message, hint, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class SchemaIndexError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "SchemaIndexError";
  }
}

export class ConfigError extends SchemaIndexError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends SchemaIndexError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export class SchemaDocumentError extends SchemaIndexError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "SchemaDocumentError";
  }
}

export class CatalogError extends SchemaIndexError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "CatalogError";
  }
}

export class OutputError extends SchemaIndexError {
  constructor(
    message: string,
    public readonly outputPath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "OutputError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  integrity: "INTEGRITY_ERROR",
  io: "IO_ERROR",
  catalog: "CATALOG_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.cause = input.cause;
  }
}
