/*
Purpose: core error types used across the generation pipeline and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new ConfigError("...", issues); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class ZoneforgeError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ZoneforgeError";
  }
}

export class ConfigError extends ZoneforgeError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export type ValidationIssueKind =
  | "missing_app"
  | "duplicate_name"
  | "duplicate_prefix"
  | "duplicate_app"
  | "empty_apps";

export type ValidationIssue = {
  kind: ValidationIssueKind;
  zone: string;
  message: string;
  app?: string;
  conflictsWith?: string;
};

export class ValidationError extends ZoneforgeError {
  constructor(public readonly issues: ValidationIssue[]) {
    super(`Zone validation failed with ${issues.length} issue(s).`);
    this.name = "ValidationError";
  }
}

export class ExtractionError extends ZoneforgeError {
  constructor(
    public readonly zone: string,
    message: string,
    public readonly diagnostic?: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ExtractionError";
  }
}

export class ArchiveError extends ZoneforgeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ArchiveError";
  }
}

export type MissingDependency = {
  language: string;
  tool: string;
  detail: string;
};

export class MissingDependencyError extends ZoneforgeError {
  constructor(public readonly missing: MissingDependency[]) {
    super(`Missing generator tools: ${missing.map((dep) => dep.tool).join(", ")}`);
    this.name = "MissingDependencyError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  validation: "VALIDATION_ERROR",
  dependency: "DEPENDENCY_ERROR",
  extraction: "EXTRACTION_ERROR",
  generation: "GENERATION_ERROR",
  archive: "ARCHIVE_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  details?: string[];
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly details: string[];
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.details = input.details ?? [];
    this.cause = input.cause;
  }
}

// =============================================================================
// MAPPING
// =============================================================================

export function toUserFacingError(error: unknown): UserFacingError | null {
  if (error instanceof UserFacingError) return error;

  if (error instanceof ValidationError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.validation,
      title: "Zone configuration is invalid.",
      message: error.message,
      details: error.issues.map((issue) => issue.message),
      hint: "Fix every listed zone before generating; no generation tasks were scheduled.",
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Configuration error.",
      message: error.message,
      details: error.issues,
      hint: "Check zoneforge.yaml or run `zoneforge init` to create a starter config.",
      cause: error,
    });
  }

  if (error instanceof MissingDependencyError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.dependency,
      title: "Generator tools are missing.",
      message: error.message,
      details: error.missing.map((dep) => `${dep.language}: ${dep.tool} (${dep.detail})`),
      hint: "Install the tools yourself or run `zoneforge deps install`.",
      next: "Re-run with --install-deps to install them before generating.",
      cause: error,
    });
  }

  if (error instanceof ArchiveError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.archive,
      title: "Archiving failed.",
      message: error.message,
      hint: "Generated clients were left in place under clients/.",
      cause: error,
    });
  }

  return null;
}
