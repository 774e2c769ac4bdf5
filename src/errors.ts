export type ErrorCode = "SOURCE_UNREADABLE" | "INVALID_OPTION" | "INVALID_CONFIG";

/**
 * Base class for errors raised by the library.
 * The CLI entry is the only place these are turned into exit codes.
 */
export class FndocError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FndocError";
    this.code = code;
  }
}

/** The script source could not be opened or read to the end */
export class SourceReadError extends FndocError {
  public readonly file: string;

  constructor(file: string, cause?: unknown) {
    super(`Cannot read script source ${file}: ${describeCause(cause)}`, "SOURCE_UNREADABLE", {
      cause,
    });
    this.name = "SourceReadError";
    this.file = file;
  }
}

/** A command-line argument is malformed or not on the allow-list */
export class OptionError extends FndocError {
  public readonly argument: string;

  constructor(message: string, argument: string) {
    super(message, "INVALID_OPTION");
    this.name = "OptionError";
    this.argument = argument;
  }
}

export class ConfigError extends FndocError {
  public readonly configPath: string;
  /** One entry per problem, formatted as `path: message` */
  public readonly issues: string[];

  constructor(configPath: string, issues: string[], cause?: unknown) {
    super(`Invalid config in ${configPath}`, "INVALID_CONFIG", { cause });
    this.name = "ConfigError";
    this.configPath = configPath;
    this.issues = issues;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return "unknown error";
  return String(cause);
}
