/** Category of a single source line, decided without looking at neighbours */
export type LineKind =
  | "comment"
  | "inline-header"
  | "bare-header"
  | "open-brace"
  | "other";

export type ScanState = "idle" | "awaiting-brace";

/**
 * Which functions to emit.
 * The target is compared with the full resolved name, before the prefix is stripped.
 */
export interface FilterCriterion {
  /** Only emit the function with exactly this name */
  target?: string;
  /** Only emit functions carrying this prefix, and strip it from the displayed name */
  prefix?: string;
}

/** A confirmed function header and the comment block written directly above it */
export interface FunctionRecord {
  name: string;
  comment: string;
}

/** Anything help text can be written to (process.stdout, a stream, a test buffer) */
export interface TextSink {
  write(chunk: string): unknown;
}

export interface ExtractOptions extends FilterCriterion {
  /** Defaults to process.stdout */
  output?: TextSink;
}
