import { collectComment } from "../comment-parser";
import type { FilterCriterion, FunctionRecord, ScanState } from "../types";
import { classifyLine } from "./classify";
import { selectDisplayName } from "./format";
import { resolveFunctionName } from "./header";

/**
 * Line-at-a-time state machine pairing function headers with the comment
 * block directly above them.
 *
 * A header without a brace is held for exactly one line. If that line is
 * not a lone `{`, the header and its comment block are dropped and the
 * line itself is consumed without being classified again.
 */
export class FunctionScanner {
  private block = "";
  private pendingHeader: string | null = null;

  constructor(private readonly criterion: FilterCriterion = {}) {}

  get state(): ScanState {
    return this.pendingHeader === null ? "idle" : "awaiting-brace";
  }

  /** The comment block accumulated so far */
  get currentBlock(): string {
    return this.block;
  }

  /** Feed the next line; returns a record when it completes an emitted function */
  push(line: string): FunctionRecord | null {
    if (this.pendingHeader !== null) {
      return this.confirmPending(line);
    }

    switch (classifyLine(line)) {
      case "comment":
        this.block = collectComment(this.block, line);
        return null;
      case "inline-header":
        return this.complete(line);
      case "bare-header":
        this.pendingHeader = line;
        return null;
      default:
        this.block = "";
        return null;
    }
  }

  /** End of input: anything still pending is discarded */
  finish(): void {
    this.block = "";
    this.pendingHeader = null;
  }

  private confirmPending(line: string): FunctionRecord | null {
    const header = this.pendingHeader ?? "";
    this.pendingHeader = null;

    if (classifyLine(line) !== "open-brace") {
      this.block = "";
      return null;
    }
    return this.complete(header);
  }

  private complete(header: string): FunctionRecord | null {
    const comment = this.block;
    this.block = "";

    const name = resolveFunctionName(header);
    if (name === "") return null;

    const displayName = selectDisplayName(name, this.criterion);
    if (displayName === null) return null;

    return { name: displayName, comment };
  }
}

/** Stream records out of a sequence of lines, in order */
export function* scanLines(
  lines: Iterable<string>,
  criterion: FilterCriterion = {},
): Generator<FunctionRecord> {
  const scanner = new FunctionScanner(criterion);
  for (const line of lines) {
    const record = scanner.push(line);
    if (record) yield record;
  }
  scanner.finish();
}

/** Async counterpart of {@link scanLines} for line streams */
export async function* scanLineStream(
  lines: AsyncIterable<string>,
  criterion: FilterCriterion = {},
): AsyncGenerator<FunctionRecord> {
  const scanner = new FunctionScanner(criterion);
  for await (const line of lines) {
    const record = scanner.push(line);
    if (record) yield record;
  }
  scanner.finish();
}
