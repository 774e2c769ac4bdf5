import type { LineKind } from "../types";

const COMMENT_LINE = /^\s*#/;
const FUNCTION_KEYWORD = /^function\s+\S/;
const EMPTY_PARENS = "()";
// `name() {`, `function name {`, `function name() {` followed by a body on the same line
const BODY_OPENER = /(\(\)|^\s*function\s+[^\s(){]+)\s*\{(\s|$)/;

/** A header line: `function name ...` or anything containing `()` */
export function isFunctionStart(line: string): boolean {
  return FUNCTION_KEYWORD.test(line.trimStart()) || line.includes(EMPTY_PARENS);
}

/** A header whose opening brace is on the same line */
export function opensBody(line: string): boolean {
  return line.trimEnd().endsWith("{") || BODY_OPENER.test(line);
}

export function isOpenBraceLine(line: string): boolean {
  return line.trim() === "{";
}

/**
 * Classify one source line. Checks run in priority order, so a comment
 * mentioning `name()` is still a comment.
 */
export function classifyLine(line: string): LineKind {
  if (COMMENT_LINE.test(line)) return "comment";
  if (isFunctionStart(line)) {
    return opensBody(line) ? "inline-header" : "bare-header";
  }
  if (isOpenBraceLine(line)) return "open-brace";
  return "other";
}
