/**
 * Builds documentation blocks out of consecutive shell comment lines.
 * Decorative rules (`# -----`, `# =====`, `# #####`) and blank comment
 * lines are dropped; everything else is kept in order.
 */

import { COMMENT_INDENT, SEPARATOR_PATTERN } from "./constants";

const MARKER_PATTERN = /^\s*#[ \t]?/;

/**
 * Strip the leading `#` and at most one following space or tab.
 *
 * @example
 * cleanCommentLine("  # Greets the user.") // "Greets the user."
 * cleanCommentLine("#   indented")         // "  indented"
 */
export function cleanCommentLine(line: string): string {
  return line.replace(MARKER_PATTERN, "");
}

/** True for fragments that carry no documentation: blanks and separator rules */
export function isDecorativeFragment(fragment: string): boolean {
  return fragment.trim() === "" || SEPARATOR_PATTERN.test(fragment);
}

/**
 * Append one comment line to a block.
 * The first fragment becomes the block as-is; later ones go on their own
 * line behind the continuation indent, so the block can be printed under
 * a single leading indent.
 */
export function collectComment(block: string, commentLine: string): string {
  const fragment = cleanCommentLine(commentLine);
  if (isDecorativeFragment(fragment)) return block;

  if (block === "") return fragment;
  return `${block}\n${COMMENT_INDENT}${fragment}`;
}
