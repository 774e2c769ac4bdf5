import { COMMENT_INDENT, NAME_INDENT } from "../constants";
import type { FilterCriterion, FunctionRecord } from "../types";

/**
 * Apply the filter to a resolved function name.
 * Returns the name to display, or null when the function is suppressed.
 */
export function selectDisplayName(
  name: string,
  criterion: FilterCriterion = {},
): string | null {
  const { target, prefix } = criterion;

  if (target && name !== target) return null;
  if (!prefix) return name;
  if (!name.startsWith(prefix)) return null;

  return name.slice(prefix.length);
}

/**
 * Render one record. A documented function is followed by a blank line;
 * an undocumented one is just its name line.
 *
 * @example
 * formatRecord({ name: "hello", comment: "Greets the user." })
 * // "  hello\n    Greets the user.\n\n"
 */
export function formatRecord(record: FunctionRecord): string {
  const nameLine = `${NAME_INDENT}${record.name}\n`;
  if (record.comment === "") return nameLine;
  return `${nameLine}${COMMENT_INDENT}${record.comment}\n\n`;
}
