/**
 * Resolves the bare function name out of a header line.
 *
 * Forms are tried in order. A header using both the keyword and
 * parentheses must hit the first rule, otherwise the third one would
 * take `function` itself as the name.
 */

interface HeaderForm {
  matches: (line: string) => boolean;
  /** Index of the whitespace-delimited token holding the name */
  token: number;
}

const HEADER_FORMS: readonly HeaderForm[] = [
  // function name() / function name () {
  { matches: (line) => /^function\s+\S.*\(/.test(line), token: 1 },
  // function name
  { matches: (line) => /^function\s+\S/.test(line), token: 1 },
  // name()
  { matches: (line) => line.includes("()"), token: 0 },
];

function stripHeaderSyntax(token: string): string {
  return token
    .replace(/\{$/, "")
    .replace(/\(\)$/, "")
    .replace(/\s+/g, "");
}

/** Returns "" when the line is not a recognised header */
export function resolveFunctionName(line: string): string {
  const trimmed = line.trim();
  const form = HEADER_FORMS.find((candidate) => candidate.matches(trimmed));
  if (!form) return "";

  const token = trimmed.split(/\s+/)[form.token] ?? "";
  return stripHeaderSyntax(token);
}
