/** Config filename searched for from the working directory upwards */
export const CONFIG_FILENAME = "fndoc.toml";

/** Indent before a function name in help output */
export const NAME_INDENT = "  ";

/** Indent before every line of a comment block in help output */
export const COMMENT_INDENT = "    ";

/** Suffix dropped from a script name to get its base name */
export const SCRIPT_SUFFIX = ".sh";

/** Decorative comment rule: one of `#`, `-`, `=` repeated three or more times */
export const SEPARATOR_PATTERN = /^\s*([#=-])\1{2,}\s*$/;
