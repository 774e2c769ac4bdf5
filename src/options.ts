/**
 * `--key` / `--key=value` argument parser for script commands.
 *
 * Every key must be declared up front; the parser never derives variable
 * names from user input. Values land in typed accessors instead.
 */

import { OptionError } from "./errors";

export type OptionKind = "flag" | "value";

export interface OptionDefinition {
  kind: OptionKind;
  description: string;
  /** Placeholder shown in usage for value options, e.g. `--file=<file>` */
  valueName?: string;
}

export type OptionSpec = Record<string, OptionDefinition>;

export type FlagKey<S extends OptionSpec> = {
  [K in keyof S & string]: S[K]["kind"] extends "flag" ? K : never;
}[keyof S & string];

export type ValueKey<S extends OptionSpec> = {
  [K in keyof S & string]: S[K]["kind"] extends "value" ? K : never;
}[keyof S & string];

// Same shape the argument has to start with to be treated as an option at all
const OPTION_START = /^--[a-zA-Z0-9][-_a-zA-Z0-9]*/;

export class ParsedOptions<S extends OptionSpec> {
  private readonly flags = new Set<string>();
  private readonly values = new Map<string, string>();

  /** Whether a flag was passed */
  flag(key: FlagKey<S>): boolean {
    return this.flags.has(key);
  }

  /** The last value given for an option, if any */
  value(key: ValueKey<S>): string | undefined {
    return this.values.get(key);
  }

  /** Untyped presence check, for keys the caller adds to the spec itself */
  isSet(key: string): boolean {
    return this.flags.has(key) || this.values.has(key);
  }

  /** Keys that were given on the command line */
  keys(): string[] {
    return [...this.flags, ...this.values.keys()];
  }

  /** @internal */
  setFlag(key: string): void {
    this.flags.add(key);
  }

  /** @internal */
  setValue(key: string, value: string): void {
    this.values.set(key, value);
  }
}

export interface ParseResult<S extends OptionSpec> {
  options: ParsedOptions<S>;
  positionals: string[];
}

function lookupDefinition(spec: OptionSpec, key: string, arg: string): OptionDefinition {
  if (!Object.hasOwn(spec, key)) {
    throw new OptionError(`Unknown option: --${key}`, arg);
  }
  return spec[key];
}

/**
 * Split argv into declared options and positionals (order preserved).
 * Options may appear anywhere; the last occurrence of a key wins.
 *
 * @throws OptionError for malformed, unknown or mistyped options
 */
export function parseOptions<S extends OptionSpec>(argv: readonly string[], spec: S): ParseResult<S> {
  const options = new ParsedOptions<S>();
  const positionals: string[] = [];

  for (const arg of argv) {
    const match = OPTION_START.exec(arg);
    if (!match) {
      positionals.push(arg);
      continue;
    }

    const key = match[0].slice(2);
    const rest = arg.slice(match[0].length);

    if (rest !== "" && !rest.startsWith("=")) {
      throw new OptionError(`Invalid argument format: ${arg}`, arg);
    }

    const definition = lookupDefinition(spec, key, arg);

    if (rest === "") {
      if (definition.kind !== "flag") {
        throw new OptionError(`Option --${key} requires a value`, arg);
      }
      options.setFlag(key);
    } else {
      if (definition.kind !== "value") {
        throw new OptionError(`Option --${key} does not take a value`, arg);
      }
      options.setValue(key, rest.slice(1));
    }
  }

  return { options, positionals };
}

export const HELP_OPTION = {
  kind: "flag",
  description: "Show this help message and exit.",
} as const satisfies OptionDefinition;

/** Options most scripts take; pass them (or a superset) as a script's spec */
export const DEFAULT_OPTIONS = {
  verbose: {
    kind: "flag",
    description: "Enable verbose mode for more detailed output.",
  },
  file: {
    kind: "value",
    valueName: "file",
    description: "Specify a file to be used by the command.",
  },
} as const satisfies OptionSpec;

/** The spec with `--help` declared first, unless the spec declares its own */
export function withHelpOption<S extends OptionSpec>(spec: S): S {
  return { help: HELP_OPTION, ...spec };
}
