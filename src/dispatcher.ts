/**
 * Runs a script's commands: parses `--key[=value]` options, answers
 * `--help` from the script's own comments, and dispatches the first
 * positional to the handler named `<prefix><command>`.
 */

import { extractAllComments } from "./core";
import { OptionError } from "./errors";
import {
  parseOptions,
  withHelpOption,
  type OptionSpec,
  type ParsedOptions,
  type ParseResult,
} from "./options";
import type { TextSink } from "./types";
import { renderUsage } from "./usage";

export type CommandHandler<S extends OptionSpec> = (
  args: string[],
  options: ParsedOptions<S>,
) => number | void | Promise<number | void>;

export interface ScriptDefinition<S extends OptionSpec> {
  /** Script whose comments document the commands */
  script: string;
  /** Prepended to a command to get its handler name, stripped again in help */
  prefix?: string;
  description?: string;
  options: S;
  /** Handlers keyed by full (prefixed) function name */
  commands: Record<string, CommandHandler<S>>;
  examples?: string[];
  stdout?: TextSink;
  stderr?: TextSink;
}

/**
 * Print help for one command, or for every command when none is given.
 * An unknown command prints nothing.
 */
export async function help(
  script: string,
  command?: string,
  prefix?: string,
  output?: TextSink,
): Promise<number> {
  const target = command ? `${prefix ?? ""}${command}` : undefined;
  return extractAllComments(script, { target, prefix, output });
}

export function findCommand<S extends OptionSpec>(
  commands: Record<string, CommandHandler<S>>,
  name: string,
): CommandHandler<S> | null {
  return Object.hasOwn(commands, name) ? commands[name] : null;
}

/**
 * Run a script definition against argv (without node and script path).
 * Resolves to the exit status; the caller decides when to exit.
 */
export async function runScript<S extends OptionSpec>(
  argv: readonly string[],
  definition: ScriptDefinition<S>,
): Promise<number> {
  const stdout = definition.stdout ?? process.stdout;
  const stderr = definition.stderr ?? process.stderr;
  const prefix = definition.prefix ?? "";

  let parsed: ParseResult<S>;
  try {
    parsed = parseOptions(argv, withHelpOption(definition.options));
  } catch (err) {
    if (err instanceof OptionError) {
      stderr.write(`${err.message}\n`);
      return 1;
    }
    throw err;
  }

  const { options, positionals } = parsed;

  if (options.isSet("help")) {
    await help(definition.script, positionals[0], definition.prefix, stdout);
    return 0;
  }

  const [command, ...args] = positionals;
  if (!command) {
    stderr.write(await renderUsage(definition));
    return 1;
  }

  const handler = findCommand(definition.commands, `${prefix}${command}`);
  if (!handler) {
    stderr.write(`Error: Command ${command} is not recognized.\n`);
    return 1;
  }

  const status = await handler(args, options);
  return typeof status === "number" ? status : 0;
}
