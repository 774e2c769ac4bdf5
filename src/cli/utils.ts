import * as os from "node:os";
import { flag, option, optional, positional, string } from "cmd-ts";
import { loadConfig } from "../config";
import { FndocError } from "../errors";
import { colors, debug, fail, info, setVerbose } from "../logging";

/** Arguments every subcommand takes */
export const scriptArgs = {
  script: positional({
    type: optional(string),
    displayName: "script",
    description: "Shell script to read (defaults to `script` in fndoc.toml)",
  }),
  prefix: option({
    type: optional(string),
    long: "prefix",
    short: "p",
    description: "Only document functions with this prefix, shown without it",
  }),
  verbose: flag({
    long: "verbose",
    short: "v",
    description: "Log config lookup and scan progress",
  }),
};

export interface ScriptTarget {
  script: string;
  prefix?: string;
}

/**
 * Merge command-line arguments over the fndoc.toml found from `cwd`.
 * Exits when no script is given either way.
 */
export function resolveScriptTarget(
  args: { script?: string; prefix?: string; verbose: boolean },
  cwd: string = process.cwd(),
): ScriptTarget {
  setVerbose(args.verbose);
  const { config, path: configPath } = loadConfig(cwd);

  const script = args.script ?? config.script;
  if (!args.script && script && configPath) {
    debug(`Script ${shortenPath(script)} taken from ${shortenPath(configPath)}`);
  }
  if (!script) {
    fail("No script given");
    info(`Pass a script path, or set ${colors.bold("script")} in fndoc.toml`);
    process.exit(1);
  }

  return { script, prefix: args.prefix ?? config.prefix };
}

/** Report a library error and exit; anything unexpected is rethrown */
export function exitWithError(err: unknown): never {
  if (err instanceof FndocError) {
    fail(err.message);
    process.exit(1);
  }
  throw err;
}

/**
 * Shortens a path by replacing the home directory with ~
 */
export function shortenPath(filePath: string): string {
  const home = os.homedir();
  if (filePath.startsWith(home)) {
    return "~" + filePath.slice(home.length);
  }
  return filePath;
}
