import { command, optional, positional, string } from "cmd-ts";
import { help } from "../../dispatcher";
import { debug } from "../../logging";
import { exitWithError, resolveScriptTarget, scriptArgs, shortenPath } from "../utils";

export const doc = command({
  name: "doc",
  description: "Print each function in a script with the comment above it",
  args: {
    ...scriptArgs,
    name: positional({
      type: optional(string),
      displayName: "command",
      description: "Only show this command (prefix is added automatically)",
    }),
  },
  handler: async (args) => {
    try {
      const { script, prefix } = resolveScriptTarget(args);
      const written = await help(script, args.name, prefix);
      if (written === 0) {
        debug(`Nothing documented in ${shortenPath(script)}`);
      }
    } catch (err) {
      exitWithError(err);
    }
  },
});
