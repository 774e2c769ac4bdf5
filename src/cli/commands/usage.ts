import { command, option, optional, string } from "cmd-ts";
import { DEFAULT_OPTIONS } from "../../options";
import { renderUsage } from "../../usage";
import { exitWithError, resolveScriptTarget, scriptArgs } from "../utils";

export const usage = command({
  name: "usage",
  description: "Print full usage text for a script built on the dispatcher",
  args: {
    ...scriptArgs,
    description: option({
      type: optional(string),
      long: "description",
      short: "d",
      description: "Paragraph shown under the synopsis",
    }),
  },
  handler: async (args) => {
    try {
      const { script, prefix } = resolveScriptTarget(args);
      const text = await renderUsage({
        script,
        prefix,
        description: args.description,
        options: DEFAULT_OPTIONS,
      });
      process.stdout.write(text);
    } catch (err) {
      exitWithError(err);
    }
  },
});
