import { command } from "cmd-ts";
import { listFunctions } from "../../core";
import { raw } from "../../logging";
import { exitWithError, resolveScriptTarget, scriptArgs } from "../utils";

export const list = command({
  name: "list",
  description: "List function names declared in a script, one per line",
  args: scriptArgs,
  handler: async (args) => {
    try {
      const { script, prefix } = resolveScriptTarget(args);
      const names = await listFunctions(script, prefix);
      if (names.length > 0) {
        raw(names.join("\n"));
      }
    } catch (err) {
      exitWithError(err);
    }
  },
});
