#!/usr/bin/env node
import { run, subcommands } from "cmd-ts";
import { doc } from "./commands/doc";
import { list } from "./commands/list";
import { usage } from "./commands/usage";
import { error } from "../logging";

// cmd-ts calls process.exit(1) for --help, override to exit 0
const isHelp = process.argv.includes("--help") || process.argv.includes("-h");
if (isHelp) {
  const originalExit = process.exit;
  process.exit = (() => originalExit(0)) as typeof process.exit;
}

const app = subcommands({
  name: "fndoc",
  description: "Show shell script functions with their documentation comments",
  version: "0.1.0",
  cmds: {
    doc,
    list,
    usage,
  },
});

run(app, process.argv.slice(2)).catch((e) => {
  error(String(e));
  process.exit(1);
});
