import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "node:fs";
import path from "node:path";
import os from "node:os";
import { findCommand, help, runScript, type ScriptDefinition } from "./dispatcher";
import { DEFAULT_OPTIONS } from "./options";
import { createScript, memorySink } from "./test-utils";

const TOOL_SCRIPT = [
  "#!/bin/sh",
  "",
  "# Greets someone.",
  "# Args: name",
  "cmd_hello() {",
  "  :",
  "}",
  "",
  "# Says goodbye.",
  "function cmd_goodbye",
  "{",
  "  :",
  "}",
  "",
  "internal() {",
  "}",
  "",
];

describe("runScript", () => {
  let tempDir: string;
  let script: string;
  let stdout: ReturnType<typeof memorySink>;
  let stderr: ReturnType<typeof memorySink>;
  let calls: Array<{ args: string[]; verbose: boolean; file?: string }>;
  let definition: ScriptDefinition<typeof DEFAULT_OPTIONS>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "fndoc-dispatch-"));
    script = await createScript(tempDir, TOOL_SCRIPT);
    stdout = memorySink();
    stderr = memorySink();
    calls = [];
    definition = {
      script,
      prefix: "cmd_",
      options: DEFAULT_OPTIONS,
      commands: {
        cmd_hello: (args, options) => {
          calls.push({ args, verbose: options.flag("verbose"), file: options.value("file") });
        },
        cmd_goodbye: () => 3,
      },
      stdout,
      stderr,
    };
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("dispatches the first positional to the prefixed handler", async () => {
    const status = await runScript(["hello", "World", "--verbose", "--file=out.txt"], definition);

    expect(status).toBe(0);
    expect(calls).toEqual([{ args: ["World"], verbose: true, file: "out.txt" }]);
  });

  it("returns the handler's status", async () => {
    await expect(runScript(["goodbye"], definition)).resolves.toBe(3);
  });

  it("rejects unknown commands", async () => {
    const status = await runScript(["nope"], definition);

    expect(status).toBe(1);
    expect(stderr.text()).toBe("Error: Command nope is not recognized.\n");
    expect(calls).toEqual([]);
  });

  it("does not resolve commands through the prototype", async () => {
    const status = await runScript(["constructor"], { ...definition, prefix: "" });

    expect(status).toBe(1);
    expect(stderr.text()).toBe("Error: Command constructor is not recognized.\n");
  });

  it("reports invalid options on stderr", async () => {
    const status = await runScript(["hello", "--color"], definition);

    expect(status).toBe(1);
    expect(stderr.text()).toBe("Unknown option: --color\n");
    expect(calls).toEqual([]);
  });

  it("prints help for every command", async () => {
    const status = await runScript(["--help"], definition);

    expect(status).toBe(0);
    expect(stdout.text()).toBe(
      "  hello\n    Greets someone.\n    Args: name\n\n  goodbye\n    Says goodbye.\n\n",
    );
  });

  it("prints help for one command", async () => {
    await runScript(["goodbye", "--help"], definition);
    expect(stdout.text()).toBe("  goodbye\n    Says goodbye.\n\n");
  });

  it("prints usage on stderr when no command is given", async () => {
    const status = await runScript([], definition);

    expect(status).toBe(1);
    expect(stderr.text().startsWith("USAGE:\n  tool.sh <command> [options] [arguments]\n\n")).toBe(
      true,
    );
    expect(stdout.text()).toBe("");
  });

  it("propagates handler errors", async () => {
    definition.commands.cmd_hello = () => {
      throw new Error("boom");
    };
    await expect(runScript(["hello"], definition)).rejects.toThrow("boom");
  });
});

describe("help", () => {
  let tempDir: string;
  let script: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "fndoc-help-"));
    script = await createScript(tempDir, TOOL_SCRIPT);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("prints every function without a prefix", async () => {
    const output = memorySink();
    await help(script, undefined, undefined, output);
    expect(output.text()).toBe(
      "  cmd_hello\n    Greets someone.\n    Args: name\n\n" +
        "  cmd_goodbye\n    Says goodbye.\n\n" +
        "  internal\n",
    );
  });

  it("prints nothing for an unknown command", async () => {
    const output = memorySink();
    await expect(help(script, "missing", "cmd_", output)).resolves.toBe(0);
    expect(output.text()).toBe("");
  });
});

describe("findCommand", () => {
  it("only finds own handlers", () => {
    const handler = () => 0;
    expect(findCommand({ run: handler }, "run")).toBe(handler);
    expect(findCommand({ run: handler }, "toString")).toBeNull();
  });
});
