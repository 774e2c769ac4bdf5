import { extractAllComments } from "./core";
import type { ScriptDefinition } from "./dispatcher";
import { withHelpOption, type OptionDefinition, type OptionSpec } from "./options";
import { resolveScriptInfo } from "./script-info";
import type { TextSink } from "./types";

function optionLabel(key: string, definition: OptionDefinition): string {
  if (definition.kind === "flag") return `--${key}`;
  return `--${key}=<${definition.valueName ?? key}>`;
}

/** One aligned line per option, two spaces past the longest label */
export function renderOptionLines(spec: OptionSpec): string[] {
  const entries = Object.entries(spec).map(
    ([key, definition]) => [optionLabel(key, definition), definition.description] as const,
  );
  const width = Math.max(0, ...entries.map(([label]) => label.length)) + 2;
  return entries.map(([label, description]) => `  ${label.padEnd(width)}${description}`);
}

async function renderCommands(script: string, prefix?: string): Promise<string> {
  const chunks: string[] = [];
  const sink: TextSink = { write: (chunk: string) => chunks.push(chunk) };
  await extractAllComments(script, { prefix, output: sink });
  return chunks.join("").trimEnd();
}

/**
 * Full usage text for a script: synopsis, description, documented commands,
 * options and examples.
 */
export async function renderUsage<S extends OptionSpec>(
  definition: Pick<ScriptDefinition<S>, "script" | "prefix" | "description" | "options" | "examples">,
): Promise<string> {
  const { name } = resolveScriptInfo(definition.script);
  const commands = await renderCommands(definition.script, definition.prefix);
  const examples = definition.examples ?? [];

  const sections = [
    `USAGE:\n  ${name} <command> [options] [arguments]`,
    definition.description ?? "",
    `Commands:\n${commands || "  (none documented)"}`,
    `Options:\n${renderOptionLines(withHelpOption(definition.options)).join("\n")}`,
    examples.length > 0 ? `Examples:\n${examples.map((line) => `  ${line}`).join("\n")}` : "",
  ].filter((section) => section !== "");

  return `${sections.join("\n\n")}\n`;
}
