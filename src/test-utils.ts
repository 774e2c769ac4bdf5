import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { TextSink } from "./types";

/**
 * Writes a shell script into `dir` and returns its path.
 * Lines are joined with "\n"; pass a trailing "" to end with a newline.
 */
export async function createScript(
  dir: string,
  lines: string[],
  name = "tool.sh",
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const scriptPath = path.join(dir, name);
  await writeFile(scriptPath, lines.join("\n"));
  return scriptPath;
}

/** A sink that keeps everything written to it */
export function memorySink(): TextSink & { text(): string } {
  const chunks: string[] = [];
  return {
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
    text() {
      return chunks.join("");
    },
  };
}
