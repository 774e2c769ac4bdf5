import { open, type FileHandle } from "node:fs/promises";
import { SourceReadError } from "../errors";
import { debug } from "../logging";
import type { ExtractOptions, FilterCriterion, TextSink } from "../types";
import { formatRecord } from "./format";
import { scanLines, scanLineStream } from "./scanner";

async function openSource(file: string): Promise<FileHandle> {
  let handle: FileHandle | undefined;
  try {
    handle = await open(file, "r");
    const stats = await handle.stat();
    if (!stats.isFile()) {
      throw new Error("not a regular file");
    }
    return handle;
  } catch (cause) {
    await handle?.close();
    throw new SourceReadError(file, cause);
  }
}

/**
 * Read a script as UTF-8 lines. A last line without a terminator is still
 * yielded. Any read failure surfaces as SourceReadError.
 */
export async function* readSourceLines(file: string): AsyncGenerator<string> {
  const handle = await openSource(file);
  try {
    const lines = handle.readLines({ encoding: "utf8" })[Symbol.asyncIterator]();
    while (true) {
      let next: IteratorResult<string>;
      try {
        next = await lines.next();
      } catch (cause) {
        throw new SourceReadError(file, cause);
      }
      if (next.done) return;
      yield next.value;
    }
  } finally {
    await handle.close();
  }
}

// Same breaks readline splits on
function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}

function splitOptions(options: ExtractOptions): {
  output: TextSink;
  criterion: FilterCriterion;
} {
  const { output = process.stdout, target, prefix } = options;
  return { output, criterion: { target, prefix } };
}

/**
 * Write help for every documented function in a script file.
 * Resolves to the number of records written; finding nothing is not an error.
 *
 * @example
 * await extractAllComments("./deploy.sh", { prefix: "cmd_" });
 */
export async function extractAllComments(
  file: string,
  options: ExtractOptions = {},
): Promise<number> {
  const { output, criterion } = splitOptions(options);
  debug(`Scanning ${file}`);

  let written = 0;
  for await (const record of scanLineStream(readSourceLines(file), criterion)) {
    output.write(formatRecord(record));
    written++;
  }

  debug(`Found ${written} matching function(s) in ${file}`);
  return written;
}

/** Same as {@link extractAllComments}, for source already in memory */
export function extractFromText(text: string, options: ExtractOptions = {}): number {
  const { output, criterion } = splitOptions(options);

  let written = 0;
  for (const record of scanLines(splitLines(text), criterion)) {
    output.write(formatRecord(record));
    written++;
  }
  return written;
}

/**
 * Names of every confirmed function header in file order.
 * With a prefix, only names carrying it are returned; names are not stripped.
 */
export async function listFunctions(file: string, prefix?: string): Promise<string[]> {
  const names: string[] = [];
  for await (const record of scanLineStream(readSourceLines(file))) {
    if (!prefix || record.name.startsWith(prefix)) {
      names.push(record.name);
    }
  }
  return names;
}
