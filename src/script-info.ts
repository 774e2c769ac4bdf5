import * as path from "node:path";
import { SCRIPT_SUFFIX } from "./constants";

export interface ScriptInfo {
  /** File name as invoked, without directories */
  name: string;
  /** Absolute directory holding the script */
  dir: string;
  /** Absolute path to the script */
  file: string;
  /** Name without the .sh suffix */
  base: string;
}

export function resolveScriptInfo(scriptPath: string): ScriptInfo {
  const file = path.resolve(scriptPath);
  const name = path.basename(file);
  return {
    name,
    dir: path.dirname(file),
    file,
    base: path.basename(file, SCRIPT_SUFFIX),
  };
}
