// Public API
export type {
  ExtractOptions,
  FilterCriterion,
  FunctionRecord,
  LineKind,
  ScanState,
  TextSink,
} from "./types";
export {
  classifyLine,
  resolveFunctionName,
  selectDisplayName,
  formatRecord,
  FunctionScanner,
  scanLines,
  scanLineStream,
  extractAllComments,
  extractFromText,
  listFunctions,
  readSourceLines,
} from "./core";
export { cleanCommentLine, collectComment, isDecorativeFragment } from "./comment-parser";
export * from "./predicates";
export {
  parseOptions,
  ParsedOptions,
  withHelpOption,
  HELP_OPTION,
  DEFAULT_OPTIONS,
  type OptionDefinition,
  type OptionKind,
  type OptionSpec,
  type ParseResult,
} from "./options";
export {
  runScript,
  help,
  findCommand,
  type CommandHandler,
  type ScriptDefinition,
} from "./dispatcher";
export { renderUsage, renderOptionLines } from "./usage";
export { resolveScriptInfo, type ScriptInfo } from "./script-info";
export { loadConfig, parseConfigFile, findConfigFile, type FndocConfig } from "./config";
export { FndocError, SourceReadError, OptionError, ConfigError, type ErrorCode } from "./errors";
