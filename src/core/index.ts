export { classifyLine, isFunctionStart, isOpenBraceLine, opensBody } from "./classify";
export { resolveFunctionName } from "./header";
export { formatRecord, selectDisplayName } from "./format";
export { FunctionScanner, scanLines, scanLineStream } from "./scanner";
export {
  extractAllComments,
  extractFromText,
  listFunctions,
  readSourceLines,
} from "./extract";
