import { createConsola, LogLevels } from "consola";
import pc from "picocolors";

export const colors = {
  bold: pc.bold,
} as const;

export const logger = createConsola();

/** Toggle debug output (scan progress, config lookup) */
export function setVerbose(verbose: boolean) {
  logger.level = verbose ? LogLevels.debug : LogLevels.info;
}

export function info(message: string, ...args: unknown[]) {
  logger.info(message, ...args);
}

export function error(message: string, ...args: unknown[]) {
  logger.error(message, ...args);
}

export function debug(message: string, ...args: unknown[]) {
  logger.debug(message, ...args);
}

/** Output raw content without tags (for help text, lists, piping) */
export function raw(message: string) {
  console.log(message);
}

export function fail(message: string, ...args: unknown[]) {
  logger.fail(message, ...args);
}
