/**
 * Boolean checks for command handlers: strings, integer strings, paths and
 * file attributes. File checks are synchronous and report false instead of
 * throwing.
 */

import { accessSync, constants, lstatSync, statSync, type Stats } from "node:fs";
import { isAbsolute } from "node:path";

const INTEGER_PATTERN = /^-?[0-9]+$/;
const POSITIVE_DIGITS = /^[0-9]+$/;

// Strings

export function isEmpty(value: string | undefined): boolean {
  return !value;
}

export function isNotEmpty(value: string | undefined): boolean {
  return !!value;
}

export function isEmptyOrWhitespace(value: string | undefined): boolean {
  return !value || value.trim() === "";
}

export function isEqual(a: string, b: string): boolean {
  return a === b;
}

export function isNotEqual(a: string, b: string): boolean {
  return a !== b;
}

export function startsWith(value: string, prefix: string): boolean {
  return value.startsWith(prefix);
}

export function endsWith(value: string, suffix: string): boolean {
  return value.endsWith(suffix);
}

export function containsSubstring(value: string, substring: string): boolean {
  return value.includes(substring);
}

// Integers

/** Optional leading minus followed by digits */
export function isInteger(value: string): boolean {
  return INTEGER_PATTERN.test(value);
}

/** Digits only, and not zero */
export function isPositiveInteger(value: string): boolean {
  return POSITIVE_DIGITS.test(value) && BigInt(value) > 0n;
}

function toInteger(value: string): bigint | null {
  return isInteger(value) ? BigInt(value) : null;
}

/** Runs the comparison only when both operands are integer strings */
function compareIntegers(
  a: string,
  b: string,
  compare: (x: bigint, y: bigint) => boolean,
): boolean {
  const x = toInteger(a);
  const y = toInteger(b);
  if (x === null || y === null) return false;
  return compare(x, y);
}

export function isIntEqual(a: string, b: string): boolean {
  return compareIntegers(a, b, (x, y) => x === y);
}

export function isIntNotEqual(a: string, b: string): boolean {
  return compareIntegers(a, b, (x, y) => x !== y);
}

export function isIntLess(a: string, b: string): boolean {
  return compareIntegers(a, b, (x, y) => x < y);
}

export function isIntLessEqual(a: string, b: string): boolean {
  return compareIntegers(a, b, (x, y) => x <= y);
}

export function isIntGreater(a: string, b: string): boolean {
  return compareIntegers(a, b, (x, y) => x > y);
}

export function isIntGreaterEqual(a: string, b: string): boolean {
  return compareIntegers(a, b, (x, y) => x >= y);
}

/** Inclusive on both ends */
export function isBetween(value: string, low: string, high: string): boolean {
  return isIntGreaterEqual(value, low) && isIntLessEqual(value, high);
}

export function isOdd(value: string): boolean {
  const n = toInteger(value);
  return n !== null && n % 2n !== 0n;
}

export function isEven(value: string): boolean {
  const n = toInteger(value);
  return n !== null && n % 2n === 0n;
}

// Paths

export function isAbsolutePath(path: string): boolean {
  return isAbsolute(path);
}

export function isRelativePath(path: string): boolean {
  return !isAbsolute(path);
}

// File attributes

function safeStat(path: string): Stats | null {
  try {
    return statSync(path);
  } catch {
    return null;
  }
}

function hasAccess(path: string, mode: number): boolean {
  try {
    accessSync(path, mode);
    return true;
  } catch {
    return false;
  }
}

export function fileExists(path: string): boolean {
  return safeStat(path) !== null;
}

export function isFile(path: string): boolean {
  return safeStat(path)?.isFile() ?? false;
}

export function isDir(path: string): boolean {
  return safeStat(path)?.isDirectory() ?? false;
}

/** Checks the link itself, not its target */
export function isSymlink(path: string): boolean {
  try {
    return lstatSync(path).isSymbolicLink();
  } catch {
    return false;
  }
}

export function isReadable(path: string): boolean {
  return hasAccess(path, constants.R_OK);
}

export function isWritable(path: string): boolean {
  return hasAccess(path, constants.W_OK);
}

export function isExecutable(path: string): boolean {
  return hasAccess(path, constants.X_OK);
}

/** Exists and has a size greater than zero */
export function fileNotEmpty(path: string): boolean {
  return (safeStat(path)?.size ?? 0) > 0;
}

export function isReadableFile(path: string): boolean {
  return isFile(path) && isReadable(path);
}

export function isWritableDir(path: string): boolean {
  return isDir(path) && isWritable(path);
}

export function fileIsExecutable(path: string): boolean {
  return isFile(path) && isExecutable(path);
}
