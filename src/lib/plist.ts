import { readFileSync } from "fs";
import { writeFile } from "fs/promises";
import * as plist from "plist";
import type { PlistArray, PlistObject, PlistValue } from "plist";
import { NodefredError, NodefredErrorCode, describeError } from "./errors";
import { runSync } from "./exec";

const BINARY_HEADER = "bplist00";

/**
 * Read a property list. Binary lists (what macOS writes for most
 * preferences) are converted to XML with `plutil` first.
 */
export function readPlistFile(path: string): PlistValue {
  let raw: Buffer;
  try {
    raw = readFileSync(path);
  } catch (err) {
    throw new NodefredError(NodefredErrorCode.PREFERENCES_UNAVAILABLE, `Cannot read ${path}`, {
      cause: describeError(err),
    });
  }

  const xml = raw.subarray(0, BINARY_HEADER.length).toString("latin1") === BINARY_HEADER
    ? convertBinary(path)
    : raw.toString("utf8");

  try {
    return plist.parse(xml);
  } catch (err) {
    throw new NodefredError(NodefredErrorCode.PREFERENCES_UNAVAILABLE, `Invalid property list ${path}: ${describeError(err)}`);
  }
}

/**
 * Read a property list whose root must be a dictionary.
 */
export function readPlistObject(path: string): PlistObject {
  const value = readPlistFile(path);
  if (!isPlistObject(value)) {
    throw new NodefredError(NodefredErrorCode.PREFERENCES_UNAVAILABLE, `Expected a dictionary at the root of ${path}`);
  }
  return value;
}

/**
 * Write an XML property list with dictionary keys sorted.
 */
export async function writePlistFile(path: string, value: PlistValue): Promise<void> {
  await writeFile(path, plist.build(sortKeys(value)) + "\n");
}

export function isPlistObject(value: PlistValue | undefined): value is PlistObject {
  return (
    typeof value === "object" &&
    !isPlistArray(value) &&
    !(value instanceof Date) &&
    !Buffer.isBuffer(value)
  );
}

function isPlistArray(value: PlistValue): value is PlistArray {
  return Array.isArray(value);
}

function sortKeys(value: PlistValue): PlistValue {
  if (isPlistArray(value)) {
    return value.map(sortKeys);
  }
  if (!isPlistObject(value)) {
    return value;
  }
  const sorted: Record<string, PlistValue> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeys(value[key]);
  }
  return sorted;
}

function convertBinary(path: string): string {
  const result = runSync("plutil", ["-convert", "xml1", "-o", "-", path]);
  if (result.exitCode !== 0) {
    throw new NodefredError(NodefredErrorCode.PREFERENCES_UNAVAILABLE, `Cannot convert binary property list ${path}`, {
      stderr: result.stderr,
    });
  }
  return result.stdout;
}
