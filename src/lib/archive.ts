import { readdir } from "fs/promises";
import { join, posix, relative, sep } from "path";
import AdmZip from "adm-zip";
import type { Context } from "../types";

/**
 * Zip the files below `directory` into `outputFile`, entry paths relative
 * to `directory`.
 */
export async function zipDirectory(directory: string, outputFile: string, ctx: Context): Promise<string[]> {
  const zip = new AdmZip();
  const entries: string[] = [];

  for (const file of await listFiles(directory, ctx)) {
    const entryPath = relative(directory, file).split(sep).join(posix.sep);
    const entryDir = posix.dirname(entryPath);
    ctx.log.debug(`Adding to package: ${file}`);
    zip.addLocalFile(file, entryDir === "." ? "" : entryDir);
    entries.push(entryPath);
  }

  zip.writeZip(outputFile);
  ctx.log.info(`Produced package at ${outputFile}`);
  return entries;
}

async function listFiles(directory: string, ctx: Context): Promise<string[]> {
  const files: string[] = [];

  for (const entry of await readdir(directory, { withFileTypes: true })) {
    const path = join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(path, ctx)));
    } else if (entry.isFile()) {
      files.push(path);
    } else {
      ctx.log.debug(`Skipping ${path}: not a regular file`);
    }
  }

  return files.sort();
}
