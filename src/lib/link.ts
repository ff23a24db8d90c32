import { randomUUID } from "crypto";
import { existsSync } from "fs";
import { readdir, readlink, stat, symlink, unlink } from "fs/promises";
import { join, resolve } from "path";
import type { Context } from "../types";
import { NodefredError, NodefredErrorCode, describeError } from "./errors";
import { expandHome, getWorkflowsDirectory } from "./paths";

export interface LinkOptions {
  /** The project's workflow folder, the link target */
  workflowDir: string;
  /** Delete (if present) and recreate the link */
  relink: boolean;
  /** When recreating, keep the previous link's path */
  samePath: boolean;
}

/**
 * Find a link to `target` in Alfred's workflow directory
 */
export async function findWorkflowLink(
  target: string,
  workflowsDir: string,
  home: string
): Promise<string | undefined> {
  const wanted = resolve(expandHome(target, home));

  let entries;
  try {
    entries = await readdir(workflowsDir, { withFileTypes: true });
  } catch (err) {
    throw new NodefredError(NodefredErrorCode.LINK_FAILED, `Cannot read workflow directory ${workflowsDir}`, {
      cause: describeError(err),
    });
  }

  for (const entry of entries) {
    if (!entry.isSymbolicLink()) continue;

    const linkPath = join(workflowsDir, entry.name);
    const linkTarget = resolve(workflowsDir, expandHome(await readlink(linkPath), home));
    if (linkTarget === wanted) {
      return linkPath;
    }
  }

  return undefined;
}

/**
 * Link the workflow folder into Alfred's workflow directory. Returns the
 * path of the link.
 */
export async function linkWorkflow(options: LinkOptions, ctx: Context): Promise<string> {
  const { workflowDir, relink, samePath } = options;
  const { log } = ctx;

  const stats = await stat(workflowDir).catch(() => undefined);
  if (!stats) {
    throw new NodefredError(NodefredErrorCode.LINK_FAILED, `${workflowDir} doesn't exist`);
  }
  if (!stats.isDirectory()) {
    throw new NodefredError(NodefredErrorCode.LINK_FAILED, `${workflowDir} is not a directory`);
  }

  const workflowsDir = getWorkflowsDirectory(ctx);
  const existing = await findWorkflowLink(workflowDir, workflowsDir, ctx.home);

  if (existing) {
    if (!relink) {
      log.debug(`Found link: ${existing}`);
      return existing;
    }
    log.debug(`Removing existing link: ${existing}`);
    await unlink(existing);
  }

  log.info(`Creating link to workflow directory ${workflowDir}`);

  const source = samePath && existing
    ? existing
    : join(workflowsDir, `user.workflow.${randomUUID().toUpperCase()}`);

  log.debug(`Creating link: ${source}`);
  await symlink(workflowDir, source);

  if (!existsSync(source)) {
    await unlink(source).catch(() => undefined);
    throw new NodefredError(NodefredErrorCode.LINK_FAILED, `Error linking from ${source} to ${workflowDir}`);
  }

  return source;
}
