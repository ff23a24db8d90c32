import { existsSync, statSync } from "fs";
import { join } from "path";
import type { Context } from "../types";
import { NodefredError, NodefredErrorCode } from "./errors";
import { readPlistObject } from "./plist";

const ALFRED_PREFERENCES = "Library/Preferences/com.runningwithcrayons.Alfred-Preferences.plist";
const DEFAULT_SYNC_DIR = "Library/Application Support/Alfred";

/**
 * Get path to the workflow folder inside a project. This is the folder Alfred
 * sees and the one that gets packaged.
 */
export function getWorkflowDir(root: string): string {
  return join(root, "workflow");
}

/**
 * Get path to the manifest. Its presence marks a project root.
 */
export function getManifestPath(root: string): string {
  return join(root, "workflow", "Info.plist");
}

export function getEntryScriptPath(root: string): string {
  return join(root, "workflow", "workflow.js");
}

export function getVendoredDir(root: string): string {
  return join(root, "workflow", "vendored");
}

export function getDistDir(root: string): string {
  return join(root, "dist");
}

export function getArchivePath(root: string): string {
  return join(root, "dist", "workflow.alfredworkflow");
}

/**
 * Get path to the project template shipped with the package. Resolves the
 * same from `src/lib` and `dist/lib`.
 */
export function getTemplateDir(): string {
  return join(__dirname, "..", "..", "template");
}

/**
 * Fail unless `cwd` is the root of a workflow project
 */
export function assertProjectRoot(cwd: string): string {
  if (!existsSync(getManifestPath(cwd))) {
    throw new NodefredError(
      NodefredErrorCode.NOT_A_PROJECT,
      "Cannot find workflow. You need to run this command from the root of the project",
      { cwd }
    );
  }
  return cwd;
}

export function expandHome(path: string, home: string): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

/**
 * Get path to Alfred's sync directory, as set in Alfred's preferences
 */
export function getSyncDirectory(home: string): string {
  const prefsPath = join(home, ALFRED_PREFERENCES);

  if (!existsSync(prefsPath)) {
    throw new NodefredError(NodefredErrorCode.HOST_NOT_FOUND, "Alfred doesn't appear to be installed", {
      path: prefsPath,
    });
  }

  const prefs = readPlistObject(prefsPath);
  const syncFolder = prefs["syncfolder"];
  const syncDir =
    typeof syncFolder === "string" && syncFolder
      ? expandHome(syncFolder, home)
      : join(home, DEFAULT_SYNC_DIR);

  if (!isDirectory(syncDir)) {
    throw new NodefredError(NodefredErrorCode.HOST_NOT_FOUND, `Cannot find Alfred's sync directory: ${syncDir}`);
  }

  return syncDir;
}

/**
 * Get path to the directory where Alfred keeps workflows
 */
export function getWorkflowsDirectory(ctx: Context): string {
  if (ctx.config.workflowsDir) {
    return ctx.config.workflowsDir;
  }
  return join(getSyncDirectory(ctx.home), "Alfred.alfredpreferences", "workflows");
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}
