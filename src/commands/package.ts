import { mkdir } from "fs/promises";
import chalk from "chalk";
import type { Context } from "../types";
import { zipDirectory } from "../lib/archive";
import { NodefredError, NodefredErrorCode } from "../lib/errors";
import { loadManifest } from "../lib/manifest";
import { assertProjectRoot, getArchivePath, getDistDir, getWorkflowDir } from "../lib/paths";
import { vendorDependencies } from "../lib/vendor";

/**
 * Package the workflow into `dist/workflow.alfredworkflow`, which users
 * import by double-clicking it. Dependencies are vendored again first.
 */
export async function pack(ctx: Context): Promise<string> {
  const root = assertProjectRoot(ctx.cwd);
  const manifest = loadManifest(root);

  console.log(chalk.blue("→") + ` Packaging ${chalk.bold(manifest.name)} ${chalk.dim(`v${manifest.version}`)}`);

  if (!(await vendorDependencies(root, ctx))) {
    throw new NodefredError(NodefredErrorCode.VENDOR_FAILED, "Failed to download dependencies. Exiting");
  }

  await mkdir(getDistDir(root), { recursive: true });

  const archive = getArchivePath(root);
  await zipDirectory(getWorkflowDir(root), archive, ctx);

  console.log(chalk.green("✓") + ` Package ready: ${chalk.dim(archive)}`);
  return archive;
}
