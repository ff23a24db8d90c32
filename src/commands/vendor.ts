import chalk from "chalk";
import type { Context } from "../types";
import { assertProjectRoot, getVendoredDir } from "../lib/paths";
import { vendorDependencies } from "../lib/vendor";

/**
 * Install the dependencies from package.json into `workflow/vendored`.
 * Returns whether the installer succeeded.
 */
export async function vendor(ctx: Context): Promise<boolean> {
  const root = assertProjectRoot(ctx.cwd);

  const ok = await vendorDependencies(root, ctx);
  if (ok) {
    console.log(chalk.green("✓") + ` Dependencies vendored into ${chalk.dim(getVendoredDir(root))}`);
  } else {
    ctx.log.warn("Failed to install dependencies");
  }
  return ok;
}
