import chalk from "chalk";
import type { Context } from "../types";
import { linkWorkflow } from "../lib/link";
import { assertProjectRoot, getWorkflowDir } from "../lib/paths";

export interface LinkCommandOptions {
  relink: boolean;
  samePath: boolean;
}

export async function link(options: LinkCommandOptions, ctx: Context): Promise<string> {
  const root = assertProjectRoot(ctx.cwd);

  const linkPath = await linkWorkflow(
    { workflowDir: getWorkflowDir(root), relink: options.relink, samePath: options.samePath },
    ctx
  );

  console.log(chalk.green("✓") + ` Linked: ${chalk.dim(linkPath)}`);
  return linkPath;
}
