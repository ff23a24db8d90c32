import { chmod, stat, writeFile } from "fs/promises";
import { join } from "path";
import chalk from "chalk";
import type { Context } from "../types";
import { NodefredError, NodefredErrorCode, describeError } from "../lib/errors";
import { run } from "../lib/exec";
import { linkWorkflow } from "../lib/link";
import { INITIAL_VERSION, createManifest, writeManifest } from "../lib/manifest";
import { getEntryScriptPath, getTemplateDir, getWorkflowDir } from "../lib/paths";
import { renderTemplate } from "../lib/template";
import { vendorDependencies } from "../lib/vendor";
import { VERSION } from "../version";

export interface NewOptions {
  keyword?: string;
  bundleId?: string;
  author?: string;
  website?: string;
  description?: string;
  git: boolean;
}

/**
 * Create a workflow project in `<cwd>/<name>` and link it into Alfred, so
 * it shows up in Alfred Preferences while staying editable in place.
 */
export async function newWorkflow(
  name: string | undefined,
  options: NewOptions,
  ctx: Context
): Promise<string> {
  if (!name) {
    throw new NodefredError(NodefredErrorCode.INVALID_ARGUMENTS, "Workflow name required. Usage: nodefred new <name> -k <keyword> -b <bundle-id>");
  }
  if (!options.keyword) {
    throw new NodefredError(NodefredErrorCode.INVALID_ARGUMENTS, "Keyword required (-k, --keyword)");
  }
  if (!options.bundleId) {
    throw new NodefredError(NodefredErrorCode.INVALID_ARGUMENTS, "Bundle ID required (-b, --bundle-id)");
  }

  const { log } = ctx;
  log.info(`Creating new workflow: ${name}`);

  const rootDir = join(ctx.cwd, name);
  const templateDir = getTemplateDir();

  try {
    log.debug(`Copying ${templateDir} to ${rootDir}`);
    await renderTemplate(templateDir, rootDir, {
      name,
      keyword: options.keyword,
      bundle_id: options.bundleId,
      author: options.author ?? "",
      website: options.website ?? "",
      description: options.description ?? "",
      nodefred_version: VERSION,
    });
    await writePackageJson(rootDir, name, options.description);
  } catch (err) {
    throw new NodefredError(NodefredErrorCode.TEMPLATE_FAILED, `Cannot create workflow: ${describeError(err)}`);
  }

  log.debug("Adding +x permission to workflow");
  const entryScript = getEntryScriptPath(rootDir);
  await chmod(entryScript, (await stat(entryScript)).mode | 0o111);

  if (options.git) {
    log.debug("Initialising git repository");
    await initGit(name, ctx);
  }

  log.debug("Creating Info.plist");
  await writeManifest(
    rootDir,
    createManifest({
      name,
      keyword: options.keyword,
      bundleId: options.bundleId,
      author: options.author,
      website: options.website,
      description: options.description,
    })
  );

  if (!(await vendorDependencies(rootDir, ctx))) {
    log.warn("Failed to vendor dependencies. Run 'nodefred vendor' in the project to retry.");
  }

  await linkWorkflow({ workflowDir: getWorkflowDir(rootDir), relink: true, samePath: false }, ctx);

  console.log();
  console.log(chalk.green("✓") + ` Workflow created: ${chalk.bold(rootDir)}`);
  console.log();
  console.log(chalk.dim("  Next steps:"));
  console.log(`    cd ${name}`);
  console.log(`    ${chalk.dim("# edit workflow/workflow.js, then type")} ${options.keyword} ${chalk.dim("in Alfred")}`);
  console.log();

  return rootDir;
}

async function initGit(name: string, ctx: Context): Promise<void> {
  try {
    const result = await run("git", ["init", name], { cwd: ctx.cwd, inherit: ctx.debug });
    if (result.exitCode !== 0) {
      ctx.log.warn("Failed to create git repository. Ignoring.");
    }
  } catch (err) {
    ctx.log.warn(`Failed to create git repository (${describeError(err)}). Ignoring.`);
  }
}

async function writePackageJson(rootDir: string, name: string, description: string | undefined): Promise<void> {
  const pkg = {
    name: packageName(name),
    version: INITIAL_VERSION,
    private: true,
    description: description ?? "",
    scripts: {
      link: "nodefred link",
      vendor: "nodefred vendor",
      package: "nodefred package",
    },
    dependencies: {
      nodefred: `^${VERSION}`,
    },
  };
  await writeFile(join(rootDir, "package.json"), JSON.stringify(pkg, null, 2) + "\n");
}

/**
 * npm package name for a workflow name: lower case, anything outside
 * `[a-z0-9._-]` replaced with dashes.
 */
export function packageName(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/^[-._]+|-+$/g, "");
  return slug || "workflow";
}
