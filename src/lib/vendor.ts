import { mkdir, readFile } from "fs/promises";
import { join } from "path";
import type { Context } from "../types";
import { describeError } from "./errors";
import { run } from "./exec";
import { getVendoredDir } from "./paths";

/**
 * Read `dependencies` from the project's package.json as install specs
 * (`name@range`).
 */
export async function readDependencySpecs(root: string): Promise<string[]> {
  const manifest: unknown = JSON.parse(await readFile(join(root, "package.json"), "utf8"));
  if (typeof manifest !== "object" || manifest === null || !("dependencies" in manifest)) {
    return [];
  }

  const { dependencies } = manifest;
  if (typeof dependencies !== "object" || dependencies === null) {
    return [];
  }

  return Object.entries(dependencies).map(([name, range]) =>
    typeof range === "string" && range ? `${name}@${range}` : name
  );
}

/**
 * Install the project's dependencies into `workflow/vendored`, so the
 * workflow runs without anything installed globally. The manifest points
 * NODE_PATH at the result.
 *
 * Returns whether the installer succeeded.
 */
export async function vendorDependencies(root: string, ctx: Context): Promise<boolean> {
  const { log } = ctx;
  const vendoredPath = getVendoredDir(root);
  await mkdir(vendoredPath, { recursive: true });

  let specs: string[];
  try {
    specs = await readDependencySpecs(root);
  } catch (err) {
    log.error(`Cannot read dependencies from ${join(root, "package.json")}: ${describeError(err)}`);
    return false;
  }

  if (specs.length === 0) {
    log.debug("No dependencies to vendor");
    return true;
  }

  const args = [
    "install",
    "--omit=dev",
    "--no-save",
    "--no-package-lock",
    `--prefix=${vendoredPath}`,
    ...specs,
  ];
  log.debug(`Running: ${ctx.config.npmClient} ${args.join(" ")}`);

  const result = await run(ctx.config.npmClient, args, { cwd: root, inherit: ctx.debug });
  if (result.exitCode !== 0) {
    log.debug(result.stderr);
  }
  return result.exitCode === 0;
}
