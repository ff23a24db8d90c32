import { readFile } from "fs/promises";
import { join } from "path";
import YAML from "yaml";
import type { NodefredConfig } from "../types";
import { NodefredError, NodefredErrorCode, describeError } from "./errors";
import { expandHome } from "./paths";

const DEFAULT_NPM_CLIENT = "npm";

/**
 * Get path to the user config file
 */
export function getConfigPath(env: NodeJS.ProcessEnv, home: string): string {
  if (env.NODEFRED_CONFIG) {
    return expandHome(env.NODEFRED_CONFIG, home);
  }
  return join(home, ".config", "nodefred", "config.yaml");
}

/**
 * Load user config. Environment variables win over the file, the file over
 * defaults. A missing file is not an error.
 */
export async function loadConfig(env: NodeJS.ProcessEnv, home: string): Promise<NodefredConfig> {
  const fromFile = await loadConfigFile(getConfigPath(env, home));

  const workflowsDir = env.NODEFRED_WORKFLOWS_DIR || fromFile.workflowsDir;
  const npmClient = env.NODEFRED_NPM_CLIENT || fromFile.npmClient || DEFAULT_NPM_CLIENT;

  return {
    workflowsDir: workflowsDir ? expandHome(workflowsDir, home) : undefined,
    npmClient,
  };
}

async function loadConfigFile(path: string): Promise<Partial<NodefredConfig>> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (err) {
    if (isMissingFile(err)) {
      return {};
    }
    throw new NodefredError(NodefredErrorCode.INVALID_ARGUMENTS, `Cannot read config ${path}`, {
      cause: describeError(err),
    });
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    throw new NodefredError(NodefredErrorCode.INVALID_ARGUMENTS, `Invalid YAML in ${path}: ${describeError(err)}`);
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new NodefredError(NodefredErrorCode.INVALID_ARGUMENTS, `Config ${path} must be a mapping`);
  }

  const record: Record<string, unknown> = { ...parsed };
  return {
    workflowsDir: optionalString(record, "workflowsDir", path),
    npmClient: optionalString(record, "npmClient", path),
  };
}

function optionalString(record: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new NodefredError(NodefredErrorCode.INVALID_ARGUMENTS, `Config ${path}: '${key}' must be a string`);
  }
  return value;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
