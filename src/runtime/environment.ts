import { homedir } from "os";
import type { PlistObject } from "plist";
import { NodefredError, NodefredErrorCode } from "../lib/errors";
import { expandHome } from "../lib/paths";
import { readPlistObject } from "../lib/plist";

/**
 * Fields of an `Environment`, named after the `alfred_*` variables they
 * come from.
 */
export interface EnvironmentInit {
  /** Whether Alfred's workflow debugger is open */
  debug: boolean;
  /** Alfred's preferences, as recorded in `alfred_preferences` */
  preferencesFile?: string;
  preferencesLocalHash?: string;
  theme?: string;
  themeBackground?: string;
  themeSelectionBackground?: string;
  themeSubtext?: number;
  /** e.g. `5.0` */
  version: string;
  /** e.g. `2058` */
  versionBuild: string;
  workflowName: string;
  workflowVersion?: string;
  workflowBundleId?: string;
  workflowUid: string;
  workflowKeyword?: string;
  workflowCache?: string;
  workflowData?: string;
}

/**
 * Snapshot of the variables Alfred sets for a workflow run.
 */
export class Environment implements EnvironmentInit {
  readonly debug: boolean;
  readonly preferencesFile?: string;
  readonly preferencesLocalHash?: string;
  readonly theme?: string;
  readonly themeBackground?: string;
  readonly themeSelectionBackground?: string;
  readonly themeSubtext?: number;
  readonly version: string;
  readonly versionBuild: string;
  readonly workflowName: string;
  readonly workflowVersion?: string;
  readonly workflowBundleId?: string;
  readonly workflowUid: string;
  readonly workflowKeyword?: string;
  readonly workflowCache?: string;
  readonly workflowData?: string;

  constructor(init: EnvironmentInit) {
    this.debug = init.debug;
    this.preferencesFile = init.preferencesFile;
    this.preferencesLocalHash = init.preferencesLocalHash;
    this.theme = init.theme;
    this.themeBackground = init.themeBackground;
    this.themeSelectionBackground = init.themeSelectionBackground;
    this.themeSubtext = init.themeSubtext;
    this.version = init.version;
    this.versionBuild = init.versionBuild;
    this.workflowName = init.workflowName;
    this.workflowVersion = init.workflowVersion;
    this.workflowBundleId = init.workflowBundleId;
    this.workflowUid = init.workflowUid;
    this.workflowKeyword = init.workflowKeyword;
    this.workflowCache = init.workflowCache;
    this.workflowData = init.workflowData;
    Object.freeze(this);
  }

  /**
   * Read Alfred's environment variables.
   *
   * Returns `undefined` outside Alfred (no `alfred_version`), which is the
   * normal case when running a workflow by hand.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, home: string = homedir()): Environment | undefined {
    if (!env.alfred_version) {
      return undefined;
    }

    const path = (name: string) => {
      const value = env[name];
      return value ? expandHome(value, home) : undefined;
    };

    return new Environment({
      debug: env.alfred_debug === "1",
      preferencesFile: path("alfred_preferences"),
      preferencesLocalHash: env.alfred_preferences_localhash || undefined,
      theme: env.alfred_theme || undefined,
      themeBackground: env.alfred_theme_background || undefined,
      themeSelectionBackground: env.alfred_theme_selection_background || undefined,
      themeSubtext: parseNumber(env.alfred_theme_subtext),
      version: env.alfred_version,
      versionBuild: env.alfred_version_build ?? "",
      workflowName: env.alfred_workflow_name ?? "",
      workflowVersion: env.alfred_workflow_version || undefined,
      workflowBundleId: env.alfred_workflow_bundleid || undefined,
      workflowUid: env.alfred_workflow_uid ?? "",
      workflowKeyword: env.alfred_workflow_keyword || undefined,
      workflowCache: path("alfred_workflow_cache"),
      workflowData: path("alfred_workflow_data"),
    });
  }

  /**
   * Alfred's preferences, parsed from `preferencesFile`. Read again on every
   * access so a long-running script sees changes.
   */
  get preferences(): PlistObject {
    if (!this.preferencesFile) {
      throw new NodefredError(
        NodefredErrorCode.PREFERENCES_UNAVAILABLE,
        "Alfred did not set alfred_preferences for this run"
      );
    }
    return readPlistObject(this.preferencesFile);
  }
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}
