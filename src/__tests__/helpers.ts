import { Logger } from "../lib/log";
import type { Context, NodefredConfig } from "../types";

export interface TestContext extends Context {
  /** Everything logged through `log` */
  logs: string[];
}

export function createTestContext(
  cwd: string,
  config: Partial<NodefredConfig> = {},
  debug = false
): TestContext {
  const logs: string[] = [];
  return {
    debug,
    cwd,
    home: cwd,
    log: new Logger({ level: "debug", colors: false, stream: { write: (line: string) => logs.push(line) } }),
    config: { npmClient: "npm", ...config },
    logs,
  };
}

/** Variables Alfred sets for a script filter run, with the debugger open */
export const ALFRED_ENV: NodeJS.ProcessEnv = {
  alfred_debug: "1",
  alfred_preferences: "~/Library/Application Support/Alfred/Alfred.alfredpreferences",
  alfred_preferences_localhash: "adbd4f66bc3ae8493832af61a41ee609b20d8705",
  alfred_theme: "theme.bundled.default",
  alfred_theme_background: "rgba(255,255,255,0.98)",
  alfred_theme_selection_background: "rgba(255,255,255,0.98)",
  alfred_theme_subtext: "3",
  alfred_version: "5.0",
  alfred_version_build: "2058",
  alfred_workflow_bundleid: "com.example.search",
  alfred_workflow_cache: "~/Library/Caches/com.runningwithcrayons.Alfred/Workflow Data/com.example.search",
  alfred_workflow_data: "~/Library/Application Support/Alfred/Workflow Data/com.example.search",
  alfred_workflow_name: "Search",
  alfred_workflow_uid: "user.workflow.B0AC54EC-601C-479A-9428-01F9FD732959",
  alfred_workflow_version: "1.0.0",
  alfred_workflow_keyword: "s",
};
