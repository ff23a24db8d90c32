import type { Logger } from "./lib/log";

// ─────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────

export interface Context {
  debug: boolean;
  cwd: string;
  home: string;
  log: Logger;
  config: NodefredConfig;
}

export interface NodefredConfig {
  /** Overrides the workflow directory found through Alfred's preferences. */
  workflowsDir?: string;
  /** Executable used to vendor dependencies. */
  npmClient: string;
}

// ─────────────────────────────────────────────────────────────
// Info.plist
//
// Type aliases rather than interfaces so the manifest stays assignable to
// the plist library's value type.
// ─────────────────────────────────────────────────────────────

export type ManifestConnection = {
  destinationuid: string;
  modifiers: number;
  modifiersubtext: string;
  vitoclose: boolean;
};

export type ClipboardOutputObject = {
  uid: string;
  type: "alfred.workflow.output.clipboard";
  config: {
    clipboardtext: string;
  };
};

export type ScriptFilterObject = {
  uid: string;
  type: "alfred.workflow.input.scriptfilter";
  config: {
    keyword: string;
    scriptfile: string;
    /** Keyword must be followed by whitespace */
    withspace: boolean;
    /** 0 required, 1 optional, 2 none */
    argumenttype: number;
    title: string;
    runningsubtext: string;
    /** 8 runs `scriptfile` as an external script */
    type: number;
    /** 2 terminates the previous run */
    queuemode: number;
    queuedelayimmediatelyinitially: boolean;
    argumenttreatemptyqueryasnil: boolean;
  };
};

export type ManifestObject = ClipboardOutputObject | ScriptFilterObject;

export type WorkflowManifest = {
  bundleid: string;
  connections: Record<string, ManifestConnection[]>;
  createdby: string;
  description: string;
  name: string;
  objects: ManifestObject[];
  readme: string;
  uidata: Record<string, { xpos: number; ypos: number }>;
  variables: Record<string, string>;
  version: string;
  webaddress: string;
};
