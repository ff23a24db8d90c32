import { randomUUID } from "crypto";
import type { PlistObject } from "plist";
import type { WorkflowManifest } from "../types";
import { NodefredError, NodefredErrorCode } from "./errors";
import { getManifestPath } from "./paths";
import { readPlistObject, writePlistFile } from "./plist";

export interface ManifestOptions {
  name: string;
  keyword: string;
  /** Reverse-DNS bundle identifier */
  bundleId: string;
  author?: string;
  website?: string;
  /** Shown to the user when importing the workflow */
  description?: string;
}

/** Lets the entry script resolve packages from the vendored folder. */
export const DEPENDENCY_PATH_VARIABLE = { NODE_PATH: "vendored/node_modules" } as const;

export const INITIAL_VERSION = "0.0.1";

/**
 * Build the Info.plist for a new workflow: a keyword-triggered script
 * filter wired into a copy-to-clipboard output.
 */
export function createManifest(options: ManifestOptions): WorkflowManifest {
  const scriptUid = randomUUID().toUpperCase();
  const clipboardUid = randomUUID().toUpperCase();

  return {
    bundleid: options.bundleId,
    connections: {
      [scriptUid]: [
        {
          destinationuid: clipboardUid,
          modifiers: 0,
          modifiersubtext: "",
          vitoclose: false,
        },
      ],
    },
    createdby: options.author ?? "",
    description: options.description ?? "",
    name: options.name,
    objects: [
      {
        uid: clipboardUid,
        type: "alfred.workflow.output.clipboard",
        config: { clipboardtext: "{query}" },
      },
      {
        uid: scriptUid,
        type: "alfred.workflow.input.scriptfilter",
        config: {
          keyword: options.keyword,
          scriptfile: "workflow.js",
          withspace: true,
          argumenttype: 1,
          title: "Search",
          runningsubtext: "Loading...",
          type: 8,
          queuemode: 2,
          queuedelayimmediatelyinitially: true,
          argumenttreatemptyqueryasnil: true,
        },
      },
    ],
    readme: "",
    uidata: {},
    variables: { ...DEPENDENCY_PATH_VARIABLE },
    version: INITIAL_VERSION,
    webaddress: options.website ?? "",
  };
}

export async function writeManifest(root: string, manifest: WorkflowManifest): Promise<void> {
  await writePlistFile(getManifestPath(root), manifest);
}

/**
 * Summary of an existing project's manifest
 */
export interface ManifestInfo {
  name: string;
  bundleId: string;
  version: string;
}

export function loadManifest(root: string): ManifestInfo {
  const path = getManifestPath(root);
  const manifest = readPlistObject(path);
  return {
    name: requireString(manifest, "name", path),
    bundleId: requireString(manifest, "bundleid", path),
    version: requireString(manifest, "version", path),
  };
}

function requireString(manifest: PlistObject, key: string, path: string): string {
  const value = manifest[key];
  if (typeof value !== "string") {
    throw new NodefredError(NodefredErrorCode.INVALID_ARGUMENTS, `Invalid manifest ${path}: missing '${key}'`);
  }
  return value;
}
