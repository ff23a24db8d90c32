#!/usr/bin/env tsx
/**
 * Fail a release build whose tag doesn't match the committed package
 * version.
 *
 *   npm run validate-version -- --expected-version v1.2.3
 */

import { join } from "path";
import { parseArgs } from "util";
import { checkReleaseTag } from "../src/lib/release";
import { readPackageVersion } from "../src/version";

function main(): number {
  const { values } = parseArgs({
    options: { "expected-version": { type: "string" } },
  });

  const tag = values["expected-version"];
  if (!tag) {
    console.error("Missing --expected-version");
    return 2;
  }

  const version = readPackageVersion(join(__dirname, "..", "package.json"));

  const mismatch = checkReleaseTag(version, tag);
  if (mismatch) {
    console.error(mismatch);
    return 1;
  }

  console.log(`Version ${version} matches ${tag}`);
  return 0;
}

process.exitCode = main();
