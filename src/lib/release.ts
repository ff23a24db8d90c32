/**
 * Compare a package version with a release tag (`v1.2.3` or `1.2.3`).
 * Returns a description of the mismatch, or `undefined` when they agree.
 */
export function checkReleaseTag(version: string, tag: string): string | undefined {
  const expected = tag.startsWith("v") ? tag.slice(1) : tag;
  if (version === expected) {
    return undefined;
  }
  return `Committed version: ${version}, but expected: ${expected}`;
}
