import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync } from "fs";
import { mkdir, mkdtemp, readdir, readFile, readlink, rm, stat } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { newWorkflow, packageName } from "../commands/new";
import { run } from "../lib/exec";
import { loadManifest } from "../lib/manifest";
import { NodefredErrorCode, isNodefredError } from "../lib/errors";
import { VERSION } from "../version";
import { createTestContext } from "./helpers";

vi.mock("../lib/exec", () => ({
  run: vi.fn(),
  runSync: vi.fn(),
}));

const runMock = vi.mocked(run);

describe("new", () => {
  let tempDir: string;
  let projectsDir: string;
  let workflowsDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "nodefred-new-"));
    projectsDir = join(tempDir, "projects");
    workflowsDir = join(tempDir, "alfred", "workflows");
    await mkdir(projectsDir);
    await mkdir(workflowsDir, { recursive: true });
    runMock.mockReset();
    runMock.mockResolvedValue({ stdout: "", stderr: "", exitCode: 0 });
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  const OPTIONS = { keyword: "tw", bundleId: "com.example.testwf", git: true };

  function context() {
    return createTestContext(projectsDir, { workflowsDir });
  }

  it("creates the project from the template", async () => {
    const root = await newWorkflow("test_wf", OPTIONS, context());

    expect(root).toBe(join(projectsDir, "test_wf"));
    expect((await readdir(root)).sort()).toEqual([".github", ".gitignore", "README.md", "package.json", "workflow"]);
    expect((await readFile(join(root, "README.md"), "utf8")).split("\n")[0]).toBe("# test_wf");
    expect(existsSync(join(root, ".github", "workflows", "build_and_release.yaml"))).toBe(true);
  });

  it("makes the entry script executable", async () => {
    const root = await newWorkflow("test_wf", OPTIONS, context());

    expect((await stat(join(root, "workflow", "workflow.js"))).mode & 0o111).toBe(0o111);
  });

  it("writes a manifest and a package.json depending on nodefred", async () => {
    const root = await newWorkflow("test_wf", { ...OPTIONS, description: "Test workflow" }, context());

    expect(loadManifest(root)).toEqual({ name: "test_wf", bundleId: "com.example.testwf", version: "0.0.1" });

    const pkg: unknown = JSON.parse(await readFile(join(root, "package.json"), "utf8"));
    expect(pkg).toMatchObject({
      name: "test_wf",
      version: "0.0.1",
      description: "Test workflow",
      dependencies: { nodefred: `^${VERSION}` },
    });
  });

  it("initialises git and vendors dependencies", async () => {
    await newWorkflow("test_wf", OPTIONS, context());

    const root = join(projectsDir, "test_wf");
    expect(runMock.mock.calls).toEqual([
      ["git", ["init", "test_wf"], { cwd: projectsDir, inherit: false }],
      [
        "npm",
        [
          "install",
          "--omit=dev",
          "--no-save",
          "--no-package-lock",
          `--prefix=${join(root, "workflow", "vendored")}`,
          `nodefred@^${VERSION}`,
        ],
        { cwd: root, inherit: false },
      ],
    ]);
  });

  it("skips git with git: false", async () => {
    await newWorkflow("test_wf", { ...OPTIONS, git: false }, context());

    expect(runMock.mock.calls.map((call) => call[0])).toEqual(["npm"]);
  });

  it("carries on when git or the installer fail", async () => {
    runMock.mockResolvedValue({ stdout: "", stderr: "", exitCode: 1 });
    const ctx = context();

    await newWorkflow("test_wf", OPTIONS, ctx);

    expect(ctx.logs.some((line) => line.includes("Failed to create git repository. Ignoring."))).toBe(true);
    expect(ctx.logs.some((line) => line.includes("Failed to vendor dependencies"))).toBe(true);
  });

  it("links the workflow folder into Alfred", async () => {
    await newWorkflow("test_wf", OPTIONS, context());

    const links = await readdir(workflowsDir);
    expect(links).toHaveLength(1);
    expect(links[0].startsWith("user.workflow.")).toBe(true);
    expect(await readlink(join(workflowsDir, links[0]))).toBe(join(projectsDir, "test_wf", "workflow"));
  });

  it("requires a keyword and a bundle id", async () => {
    await expect(newWorkflow("test_wf", { git: false, bundleId: "com.example.x" }, context())).rejects.toThrow(
      "Keyword required (-k, --keyword)"
    );
    await expect(newWorkflow("test_wf", { git: false, keyword: "x" }, context())).rejects.toThrow(
      "Bundle ID required (-b, --bundle-id)"
    );
    expect(existsSync(join(projectsDir, "test_wf"))).toBe(false);
  });

  it("refuses to overwrite an existing directory", async () => {
    await mkdir(join(projectsDir, "test_wf"));

    await expect(newWorkflow("test_wf", OPTIONS, context())).rejects.toSatisfy((err: unknown) =>
      isNodefredError(err, NodefredErrorCode.TEMPLATE_FAILED)
    );
    expect(runMock).not.toHaveBeenCalled();
  });
});

describe("packageName", () => {
  it("slugs workflow names", () => {
    expect(packageName("Google Suggest")).toBe("google-suggest");
    expect(packageName("  ..Émoji!  ")).toBe("moji");
    expect(packageName("***")).toBe("workflow");
  });
});
