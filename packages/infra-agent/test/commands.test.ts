import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { buildProgram, createCommand, reviewCommand, type CliDeps } from "../src/commands.js";
import type { ModelConfig } from "../src/config/types.js";
import type { ModelCapability } from "../src/interfaces/index.js";
import { cleanupTempDirs, makeSandbox, type Sandbox } from "./helpers.js";

afterEach(async () => {
  process.exitCode = undefined;
  await cleanupTempDirs();
});

const MANIFEST = JSON.stringify({
  files: [{ path: "main.tf", content: "# generated\n" }],
});

function cliDeps(sandbox: Sandbox, reply: string, env: NodeJS.ProcessEnv = {}) {
  const lines: string[] = [];
  const createModel = vi.fn(
    (_config: ModelConfig): ModelCapability => ({
      generate: async () => reply,
    }),
  );
  const deps: CliDeps = {
    env: { PATH: sandbox.binDir, TERRAFORM_WORKDIR: sandbox.workdir, ...env },
    cwd: sandbox.root,
    print: (line) => lines.push(line),
    createModel,
  };
  return { deps, lines, createModel };
}

describe("createCommand", () => {
  it("derives the output directory from the spec inside the workdir", async () => {
    const sandbox = await makeSandbox("cli-create");
    const { deps, lines } = cliDeps(sandbox, MANIFEST);

    const code = await createCommand({ spec: "Static site bucket" }, deps);

    const outDir = path.join(sandbox.workdir, "static-site-bucket");
    expect(code).toBe(0);
    expect(lines).toEqual([
      `Wrote 1 files to ${outDir}.`,
      path.join(outDir, "main.tf"),
    ]);
    expect(await readFile(path.join(outDir, "main.tf"), "utf-8")).toBe("# generated\n");
  });

  it("reads the spec from a file and honours --out-dir", async () => {
    const sandbox = await makeSandbox("cli-spec-file");
    await writeFile(path.join(sandbox.root, "spec.txt"), "A queue\n", "utf-8");
    const { deps, lines } = cliDeps(sandbox, MANIFEST);

    const code = await createCommand({ specFile: "spec.txt", outDir: "out" }, deps);

    expect(code).toBe(0);
    expect(lines[0]).toBe(`Wrote 1 files to ${path.join(sandbox.root, "out")}.`);
  });

  it("asks for a spec when none is given", async () => {
    const sandbox = await makeSandbox("cli-no-spec");
    const { deps, lines, createModel } = cliDeps(sandbox, MANIFEST);

    await expect(createCommand({}, deps)).resolves.toBe(1);
    expect(lines).toEqual(["Provide --spec or --spec-file for create mode."]);
    expect(createModel).not.toHaveBeenCalled();
  });

  it("prints the parse error for a malformed reply", async () => {
    const sandbox = await makeSandbox("cli-bad-reply");
    const { deps, lines } = cliDeps(sandbox, "no json here");

    await expect(createCommand({ spec: "anything" }, deps)).resolves.toBe(1);
    expect(lines).toEqual(["Model did not return JSON."]);
  });
});

describe("reviewCommand", () => {
  it("writes report.md even when no tool is installed", async () => {
    const sandbox = await makeSandbox("cli-review");
    const { deps, lines } = cliDeps(sandbox, "# Review");

    await expect(reviewCommand({}, deps)).resolves.toBe(0);
    expect(lines).toEqual(["Report written to report.md in workdir."]);
    expect(await readFile(path.join(sandbox.workdir, "report.md"), "utf-8")).toBe("# Review");
  });

  it("fails when the report cannot be written", async () => {
    const sandbox = await makeSandbox("cli-review-denied");
    const { deps, lines } = cliDeps(sandbox, "# Review", {
      TOOLS_ALLOWLIST: "read_repo_files",
    });

    await expect(reviewCommand({}, deps)).resolves.toBe(1);
    expect(lines).toEqual(["Report could not be written: Tool not allowed: write_report"]);
  });
});

describe("buildProgram", () => {
  it("runs create through the legacy --mode flag", async () => {
    const sandbox = await makeSandbox("cli-mode");
    const { deps, lines } = cliDeps(sandbox, MANIFEST);

    await buildProgram(deps).parseAsync(
      ["--mode", "create", "--spec", "legacy mode", "--out-dir", "legacy"],
      { from: "user" },
    );

    expect(process.exitCode).toBe(0);
    expect(lines[0]).toBe(`Wrote 1 files to ${path.join(sandbox.root, "legacy")}.`);
  });

  it("runs the review subcommand against --workdir", async () => {
    const sandbox = await makeSandbox("cli-subcommand");
    const { deps, lines } = cliDeps(sandbox, "# Sub");
    const other = path.join(sandbox.root, "other");
    await mkdir(other);

    await buildProgram(deps).parseAsync(["review", "--workdir", other], { from: "user" });

    expect(process.exitCode).toBe(0);
    expect(lines).toEqual(["Report written to report.md in workdir."]);
    expect(existsSync(path.join(other, "report.md"))).toBe(true);
    expect(existsSync(path.join(sandbox.workdir, "report.md"))).toBe(false);
  });
});
