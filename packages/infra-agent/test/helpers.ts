import { chmod, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { resolveAgentConfig } from "../src/config/index.js";
import type { AgentConfig, PolicyPluginConfigEntry } from "../src/config/types.js";
import { createToolGateway } from "../src/core/ToolGateway.js";
import type { ToolGateway } from "../src/core/ToolGateway.js";

const createdDirs: string[] = [];

export async function makeTempDir(prefix: string): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), `infra-agent-${prefix}-`));
  createdDirs.push(dir);
  return dir;
}

export async function cleanupTempDirs(): Promise<void> {
  while (createdDirs.length > 0) {
    const dir = createdDirs.pop();
    if (dir) {
      await rm(dir, { recursive: true, force: true });
    }
  }
}

/** Writes an executable /bin/sh script standing in for a CLI tool. */
export async function writeFakeBinary(
  binDir: string,
  name: string,
  body: string,
): Promise<string> {
  await mkdir(binDir, { recursive: true });
  const file = path.join(binDir, name);
  await writeFile(file, `#!/bin/sh\n${body}\n`, "utf-8");
  await chmod(file, 0o755);
  return file;
}

export interface Sandbox {
  root: string;
  workdir: string;
  binDir: string;
}

/** A temp tree with an (initially empty) workdir and bin directory. */
export async function makeSandbox(prefix: string): Promise<Sandbox> {
  const root = await makeTempDir(prefix);
  const workdir = path.join(root, "work");
  const binDir = path.join(root, "bin");
  await mkdir(workdir, { recursive: true });
  await mkdir(binDir, { recursive: true });
  return { root, workdir, binDir };
}

export function sandboxConfig(
  sandbox: Sandbox,
  options: {
    allowlist?: string;
    timeout?: string;
    policies?: PolicyPluginConfigEntry[];
  } = {},
): AgentConfig {
  const env: NodeJS.ProcessEnv = {
    PATH: sandbox.binDir,
    TERRAFORM_WORKDIR: sandbox.workdir,
  };
  if (options.allowlist !== undefined) env.TOOLS_ALLOWLIST = options.allowlist;
  if (options.timeout !== undefined) env.TOOLS_TIMEOUT_SECONDS = options.timeout;
  return resolveAgentConfig({
    env,
    cwd: sandbox.root,
    file: options.policies ? { policies: options.policies } : undefined,
  });
}

export function sandboxGateway(
  sandbox: Sandbox,
  options: Parameters<typeof sandboxConfig>[1] = {},
): ToolGateway {
  return createToolGateway(sandboxConfig(sandbox, options));
}
