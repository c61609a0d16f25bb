import { readFile, stat, writeFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import fg from "fast-glob";
import { v7 as uuidv7 } from "uuid";
import type { AgentConfig } from "../config/types.js";
import type {
  PolicyPluginInterface,
  PolicyVerdict,
} from "../interfaces/index.js";
import { PolicyStore } from "../policy/PolicyStore.js";
import { buildPolicyChain } from "../plugins/policy/index.js";
import { createBinaryResolver, type BinaryResolver } from "./binaries.js";
import { runCommand as defaultRunCommand } from "./CommandRunner.js";
import {
  checkInfraCommand,
  infraCommandArgs,
  parseInfraCommand,
  type InfraCommand,
  type ParseInfraCommandResult,
} from "./infraCommands.js";
import {
  COST_ESTIMATOR,
  INFRA_BINARY,
  SECURITY_SCANNERS,
  type ToolProbe,
} from "./scanners.js";
import {
  ToolName,
  toolFailure,
  type ProcessToolOutput,
  type ProcessToolResult,
  type ReadFilesResult,
  type ToolFailure,
  type ToolResult,
  type WriteReportResult,
} from "./types.js";
import { logger } from "../logger.js";

export const REPORT_FILE_NAME = "report.md";
export const MAX_FILE_BYTES = 1_000_000;

export interface ToolGatewayOptions {
  policy: PolicyStore;
  /** Evaluated in order before every call. */
  policyPlugins: PolicyPluginInterface[];
  resolveBinary: BinaryResolver;
  runCommand?: typeof defaultRunCommand;
  /** Scanner fallback chain, highest priority first. */
  securityScanners?: readonly ToolProbe[];
  costEstimator?: ToolProbe;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function escapesRoot(pattern: string): boolean {
  return isAbsolute(pattern) || pattern.split(/[\\/]/).includes("..");
}

function decodeUtf8(buffer: Buffer): string | null {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch {
    return null;
  }
}

/**
 * Capability-scoped access to Terraform, the security scanners, Infracost and
 * the working directory. Every operation is checked against the policy chain
 * first and resolves to a ToolResult; nothing is thrown past this class.
 */
export class ToolGateway {
  private readonly policy: PolicyStore;
  private readonly policyPlugins: PolicyPluginInterface[];
  private readonly resolveBinary: BinaryResolver;
  private readonly runCommand: typeof defaultRunCommand;
  private readonly securityScanners: readonly ToolProbe[];
  private readonly costEstimator: ToolProbe;

  constructor(options: ToolGatewayOptions) {
    this.policy = options.policy;
    this.policyPlugins = options.policyPlugins;
    this.resolveBinary = options.resolveBinary;
    this.runCommand = options.runCommand ?? defaultRunCommand;
    this.securityScanners = options.securityScanners ?? SECURITY_SCANNERS;
    this.costEstimator = options.costEstimator ?? COST_ESTIMATOR;
  }

  get workdir(): string {
    return this.policy.workdir();
  }

  async runInfraCommand(
    cmd: InfraCommand | string,
  ): Promise<ProcessToolResult> {
    const parsed: ParseInfraCommandResult =
      typeof cmd === "string" ? parseInfraCommand(cmd) : { ok: true, command: cmd };
    const rawTokens = typeof cmd === "string" ? cmd.trim().split(/\s+/) : [];
    // Policies see the argv that will run; unparseable input is shown as given.
    const args = parsed.ok ? infraCommandArgs(parsed.command) : rawTokens;
    return this.guarded<ProcessToolOutput>(ToolName.INFRA, args, async () => {
      if (!parsed.ok) return toolFailure("disallowed_operation", parsed.error);
      const { command } = parsed;
      const invalid = checkInfraCommand(command);
      if (invalid) return toolFailure("disallowed_operation", invalid);

      const binaryPath = await this.resolveBinary(INFRA_BINARY);
      if (!binaryPath) {
        return toolFailure("binary_missing", `Binary not found: ${INFRA_BINARY}`);
      }
      return this.runProbe(
        { binary: INFRA_BINARY, args, successCodes: [0] },
        binaryPath,
      );
    });
  }

  /** Runs the first scanner found on the search path; never more than one. */
  async runSecurityScan(): Promise<ProcessToolResult> {
    return this.guarded<ProcessToolOutput>(ToolName.SECURITY_SCAN, [], async () => {
      for (const probe of this.securityScanners) {
        const binaryPath = await this.resolveBinary(probe.binary);
        if (binaryPath) return this.runProbe(probe, binaryPath);
        logger.debug({ binary: probe.binary }, "Scanner not on search path");
      }
      return toolFailure("binary_missing", "no scanner found");
    });
  }

  async runCostEstimate(): Promise<ProcessToolResult> {
    return this.guarded<ProcessToolOutput>(ToolName.COST_ESTIMATE, [], async () => {
      const probe = this.costEstimator;
      const binaryPath = await this.resolveBinary(probe.binary);
      if (!binaryPath) {
        return toolFailure("binary_missing", `Binary not found: ${probe.binary}`);
      }
      return this.runProbe(probe, binaryPath);
    });
  }

  /**
   * Expand globs against the working directory and return workdir-relative
   * path → content. Directories, files over MAX_FILE_BYTES and files that are
   * not valid UTF-8 are skipped; a per-file error never aborts the batch.
   */
  async readRepoFiles(patterns: readonly string[]): Promise<ReadFilesResult> {
    return this.guarded<{ files: Record<string, string> }>(ToolName.READ_FILES, patterns, async () => {
      const cwd = this.policy.workdir();
      try {
        const info = await stat(cwd);
        if (!info.isDirectory()) {
          return toolFailure("io_failure", `Not a directory: ${cwd}`);
        }
      } catch (err) {
        return toolFailure("io_failure", describeError(err));
      }

      const files: Record<string, string> = {};
      for (const pattern of patterns) {
        if (escapesRoot(pattern)) {
          return toolFailure(
            "disallowed_operation",
            `Pattern escapes working directory: ${pattern}`,
          );
        }
        let matches: string[];
        try {
          matches = await fg(pattern, { cwd, onlyFiles: false, dot: false });
        } catch (err) {
          return toolFailure("io_failure", describeError(err));
        }
        for (const rel of matches.sort()) {
          if (Object.hasOwn(files, rel)) continue;
          const content = await this.readTextFile(join(cwd, rel));
          if (content !== null) files[rel] = content;
        }
      }
      return { ok: true, files };
    });
  }

  /** Writes `<workdir>/report.md`, overwriting any previous report. */
  async writeReport(text: string): Promise<WriteReportResult> {
    return this.guarded<{ path: string }>(ToolName.WRITE_REPORT, [REPORT_FILE_NAME], async () => {
      const path = join(this.policy.workdir(), REPORT_FILE_NAME);
      try {
        await writeFile(path, text, "utf-8");
      } catch (err) {
        return toolFailure("io_failure", describeError(err));
      }
      return { ok: true, path };
    });
  }

  private async readTextFile(path: string): Promise<string | null> {
    try {
      const info = await stat(path);
      if (info.isDirectory()) return null;
      if (info.size > MAX_FILE_BYTES) {
        logger.debug({ path, size: info.size }, "Skipping oversized file");
        return null;
      }
      const text = decodeUtf8(await readFile(path));
      if (text === null) {
        logger.debug({ path }, "Skipping file that is not valid UTF-8");
      }
      return text;
    } catch (err) {
      logger.debug({ err, path }, "Skipping unreadable file");
      return null;
    }
  }

  private async runProbe(
    probe: ToolProbe,
    binaryPath: string,
  ): Promise<ProcessToolResult> {
    const argv = [binaryPath, ...probe.args];
    const outcome = await this.runCommand(argv, {
      cwd: this.policy.workdir(),
      timeoutSeconds: this.policy.timeoutSeconds(),
    });
    const tool = probe.binary;
    switch (outcome.status) {
      case "timed_out":
        return toolFailure(
          "timed_out",
          `Command timed out: ${[tool, ...probe.args].join(" ")}`,
          { tool },
        );
      case "spawn_failed":
        return toolFailure("spawn_failed", outcome.error, { tool });
      case "exited": {
        const { exitCode, stdout, stderr } = outcome;
        if (probe.successCodes.includes(exitCode)) {
          return { ok: true, tool, exitCode, stdout, stderr };
        }
        return toolFailure("exit_status", `${tool} exited with code ${exitCode}`, {
          tool,
          exitCode,
          stdout,
          stderr,
        });
      }
    }
  }

  /** Runs the policy chain; a plugin that throws counts as a block. */
  private async authorize(
    toolName: string,
    args: readonly string[],
  ): Promise<ToolFailure | null> {
    for (const plugin of this.policyPlugins) {
      let verdict: PolicyVerdict;
      let reason: string | undefined;
      try {
        const result = await plugin.evaluate({ toolName, args });
        verdict = result.verdict;
        reason = result.reason;
      } catch (err) {
        verdict = "block";
        reason = `Policy ${plugin.name} failed: ${describeError(err)}`;
      }
      if (verdict === "block") {
        logger.warn({ toolName, policy: plugin.name }, "Call blocked by policy");
        return toolFailure(
          "policy_denied",
          reason ?? `Tool not allowed: ${toolName}`,
        );
      }
    }
    return null;
  }

  private async guarded<T extends object>(
    toolName: string,
    args: readonly string[],
    fn: () => Promise<ToolResult<T>>,
  ): Promise<ToolResult<T>> {
    const callId = uuidv7();
    logger.debug({ callId, toolName, args }, "Gateway call");
    const denied = await this.authorize(toolName, args);
    if (denied) return denied;

    let result: ToolResult<T>;
    try {
      result = await fn();
    } catch (err) {
      result = toolFailure("io_failure", describeError(err));
    }
    if (!result.ok) {
      logger.warn(
        { callId, toolName, kind: result.kind, error: result.error },
        "Gateway call failed",
      );
    } else {
      logger.debug({ callId, toolName }, "Gateway call succeeded");
    }
    return result;
  }
}

/**
 * Build a gateway from the process configuration: policy store, policy chain
 * (allowlist + configured plugins) and a binary resolver over `searchPath`.
 */
export function createToolGateway(config: AgentConfig): ToolGateway {
  const policy = new PolicyStore(config);
  return new ToolGateway({
    policy,
    policyPlugins: buildPolicyChain(policy, config.policies),
    resolveBinary: createBinaryResolver(config.searchPath),
  });
}
