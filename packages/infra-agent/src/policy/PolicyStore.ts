import type { AgentConfig } from "../config/types.js";

/**
 * Read-only view over the tool policy part of an AgentConfig: where tools run,
 * which ones may run, and for how long.
 */
export class PolicyStore {
  private readonly workdirPath: string;
  private readonly allowed: ReadonlySet<string> | null;
  private readonly timeout: number;

  constructor(config: Pick<AgentConfig, "workdir" | "allowlist" | "timeoutSeconds">) {
    this.workdirPath = config.workdir;
    this.allowed = config.allowlist ? new Set(config.allowlist) : null;
    this.timeout = config.timeoutSeconds;
  }

  workdir(): string {
    return this.workdirPath;
  }

  /** null means every tool is permitted. */
  allowlist(): ReadonlySet<string> | null {
    return this.allowed;
  }

  timeoutSeconds(): number {
    return this.timeout;
  }

  isAllowed(toolName: string): boolean {
    return this.allowed === null || this.allowed.has(toolName);
  }
}
