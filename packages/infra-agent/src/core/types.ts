/**
 * Why a gateway operation did not succeed.
 * - policy_denied: blocked by the policy chain; nothing was executed.
 * - binary_missing: the executable is not on the search path.
 * - disallowed_operation: subcommand or argument outside the permitted set.
 * - timed_out: the process exceeded its bound and was killed.
 * - io_failure: a filesystem read or write failed.
 * - exit_status: the process ran but its exit code is not a success code.
 * - spawn_failed: the process could not be started.
 */
export type ToolFailureKind =
  | "policy_denied"
  | "binary_missing"
  | "disallowed_operation"
  | "timed_out"
  | "io_failure"
  | "exit_status"
  | "spawn_failed";

/** Captured output of a process that ran to completion. */
export interface ProcessOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ToolFailure extends Partial<ProcessOutput> {
  ok: false;
  kind: ToolFailureKind;
  error: string;
  /** Binary that produced the failure, when one ran. */
  tool?: string;
}

export type ToolSuccess<T extends object> = { ok: true } & T;

/**
 * Outcome of every gateway operation. Gateway operations resolve to exactly one
 * ToolResult and never reject.
 */
export type ToolResult<T extends object = Record<never, never>> =
  | ToolSuccess<T>
  | ToolFailure;

export interface ProcessToolOutput extends ProcessOutput {
  tool: string;
}

export type ProcessToolResult = ToolResult<ProcessToolOutput>;
export type ReadFilesResult = ToolResult<{ files: Record<string, string> }>;
export type WriteReportResult = ToolResult<{ path: string }>;

/** Gateway tool names, as matched against the allowlist. */
export const ToolName = {
  INFRA: "run_terraform",
  SECURITY_SCAN: "run_security_scan",
  COST_ESTIMATE: "run_infracost",
  READ_FILES: "read_repo_files",
  WRITE_REPORT: "write_report",
} as const;

export type ToolName = (typeof ToolName)[keyof typeof ToolName];

export function toolFailure(
  kind: ToolFailureKind,
  error: string,
  extra: Partial<ProcessOutput> & { tool?: string } = {},
): ToolFailure {
  return { ok: false, kind, error, ...extra };
}
