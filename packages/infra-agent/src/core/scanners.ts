/**
 * A tool the gateway may fall back through, in declared priority order.
 */
export interface ToolProbe {
  /** Binary name resolved on the search path. */
  binary: string;
  /** Arguments after the binary name; run in the working directory. */
  args: readonly string[];
  /** Exit codes that count as success (1 for scanners means "issues found"). */
  successCodes: readonly number[];
}

/** Security scanners, highest priority first. Exactly one is ever run. */
export const SECURITY_SCANNERS: readonly ToolProbe[] = [
  {
    binary: "tfsec",
    args: ["--format", "json", "--no-color", "."],
    successCodes: [0, 1],
  },
  {
    binary: "checkov",
    args: ["-d", ".", "--output", "json"],
    successCodes: [0, 1],
  },
];

export const COST_ESTIMATOR: ToolProbe = {
  binary: "infracost",
  args: ["breakdown", "--path", ".", "--format", "json", "--no-color"],
  successCodes: [0],
};

export const INFRA_BINARY = "terraform";
