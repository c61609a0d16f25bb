/**
 * Context passed to policy evaluation for a gateway call.
 */
export interface PolicyRequestContext {
  /** Gateway tool name, e.g. "run_terraform". */
  toolName: string;
  /** Arguments the tool would run with (argv tail, glob patterns, ...). */
  args: readonly string[];
}

export type PolicyVerdict = "allow" | "block";

export interface PolicyResult {
  verdict: PolicyVerdict;

  /**
   * A unique code for grouping denials in logs.
   * e.g. "FORBIDDEN_TOOL", "REGEX_POLICY_MATCH"
   */
  code?: string;

  /**
   * A human/LLM-readable explanation. When blocked, this becomes the
   * gateway failure's error text.
   */
  reason?: string;
}
