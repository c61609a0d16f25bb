import { z } from "zod";
import type {
  PolicyPluginInterface,
  PolicyRequestContext,
  PolicyResult,
} from "../../interfaces/index.js";
import { logger } from "../../logger.js";

const denyRegexArgumentRuleSchema = z.object({
  /** Gateway tool this rule applies to (exact match, e.g. "run_terraform"). */
  tool: z.string().min(1),
  /** Regex pattern. When it matches any single argument, the call is blocked. */
  regex: z.string().min(1),
  /** Optional RegExp flags (e.g. "i" for case-insensitive). */
  flags: z.string().optional(),
});

export const denyRegexArgumentConfigSchema = z.object({
  rules: z.array(denyRegexArgumentRuleSchema).min(1),
});

export type DenyRegexArgumentRule = z.infer<typeof denyRegexArgumentRuleSchema>;
export type DenyRegexArgumentPolicyPluginConfig = z.infer<
  typeof denyRegexArgumentConfigSchema
>;

/**
 * Blocks a gateway call when one of its arguments matches a rule's regex.
 * Useful to keep e.g. `-var-file` or `-target` out of plan invocations, or
 * `**` out of file globs.
 *
 * Config: { rules: [ { tool, regex, flags? }, ... ] }
 */
export class DenyRegexArgumentPolicyPlugin implements PolicyPluginInterface {
  readonly name = "deny-regex-argument";

  private readonly rules: Array<{
    tool: string;
    regex: RegExp;
    pattern: string;
  }>;

  getConfigSchema(): z.ZodType {
    return denyRegexArgumentConfigSchema;
  }

  constructor(config: Record<string, unknown>) {
    const parsed = denyRegexArgumentConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new Error(
        `DenyRegexArgumentPolicyPlugin invalid config: ${parsed.error.message}`,
      );
    }
    this.rules = parsed.data.rules.map((rule) => ({
      tool: rule.tool,
      // g and y make test() stateful across calls.
      regex: new RegExp(rule.regex, (rule.flags ?? "").replace(/[gy]/g, "")),
      pattern: rule.regex,
    }));
  }

  async evaluate(context: PolicyRequestContext): Promise<PolicyResult> {
    for (let i = 0; i < this.rules.length; i++) {
      const rule = this.rules[i];
      if (context.toolName !== rule.tool) continue;
      const matched = context.args.find((arg) => rule.regex.test(arg));
      if (matched !== undefined) {
        logger.debug(
          {
            toolName: context.toolName,
            plugin: this.name,
            ruleIndex: i,
            pattern: rule.pattern,
          },
          "Deny-regex-argument policy rule matched",
        );
        return {
          verdict: "block",
          code: "REGEX_POLICY_MATCH",
          reason: `Argument '${matched}' matched policy rule (pattern: ${rule.pattern}).`,
        };
      }
    }
    return { verdict: "allow" };
  }
}
