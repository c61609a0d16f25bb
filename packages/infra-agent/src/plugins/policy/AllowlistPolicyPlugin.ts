import type {
  PolicyPluginInterface,
  PolicyRequestContext,
  PolicyResult,
} from "../../interfaces/index.js";
import type { PolicyStore } from "../../policy/PolicyStore.js";
import { logger } from "../../logger.js";

/**
 * Blocks every gateway tool that is not on the policy store's allowlist.
 * Always first in the gateway's policy chain.
 */
export class AllowlistPolicyPlugin implements PolicyPluginInterface {
  readonly name = "allowlist";

  constructor(private readonly store: PolicyStore) {}

  async evaluate(context: PolicyRequestContext): Promise<PolicyResult> {
    if (this.store.isAllowed(context.toolName)) {
      return { verdict: "allow" };
    }
    logger.debug(
      { toolName: context.toolName, plugin: this.name },
      "Tool blocked by allowlist policy",
    );
    return {
      verdict: "block",
      code: "FORBIDDEN_TOOL",
      reason: `Tool not allowed: ${context.toolName}`,
    };
  }
}
