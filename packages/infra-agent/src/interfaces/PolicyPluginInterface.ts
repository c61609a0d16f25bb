import type { z } from "zod";
import type { PolicyRequestContext, PolicyResult } from "./PolicyTypes.js";

/**
 * Policy plugin interface for deciding whether a gateway call may run.
 * The gateway evaluates plugins in order; the first "block" wins.
 */
export interface PolicyPluginInterface {
  readonly name: string;

  /**
   * Optional Zod schema for this plugin's config, used to validate the
   * config file entry at load time.
   */
  getConfigSchema?(): z.ZodType;

  evaluate(context: PolicyRequestContext): Promise<PolicyResult>;
}
