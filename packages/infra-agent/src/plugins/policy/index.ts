import type { PolicyPluginConfigEntry } from "../../config/types.js";
import type { PolicyPluginInterface } from "../../interfaces/index.js";
import type { PolicyStore } from "../../policy/PolicyStore.js";
import { AllowlistPolicyPlugin } from "./AllowlistPolicyPlugin.js";
import { DenyRegexArgumentPolicyPlugin } from "./DenyRegexArgumentPolicyPlugin.js";

export { AllowlistPolicyPlugin } from "./AllowlistPolicyPlugin.js";
export {
  DenyRegexArgumentPolicyPlugin,
  denyRegexArgumentConfigSchema,
  type DenyRegexArgumentRule,
  type DenyRegexArgumentPolicyPluginConfig,
} from "./DenyRegexArgumentPolicyPlugin.js";

export type PolicyPluginFactory = (
  config: Record<string, unknown>,
) => PolicyPluginInterface;

/** Factories for policy plugins that can be named in the config file. */
const policyFactories: Record<string, PolicyPluginFactory> = {
  "deny-regex-argument": (config) => new DenyRegexArgumentPolicyPlugin(config),
};

/**
 * Create a policy plugin instance by name with the given config.
 */
export function createPolicyPluginInstance(
  name: string,
  config: Record<string, unknown>,
): PolicyPluginInterface {
  const factory = policyFactories[name];
  if (!factory) {
    throw new Error(
      `Unknown policy plugin name: "${name}". Registered: ${Object.keys(policyFactories).join(", ")}`,
    );
  }
  return factory(config);
}

/**
 * The gateway's policy chain: the allowlist first, then configured plugins in
 * config order.
 */
export function buildPolicyChain(
  store: PolicyStore,
  entries: PolicyPluginConfigEntry[],
): PolicyPluginInterface[] {
  return [
    new AllowlistPolicyPlugin(store),
    ...entries.map((entry) =>
      createPolicyPluginInstance(entry.name, entry.config ?? {}),
    ),
  ];
}
