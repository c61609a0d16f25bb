export {
  loadAgentConfig,
  resolveAgentConfig,
  loadConfigFile,
  getConfigPath,
  parseAllowlist,
  parseTimeoutSeconds,
  agentConfigFileSchema,
  DEFAULT_WORKDIR,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_MODEL_NAME,
  DEFAULT_MODEL_BASE_URL,
  DEFAULT_MODEL_TIMEOUT_MS,
} from "./ConfigLoader.js";
export type {
  LoadAgentConfigOptions,
  ResolveAgentConfigInput,
} from "./ConfigLoader.js";
export type {
  AgentConfig,
  AgentConfigFile,
  AgentConfigOverrides,
  ModelConfig,
  PolicyPluginConfigEntry,
} from "./types.js";
