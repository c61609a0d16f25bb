// Programmatic API: config, gateway, pipelines, model and helpers
export { logger } from "./logger.js";
export type { Logger } from "./logger.js";
export {
  ConfigurationError,
  ModelRequestError,
  ModelUnreachableError,
} from "./errors.js";
export {
  loadAgentConfig,
  resolveAgentConfig,
  getConfigPath,
  parseAllowlist,
  parseTimeoutSeconds,
} from "./config/index.js";
export type {
  AgentConfig,
  AgentConfigFile,
  AgentConfigOverrides,
  ModelConfig,
  PolicyPluginConfigEntry,
} from "./config/index.js";
export { PolicyStore } from "./policy/PolicyStore.js";
export {
  AllowlistPolicyPlugin,
  DenyRegexArgumentPolicyPlugin,
  buildPolicyChain,
  createPolicyPluginInstance,
  type DenyRegexArgumentPolicyPluginConfig,
  type DenyRegexArgumentRule,
} from "./plugins/policy/index.js";
export * from "./core/index.js";
export type {
  ModelCapability,
  ModelPart,
  ModelProvider,
  PolicyPluginInterface,
  PolicyRequestContext,
  PolicyResult,
  PolicyVerdict,
} from "./interfaces/index.js";
export { GeminiModel, createGeminiModel } from "./model/GeminiModel.js";
export * from "./pipelines/index.js";
export { extractFirstStructuredBlock } from "./extract/structuredBlock.js";
export {
  slugify,
  slugFromSpec,
  allocateOutputDir,
  deriveOutputDir,
  FALLBACK_SLUG,
} from "./output/outputPath.js";
export { buildProgram, reviewCommand, createCommand } from "./commands.js";
export type { CliDeps } from "./commands.js";
