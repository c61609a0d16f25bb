/**
 * Policy plugin entry in the config file. Built-in names: "deny-regex-argument".
 * The allowlist policy is always active and configured through `allowlist`.
 */
export interface PolicyPluginConfigEntry {
  name: string;
  config?: Record<string, unknown>;
}

export interface ModelConfig {
  /** Gemini API key. Only read from the environment, never from the config file. */
  apiKey?: string;
  /** Model id. Defaults to "gemini-2.5-flash". */
  name: string;
  baseUrl: string;
  /** Request timeout in ms. Defaults to 120000. */
  timeoutMs: number;
}

/**
 * Process-wide configuration, constructed once at start-up and passed to the
 * policy store, gateway and pipelines.
 */
export interface AgentConfig {
  /** Absolute working directory; every gateway operation is rooted here. */
  workdir: string;
  /** Permitted gateway tool names. null means every tool is permitted. */
  allowlist: string[] | null;
  /** Per-command timeout. Always a positive integer. */
  timeoutSeconds: number;
  /** Search path used to resolve tool binaries (PATH format). */
  searchPath: string;
  model: ModelConfig;
  policies: PolicyPluginConfigEntry[];
}

/**
 * infra-agent.config.json / infra-agent.config.js shape. Every field is optional;
 * environment variables and CLI flags take precedence.
 */
export interface AgentConfigFile {
  workdir?: string;
  allowlist?: string[];
  timeoutSeconds?: number | string;
  model?: {
    name?: string;
    baseUrl?: string;
    timeoutMs?: number;
  };
  policies?: PolicyPluginConfigEntry[];
}

/** Values given on the command line; they override everything else. */
export interface AgentConfigOverrides {
  workdir?: string;
}
