import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { z } from "zod";
import type {
  AgentConfig,
  AgentConfigFile,
  AgentConfigOverrides,
} from "./types.js";
import { MAX_TIMEOUT_SECONDS } from "../core/CommandRunner.js";
import { ConfigurationError } from "../errors.js";
import { logger } from "../logger.js";

export const DEFAULT_WORKDIR = "..";
export const DEFAULT_TIMEOUT_SECONDS = 120;
export const DEFAULT_MODEL_NAME = "gemini-2.5-flash";
export const DEFAULT_MODEL_BASE_URL =
  "https://generativelanguage.googleapis.com/v1beta";
export const DEFAULT_MODEL_TIMEOUT_MS = 120_000;

const CONFIG_FILE_NAMES = ["infra-agent.config.js", "infra-agent.config.json"];

export const agentConfigFileSchema = z
  .object({
    workdir: z.string().min(1).optional(),
    allowlist: z.array(z.string()).optional(),
    timeoutSeconds: z.union([z.number(), z.string()]).optional(),
    model: z
      .object({
        name: z.string().min(1).optional(),
        baseUrl: z.string().url().optional(),
        timeoutMs: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    policies: z
      .array(
        z.object({
          name: z.string().min(1),
          config: z.record(z.unknown()).optional(),
        }),
      )
      .optional(),
  })
  .strict();

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

/**
 * Comma-separated tool names. Unset or empty means "all tools"; a value that
 * lists no names (",,") permits nothing.
 */
export function parseAllowlist(raw: string | undefined): string[] | null {
  if (!raw) return null;
  return raw
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

function inTimeoutRange(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= MAX_TIMEOUT_SECONDS;
}

/**
 * Always returns a positive integer no larger than MAX_TIMEOUT_SECONDS;
 * anything else degrades to the default.
 */
export function parseTimeoutSeconds(raw: string | number | undefined): number {
  if (typeof raw === "number") {
    return inTimeoutRange(raw) ? raw : DEFAULT_TIMEOUT_SECONDS;
  }
  if (raw === undefined || !/^\s*\+?\d+\s*$/.test(raw)) {
    return DEFAULT_TIMEOUT_SECONDS;
  }
  const value = Number.parseInt(raw, 10);
  return inTimeoutRange(value) ? value : DEFAULT_TIMEOUT_SECONDS;
}

/**
 * Resolves path to config file: first .js, then .json (from cwd).
 */
export function getConfigPath(cwd: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const p = join(cwd, name);
    if (existsSync(p)) return p;
  }
  return null;
}

function parseConfigFile(raw: unknown, configPath: string): AgentConfigFile {
  const parsed = agentConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid config file ${configPath}: ${parsed.error.message}`,
    );
  }
  return parsed.data;
}

/**
 * Loads the config file. Supports .json (readFile + parse) and .js/.mjs
 * (dynamic import, default export).
 */
export async function loadConfigFile(
  configPath: string,
): Promise<AgentConfigFile> {
  logger.debug({ configPath }, "Loading config from path");
  if (configPath.endsWith(".json")) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (err) {
      throw new ConfigurationError(
        `Could not read config file ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    return parseConfigFile(raw, configPath);
  }
  const mod: unknown = await import(pathToFileURL(configPath).href);
  const config =
    typeof mod === "object" && mod !== null && "default" in mod
      ? mod.default
      : mod;
  return parseConfigFile(config, configPath);
}

export interface ResolveAgentConfigInput {
  env: NodeJS.ProcessEnv;
  /** Base for relative workdir paths. */
  cwd: string;
  file?: AgentConfigFile;
  overrides?: AgentConfigOverrides;
}

/**
 * Merge defaults, config file, environment and CLI overrides (increasing
 * precedence) into one AgentConfig. Never throws.
 */
export function resolveAgentConfig(input: ResolveAgentConfigInput): AgentConfig {
  const { env, cwd, file = {}, overrides = {} } = input;

  const workdir =
    nonEmpty(overrides.workdir) ??
    nonEmpty(env.TERRAFORM_WORKDIR) ??
    file.workdir ??
    DEFAULT_WORKDIR;

  const allowlistEnv = env.TOOLS_ALLOWLIST;
  const allowlist = allowlistEnv
    ? parseAllowlist(allowlistEnv)
    : (file.allowlist ?? null);

  const timeoutSeconds =
    env.TOOLS_TIMEOUT_SECONDS !== undefined
      ? parseTimeoutSeconds(env.TOOLS_TIMEOUT_SECONDS)
      : parseTimeoutSeconds(file.timeoutSeconds);

  const modelTimeout = Number(env.GEMINI_TIMEOUT_MS);

  return {
    workdir: resolve(cwd, workdir),
    allowlist,
    timeoutSeconds,
    searchPath: env.PATH ?? "",
    model: {
      apiKey: nonEmpty(env.GEMINI_API_KEY),
      name: nonEmpty(env.GEMINI_MODEL) ?? file.model?.name ?? DEFAULT_MODEL_NAME,
      baseUrl:
        nonEmpty(env.GEMINI_BASE_URL) ??
        file.model?.baseUrl ??
        DEFAULT_MODEL_BASE_URL,
      timeoutMs:
        Number.isInteger(modelTimeout) && modelTimeout > 0
          ? modelTimeout
          : (file.model?.timeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS),
    },
    policies: file.policies ?? [],
  };
}

export interface LoadAgentConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Explicit config file. When absent, looked up in cwd. */
  configPath?: string;
  overrides?: AgentConfigOverrides;
}

export async function loadAgentConfig(
  options: LoadAgentConfigOptions = {},
): Promise<AgentConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath
    ? resolve(cwd, options.configPath)
    : getConfigPath(cwd);
  const file = configPath ? await loadConfigFile(configPath) : undefined;
  const config = resolveAgentConfig({
    env,
    cwd,
    file,
    overrides: options.overrides,
  });
  logger.debug(
    {
      configPath,
      workdir: config.workdir,
      allowlist: config.allowlist,
      timeoutSeconds: config.timeoutSeconds,
      model: config.model.name,
    },
    "Configuration resolved",
  );
  return config;
}
