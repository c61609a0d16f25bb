import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Command, Option } from "commander";
import { loadAgentConfig } from "./config/index.js";
import type { ModelConfig } from "./config/types.js";
import { createToolGateway } from "./core/ToolGateway.js";
import type { ModelCapability } from "./interfaces/index.js";
import { createGeminiModel } from "./model/GeminiModel.js";
import { deriveOutputDir } from "./output/outputPath.js";
import { CreatePipeline } from "./pipelines/CreatePipeline.js";
import { ReviewPipeline } from "./pipelines/ReviewPipeline.js";
import { logger } from "./logger.js";

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Prints one line of user-facing output. */
  print: (line: string) => void;
  createModel: (config: ModelConfig) => ModelCapability;
}

export const defaultCliDeps = (): CliDeps => ({
  env: process.env,
  cwd: process.cwd(),
  print: (line) => process.stdout.write(`${line}\n`),
  createModel: createGeminiModel,
});

export interface ReviewCommandOptions {
  workdir?: string;
  config?: string;
}

export interface CreateCommandOptions extends ReviewCommandOptions {
  spec?: string;
  specFile?: string;
  outDir?: string;
}

/** Returns the process exit code. */
export async function reviewCommand(
  opts: ReviewCommandOptions,
  deps: CliDeps,
): Promise<number> {
  const config = await loadAgentConfig({
    env: deps.env,
    cwd: deps.cwd,
    configPath: opts.config,
    overrides: { workdir: opts.workdir },
  });
  const pipeline = new ReviewPipeline({
    gateway: createToolGateway(config),
    model: () => deps.createModel(config.model),
  });
  const result = await pipeline.run();
  if (!result.report.ok) {
    deps.print(`Report could not be written: ${result.report.error}`);
    return 1;
  }
  deps.print("Report written to report.md in workdir.");
  return 0;
}

/** Returns the process exit code. */
export async function createCommand(
  opts: CreateCommandOptions,
  deps: CliDeps,
): Promise<number> {
  const config = await loadAgentConfig({
    env: deps.env,
    cwd: deps.cwd,
    configPath: opts.config,
    overrides: { workdir: opts.workdir },
  });

  let specText = opts.spec;
  if (!specText && opts.specFile) {
    specText = await readFile(resolve(deps.cwd, opts.specFile), "utf-8");
  }
  if (!specText) {
    deps.print("Provide --spec or --spec-file for create mode.");
    return 1;
  }

  const outDir = opts.outDir
    ? resolve(deps.cwd, opts.outDir)
    : deriveOutputDir(specText, config.workdir);
  logger.debug({ outDir }, "Output directory selected");

  const pipeline = new CreatePipeline({
    model: () => deps.createModel(config.model),
  });
  const result = await pipeline.run(specText, outDir);
  if (!result.ok) {
    deps.print(result.error);
    return 1;
  }
  deps.print(result.message);
  for (const path of result.written) {
    deps.print(path);
  }
  return 0;
}

function addSharedOptions(command: Command): Command {
  return command
    .option("--workdir <dir>", "Path to Terraform project (defaults to ..)")
    .option("--config <path>", "Path to infra-agent.config.json / .js");
}

function addCreateOptions(command: Command): Command {
  return command
    .option("--spec <text>", "Inline text spec for create mode")
    .option("--spec-file <path>", "Path to text spec file for create mode")
    .option("--out-dir <dir>", "Output directory for create mode");
}

export function buildProgram(deps: CliDeps): Command {
  const program = new Command();
  program
    .name("infra-agent")
    .description("Terraform review and scaffold agent")
    .enablePositionalOptions()
    .addOption(
      new Option("--mode <mode>", "Legacy mode selector")
        .choices(["review", "create"])
        .default("review"),
    );
  addCreateOptions(addSharedOptions(program)).action(
    async (opts: CreateCommandOptions & { mode: string }) => {
      process.exitCode =
        opts.mode === "create"
          ? await createCommand(opts, deps)
          : await reviewCommand(opts, deps);
    },
  );

  addSharedOptions(
    program
      .command("review")
      .description("Run Terraform, security and cost tools and write report.md"),
  ).action(async (opts: ReviewCommandOptions) => {
    process.exitCode = await reviewCommand(opts, deps);
  });

  addCreateOptions(
    addSharedOptions(
      program
        .command("create")
        .description("Generate Terraform files from a text spec"),
    ),
  ).action(async (opts: CreateCommandOptions) => {
    process.exitCode = await createCommand(opts, deps);
  });

  return program;
}
