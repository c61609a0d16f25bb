#!/usr/bin/env node
/**
 * CLI – load .env files, then run the review or create pipeline.
 */
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadDotenv } from "dotenv";
import { buildProgram, defaultCliDeps } from "./commands.js";
import { logger } from "./logger.js";

function loadEnvFiles(): void {
  // Neither file overrides variables that are already set.
  loadDotenv({ path: join(process.cwd(), ".env") });
  const packageEnv = join(dirname(fileURLToPath(import.meta.url)), "..", ".env");
  loadDotenv({ path: packageEnv });
}

async function main(): Promise<void> {
  loadEnvFiles();
  logger.debug({ argv: process.argv }, "CLI starting");
  await buildProgram(defaultCliDeps()).parseAsync(process.argv);
}

main().catch((err) => {
  logger.error({ err }, "infra-agent failed");
  process.exit(1);
});
