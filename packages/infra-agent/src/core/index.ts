export {
  ToolGateway,
  createToolGateway,
  REPORT_FILE_NAME,
  MAX_FILE_BYTES,
} from "./ToolGateway.js";
export type { ToolGatewayOptions } from "./ToolGateway.js";
export { runCommand } from "./CommandRunner.js";
export type { CommandOutcome, RunCommandOptions } from "./CommandRunner.js";
export { resolveBinary, createBinaryResolver } from "./binaries.js";
export type { BinaryResolver } from "./binaries.js";
export {
  parseInfraCommand,
  checkInfraCommand,
  infraCommandArgs,
  INFRA_SUBCOMMANDS,
} from "./infraCommands.js";
export type { InfraCommand, InfraSubcommand } from "./infraCommands.js";
export { SECURITY_SCANNERS, COST_ESTIMATOR, INFRA_BINARY } from "./scanners.js";
export type { ToolProbe } from "./scanners.js";
export { ToolName, toolFailure } from "./types.js";
export type {
  ToolResult,
  ToolFailure,
  ToolFailureKind,
  ToolSuccess,
  ProcessOutput,
  ProcessToolOutput,
  ProcessToolResult,
  ReadFilesResult,
  WriteReportResult,
} from "./types.js";
