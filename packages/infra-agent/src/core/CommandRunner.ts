import { spawn } from "node:child_process";
import { logger } from "../logger.js";

/** Largest delay setTimeout honours; longer ones fire after 1 ms. */
const MAX_TIMER_DELAY_MS = 2_147_483_647;
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

function timerDelayMs(timeoutSeconds: number): number {
  if (Number.isNaN(timeoutSeconds)) return MAX_TIMER_DELAY_MS;
  return Math.min(Math.max(timeoutSeconds * 1000, 0), MAX_TIMER_DELAY_MS);
}

export interface RunCommandOptions {
  cwd: string;
  timeoutSeconds: number;
  env?: NodeJS.ProcessEnv;
}

export type CommandOutcome =
  | { status: "exited"; exitCode: number; stdout: string; stderr: string }
  | { status: "timed_out"; argv: readonly string[]; pid: number | undefined }
  | { status: "spawn_failed"; error: string };

function killProcessGroup(pid: number): void {
  try {
    // Negative pid: the whole group, so grandchildren (provider plugins) die too.
    process.kill(-pid, "SIGKILL");
  } catch (err) {
    logger.debug({ err, pid }, "Process group already gone");
  }
}

/**
 * Run one process with argv passed as a discrete list (never through a shell)
 * and a wall-clock bound. On timeout the child's process group is killed and
 * the promise resolves once the child has exited.
 */
export function runCommand(
  argv: readonly string[],
  options: RunCommandOptions,
): Promise<CommandOutcome> {
  const [command, ...args] = argv;
  if (command === undefined) {
    return Promise.resolve({ status: "spawn_failed", error: "Empty command" });
  }

  return new Promise<CommandOutcome>((resolve) => {
    let settled = false;
    let timedOut = false;
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    const settle = (outcome: CommandOutcome): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(outcome);
    };

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      shell: false,
      detached: true,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const timer = setTimeout(() => {
      timedOut = true;
      logger.warn(
        { argv, pid: child.pid, timeoutSeconds: options.timeoutSeconds },
        "Command timed out; killing process group",
      );
      if (child.pid !== undefined) {
        killProcessGroup(child.pid);
      } else {
        child.kill("SIGKILL");
      }
    }, timerDelayMs(options.timeoutSeconds));

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (err) => {
      settle({ status: "spawn_failed", error: err.message });
    });

    child.on("exit", () => {
      if (timedOut) {
        settle({ status: "timed_out", argv, pid: child.pid });
      }
    });

    child.on("close", (code) => {
      if (timedOut) {
        settle({ status: "timed_out", argv, pid: child.pid });
        return;
      }
      settle({
        status: "exited",
        exitCode: code ?? -1,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
      });
    });
  });
}
