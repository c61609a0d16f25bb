/**
 * The closed set of Terraform invocations the gateway will run. Each variant
 * carries only the arguments that subcommand is permitted to take.
 */
export type InfraCommand =
  | { kind: "init" }
  | { kind: "validate" }
  | { kind: "plan"; out?: string }
  | { kind: "show"; planFile?: string; json?: boolean }
  | { kind: "version" };

export type InfraSubcommand = InfraCommand["kind"];

export const INFRA_SUBCOMMANDS: readonly InfraSubcommand[] = [
  "init",
  "validate",
  "plan",
  "show",
  "version",
];

export type ParseInfraCommandResult =
  | { ok: true; command: InfraCommand }
  | { ok: false; error: string };

function isSubcommand(value: string): value is InfraSubcommand {
  return INFRA_SUBCOMMANDS.some((sub) => sub === value);
}

function disallowedArgument(sub: InfraSubcommand, arg: string): ParseInfraCommandResult {
  return { ok: false, error: `Disallowed argument for ${sub}: ${arg}` };
}

/**
 * Parse the string form ("plan -out tf.plan", "show -json tf.plan") into an
 * InfraCommand. Flags the gateway injects itself (-input=false, -no-color) are
 * accepted and dropped.
 */
export function parseInfraCommand(input: string): ParseInfraCommandResult {
  const tokens = input.trim().split(/\s+/).filter((t) => t.length > 0);
  const [sub, ...rest] = tokens;
  if (sub === undefined) {
    return { ok: false, error: "Empty terraform command" };
  }
  if (!isSubcommand(sub)) {
    return { ok: false, error: `Disallowed subcommand: ${sub}` };
  }
  const args = rest.filter((t) => t !== "-input=false" && t !== "-no-color");

  switch (sub) {
    case "init":
    case "validate":
    case "version": {
      const [first] = args;
      if (first !== undefined) return disallowedArgument(sub, first);
      return { ok: true, command: { kind: sub } };
    }
    case "plan": {
      let out: string | undefined;
      for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === "-out" && out === undefined && i + 1 < args.length) {
          out = args[++i];
        } else if (arg.startsWith("-out=") && out === undefined) {
          out = arg.slice("-out=".length);
        } else {
          return disallowedArgument(sub, arg);
        }
      }
      return { ok: true, command: out === undefined ? { kind: "plan" } : { kind: "plan", out } };
    }
    case "show": {
      let json = false;
      let planFile: string | undefined;
      for (const arg of args) {
        if (arg === "-json") {
          json = true;
        } else if (!arg.startsWith("-") && planFile === undefined) {
          planFile = arg;
        } else {
          return disallowedArgument(sub, arg);
        }
      }
      const command: InfraCommand = { kind: "show", json };
      if (planFile !== undefined) command.planFile = planFile;
      return { ok: true, command };
    }
  }
}

/**
 * Reject values that could be read as flags or smuggle control bytes.
 * Returns an error message, or null when the command is acceptable.
 */
export function checkInfraCommand(command: InfraCommand): string | null {
  const values =
    command.kind === "plan"
      ? [command.out]
      : command.kind === "show"
        ? [command.planFile]
        : [];
  for (const value of values) {
    if (value === undefined) continue;
    if (value.length === 0 || value.startsWith("-") || value.includes("\0")) {
      return `Disallowed argument for ${command.kind}: ${JSON.stringify(value)}`;
    }
  }
  return null;
}

/**
 * Arguments after the binary name. Non-interactive and non-colored flags are
 * injected ahead of anything the caller supplied.
 */
export function infraCommandArgs(command: InfraCommand): string[] {
  switch (command.kind) {
    case "init":
      return ["init", "-input=false"];
    case "validate":
      return ["validate", "-no-color"];
    case "plan":
      return [
        "plan",
        "-input=false",
        "-no-color",
        ...(command.out !== undefined ? [`-out=${command.out}`] : []),
      ];
    case "show":
      return [
        "show",
        "-no-color",
        ...(command.json ? ["-json"] : []),
        ...(command.planFile !== undefined ? [command.planFile] : []),
      ];
    case "version":
      return ["version"];
  }
}
