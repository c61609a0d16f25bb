import type {
  ProcessToolResult,
  ReadFilesResult,
  ToolResult,
} from "../core/types.js";
import type { ModelPart } from "../interfaces/index.js";

export interface EvidenceFragment {
  label: string;
  text: string;
}

/** Ordered: files, init, validate, plan, security, cost. */
export type EvidenceBundle = EvidenceFragment[];

/**
 * What a step contributes to the bundle: stdout on success; otherwise the
 * error line followed by whatever the process printed.
 */
export function outcomeText(result: ToolResult<{ stdout: string }>): string {
  if (result.ok) return result.stdout;
  return [result.error, result.stderr, result.stdout]
    .map((part) => part?.trim() ?? "")
    .filter((part) => part.length > 0)
    .join("\n");
}

function fenced(body: string, lang = ""): string {
  return "```" + lang + "\n" + body + "\n```";
}

export function fileFragments(files: ReadFilesResult): EvidenceFragment[] {
  if (!files.ok) {
    return [{ label: "files", text: `Could not read files: ${files.error}` }];
  }
  return Object.entries(files.files).map(([rel, content]) => ({
    label: `file:${rel}`,
    text: `File: ${rel}\n${fenced(content, "hcl")}`,
  }));
}

export function stepFragment(
  label: string,
  title: string,
  result: ProcessToolResult,
): EvidenceFragment {
  return { label, text: `${title}:\n${fenced(outcomeText(result))}` };
}

/**
 * Plan evidence: the JSON show output when it succeeded, else the text show
 * output. When the text show also failed, the plan step's own error explains
 * why.
 */
export function planFragment(
  plan: ProcessToolResult,
  showJson: ProcessToolResult,
  showText: ProcessToolResult | null,
): EvidenceFragment {
  if (showJson.ok) {
    return {
      label: "plan",
      text: `Terraform plan (JSON):\n${fenced(showJson.stdout, "json")}`,
    };
  }
  const source = showText && !showText.ok && !plan.ok ? plan : (showText ?? showJson);
  return {
    label: "plan",
    text: `Terraform plan (text):\n${fenced(outcomeText(source))}`,
  };
}

export function securityFragment(result: ProcessToolResult): EvidenceFragment {
  if (result.ok) {
    return {
      label: "security",
      text: `Security scan (${result.tool}):\n${fenced(result.stdout, "json")}`,
    };
  }
  return {
    label: "security",
    text: `Security scan unavailable: ${outcomeText(result)}`,
  };
}

export function costFragment(result: ProcessToolResult): EvidenceFragment {
  if (result.ok) {
    return { label: "cost", text: `Infracost:\n${fenced(result.stdout, "json")}` };
  }
  return { label: "cost", text: `Infracost unavailable: ${outcomeText(result)}` };
}

export function bundleToParts(
  instructions: string,
  bundle: EvidenceBundle,
): ModelPart[] {
  return [{ text: instructions }, ...bundle.map((f) => ({ text: f.text }))];
}
