import { v7 as uuidv7 } from "uuid";
import type { ToolGateway } from "../core/ToolGateway.js";
import type { WriteReportResult } from "../core/types.js";
import type { ModelProvider } from "../interfaces/index.js";
import {
  bundleToParts,
  costFragment,
  fileFragments,
  planFragment,
  securityFragment,
  stepFragment,
  type EvidenceBundle,
} from "./evidence.js";
import { logger } from "../logger.js";

export const REVIEW_FILE_PATTERNS = ["*.tf"];
export const PLAN_FILE = "tf.plan";

export const REVIEW_INSTRUCTIONS = [
  "You are a Terraform PR reviewer. Using the provided files and tool outputs, " +
    "write a concise, actionable Markdown report with these sections:",
  "1) Summary (top risks, quick wins)",
  "2) Validation/Plan (key changes, errors if any)",
  "3) Security (notable issues, severities, suggestions)",
  "4) Cost (estimated monthly impact, hotspots, savings ideas)",
  "5) Suggested Diffs (minimal changes to improve security/cost/compliance).",
  "Avoid verbosity; prefer bullet points. If a tool failed or is missing, note it briefly and proceed.",
  "Do not include any apply steps.",
].join("\n");

export interface ReviewPipelineDeps {
  gateway: ToolGateway;
  model: ModelProvider;
}

export interface ReviewRunResult {
  runId: string;
  /** Model output, verbatim. */
  markdown: string;
  evidence: EvidenceBundle;
  report: WriteReportResult;
}

/**
 * Gathers evidence from Terraform, a security scanner and Infracost, has the
 * model write a review, and persists it as report.md in the working directory.
 * Steps run strictly in sequence and a failed step never stops the run.
 */
export class ReviewPipeline {
  private readonly gateway: ToolGateway;
  private readonly model: ModelProvider;

  constructor(deps: ReviewPipelineDeps) {
    this.gateway = deps.gateway;
    this.model = deps.model;
  }

  async run(): Promise<ReviewRunResult> {
    const runId = uuidv7();
    // Throws ModelUnreachableError before any tool has run.
    const model = this.model();
    const log = logger.child({ runId, pipeline: "review" });
    log.info({ workdir: this.gateway.workdir }, "Review started");

    const evidence = await this.gatherEvidence();
    log.debug(
      { fragments: evidence.map((f) => f.label) },
      "Evidence bundle assembled",
    );

    const markdown = await model.generate(
      bundleToParts(REVIEW_INSTRUCTIONS, evidence),
    );

    const report = await this.gateway.writeReport(markdown);
    if (report.ok) {
      log.info({ path: report.path }, "Review report written");
    } else {
      log.warn({ error: report.error }, "Review report could not be written");
    }
    return { runId, markdown, evidence, report };
  }

  private async gatherEvidence(): Promise<EvidenceBundle> {
    const gw = this.gateway;
    const files = await gw.readRepoFiles(REVIEW_FILE_PATTERNS);
    const init = await gw.runInfraCommand({ kind: "init" });
    const validate = await gw.runInfraCommand({ kind: "validate" });
    const plan = await gw.runInfraCommand({ kind: "plan", out: PLAN_FILE });
    const showJson = await gw.runInfraCommand({
      kind: "show",
      json: true,
      planFile: PLAN_FILE,
    });
    const showText = showJson.ok
      ? null
      : await gw.runInfraCommand({ kind: "show", planFile: PLAN_FILE });
    const security = await gw.runSecurityScan();
    const cost = await gw.runCostEstimate();

    return [
      ...fileFragments(files),
      stepFragment("init", "Terraform init", init),
      stepFragment("validate", "Terraform validate", validate),
      planFragment(plan, showJson, showText),
      securityFragment(security),
      costFragment(cost),
    ];
  }
}
