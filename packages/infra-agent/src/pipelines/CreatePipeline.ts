import { mkdir, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import { v7 as uuidv7 } from "uuid";
import { z } from "zod";
import { extractFirstStructuredBlock } from "../extract/structuredBlock.js";
import type { ModelProvider } from "../interfaces/index.js";
import { logger } from "../logger.js";

export const CREATE_SYSTEM_INSTRUCTION = [
  "Generate a Terraform scaffold as JSON. Output only JSON with the following shape:",
  "{",
  '  "files": [',
  '    { "path": "main.tf", "content": "hcl content" },',
  '    { "path": "variables.tf", "content": "hcl content" },',
  '    { "path": "outputs.tf", "content": "hcl content" }',
  "  ]",
  "}",
  "Use secure defaults (encryption, least-privilege, tags). Keep content concise and valid.",
].join("\n");

export function createPrompt(specText: string): string {
  return `Spec for Terraform scaffold:\n${specText}\n\nReturn ONLY the JSON object as specified.`;
}

const fileManifestEntrySchema = z.object({
  path: z.string().nullish().transform((v) => v ?? ""),
  content: z.string().nullish().transform((v) => v ?? ""),
});

export const fileManifestSchema = z.object({
  files: z.array(fileManifestEntrySchema).default([]),
});

export type FileManifestEntry = z.infer<typeof fileManifestEntrySchema>;
export type FileManifest = z.infer<typeof fileManifestSchema>;

export type CreateFailureKind = "malformed_response" | "io_failure";

export type CreateRunResult =
  | { ok: true; runId: string; outDir: string; written: string[]; message: string }
  | {
      ok: false;
      runId: string;
      kind: CreateFailureKind;
      error: string;
      /** Files already written before an io_failure; always empty otherwise. */
      written: string[];
    };

type ManifestParse =
  | { ok: true; manifest: FileManifest }
  | { ok: false; error: string };

function summarizeZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Locate and validate the file manifest in raw model output.
 */
export function parseManifest(responseText: string): ManifestParse {
  const block = extractFirstStructuredBlock(responseText);
  if (!block) {
    return { ok: false, error: "Model did not return JSON." };
  }
  let data: unknown;
  try {
    data = JSON.parse(block);
  } catch (err) {
    return {
      ok: false,
      error: `Failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
  const parsed = fileManifestSchema.safeParse(data);
  if (!parsed.success) {
    return {
      ok: false,
      error: `Failed to parse JSON: ${summarizeZodIssues(parsed.error)}`,
    };
  }
  return { ok: true, manifest: parsed.data };
}

/**
 * Destination of every entry that will be written, or the first path that
 * would land outside `outDir`.
 */
function planWrites(
  manifest: FileManifest,
  outDir: string,
): { ok: true; writes: Array<{ dest: string; content: string }> } | { ok: false; error: string } {
  const root = resolve(outDir);
  const writes: Array<{ dest: string; content: string }> = [];
  for (const entry of manifest.files) {
    if (!entry.path) continue;
    const dest = resolve(root, entry.path);
    const rel = relative(root, dest);
    const outside = rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel);
    if (isAbsolute(entry.path) || rel === "" || outside) {
      return { ok: false, error: `Path escapes output directory: ${entry.path}` };
    }
    writes.push({ dest, content: entry.content });
  }
  return { ok: true, writes };
}

export interface CreatePipelineDeps {
  model: ModelProvider;
}

/**
 * Turns a free-text infrastructure spec into files: asks the model for a JSON
 * manifest, extracts and validates it, then writes every entry under the
 * output directory. Nothing is written unless the whole manifest is valid.
 */
export class CreatePipeline {
  private readonly model: ModelProvider;

  constructor(deps: CreatePipelineDeps) {
    this.model = deps.model;
  }

  async run(specText: string, outDir: string): Promise<CreateRunResult> {
    const runId = uuidv7();
    const model = this.model();
    const log = logger.child({ runId, pipeline: "create" });
    log.info({ outDir }, "Create started");

    const response = await model.generate([
      { text: CREATE_SYSTEM_INSTRUCTION },
      { text: createPrompt(specText) },
    ]);

    const parsed = parseManifest(response);
    if (!parsed.ok) {
      log.warn({ error: parsed.error }, "Model response rejected");
      return { ok: false, runId, kind: "malformed_response", error: parsed.error, written: [] };
    }
    const planned = planWrites(parsed.manifest, outDir);
    if (!planned.ok) {
      log.warn({ error: planned.error }, "Model response rejected");
      return { ok: false, runId, kind: "malformed_response", error: planned.error, written: [] };
    }

    const root = resolve(outDir);
    const written: string[] = [];
    try {
      await mkdir(root, { recursive: true });
      for (const { dest, content } of planned.writes) {
        await mkdir(dirname(dest), { recursive: true });
        await writeFile(dest, content, "utf-8");
        written.push(dest);
      }
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      log.error({ err, written: written.length }, "Writing generated files failed");
      return { ok: false, runId, kind: "io_failure", error, written };
    }

    const message = `Wrote ${written.length} files to ${outDir}.`;
    log.info({ written: written.length }, "Create finished");
    return { ok: true, runId, outDir: root, written, message };
  }
}
