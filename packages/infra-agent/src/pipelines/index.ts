export {
  ReviewPipeline,
  REVIEW_INSTRUCTIONS,
  REVIEW_FILE_PATTERNS,
  PLAN_FILE,
} from "./ReviewPipeline.js";
export type { ReviewPipelineDeps, ReviewRunResult } from "./ReviewPipeline.js";
export {
  CreatePipeline,
  CREATE_SYSTEM_INSTRUCTION,
  createPrompt,
  parseManifest,
  fileManifestSchema,
} from "./CreatePipeline.js";
export type {
  CreatePipelineDeps,
  CreateRunResult,
  CreateFailureKind,
  FileManifest,
  FileManifestEntry,
} from "./CreatePipeline.js";
export { outcomeText } from "./evidence.js";
export type { EvidenceBundle, EvidenceFragment } from "./evidence.js";
