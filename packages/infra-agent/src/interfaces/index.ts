export type {
  PolicyRequestContext,
  PolicyResult,
  PolicyVerdict,
} from "./PolicyTypes.js";
export type { PolicyPluginInterface } from "./PolicyPluginInterface.js";
export type {
  ModelCapability,
  ModelPart,
  ModelProvider,
} from "./ModelCapability.js";
