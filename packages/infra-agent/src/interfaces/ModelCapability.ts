/** One text part of a model request. */
export interface ModelPart {
  text: string;
}

/**
 * The only thing the pipelines need from a language model: turn an ordered
 * list of text parts into a single text response.
 */
export interface ModelCapability {
  generate(parts: ModelPart[]): Promise<string>;
}

/**
 * Resolves the model capability. Called first thing in every pipeline run so
 * that a missing credential fails the run before any tool executes.
 */
export type ModelProvider = () => ModelCapability;
