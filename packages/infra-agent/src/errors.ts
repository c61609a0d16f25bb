/**
 * Errors that stop a pipeline run. Recoverable tool conditions (missing binary,
 * timeout, denied tool) are returned as ToolResult failures instead.
 */

export class ConfigurationError extends Error {
  readonly code = "CONFIGURATION_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The model capability is unconfigured; raised before any tool runs. */
export class ModelUnreachableError extends Error {
  readonly code = "MODEL_UNREACHABLE";

  constructor(message: string) {
    super(message);
    this.name = "ModelUnreachableError";
  }
}

export class ModelRequestError extends Error {
  readonly code = "MODEL_REQUEST_FAILED";
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "ModelRequestError";
    this.status = status;
  }
}
