/**
 * Error taxonomy shared by the services and the HTTP layer.
 * Each error knows the status it maps to and whether a client may retry it.
 */

export class AppError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string,
    readonly retryable: boolean,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string) {
    super(message, 400, "invalid_input", false);
    this.name = "InvalidInputError";
  }
}

export class TaskNotFoundError extends AppError {
  constructor(readonly taskId: number) {
    super(`Task ${taskId} not found`, 404, "task_not_found", false);
    this.name = "TaskNotFoundError";
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(message, 404, "not_found", false);
    this.name = "NotFoundError";
  }
}

/** The model could not be reached, refused the call, or timed out. */
export class UpstreamUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, "upstream_unavailable", true);
    this.name = "UpstreamUnavailableError";
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/** The model answered, but not with data of the requested shape. */
export class MalformedUpstreamResponseError extends AppError {
  constructor(message: string, readonly rawText?: string) {
    super(message, 502, "malformed_upstream_response", false);
    this.name = "MalformedUpstreamResponseError";
  }
}
