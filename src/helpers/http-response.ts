import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import { AppError, NotFoundError } from "../errors.js";

export interface ErrorBody {
  success: false;
  error: string;
  code: string;
  retryable: boolean;
  [extra: string]: unknown;
}

/**
 * Maps any thrown value to a status and JSON body.
 * AppErrors keep their own message; anything else gets a generic one so
 * internals never leak to the client.
 */
export function classifyError(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof AppError) {
    return {
      status: err.status,
      body: { success: false, error: err.message, code: err.code, retryable: err.retryable },
    };
  }

  // express.json() tags parse failures with type "entity.parse.failed" and a 4xx status
  if (err instanceof Error && "type" in err && err.type === "entity.parse.failed") {
    return {
      status: 400,
      body: { success: false, error: "Request body is not valid JSON", code: "invalid_input", retryable: false },
    };
  }
  if (err instanceof Error && "status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    return {
      status: err.status,
      body: { success: false, error: err.message, code: "bad_request", retryable: false },
    };
  }

  return {
    status: 500,
    body: { success: false, error: "An unexpected error occurred", code: "internal_error", retryable: true },
  };
}

/**
 * Wraps an async route handler so rejections reach the error middleware
 * instead of becoming unhandled promise rejections.
 */
export function safeHandler(
  handler: (req: Request, res: Response) => Promise<void> | void,
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new NotFoundError(`No route for ${req.method} ${req.path}`));
};

export const errorHandler: ErrorRequestHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  const { status, body } = classifyError(err);
  if (status >= 500 && !(err instanceof AppError)) {
    console.error(`[${req.method} ${req.path}] Unhandled error:`, err instanceof Error ? err.stack : err);
  } else if (status >= 500) {
    console.warn(`[${req.method} ${req.path}] ${body.code}: ${body.error}`);
  }
  res.status(status).json(body);
};

export function requestLogger(): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      console.log(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms`);
    });
    next();
  };
}
