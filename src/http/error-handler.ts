import { randomUUID } from "node:crypto";
import type { Context } from "hono";
import { AppError } from "../errors.js";
import type { Logger } from "../logger.js";

/**
 * Standardized error response format
 */
interface ErrorResponse {
  success: false;
  error: {
    id: string; // Unique error ID for tracking
    code: string; // Machine-readable error code
    message: string;
    details?: Record<string, unknown>;
  };
  meta: {
    timestamp: string;
    requestId?: string;
  };
}

type ErrorStatus = 400 | 404 | 408 | 422 | 500 | 502 | 503;

const ERROR_STATUSES: readonly ErrorStatus[] = [400, 404, 408, 422, 500, 502, 503];

function toErrorStatus(statusCode: number): ErrorStatus {
  return ERROR_STATUSES.find((status) => status === statusCode) ?? 500;
}

export function createErrorHandler(log: Logger) {
  return (err: Error, c: Context): Response => {
    const errorId = `err_${randomUUID()}`;
    const timestamp = new Date().toISOString();
    const requestId = c.req.header("x-request-id");

    if (err instanceof AppError) {
      const status = toErrorStatus(err.statusCode);
      const logFn = status >= 500 ? log.error.bind(log) : log.warn.bind(log);
      logFn({ errorId, code: err.code, details: err.details }, err.message);

      const response: ErrorResponse = {
        success: false,
        error: {
          id: errorId,
          code: err.code,
          message: err.message,
          details: err.details,
        },
        meta: {
          timestamp,
          ...(requestId && { requestId }),
        },
      };
      return c.json(response, status);
    }

    log.error({ errorId, err }, "Unexpected error");

    const response: ErrorResponse = {
      success: false,
      error: {
        id: errorId,
        code: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
      },
      meta: {
        timestamp,
        ...(requestId && { requestId }),
      },
    };
    return c.json(response, 500);
  };
}
