/**
 * Fastify error handler plugin
 *
 * Every error leaves the API as an ApiError body. Route handlers throw
 * ApiRequestError subclasses; anything else is logged and hidden behind a 500.
 */

import fp from "fastify-plugin";

import type { ApiError } from "../../types/api.js";
import type {
  FastifyInstance,
  FastifyError,
  FastifyRequest,
  FastifyReply,
} from "fastify";

export type ApiErrorCode =
  | "NOT_FOUND"
  | "VALIDATION_ERROR"
  | "INVALID_CURSOR"
  | "INTERNAL_ERROR";

// ============================================================================
// Custom Error Classes
// ============================================================================

export abstract class ApiRequestError extends Error {
  abstract readonly code: ApiErrorCode;
  abstract readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

export class NotFoundError extends ApiRequestError {
  override readonly code = "NOT_FOUND";
  override readonly statusCode = 404;
}

export class ValidationError extends ApiRequestError {
  override readonly code: ApiErrorCode = "VALIDATION_ERROR";
  override readonly statusCode = 400;
}

/**
 * Pagination cursor that does not decode to a license position
 */
export class InvalidCursorError extends ValidationError {
  override readonly code = "INVALID_CURSOR";

  constructor(cursor: string) {
    super("Invalid cursor", { cursor });
  }
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

function send(
  reply: FastifyReply,
  statusCode: number,
  body: ApiError
): FastifyReply {
  return reply.status(statusCode).send(body);
}

function errorHandlerPlugin(fastify: FastifyInstance): void {
  fastify.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      const requestId = request.id;

      // Schema validation of params, querystring or body
      if (error.validation) {
        return send(reply, 400, {
          error: "VALIDATION_ERROR",
          message: `Invalid ${error.validationContext ?? "request"} parameters`,
          details: {
            validation: error.validation,
          },
          requestId,
        });
      }

      if (error instanceof ApiRequestError) {
        return send(reply, error.statusCode, {
          error: error.code,
          message: error.message,
          details: error.details,
          requestId,
        });
      }

      request.log.error(error, "Unhandled error");

      return send(reply, 500, {
        error: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
        requestId,
      });
    }
  );

  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) =>
    send(reply, 404, {
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`,
      requestId: request.id,
    })
  );
}

export const errorHandler = fp(errorHandlerPlugin, {
  name: "error-handler",
});
