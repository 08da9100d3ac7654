import { ZodError } from "zod";
import type { FastifyInstance } from "fastify";
import { isStoreError } from "@image-triage/shared";

export type ApiError = {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
};

const codeForStatus = (status: number): string => {
  switch (status) {
    case 400:
      return "BAD_REQUEST";
    case 404:
      return "NOT_FOUND";
    case 409:
      return "CONFLICT";
    case 415:
      return "UNSUPPORTED_MEDIA_TYPE";
    default:
      return "REQUEST_ERROR";
  }
};

const apiError = (code: string, message: string, details?: Record<string, unknown>): ApiError => ({
  error: details ? { code, message, details } : { code, message },
});

export const registerErrorHandling = (app: FastifyInstance) => {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send(
        apiError("VALIDATION_ERROR", "request validation failed", {
          issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
        }),
      );
    }
    if (isStoreError(error, "NOT_FOUND")) {
      return reply.status(404).send(apiError("NOT_FOUND", error.message));
    }
    if (isStoreError(error, "DUPLICATE_ID")) {
      return reply.status(409).send(apiError("DUPLICATE_ID", error.message));
    }

    const status = typeof error.statusCode === "number" ? error.statusCode : 500;
    if (status < 500) {
      const code = typeof error.code === "string" && error.code.length > 0 ? error.code : codeForStatus(status);
      return reply.status(status).send(apiError(code, error.message));
    }

    request.log.error({ err: error }, "request failed");
    return reply.status(500).send(apiError("INTERNAL_ERROR", "internal server error"));
  });

  app.setNotFoundHandler((request, reply) => reply.notFound(`route ${request.method} ${request.url} not found`));
};
