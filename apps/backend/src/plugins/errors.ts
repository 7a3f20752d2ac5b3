import fp from "fastify-plugin";
import type { FastifyError } from "fastify";
import { ZodError } from "zod";

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    detail?: string;
  };
}

const STATUS_CODES: Record<number, string> = {
  400: "bad_request",
  401: "unauthenticated",
  403: "forbidden",
  404: "not_found",
  409: "conflict",
  413: "payload_too_large",
  429: "rate_limited",
};

function errorCode(status: number, code: string | undefined): string {
  if (status >= 500) return "internal_error";
  if (code === "FST_ERR_VALIDATION") return "invalid_request";
  return STATUS_CODES[status] ?? "bad_request";
}

// Consistent error shaping for every route: { error: { code, message, detail? } }.
// `detail` carries the underlying message and is omitted in production.
export default fp(async (app) => {
  const isDev = process.env.NODE_ENV !== "production";

  app.setErrorHandler((err: FastifyError, req, rep) => {
    if (err instanceof ZodError) {
      const detail = err.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      const body: ErrorBody = {
        error: {
          code: "invalid_request",
          message: "Request validation failed",
          ...(isDev ? { detail } : {}),
        },
      };
      return rep.status(400).send(body);
    }

    const status = err.statusCode && err.statusCode >= 400 ? err.statusCode : 500;
    if (status >= 500) {
      req.log.error({ err }, "request failed");
    } else {
      req.log.warn({ code: err.code, message: err.message }, "request rejected");
    }

    const body: ErrorBody = {
      error: {
        code: errorCode(status, err.code),
        message: status >= 500 ? "Internal server error" : err.message,
        ...(isDev ? { detail: err.message } : {}),
      },
    };
    return rep.status(status).send(body);
  });

  app.setNotFoundHandler((req, rep) => {
    const body: ErrorBody = {
      error: { code: "not_found", message: `Route ${req.method} ${req.url} not found` },
    };
    return rep.status(404).send(body);
  });
});
