import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";

import { JournalError } from "../errors";
import { logger } from "../logger";

const log = logger.child({ module: "api" });

interface ErrorBody {
  status: number;
  code: string;
  message: string;
}

export function toErrorBody(err: unknown): ErrorBody {
  if (err instanceof JournalError) {
    return { status: err.status, code: err.code, message: err.message };
  }
  if (err instanceof ZodError) {
    const message = err.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
    return { status: 400, code: "INVALID_INPUT", message };
  }
  return { status: 500, code: "INTERNAL_ERROR", message: "Unexpected server error" };
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const { status, code, message } = toErrorBody(err);

  const entry = { status, code, path: req.path, method: req.method, err };
  if (status >= 500) {
    log.error(entry, "[API Error]");
  } else {
    log.warn(entry, "[API Error]");
  }

  res.status(status).json({
    ok: false,
    error: {
      code,
      message,
    },
  });
}

export function notFound(req: Request, res: Response) {
  res.status(404).json({
    ok: false,
    error: {
      code: "NOT_FOUND",
      message: `Route not found: ${req.method} ${req.path}`,
    },
  });
}
