import type { NextFunction, Request, Response } from "express";
import type { ZodType } from "zod";

export type ApiLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export function parseBody<T>(schema: ZodType<T>, req: Request, res: Response): T | null {
  return parseInput(schema, req.body, res);
}

export function parseQuery<T>(schema: ZodType<T>, req: Request, res: Response): T | null {
  return parseInput(schema, req.query, res);
}

function parseInput<T>(schema: ZodType<T>, input: unknown, res: Response): T | null {
  const result = schema.safeParse(input);
  if (!result.success) {
    res.status(400).json({
      error: "invalid_request",
      issues: result.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    });
    return null;
  }
  return result.data;
}

export function createErrorHandler(logger: ApiLogger) {
  return (error: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    const status = clientErrorStatus(error);
    if (status !== null) {
      res.status(status).json({ error: "invalid_request", message: errorMessage(error) });
      return;
    }

    logger.error(`[bill-ledger-api] request failed: ${errorMessage(error)}`);
    res.status(500).json({ error: "internal_error", message: "internal server error" });
  };
}

// body-parser rejections (malformed JSON, oversized payloads) carry a 4xx status.
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return null;
  }
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
