import type { NextFunction, Request, Response } from "express";

export class HttpError extends Error {
  status: number;
  code: string;
  details?: unknown;

  constructor(status: number, message: string, details?: unknown, code?: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code ?? (status >= 500 ? "INTERNAL_ERROR" : "REQUEST_ERROR");
    this.details = details;
  }
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const status = err instanceof HttpError ? err.status : 500;
  const code = err instanceof HttpError ? err.code : "INTERNAL_ERROR";
  const message = err instanceof Error && err.message ? err.message : "Unexpected error";
  const body = {
    message,
    error: {
      code,
      message,
      details: err instanceof HttpError ? err.details : undefined
    }
  };
  if (status === 500) {
    // eslint-disable-next-line no-console
    console.error("[Metrics] unhandled error", err);
  }
  res.status(status).json(body);
}
