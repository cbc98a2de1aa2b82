import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class NotFoundError extends HttpError {
  constructor(entity: string, id: string) {
    super(404, `${entity} with ID ${id} not found`);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, message);
    this.name = "ValidationError";
  }
}

export function formatZodError(err: ZodError): string {
  const issue = err.issues[0];
  if (!issue) return "Invalid request body";
  const field = issue.path.join(".");
  return field ? `${field}: ${issue.message}` : issue.message;
}

// Must be registered after all routers.
export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof HttpError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  if (err instanceof ZodError) {
    res.status(400).json({ error: formatZodError(err) });
    return;
  }
  // express.json() parse failures carry a status
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    res.status(400).json({ error: "Malformed JSON body" });
    return;
  }

  console.error("[API] Unhandled error:", err);
  res.status(500).json({ error: "Internal server error" });
};
