export class NotFoundError extends Error {
  code = "NOT_FOUND";
  status = 404;
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = "NotFoundError";
  }
}

/** HTTP status carried by an error, e.g. body-parser's 400 on malformed JSON. */
export function errorStatus(error: unknown): number {
  if (error && typeof error === "object") {
    if ("status" in error && typeof error.status === "number") return error.status;
    if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  }
  return 500;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
