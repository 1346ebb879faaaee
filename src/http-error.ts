import type { ServerResponse } from "node:http";

/** Error carrying the status code and client-facing detail a route replies with. */
export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    readonly detail: string
  ) {
    super(detail);
    this.name = "HttpError";
  }
}

export function mapHttpError(error: unknown): { statusCode: number; detail: string } {
  if (error instanceof HttpError) {
    return { statusCode: error.statusCode, detail: error.detail };
  }
  return { statusCode: 500, detail: "Internal server error" };
}


/** Aborts when the connection closes before the reply has been written. */
export function abortOnDisconnect(response: ServerResponse): AbortController {
  const controller = new AbortController();
  response.once("close", () => {
    if (!response.writableFinished) {
      controller.abort();
    }
  });
  return controller;
}
