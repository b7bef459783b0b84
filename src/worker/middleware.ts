// Worker middleware

import { NotFoundError, ValidationError, errorMessage } from "../errors";

/** CORS headers for all responses */
export const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, DELETE, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type, Accept",
};

export const SSE_HEADERS = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  "Connection": "keep-alive",
};

/** Handle CORS preflight requests */
export function handleCors(): Response {
  return new Response(null, { status: 204, headers: CORS_HEADERS });
}

/** Wrap response with CORS headers */
export function withCors(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(CORS_HEADERS)) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}

/** Create error response */
export function errorResponse(message: string, status = 500, extra?: Record<string, unknown>): Response {
  return Response.json({ error: message, ...extra }, { status, headers: CORS_HEADERS });
}

/** Create not found response */
export function notFoundResponse(): Response {
  return errorResponse("Not found", 404);
}

export function statusForError(error: unknown): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof ValidationError) return 400;
  return 500;
}

/** Maps a thrown error onto its HTTP response */
export function errorToResponse(error: unknown): Response {
  const status = statusForError(error);
  if (status === 500) {
    console.error(`[worker] ${errorMessage(error)}`);
    return errorResponse("Internal server error", 500);
  }
  const field = error instanceof ValidationError && error.field ? { field: error.field } : undefined;
  return errorResponse(errorMessage(error), status, field);
}

/** Parses a JSON request body; malformed JSON is a ValidationError */
export async function readJsonBody(req: Request): Promise<unknown> {
  const text = await req.text();
  if (!text.trim()) {
    return {};
  }
  try {
    const body: unknown = JSON.parse(text);
    return body;
  } catch (error) {
    throw new ValidationError(`Invalid JSON body: ${errorMessage(error)}`, "body");
  }
}

export function formatSse(data: unknown): string {
  return `data: ${JSON.stringify(data)}\n\n`;
}
