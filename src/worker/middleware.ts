// Worker middleware

import type { z } from "zod/v4";

/** CORS headers for all responses */
export const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
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
  return Response.json({ error: "Not found" }, { status: 404, headers: CORS_HEADERS });
}

export type ParsedBody<T> =
  | { ok: true; data: T }
  | { ok: false; response: Response };

/** Read a JSON body and validate it; failures become 400 responses */
export async function parseJsonBody<T>(req: Request, schema: z.ZodType<T>): Promise<ParsedBody<T>> {
  let raw: unknown;
  try {
    raw = await req.json();
  } catch {
    return { ok: false, response: errorResponse("Request body must be valid JSON", 400) };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map(issue => {
      const path = issue.path.map(String).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return { ok: false, response: errorResponse("Invalid request body", 400, { details }) };
  }

  return { ok: true, data: result.data };
}
