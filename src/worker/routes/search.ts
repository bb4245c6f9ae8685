// Search route handler

import type { SearchBackend } from "../router";
import { parseJsonBody } from "../middleware";
import { SearchBodySchema } from "./schemas";

export async function handleSearch(req: Request, backend: SearchBackend): Promise<Response> {
  const body = await parseJsonBody(req, SearchBodySchema);
  if (!body.ok) return body.response;

  return Response.json(await backend.search(body.data));
}
