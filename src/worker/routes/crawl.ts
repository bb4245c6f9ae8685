// Crawl route handler - crawls the seeds and starts a background index build

import type { SearchBackend } from "../router";
import { parseJsonBody } from "../middleware";
import { CrawlBodySchema } from "./schemas";

export async function handleCrawl(req: Request, backend: SearchBackend): Promise<Response> {
  const body = await parseJsonBody(req, CrawlBodySchema);
  if (!body.ok) return body.response;

  const result = await backend.crawl(body.data);
  return Response.json(result, { status: result.success ? 202 : 200 });
}
