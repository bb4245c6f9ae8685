// Request router

import type { SearchOrchestrator } from "../crawler/orchestrator";
import { handleCrawl, handleHealth, handleIndexStatus, handleSearch } from "./routes";
import { handleCors, withCors, errorResponse, notFoundResponse } from "./middleware";

/** The orchestrator operations the HTTP layer calls */
export type SearchBackend = Pick<SearchOrchestrator, "crawl" | "search" | "getBuildStatus">;

export type RequestHandler = (req: Request) => Promise<Response>;

export function createRouter(resolveBackend: () => Promise<SearchBackend>): RequestHandler {
  return async function routeRequest(req: Request): Promise<Response> {
    const url = new URL(req.url);
    const path = url.pathname;
    const method = req.method;

    // Handle CORS preflight
    if (method === "OPTIONS") {
      return handleCors();
    }

    try {
      let response: Response;

      if (path === "/health" && method === "GET") {
        response = handleHealth();
      }
      else if (path === "/api/crawl" && method === "POST") {
        response = await handleCrawl(req, await resolveBackend());
      }
      else if (path === "/api/search" && method === "POST") {
        response = await handleSearch(req, await resolveBackend());
      }
      else if (path === "/api/index/status" && method === "GET") {
        response = handleIndexStatus(url, await resolveBackend());
      }
      else {
        response = notFoundResponse();
      }

      return withCors(response);

    } catch (error) {
      console.error("[worker] Request error:", error);
      return errorResponse(
        error instanceof Error ? error.message : "Internal server error"
      );
    }
  };
}
