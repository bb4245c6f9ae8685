// Index build status route handler

import type { SearchBackend } from "../router";

export function handleIndexStatus(url: URL, backend: SearchBackend): Response {
  const jobId = url.searchParams.get("jobId") ?? undefined;
  const status = backend.getBuildStatus(jobId);

  if (jobId && !status.job) {
    return Response.json({ error: `Unknown build job: ${jobId}` }, { status: 404 });
  }

  return Response.json(status);
}
