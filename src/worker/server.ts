// Worker HTTP service - node:http bridged to the Fetch-API router

import { createServer, type IncomingMessage, type ServerResponse } from "http";
import type { AddressInfo } from "net";
import { loadConfig } from "../config";
import { getOrchestrator } from "../crawler/orchestrator";
import { createRouter, type RequestHandler, type SearchBackend } from "./router";

export interface WorkerServer {
  stop(): Promise<void>;
  port: number;
  hostname: string;
}

export interface WorkerServerOptions {
  port?: number;
  host?: string;
  backend?: () => Promise<SearchBackend>;
}

export async function toRequest(req: IncomingMessage): Promise<Request> {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.set(name, value);
    }
  }

  const method = req.method ?? "GET";
  if (method === "GET" || method === "HEAD") {
    return new Request(url, { method, headers });
  }

  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return new Request(url, { method, headers, body: Buffer.concat(chunks).toString("utf-8") });
}

export async function writeResponse(response: Response, res: ServerResponse): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  const body = Buffer.from(await response.arrayBuffer());
  res.end(body);
}

function listener(handle: RequestHandler) {
  return (req: IncomingMessage, res: ServerResponse): void => {
    toRequest(req)
      .then(handle)
      .then(response => writeResponse(response, res))
      .catch(error => {
        console.error("[worker] Failed to handle request:", error);
        if (!res.headersSent) {
          res.statusCode = 500;
          res.setHeader("Content-Type", "application/json");
        }
        res.end(JSON.stringify({ error: "Internal server error" }));
      });
  };
}

export async function startWorkerServer(options?: WorkerServerOptions): Promise<WorkerServer> {
  const config = await loadConfig();
  const port = options?.port ?? config.worker.port;
  const host = options?.host ?? config.worker.host;
  const server = createServer(listener(createRouter(options?.backend ?? getOrchestrator)));

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const boundPort = isAddressInfo(address) ? address.port : port;

  console.log(`[worker] siteseek worker listening on http://${host}:${boundPort}`);

  return {
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      }),
    port: boundPort,
    hostname: host,
  };
}

function isAddressInfo(value: string | AddressInfo | null): value is AddressInfo {
  return typeof value === "object" && value !== null;
}
