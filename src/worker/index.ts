// Worker module barrel export

export { startWorkerServer, toRequest, writeResponse } from "./server";
export type { WorkerServer, WorkerServerOptions } from "./server";
export { createRouter } from "./router";
export type { RequestHandler, SearchBackend } from "./router";
export * from "./middleware";
