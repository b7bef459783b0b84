// Worker module barrel export

export { startWorkerServer } from "./server";
export type { WorkerServer, WorkerServerOptions } from "./server";
export { createRouter, routeRequest } from "./router";
export type { RequestHandler } from "./router";
export * from "./middleware";
