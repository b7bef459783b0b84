// Health check route handler

import type { AppContext } from "../../app";

export const VERSION = "0.1.0";

export function handleHealth(ctx: AppContext): Response {
  return Response.json({
    status: "ok",
    timestamp: Date.now(),
    version: VERSION,
    activeCrawls: ctx.orchestrator.activeJobs,
  });
}
