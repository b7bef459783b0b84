// Site route handlers

import { z } from "zod/v4";
import type { AppContext } from "../../app";
import { ValidationError } from "../../errors";
import { readJsonBody } from "../middleware";

const SiteInputSchema = z.object({
  url: z.string({ error: "url is required" }).min(1, "url is required"),
  name: z.string({ error: "name must be a string" }).optional(),
});

export function handleListSites(ctx: AppContext): Response {
  return Response.json({ sites: ctx.orchestrator.listSites() });
}

export async function handleCreateSite(req: Request, ctx: AppContext): Promise<Response> {
  const parsed = SiteInputSchema.safeParse(await readJsonBody(req));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.message ?? "Invalid site", issue?.path.map(String).join(".") || null);
  }

  const site = ctx.orchestrator.submit(parsed.data);
  return Response.json({ site }, { status: 201 });
}

export function handleGetSite(siteId: string, ctx: AppContext): Response {
  return Response.json({ site: ctx.orchestrator.status(siteId) });
}

export async function handleDeleteSite(siteId: string, ctx: AppContext): Promise<Response> {
  await ctx.orchestrator.delete(siteId);
  return Response.json({ deleted: true, siteId });
}

export async function handleRecrawl(siteId: string, ctx: AppContext): Promise<Response> {
  const site = await ctx.orchestrator.recrawl(siteId);
  return Response.json({ site }, { status: 202 });
}

export async function handleClearDatabase(ctx: AppContext): Promise<Response> {
  await ctx.orchestrator.clearAll();
  return Response.json({ cleared: true });
}
