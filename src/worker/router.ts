// Request router

import type { AppContext } from "../app";
import {
  handleHealth,
  handleListSites,
  handleCreateSite,
  handleGetSite,
  handleDeleteSite,
  handleRecrawl,
  handleClearDatabase,
  handleChat,
  handleEvents,
} from "./routes";
import { handleCors, withCors, errorToResponse, notFoundResponse } from "./middleware";

export type RequestHandler = (req: Request) => Promise<Response>;

export function createRouter(ctx: AppContext): RequestHandler {
  return req => routeRequest(req, ctx);
}

export async function routeRequest(req: Request, ctx: AppContext): Promise<Response> {
  const url = new URL(req.url);
  const path = url.pathname.replace(/\/+$/, "") || "/";
  const method = req.method;

  // Handle CORS preflight
  if (method === "OPTIONS") {
    return handleCors();
  }

  try {
    let response: Response;

    if (path === "/health" && method === "GET") {
      response = handleHealth(ctx);
    }
    else if (path === "/api/sites" && method === "GET") {
      response = handleListSites(ctx);
    }
    else if (path === "/api/sites" && method === "POST") {
      response = await handleCreateSite(req, ctx);
    }
    else if (path.startsWith("/api/sites/")) {
      const parts = path.slice("/api/sites/".length).split("/");
      const siteId = decodePathSegment(parts[0] ?? "");
      const subResource = parts[1];

      if (!siteId || parts.length > 2) {
        response = notFoundResponse();
      }
      else if (subResource === "recrawl" && method === "POST") {
        response = await handleRecrawl(siteId, ctx);
      }
      else if (!subResource && method === "GET") {
        response = handleGetSite(siteId, ctx);
      }
      else if (!subResource && method === "DELETE") {
        response = await handleDeleteSite(siteId, ctx);
      }
      else {
        response = notFoundResponse();
      }
    }
    else if (path === "/api/database" && method === "DELETE") {
      response = await handleClearDatabase(ctx);
    }
    else if (path === "/api/chat" && method === "POST") {
      response = await handleChat(req, ctx);
    }
    else if (path === "/api/events" && method === "GET") {
      response = handleEvents(req, ctx);
    }
    else {
      response = notFoundResponse();
    }

    return withCors(response);

  } catch (error) {
    return errorToResponse(error);
  }
}

// Malformed escapes cannot name a site
function decodePathSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}
