// Worker HTTP service - node:http in front of the fetch-style router

import { createServer, type IncomingMessage, type ServerResponse } from "http";
import type { AppContext } from "../app";
import { errorMessage } from "../errors";
import { createRouter, type RequestHandler } from "./router";

export interface WorkerServer {
  stop(): Promise<void>;
  port: number;
  hostname: string;
}

export interface WorkerServerOptions {
  port?: number;
  host?: string;
}

const BODYLESS_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

async function toRequest(req: IncomingMessage, baseUrl: string, signal: AbortSignal): Promise<Request> {
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) headers.append(key, item);
    } else if (value !== undefined) {
      headers.set(key, value);
    }
  }

  const method = req.method ?? "GET";
  let body: string | undefined;
  if (!BODYLESS_METHODS.has(method)) {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    body = Buffer.concat(chunks).toString("utf8");
  }

  return new Request(new URL(req.url ?? "/", baseUrl), { method, headers, body, signal });
}

async function writeResponse(response: Response, res: ServerResponse): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  res.writeHead(response.status, headers);

  if (!response.body) {
    res.end();
    return;
  }

  const reader = response.body.getReader();
  res.on("close", () => {
    reader.cancel().catch(error => console.warn(`[worker] Stream cancel failed: ${errorMessage(error)}`));
  });

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    res.write(value);
  }
  res.end();
}

async function handle(handler: RequestHandler, baseUrl: string, req: IncomingMessage, res: ServerResponse): Promise<void> {
  const controller = new AbortController();
  res.on("close", () => controller.abort());

  try {
    const request = await toRequest(req, baseUrl, controller.signal);
    await writeResponse(await handler(request), res);
  } catch (error) {
    if (controller.signal.aborted) return;
    console.error(`[worker] Request failed: ${errorMessage(error)}`);
    if (!res.headersSent) {
      res.writeHead(500, { "Content-Type": "application/json" });
    }
    res.end(res.headersSent ? undefined : JSON.stringify({ error: "Internal server error" }));
  }
}

export async function startWorkerServer(ctx: AppContext, options?: WorkerServerOptions): Promise<WorkerServer> {
  const port = options?.port ?? ctx.config.worker.port;
  const host = options?.host ?? ctx.config.worker.host;
  const handler = createRouter(ctx);
  const baseUrl = `http://${host}:${port}`;

  const server = createServer((req, res) => {
    handle(handler, baseUrl, req, res).catch(error => {
      console.error(`[worker] Unhandled request error: ${errorMessage(error)}`);
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const boundPort = typeof address === "object" && address !== null ? address.port : port;
  console.log(`docsage worker listening on http://${host}:${boundPort}`);

  return {
    port: boundPort,
    hostname: host,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close(error => (error ? reject(error) : resolve()));
      }),
  };
}
