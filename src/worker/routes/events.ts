// Progress events route handler - the ProgressBus as server-sent events

import type { AppContext } from "../../app";
import type { ProgressMessage } from "../../types";
import { SSE_HEADERS, formatSse } from "../middleware";

const KEEPALIVE_MS = 15000;

export function handleEvents(req: Request, ctx: AppContext, keepaliveMs = KEEPALIVE_MS): Response {
  const encoder = new TextEncoder();
  let release: (() => void) | null = null;

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      let open = true;
      const send = (text: string): void => {
        if (open) controller.enqueue(encoder.encode(text));
      };

      const handle = ctx.bus.subscribe((message: ProgressMessage) => send(formatSse(message)));
      const keepalive = setInterval(() => send(": keepalive\n\n"), keepaliveMs);

      release = () => {
        if (!open) return;
        open = false;
        clearInterval(keepalive);
        ctx.bus.unsubscribe(handle);
      };

      req.signal.addEventListener("abort", () => {
        if (!open) return;
        release?.();
        controller.close();
      }, { once: true });
    },
    cancel() {
      release?.();
    },
  });

  return new Response(stream, { headers: SSE_HEADERS });
}
