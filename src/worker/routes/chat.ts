// Chat route handler - JSON answer, or the message stream as SSE

import { z } from "zod/v4";
import type { AppContext } from "../../app";
import type { ChatMessage } from "../../types";
import { ValidationError, errorMessage } from "../../errors";
import { SSE_HEADERS, formatSse, readJsonBody } from "../middleware";

const ChatRequestSchema = z.object({
  message: z.unknown(),
});

export function wantsEventStream(req: Request): boolean {
  return (req.headers.get("accept") ?? "").includes("text/event-stream");
}

export async function handleChat(req: Request, ctx: AppContext): Promise<Response> {
  const parsed = ChatRequestSchema.safeParse(await readJsonBody(req));
  if (!parsed.success) {
    throw new ValidationError("Request body must be a JSON object", "body");
  }
  const { message } = parsed.data;

  if (!wantsEventStream(req)) {
    const answer = await ctx.chat.answer(message, req.signal);
    return Response.json(answer);
  }

  return new Response(streamMessages(ctx.chat.ask(message, req.signal)), { headers: SSE_HEADERS });
}

function streamMessages(messages: AsyncGenerator<ChatMessage>): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const next = await messages.next();
        if (next.done) {
          controller.close();
          return;
        }
        controller.enqueue(encoder.encode(formatSse(next.value)));
      } catch (error) {
        console.error(`[chat] Stream failed: ${errorMessage(error)}`);
        controller.error(error);
      }
    },
    async cancel() {
      await messages.return(undefined);
    },
  });
}
