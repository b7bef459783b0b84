// Chat service - retrieval plus answer generation, emitted as an ordered message stream

import { randomUUID } from "crypto";
import type { AnswerGenerator, ChatMessage, Retriever, SiteStore, SourcePassage } from "../types";
import { IndexError, errorMessage, isAbortError } from "../errors";

export const EMPTY_MESSAGE_REPLY = "Please enter a valid message.";
export const NO_RESULTS_REPLY = "I couldn't find any relevant information to answer your question.";
export const GENERATION_FAILED_REPLY = "Sorry, I couldn't generate an answer from the retrieved documentation.";
export const STORE_UNAVAILABLE_REPLY = "The documentation index is unavailable right now.";

export interface ChatServiceDeps {
  retriever: Retriever;
  store: SiteStore;
  generator: AnswerGenerator;
  /** Passages used to ground each answer */
  topK: number;
}

export function newMessageId(): string {
  return `msg-${randomUUID().replace(/-/g, "")}`;
}

/**
 * Message order for one question: typing, sources, partial chat_response
 * messages carrying the answer so far, the final chat_response with sources,
 * then typing:false.
 */
export class ChatService {
  constructor(private deps: ChatServiceDeps) {}

  async *ask(message: unknown, signal?: AbortSignal): AsyncGenerator<ChatMessage> {
    const messageId = newMessageId();
    const question = typeof message === "string" ? message.trim() : "";

    if (!question) {
      yield { type: "chat_response", response: EMPTY_MESSAGE_REPLY, messageId, isComplete: true, sources: [] };
      return;
    }

    yield { type: "typing", isTyping: true, messageId };

    let passages: SourcePassage[];
    let contexts: string[];
    try {
      passages = await this.deps.retriever.retrieve(question, this.deps.topK);
      contexts = this.contextsFor(passages);
    } catch (error) {
      if (error instanceof IndexError) {
        console.error(`[chat] Retrieval failed: ${error.message}`);
        yield {
          type: "chat_response",
          response: STORE_UNAVAILABLE_REPLY,
          messageId,
          isComplete: true,
          sources: [],
          error: error.message,
        };
        yield { type: "typing", isTyping: false, messageId };
        return;
      }
      console.warn(`[chat] Retrieval degraded to no sources: ${errorMessage(error)}`);
      passages = [];
      contexts = [];
    }

    yield { type: "sources", sources: passages, messageId };

    if (passages.length === 0) {
      yield { type: "chat_response", response: NO_RESULTS_REPLY, messageId, isComplete: true, sources: [] };
      yield { type: "typing", isTyping: false, messageId };
      return;
    }

    let answer = "";
    let failure: string | null = null;
    try {
      for await (const piece of this.deps.generator.generate({ question, passages, contexts }, signal)) {
        answer += piece;
        yield { type: "chat_response", response: answer, messageId, isComplete: false };
      }
    } catch (error) {
      if (isAbortError(error) && signal?.aborted) throw error;
      failure = errorMessage(error);
      console.error(`[chat] ${this.deps.generator.name} generation failed: ${failure}`);
    }

    yield {
      type: "chat_response",
      response: answer || GENERATION_FAILED_REPLY,
      messageId,
      isComplete: true,
      sources: passages,
      ...(failure ? { error: failure } : {}),
    };
    yield { type: "typing", isTyping: false, messageId };
  }

  /** Runs a question to completion and returns the final answer with its sources */
  async answer(message: unknown, signal?: AbortSignal): Promise<{ messageId: string; response: string; sources: SourcePassage[]; error?: string }> {
    let final: { messageId: string; response: string; sources: SourcePassage[]; error?: string } | null = null;
    for await (const event of this.ask(message, signal)) {
      if (event.type === "chat_response" && event.isComplete) {
        final = {
          messageId: event.messageId,
          response: event.response,
          sources: event.sources ?? [],
          ...(event.error ? { error: event.error } : {}),
        };
      }
    }
    if (!final) {
      throw new Error("Chat stream ended without a final response");
    }
    return final;
  }

  private contextsFor(passages: SourcePassage[]): string[] {
    if (passages.length === 0) return [];
    const records = new Map(this.deps.store.getChunks(passages.map(p => p.chunkId)).map(r => [r.id, r]));
    return passages.map(p => records.get(p.chunkId)?.text ?? p.preview);
  }
}
