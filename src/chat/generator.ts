// Answer generators - offline extractive answers, or a streamed OpenAI-compatible chat completion

import { z } from "zod/v4";
import type { AnswerGenerator, AnswerPrompt, GeneratorConfig } from "../types";
import { GenerationError, errorMessage, isAbortError } from "../errors";

export const ANSWER_INTRO = "Based on the indexed documentation:\n\n";

export const SYSTEM_PROMPT =
  "You are a helpful documentation assistant. Answer the question using only the numbered context " +
  "passages, cite them as [n], and say so when the context does not contain the answer. Format the " +
  "answer neatly using Markdown, including headers, code blocks (if applicable), and lists to improve readability.";

const HEADING_LINE = /^#{1,6}\s/;

/** First one or two sentences of a chunk, without heading lines, capped at maxChars */
export function leadingSentences(text: string, maxChars = 300): string {
  const prose = text
    .split("\n")
    .filter(line => !HEADING_LINE.test(line.trim()))
    .join(" ")
    .replace(/\s+/g, " ")
    .trim();
  if (!prose) return "";

  const sentences = prose.split(/(?<=[.!?])\s+/);
  let lead = "";
  for (const sentence of sentences.slice(0, 2)) {
    const next = lead ? `${lead} ${sentence}` : sentence;
    if (next.length > maxChars) break;
    lead = next;
  }

  if (!lead) {
    const cut = prose.slice(0, maxChars);
    const lastSpace = cut.lastIndexOf(" ");
    lead = `${(lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trim()}...`;
  }
  return lead;
}

/** Quotes the leading sentences of each passage with its citation number */
export class ExtractiveAnswerGenerator implements AnswerGenerator {
  readonly name = "extractive";

  constructor(private maxCharsPerPassage = 300) {}

  async *generate(prompt: AnswerPrompt, signal?: AbortSignal): AsyncIterable<string> {
    yield ANSWER_INTRO;

    const parts: string[] = [];
    prompt.passages.forEach((passage, index) => {
      const lead = leadingSentences(prompt.contexts[index] ?? passage.preview, this.maxCharsPerPassage);
      if (lead) parts.push(`${lead} [${index + 1}]`);
    });

    for (let i = 0; i < parts.length; i++) {
      signal?.throwIfAborted();
      yield i < parts.length - 1 ? `${parts[i]}\n\n` : `${parts[i]}`;
    }
  }
}

const CompletionChunkSchema = z.object({
  choices: z.array(z.object({
    delta: z.object({
      content: z.string().nullish(),
    }).optional(),
  })),
});

export function buildUserPrompt(prompt: AnswerPrompt): string {
  const context = prompt.passages
    .map((passage, index) => `[${index + 1}] ${passage.title} (${passage.url})\n${prompt.contexts[index] ?? passage.preview}`)
    .join("\n\n");
  return `Context:\n${context}\n\nQuestion: ${prompt.question}`;
}

export class OpenAIChatGenerator implements AnswerGenerator {
  readonly name = "openai";

  private apiKey: string;
  private model: string;
  private apiBase: string;

  constructor(config: GeneratorConfig) {
    if (!config.apiKey) {
      throw new GenerationError("OpenAI API key is required (generator.apiKey)");
    }

    this.apiKey = config.apiKey;
    this.model = config.model || "gpt-4o-mini";
    this.apiBase = (config.apiBase || "https://api.openai.com/v1").replace(/\/+$/, "");
  }

  async *generate(prompt: AnswerPrompt, signal?: AbortSignal): AsyncIterable<string> {
    let response: Response;
    try {
      response = await fetch(`${this.apiBase}/chat/completions`, {
        method: "POST",
        headers: {
          "Authorization": `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
          "Accept": "text/event-stream",
        },
        body: JSON.stringify({
          model: this.model,
          stream: true,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: buildUserPrompt(prompt) },
          ],
        }),
        signal,
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      throw new GenerationError(`OpenAI chat request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok || !response.body) {
      const body = await response.text();
      throw new GenerationError(`OpenAI API error: ${response.status} ${body.slice(0, 200)}`);
    }

    for await (const data of readServerSentData(response.body)) {
      if (data === "[DONE]") return;

      let payload: unknown;
      try {
        payload = JSON.parse(data);
      } catch (error) {
        throw new GenerationError(`Malformed completion chunk: ${errorMessage(error)}`, { cause: error });
      }
      const parsed = CompletionChunkSchema.safeParse(payload);
      if (!parsed.success) {
        throw new GenerationError("Unexpected completion chunk shape");
      }
      const content = parsed.data.choices[0]?.delta?.content;
      if (content) yield content;
    }
  }
}

/** Yields the payload of each `data:` line of a server-sent event stream */
export async function* readServerSentData(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      buffer += done ? decoder.decode() : decoder.decode(value, { stream: true });

      let newline: number;
      while ((newline = buffer.indexOf("\n")) >= 0) {
        const line = buffer.slice(0, newline).replace(/\r$/, "");
        buffer = buffer.slice(newline + 1);
        if (line.startsWith("data:")) {
          yield line.slice(5).trim();
        }
      }

      if (done) break;
    }
    const rest = buffer.trim();
    if (rest.startsWith("data:")) {
      yield rest.slice(5).trim();
    }
  } finally {
    reader.releaseLock();
  }
}

export function createAnswerGenerator(config: GeneratorConfig): AnswerGenerator {
  switch (config.provider) {
    case "openai":
      return new OpenAIChatGenerator(config);
    case "extractive":
    default:
      return new ExtractiveAnswerGenerator();
  }
}
