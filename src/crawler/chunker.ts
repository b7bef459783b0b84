// Text chunker - paragraphs first, then sentences, then a fixed window

import { ValidationError } from "../errors";
import type { Chunker, ChunkSource, HeadingInfo, TextChunk } from "../types";

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
}

interface Span {
  start: number;
  end: number;
}

interface OpenChunk extends Span {
  /** Where the chunk's own content begins, after any carried-over overlap */
  ownStart: number;
}

const HEADING_LINE = /^(#{1,6})[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/;
const FENCE_LINE = /^\s*(```|~~~)/;
const PARAGRAPH_BREAK = /\n[ \t]*\n\s*/g;
const SENTENCE_BREAK = /(?<=[.!?])\s+|\n+/g;

/** Markdown-style headings outside fenced code blocks, with line offsets */
export function findHeadings(text: string): HeadingInfo[] {
  const headings: HeadingInfo[] = [];
  let offset = 0;
  let inFence = false;

  for (const line of text.split("\n")) {
    if (FENCE_LINE.test(line)) {
      inFence = !inFence;
    } else if (!inFence) {
      const match = HEADING_LINE.exec(line);
      if (match?.[1] && match[2]) {
        headings.push({ level: match[1].length, text: match[2].trim(), offset });
      }
    }
    offset += line.length + 1;
  }

  return headings;
}

function isSpace(char: string): boolean {
  return char === " " || char === "\n" || char === "\t" || char === "\r" || char === "\f" || char === "\v";
}

function trimSpan(text: string, start: number, end: number): Span | null {
  while (start < end && isSpace(text.charAt(start))) start++;
  while (end > start && isSpace(text.charAt(end - 1))) end--;
  return start < end ? { start, end } : null;
}

function splitOn(text: string, span: Span, separator: RegExp): Span[] {
  const spans: Span[] = [];
  const segment = text.slice(span.start, span.end);
  const pattern = new RegExp(separator.source, "g");
  let from = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(segment)) !== null) {
    if (match[0].length === 0) {
      pattern.lastIndex++;
      continue;
    }
    const piece = trimSpan(text, span.start + from, span.start + match.index);
    if (piece) spans.push(piece);
    from = match.index + match[0].length;
  }

  const tail = trimSpan(text, span.start + from, span.end);
  if (tail) spans.push(tail);
  return spans;
}

/**
 * Splits text into chunks of at most chunkSize characters. Each chunk after
 * the first begins with up to chunkOverlap characters from the end of its
 * predecessor, snapped forward to a word boundary. The same input always
 * produces the same boundaries.
 */
export class TextChunker implements Chunker {
  readonly chunkSize: number;
  readonly chunkOverlap: number;

  constructor(options: ChunkerOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize < 1) {
      throw new ValidationError("chunkSize must be a positive integer", "chunkSize");
    }
    if (!Number.isInteger(options.chunkOverlap) || options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
      throw new ValidationError("chunkOverlap must be between 0 and chunkSize - 1", "chunkOverlap");
    }
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
  }

  split(text: string, source: ChunkSource): TextChunk[] {
    const pieces = this.segment(text);
    if (pieces.length === 0) {
      return [];
    }

    const headings = findHeadings(text);
    const chunks: TextChunk[] = [];
    let current: OpenChunk | null = null;

    const emit = (chunk: OpenChunk) => {
      chunks.push({
        text: text.slice(chunk.start, chunk.end),
        title: this.titleAt(headings, chunk.ownStart) ?? source.title,
        position: chunks.length,
        startOffset: chunk.start,
        endOffset: chunk.end,
      });
    };

    for (const piece of pieces) {
      if (!current) {
        current = { start: piece.start, end: piece.end, ownStart: piece.start };
        continue;
      }
      if (piece.end - current.start <= this.chunkSize) {
        current.end = piece.end;
        continue;
      }

      emit(current);
      const carried = this.overlapStart(text, current);
      const start = carried !== null && piece.end - carried <= this.chunkSize ? carried : piece.start;
      current = { start, end: piece.end, ownStart: piece.start };
    }

    if (current) {
      emit(current);
    }
    return chunks;
  }

  private segment(text: string): Span[] {
    const whole = trimSpan(text, 0, text.length);
    if (!whole) return [];

    const pieces: Span[] = [];
    for (const paragraph of splitOn(text, whole, PARAGRAPH_BREAK)) {
      if (paragraph.end - paragraph.start <= this.chunkSize) {
        pieces.push(paragraph);
        continue;
      }
      for (const sentence of splitOn(text, paragraph, SENTENCE_BREAK)) {
        if (sentence.end - sentence.start <= this.chunkSize) {
          pieces.push(sentence);
        } else {
          pieces.push(...this.window(text, sentence));
        }
      }
    }
    return pieces;
  }

  // Windows leave room for the overlap carried into the next chunk
  private window(text: string, span: Span): Span[] {
    const step = this.chunkSize - this.chunkOverlap;
    const windows: Span[] = [];
    for (let start = span.start; start < span.end; start += step) {
      const piece = trimSpan(text, start, Math.min(start + step, span.end));
      if (piece) windows.push(piece);
    }
    return windows;
  }

  private overlapStart(text: string, previous: Span): number | null {
    if (this.chunkOverlap === 0) return null;

    let start = Math.max(previous.start, previous.end - this.chunkOverlap);
    if (start > previous.start && !isSpace(text.charAt(start - 1))) {
      while (start < previous.end && !isSpace(text.charAt(start))) start++;
    }
    while (start < previous.end && isSpace(text.charAt(start))) start++;

    return start < previous.end ? start : null;
  }

  private titleAt(headings: HeadingInfo[], offset: number): string | null {
    let title: string | null = null;
    for (const heading of headings) {
      if (heading.offset > offset) break;
      title = heading.text;
    }
    return title;
  }
}
