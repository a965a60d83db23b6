import { Injectable } from '@nestjs/common';
import { InvalidChunkConfigError, type ChunkSegment } from '@docqa/core';

export interface ChunkOptions {
  maxChunkChars: number;
  overlapChars: number;
}

const MAX_LOOKBACK = 100;

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number) => code >= 0xdc00 && code <= 0xdfff;

/**
 * Index just past the best break point in `text[from, to)`: a sentence end, else whitespace.
 * Returns -1 when the window has neither.
 */
function findBreak(text: string, from: number, to: number): number {
  let whitespaceBreak = -1;
  for (let i = to - 1; i >= from; i--) {
    const ch = text[i];
    if (!/\s/.test(ch)) {
      continue;
    }
    const prev = i > 0 ? text[i - 1] : '';
    if (prev === '.' || prev === '!' || prev === '?' || prev === '\n') {
      return i + 1;
    }
    if (whitespaceBreak === -1) {
      whitespaceBreak = i + 1;
    }
  }
  return whitespaceBreak;
}

@Injectable()
export class ChunkingService {
  /**
   * Split text into overlapping windows of at most `maxChunkChars` characters.
   * Every segment is an exact slice of the input and consecutive segments overlap by
   * `overlapChars` characters, so the input can be rebuilt with `reconstruct`.
   */
  chunk(text: string, options: ChunkOptions): ChunkSegment[] {
    const { maxChunkChars, overlapChars } = options;
    this.validate(maxChunkChars, overlapChars);

    const segments: ChunkSegment[] = [];
    if (text.length === 0) {
      return segments;
    }

    const lookback = Math.min(
      MAX_LOOKBACK,
      Math.floor((maxChunkChars - overlapChars) / 4)
    );

    let start = 0;
    for (;;) {
      if (text.length - start <= maxChunkChars) {
        segments.push(this.segment(text, segments.length, start, text.length));
        break;
      }

      const hardEnd = start + maxChunkChars;
      const windowStart = Math.max(hardEnd - lookback, start + overlapChars + 1);
      const boundary = lookback > 0 ? findBreak(text, windowStart, hardEnd) : -1;
      let end = boundary > 0 ? boundary : hardEnd;
      // Never split a surrogate pair.
      if (isHighSurrogate(text.charCodeAt(end - 1)) && end - 1 - overlapChars > start) {
        end -= 1;
      }

      segments.push(this.segment(text, segments.length, start, end));
      let next = end - overlapChars;
      if (isLowSurrogate(text.charCodeAt(next)) && next - 1 > start) {
        next -= 1;
      }
      start = next;
    }

    return segments;
  }

  /**
   * Rebuild the source text from ordered segments by dropping each overlap.
   */
  reconstruct(segments: readonly ChunkSegment[]): string {
    let text = '';
    let covered = 0;
    for (const segment of segments) {
      text += segment.text.slice(Math.max(0, covered - segment.start));
      covered = segment.end;
    }
    return text;
  }

  private segment(
    text: string,
    index: number,
    start: number,
    end: number
  ): ChunkSegment {
    return { index, text: text.slice(start, end), start, end };
  }

  private validate(maxChunkChars: number, overlapChars: number): void {
    if (!Number.isInteger(maxChunkChars) || maxChunkChars < 1) {
      throw new InvalidChunkConfigError(
        maxChunkChars,
        overlapChars,
        'maxChunkChars must be a positive integer'
      );
    }
    if (!Number.isInteger(overlapChars) || overlapChars < 0) {
      throw new InvalidChunkConfigError(
        maxChunkChars,
        overlapChars,
        'overlapChars must be a non-negative integer'
      );
    }
    if (overlapChars >= maxChunkChars) {
      throw new InvalidChunkConfigError(
        maxChunkChars,
        overlapChars,
        'overlapChars must be lower than maxChunkChars'
      );
    }
  }
}
