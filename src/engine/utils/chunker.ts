/**
 * Text Chunker - Splits text into chunks at natural boundaries
 *
 * Boundary priority inside each window: paragraph break, line break,
 * sentence end, space, then a hard cut. A boundary is accepted only if it
 * sits at or beyond MIN_CHUNK_RATIO of the window. Chunks are exact slices
 * of the input, so joining them gives the input back.
 */

import { ChunkingError } from '../errors.js';

export const MIN_CHUNK_RATIO = 0.7;

const SENTENCE_ENDINGS = ['. ', '! ', '? ', '.\n', '!\n', '?\n'] as const;

export interface BoundaryChunkerOptions {
  maxChunkSize: number;
}

export class BoundaryChunker {
  readonly maxChunkSize: number;

  constructor(options: BoundaryChunkerOptions) {
    assertChunkSize(options.maxChunkSize);
    this.maxChunkSize = options.maxChunkSize;
  }

  chunk(text: string): string[] {
    return chunkText(text, this.maxChunkSize);
  }
}

/**
 * Chunk text, never exceeding maxSize characters per chunk
 */
export function chunkText(text: string, maxSize: number): string[] {
  assertChunkSize(maxSize);

  if (text.length <= maxSize) {
    return [text];
  }

  const chunks: string[] = [];
  let position = 0;

  while (position < text.length) {
    const end = findChunkBoundary(text, position, maxSize);
    chunks.push(text.slice(position, end));
    position = end;
  }

  return chunks;
}

/**
 * Find the end offset (exclusive) of the chunk starting at `start`
 */
export function findChunkBoundary(text: string, start: number, maxSize: number): number {
  const idealEnd = start + maxSize;
  if (idealEnd >= text.length) {
    return text.length;
  }

  const window = text.slice(start, idealEnd);
  const floor = Math.floor(maxSize * MIN_CHUNK_RATIO);

  const paragraph = lastOccurrence(window, '\n\n', floor);
  if (paragraph >= 0) {
    return start + paragraph + 2;
  }

  const line = lastOccurrence(window, '\n', floor);
  if (line >= 0) {
    return start + line + 1;
  }

  let sentence = -1;
  for (const ending of SENTENCE_ENDINGS) {
    sentence = Math.max(sentence, lastOccurrence(window, ending, floor));
  }
  if (sentence >= 0) {
    return start + sentence + 2;
  }

  const space = lastOccurrence(window, ' ', floor);
  if (space >= 0) {
    return start + space + 1;
  }

  // Hard cut, may split a word
  return idealEnd;
}

function lastOccurrence(window: string, pattern: string, floor: number): number {
  const pos = window.lastIndexOf(pattern);
  return pos >= floor ? pos : -1;
}

function assertChunkSize(maxSize: number): void {
  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new ChunkingError(`Max chunk size must be a positive integer, got ${maxSize}`, {
      maxSize,
    });
  }
}
