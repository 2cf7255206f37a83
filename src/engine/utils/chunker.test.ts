import { describe, it, expect } from 'vitest';
import { BoundaryChunker, chunkText, findChunkBoundary } from './chunker.js';
import { ChunkingError } from '../errors.js';

function sampleDocument(paragraphs: number): string {
  const sentences = ['The tide came in.', 'Nobody moved!', 'Was it morning already?', 'She laughed, then left.'];
  const parts: string[] = [];
  for (let i = 0; i < paragraphs; i++) {
    const lines: string[] = [];
    for (let j = 0; j <= i % 5; j++) {
      lines.push(`${sentences[(i + j) % sentences.length]} Line ${i}-${j} goes on for a while.`);
    }
    parts.push(lines.join(i % 2 === 0 ? ' ' : '\n'));
  }
  return parts.join('\n\n');
}

describe('chunkText', () => {
  it('returns text that fits as a single chunk', () => {
    expect(chunkText('hello world', 100)).toEqual(['hello world']);
  });

  it('returns a single empty chunk for empty input', () => {
    expect(chunkText('', 10)).toEqual(['']);
  });

  it('rejects invalid chunk sizes', () => {
    expect(() => chunkText('abc', 0)).toThrow(ChunkingError);
    expect(() => chunkText('abc', -5)).toThrow(ChunkingError);
    expect(() => chunkText('abc', 1.5)).toThrow(ChunkingError);
    expect(() => new BoundaryChunker({ maxChunkSize: 0 })).toThrow(ChunkingError);
  });

  it('prefers a paragraph break', () => {
    const text = 'a'.repeat(80) + '\n\n' + 'b'.repeat(50);
    expect(chunkText(text, 100)).toEqual(['a'.repeat(80) + '\n\n', 'b'.repeat(50)]);
  });

  it('prefers a paragraph break over a later line break, sentence end or space', () => {
    const head = 'a'.repeat(75) + '\n\n';
    const tail = 'b'.repeat(10) + '\n' + 'c'.repeat(5) + '. ' + 'd'.repeat(3) + ' ' + 'e'.repeat(50);
    expect(findChunkBoundary(head + tail, 0, 100)).toBe(77);
    expect(chunkText(head + tail, 100)).toEqual([head, tail]);
  });

  it('ignores boundaries too early in the window and cuts hard', () => {
    const text = 'a'.repeat(10) + '\n\n' + 'b'.repeat(200);
    const chunks = chunkText(text, 100);
    expect(chunks.map((c) => c.length)).toEqual([100, 100, 12]);
    expect(chunks.join('')).toBe(text);
  });

  it('prefers a sentence end over a later space', () => {
    const text = 'x'.repeat(75) + '. ' + 'y'.repeat(10) + ' ' + 'z'.repeat(50);
    expect(chunkText(text, 100)).toEqual(['x'.repeat(75) + '. ', 'y'.repeat(10) + ' ' + 'z'.repeat(50)]);
  });

  it('falls back to a space', () => {
    const text = 'w'.repeat(80) + ' ' + 'v'.repeat(40);
    expect(chunkText(text, 100)).toEqual(['w'.repeat(80) + ' ', 'v'.repeat(40)]);
  });

  it('splits 100k characters with regular paragraphs into four chunks', () => {
    const text = Array.from({ length: 50 }, () => 'p'.repeat(1998) + '\n\n').join('');
    expect(text.length).toBe(100000);

    const chunks = chunkText(text, 30000);
    expect(chunks.map((c) => c.length)).toEqual([30000, 30000, 30000, 10000]);
    expect(chunks[0].endsWith('\n\n')).toBe(true);
  });

  it('never loses text and never exceeds the size limit', () => {
    const text = sampleDocument(60);
    for (const size of [40, 73, 128, 500, 1999]) {
      const chunks = chunkText(text, size);
      expect(chunks.join('')).toBe(text);
      for (const chunk of chunks) {
        expect(chunk.length).toBeLessThanOrEqual(size);
        expect(chunk.length).toBeGreaterThan(0);
      }
    }
  });
});

describe('findChunkBoundary', () => {
  it('returns the end of text when the rest fits', () => {
    expect(findChunkBoundary('abcdef', 2, 10)).toBe(6);
  });

  it('cuts after a line break when no paragraph break is in range', () => {
    const text = 'a'.repeat(90) + '\n' + 'b'.repeat(30);
    expect(findChunkBoundary(text, 0, 100)).toBe(91);
  });
});
