import { describe, it, expect } from 'vitest';
import { createCodecRegistry } from './index.js';
import { DecodeError } from '../../engine/errors.js';

describe('CodecRegistry', () => {
  const registry = createCodecRegistry();

  it('detects the format from the extension', () => {
    expect(registry.detectFormat('notes.TXT')).toBe('plain');
    expect(registry.detectFormat('README.md')).toBe('plain');
    expect(registry.detectFormat('app.pot')).toBe('catalog');
    expect(registry.detectFormat('book.epub')).toBe('ebook');
  });

  it('rejects unknown formats', () => {
    expect(() => registry.detectFormat('report.docx')).toThrow(DecodeError);
    expect(() => registry.detectFormat('report.docx')).toThrow('Unsupported file format: .docx');
    expect(registry.isSupported('report.docx')).toBe(false);
    expect(registry.isSupported('app.po')).toBe(true);
  });

  it('knows which formats are re-encoded', () => {
    expect(registry.requiresReassembly('plain')).toBe(false);
    expect(registry.requiresReassembly('catalog')).toBe(true);
    expect(registry.requiresReassembly('ebook')).toBe(true);
  });

  it('decodes and encodes through the matching codec', async () => {
    const doc = await registry.decode(Buffer.from('Hello'), 'hello.txt');

    expect(doc.format).toBe('plain');
    expect(await registry.encode('Bonjour', doc)).toBeNull();
  });
});
