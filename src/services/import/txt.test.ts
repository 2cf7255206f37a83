import { describe, it, expect, vi } from 'vitest';
import { PlainTextCodec, decodeText } from './txt.js';

describe('decodeText', () => {
  it('decodes UTF-8', () => {
    expect(decodeText(Buffer.from('héllo wörld', 'utf-8'))).toEqual({ text: 'héllo wörld', encoding: 'utf-8' });
  });

  it('falls back to Latin-1 for invalid UTF-8', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(decodeText(Buffer.from([0x63, 0x61, 0x66, 0xe9]))).toEqual({ text: 'café', encoding: 'latin1' });
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});

describe('PlainTextCodec', () => {
  const codec = new PlainTextCodec();

  it('decodes to a plain document', async () => {
    const doc = await codec.decode(Buffer.from('Once upon a time.'), 'story.txt');

    expect(doc).toEqual({
      format: 'plain',
      filename: 'story.txt',
      text: 'Once upon a time.',
      metadata: { encoding: 'utf-8' },
    });
  });

  it('needs no re-encoding', async () => {
    expect(codec.requiresReassembly).toBe(false);
    expect(await codec.encode()).toBeNull();
  });
});
