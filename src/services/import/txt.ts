/**
 * Plain text codec
 */

import type { DocumentCodec, DocumentOf, PlainMetadata } from './types.js';

/**
 * Decode as strict UTF-8, falling back to Latin-1 for anything else.
 * Latin-1 maps every byte, so this never fails.
 */
export function decodeText(bytes: Buffer): { text: string; encoding: PlainMetadata['encoding'] } {
  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    return { text, encoding: 'utf-8' };
  } catch (error) {
    console.warn(`[TextCodec] Not valid UTF-8, decoding as Latin-1: ${String(error)}`);
    return { text: bytes.toString('latin1'), encoding: 'latin1' };
  }
}

export class PlainTextCodec implements DocumentCodec<'plain'> {
  readonly format = 'plain';
  readonly extensions = ['.txt', '.text', '.md'] as const;
  readonly requiresReassembly = false;

  async decode(bytes: Buffer, filename: string): Promise<DocumentOf<'plain'>> {
    const { text, encoding } = decodeText(bytes);
    return { format: 'plain', filename, text, metadata: { encoding } };
  }

  async encode(): Promise<null> {
    // The concatenated final document is the output
    return null;
  }
}
