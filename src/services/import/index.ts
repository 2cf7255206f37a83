/**
 * Document codec registry
 * Detects the format once from the file extension and routes to its codec
 */

import path from 'path';
import { DecodeError } from '../../engine/errors.js';
import type { CodecMap, DocumentContent, DocumentFormat, EncodedArtifact } from './types.js';
import { PlainTextCodec } from './txt.js';
import { CatalogCodec } from './po.js';
import { EbookCodec, type EbookOpener } from './epub.js';

export type {
  CatalogFilter,
  CatalogMetadata,
  CodecMap,
  DocumentCodec,
  DocumentContent,
  DocumentOf,
  EbookMetadata,
  EncodedArtifact,
  PlainMetadata,
  PoEntry,
} from './types.js';
export { PlainTextCodec, decodeText } from './txt.js';
export { CatalogCodec, DEFAULT_CATALOG_FILTER, parsePo, serializePo, renderCatalog, assembleCatalog } from './po.js';
export { EbookCodec, openEpub, type EbookOpener, type EbookReader } from './epub.js';

export class CodecRegistry {
  private readonly codecs: CodecMap;

  constructor(codecs: CodecMap) {
    this.codecs = codecs;
  }

  /**
   * Format for a file name
   */
  detectFormat(filename: string): DocumentFormat {
    const extension = path.extname(filename).toLowerCase();
    const formats = Object.keys(this.codecs).filter(isFormat);
    const format = formats.find((f) => this.codecs[f].extensions.includes(extension));

    if (!format) {
      throw new DecodeError(`Unsupported file format: ${extension || filename}`, { filename });
    }
    return format;
  }

  isSupported(filename: string): boolean {
    const extension = path.extname(filename).toLowerCase();
    return Object.values(this.codecs).some((codec) => codec.extensions.includes(extension));
  }

  requiresReassembly(format: DocumentFormat): boolean {
    return this.codecs[format].requiresReassembly;
  }

  async decode(bytes: Buffer, filename: string): Promise<DocumentContent> {
    switch (this.detectFormat(filename)) {
      case 'plain':
        return this.codecs.plain.decode(bytes, filename);
      case 'catalog':
        return this.codecs.catalog.decode(bytes, filename);
      case 'ebook':
        return this.codecs.ebook.decode(bytes, filename);
    }
  }

  async encode(translatedText: string, doc: DocumentContent): Promise<EncodedArtifact | null> {
    switch (doc.format) {
      case 'plain':
        return this.codecs.plain.encode(translatedText, doc);
      case 'catalog':
        return this.codecs.catalog.encode(translatedText, doc);
      case 'ebook':
        return this.codecs.ebook.encode(translatedText, doc);
    }
  }
}

function isFormat(value: string): value is DocumentFormat {
  return value === 'plain' || value === 'catalog' || value === 'ebook';
}

export interface CodecOptions {
  ebookOpener?: EbookOpener;
}

export function createCodecRegistry(options: CodecOptions = {}): CodecRegistry {
  return new CodecRegistry({
    plain: new PlainTextCodec(),
    catalog: new CatalogCodec(),
    ebook: new EbookCodec(options.ebookOpener),
  });
}
