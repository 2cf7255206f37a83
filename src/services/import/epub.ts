/**
 * EPUB codec
 * Reads content units in spine order and keeps their body markup
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { EPub } from 'epub2';
import { DecodeError, errorMessage } from '../../engine/errors.js';
import type { DocumentCodec, DocumentOf, EncodedArtifact } from './types.js';

export const UNIT_SEPARATOR = '\n\n';

/**
 * The parts of an opened EPUB the codec reads
 */
export interface EbookReader {
  title?: string;
  author?: string;
  spine: { id?: string; href?: string }[];
  readUnit(id: string): Promise<string>;
}

export type EbookOpener = (filePath: string) => Promise<EbookReader>;

/**
 * Default opener on epub2
 */
export const openEpub: EbookOpener = async (filePath) => {
  const epub = await EPub.createAsync(filePath);
  return {
    title: epub.metadata.title || undefined,
    author: epub.metadata.creator || undefined,
    spine: epub.flow.map((item: { id?: string; href?: string }) => ({ id: item.id, href: item.href })),
    readUnit: async (id: string) => epub.getChapterRawAsync(id),
  };
};

/**
 * Inner markup of <body>, or the whole document when there is none
 */
export function extractBody(xhtml: string): string {
  const match = /<body[^>]*>([\s\S]*)<\/body>/i.exec(xhtml);
  return (match ? match[1] : xhtml).trim();
}

export function stemOf(filename: string): string {
  const ext = path.extname(filename);
  return ext ? filename.slice(0, -ext.length) : filename;
}

export class EbookCodec implements DocumentCodec<'ebook'> {
  readonly format = 'ebook';
  readonly extensions = ['.epub'] as const;
  readonly requiresReassembly = true;

  private readonly open: EbookOpener;

  constructor(open: EbookOpener = openEpub) {
    this.open = open;
  }

  async decode(bytes: Buffer, filename: string): Promise<DocumentOf<'ebook'>> {
    // epub2 reads from a path
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'epub-'));
    const tempFile = path.join(tempDir, path.basename(filename));

    try {
      await fs.writeFile(tempFile, bytes);

      let reader: EbookReader;
      try {
        reader = await this.open(tempFile);
      } catch (error) {
        throw new DecodeError(`Failed to open EPUB ${filename}: ${errorMessage(error)}`, { filename }, error);
      }

      const units: string[] = [];
      const skippedUnits: string[] = [];
      const parts: string[] = [];

      for (const [i, item] of reader.spine.entries()) {
        const unitId = item.id ?? item.href ?? `#${i + 1}`;
        if (!item.id) {
          console.warn(`[EpubCodec] Spine item ${i + 1} has no id, skipping`);
          skippedUnits.push(unitId);
          continue;
        }

        try {
          const body = extractBody(await reader.readUnit(item.id));
          units.push(item.id);
          if (body.length > 0) {
            parts.push(body);
          }
        } catch (error) {
          console.warn(`[EpubCodec] Could not read unit ${item.id}: ${errorMessage(error)}`);
          skippedUnits.push(item.id);
        }
      }

      if (parts.length === 0) {
        throw new DecodeError(`EPUB ${filename} has no readable content`, { filename, skippedUnits });
      }

      return {
        format: 'ebook',
        filename,
        text: parts.join(UNIT_SEPARATOR),
        metadata: { title: reader.title, author: reader.author, units, skippedUnits },
      };
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  }

  /**
   * No container rebuild: the final chunks are written out verbatim as text
   */
  async encode(translatedText: string, doc: DocumentOf<'ebook'>): Promise<EncodedArtifact> {
    return {
      name: `assembled_${stemOf(doc.filename)}.txt`,
      body: translatedText,
      contentType: 'text/plain; charset=utf-8',
    };
  }
}
