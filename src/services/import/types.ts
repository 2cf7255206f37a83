/**
 * Types for document decoding and structural re-encoding
 */

import type { DocumentFormat } from '../../engine/types/common.js';

export type { DocumentFormat };

/**
 * One gettext entry
 */
export interface PoEntry {
  msgctxt?: string;
  msgid: string;
  msgidPlural?: string;
  msgstr: string;
  msgstrPlural?: string[]; // Indexed by plural form
  comments: string[]; // Translator comments (#)
  extractedComments: string[]; // #.
  references: string[]; // #:
  flags: string[]; // #, fuzzy, c-format, ...
  previousMsgid?: string; // #| msgid
  obsolete: boolean; // #~
}

/**
 * What the catalog projection shows to the translator
 */
export interface CatalogFilter {
  includeUntranslated: boolean;
  includeFuzzy: boolean;
  includeObsolete: boolean;
  includeMetadata: boolean;
  includeComments: boolean;
}

export interface PlainMetadata {
  encoding: 'utf-8' | 'latin1';
}

export interface CatalogMetadata {
  header: PoEntry | null;
  entries: PoEntry[];
  filter: CatalogFilter;
}

export interface EbookMetadata {
  title?: string;
  author?: string;
  units: string[]; // Spine ids that were read
  skippedUnits: string[]; // Spine ids that failed to load
}

interface DocumentBase {
  filename: string; // Basename of the source
  text: string; // Normalized text handed to the chunker
}

/**
 * Decoded document. Produced once, read-only afterwards.
 */
export type DocumentContent =
  | (DocumentBase & { format: 'plain'; metadata: PlainMetadata })
  | (DocumentBase & { format: 'catalog'; metadata: CatalogMetadata })
  | (DocumentBase & { format: 'ebook'; metadata: EbookMetadata });

export type DocumentOf<F extends DocumentFormat> = Extract<DocumentContent, { format: F }>;

/**
 * Output of a structural encode, stored beside the final document
 */
export interface EncodedArtifact {
  name: string;
  body: string | Uint8Array;
  contentType: string;
}

export interface DocumentCodec<F extends DocumentFormat> {
  readonly format: F;
  readonly extensions: readonly string[];
  /** Whether reassembly runs `encode` after the final concatenation */
  readonly requiresReassembly: boolean;

  decode(bytes: Buffer, filename: string): Promise<DocumentOf<F>>;
  encode(translatedText: string, doc: DocumentOf<F>): Promise<EncodedArtifact | null>;
}

export type CodecMap = { [F in DocumentFormat]: DocumentCodec<F> };
