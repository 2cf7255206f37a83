/**
 * Common types used across the translation engine
 */

/** Closed set of source document formats */
export type DocumentFormat = 'plain' | 'catalog' | 'ebook';

export interface TextChunk {
  index: number;   // 1-based sequence number
  content: string;
  key: string;     // Artifact key the chunk is stored under
}

/**
 * Parameters of one pipeline run. Frozen once created.
 */
export interface TranslationSession {
  readonly id: string;
  readonly sourceRef: string;          // URI or path of the source document
  readonly targetLanguage: string;     // e.g. "French", "pt-BR"
  readonly maxChunkSize: number;       // characters
  readonly maxChunkCount?: number;     // drop trailing chunks beyond this
  readonly metadataPreviewSize: number;
  readonly model: string;
  readonly temperature: number;
  readonly validationEnabled: boolean;
  readonly concurrency: number;
}

export type SessionParams = Omit<TranslationSession, 'id'> & { id?: string };
