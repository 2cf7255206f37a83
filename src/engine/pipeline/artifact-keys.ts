/**
 * Artifact key layout of a session
 *
 * {session}/entity_extraction.txt
 * {session}/style_instructions.txt
 * {session}/original_chunks/original_chunk_0001.txt
 * {session}/prompts_for_translation/translation_prompt_chunk_0001.txt
 * {session}/translated_chunks/translated_chunk_0001.txt
 * {session}/translated_chunks/final_translated_chunk_0001.txt
 * {session}/FINAL_{basename}
 */

import path from 'path';

export const ENTITY_EXTRACTION_FILE = 'entity_extraction.txt';
export const STYLE_INSTRUCTIONS_FILE = 'style_instructions.txt';

export const ORIGINAL_CHUNKS_DIR = 'original_chunks';
export const PROMPTS_DIR = 'prompts_for_translation';
export const TRANSLATED_DIR = 'translated_chunks';

export const ORIGINAL_CHUNK_PREFIX = 'original_chunk_';
export const PROMPT_PREFIX = 'translation_prompt_';
export const TRANSLATED_PREFIX = 'translated_';
export const FINAL_PREFIX = 'final_translated_';

const SEQUENCE_PATTERN = /_(\d{4,})\.txt$/;

export function formatSequence(index: number): string {
  return String(index).padStart(4, '0');
}

/**
 * Sequence number of a chunk-indexed key, or null for other keys
 */
export function parseSequence(key: string): number | null {
  const match = key.match(SEQUENCE_PATTERN);
  return match ? parseInt(match[1], 10) : null;
}

export class SessionKeys {
  readonly root: string;

  constructor(sessionRoot: string) {
    this.root = sessionRoot.replace(/^\/+|\/+$/g, '');
  }

  entities(): string {
    return `${this.root}/${ENTITY_EXTRACTION_FILE}`;
  }

  style(): string {
    return `${this.root}/${STYLE_INSTRUCTIONS_FILE}`;
  }

  source(basename: string): string {
    return `${this.root}/source/${basename}`;
  }

  originalChunk(index: number): string {
    return `${this.root}/${ORIGINAL_CHUNKS_DIR}/${ORIGINAL_CHUNK_PREFIX}${formatSequence(index)}.txt`;
  }

  prompt(index: number): string {
    return `${this.root}/${PROMPTS_DIR}/${PROMPT_PREFIX}chunk_${formatSequence(index)}.txt`;
  }

  promptsPrefix(): string {
    return `${this.root}/${PROMPTS_DIR}/${PROMPT_PREFIX}`;
  }

  finalPrefix(): string {
    return `${this.root}/${TRANSLATED_DIR}/${FINAL_PREFIX}`;
  }

  finalDocument(sourceRef: string): string {
    return `${this.root}/FINAL_${basenameOf(sourceRef)}`;
  }

  artifact(name: string): string {
    return `${this.root}/${name}`;
  }
}

/**
 * translation_prompt_chunk_0001.txt -> translated_chunk_0001.txt, same session
 */
export function translatedKeyForPrompt(promptKey: string): string {
  return rewriteKey(promptKey, PROMPT_PREFIX, TRANSLATED_PREFIX, TRANSLATED_DIR);
}

/**
 * translation_prompt_chunk_0001.txt -> final_translated_chunk_0001.txt, same session
 */
export function finalKeyForPrompt(promptKey: string): string {
  return rewriteKey(promptKey, PROMPT_PREFIX, FINAL_PREFIX, TRANSLATED_DIR);
}

/**
 * Swap the file name prefix and the stage directory of a chunk key
 */
function rewriteKey(key: string, fromPrefix: string, toPrefix: string, toDir: string): string {
  const parts = key.split('/');
  const file = parts.pop() ?? '';
  if (parts.length < 2 || !file.startsWith(fromPrefix)) {
    throw new Error(`Artifact key "${key}" is not a "${fromPrefix}" chunk key`);
  }
  parts[parts.length - 1] = toDir;
  return `${parts.join('/')}/${toPrefix}${file.slice(fromPrefix.length)}`;
}

/**
 * Last path segment of a path, file URL or bucket URI
 */
export function basenameOf(sourceRef: string): string {
  const withoutQuery = sourceRef.split(/[?#]/)[0] ?? sourceRef;
  return path.posix.basename(withoutQuery.replace(/\\/g, '/'));
}
