/**
 * Glossary Manager - Shared entity dictionary and style guide of a session
 */

import { z } from 'zod';
import type { GlossaryMetadata, GlossaryTerm, MetadataOrigin } from '../types/glossary.js';

/**
 * Entity dictionary as the extraction prompt asks for it:
 * `{ "<term>": { "context": "...", "suggested_translation": "..." } }`.
 * A bare string value is taken as the suggested translation.
 */
const entityValueSchema = z.union([
  z.string().transform((suggested) => ({ context: '', suggested_translation: suggested })),
  z
    .object({
      context: z.string().optional().default(''),
      suggested_translation: z.string().optional().default(''),
    })
    .passthrough(),
]);

const entityDictionarySchema = z.record(z.string(), entityValueSchema);

/**
 * Remove a surrounding markdown code fence, if any
 */
export function stripCodeFence(text: string): string {
  const fenced = /^\s*```[a-zA-Z]*\s*\n([\s\S]*?)\n?```\s*$/.exec(text);
  return (fenced ? fenced[1] : text).trim();
}

/**
 * Parse the entity dictionary. Returns no terms when the text is not a JSON
 * dictionary of the expected shape.
 */
export function parseEntityDictionary(text: string): GlossaryTerm[] {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(text));
  } catch {
    return [];
  }

  const parsed = entityDictionarySchema.safeParse(data);
  if (!parsed.success) {
    return [];
  }

  return Object.entries(parsed.data).map(([term, value]) => ({
    term,
    context: value.context,
    suggestedTranslation: value.suggested_translation,
  }));
}

export class GlossaryManager {
  private metadata: GlossaryMetadata;

  constructor(metadata: GlossaryMetadata) {
    this.metadata = metadata;
  }

  static create(params: {
    entities: string;
    style: string;
    entitiesOrigin: MetadataOrigin;
    styleOrigin: MetadataOrigin;
  }): GlossaryManager {
    return new GlossaryManager({
      ...params,
      terms: parseEntityDictionary(params.entities),
    });
  }

  get entities(): string {
    return this.metadata.entities;
  }

  get style(): string {
    return this.metadata.style;
  }

  get terms(): GlossaryTerm[] {
    return this.metadata.terms;
  }
}
