/**
 * Glossary and style metadata shared by every chunk of a session
 */

export interface GlossaryTerm {
  term: string;
  context: string;
  suggestedTranslation: string;
}

export type MetadataOrigin = 'provided' | 'extracted';

export interface GlossaryMetadata {
  entities: string;            // Entity dictionary as stored and sent to the model
  style: string;               // Free-text style guide
  entitiesOrigin: MetadataOrigin;
  styleOrigin: MetadataOrigin;
  terms: GlossaryTerm[];       // Parsed view of `entities`, empty when it is not JSON
}
