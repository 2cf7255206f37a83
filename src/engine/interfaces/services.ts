/**
 * External collaborators of the pipeline
 */

import type { ArtifactLocator } from './artifact-store.js';

/**
 * Turns a prompt into generated text. Rejects with GenerationFailure.
 */
export interface GenerationService {
  generate(prompt: string, temperature: number): Promise<string>;
}

/**
 * Reviews a translated artifact against the prompt it came from and returns
 * the corrected text. Rejects with ValidationFailure.
 */
export interface ValidationService {
  validate(promptLocator: ArtifactLocator, translatedLocator: ArtifactLocator): Promise<string>;
}
