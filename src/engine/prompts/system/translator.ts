/**
 * Prompt template for chunk translation
 *
 * Composed once per chunk from the shared entity dictionary and style guide,
 * the format instruction and the chunk text itself.
 */

import type { DocumentFormat } from '../../types/common.js';

export const FORMAT_INSTRUCTIONS: Record<DocumentFormat, string> = {
  plain: 'Plain text document. Maintain paragraph structure and formatting.',
  catalog:
    'Gettext (PO) translation catalog rendered as text blocks. Keep every separator line, "[Entry n]" header, "Context:", "Original:" and "Plural:" section unchanged. Write the translation of the "Original:" text under "Translation:" in place of the existing text or "(not translated)", keeping "[Plural form n]:" labels.',
  ebook:
    'EPUB ebook in HTML format. Preserve ALL HTML tags, attributes, and structure. Do not escape HTML entities. Maintain all formatting tags like <p>, <h1>, <div>, <em>, <strong>, etc.',
};

export interface TranslatorPromptInput {
  targetLanguage: string;
  format: DocumentFormat;
  entities: string;
  style: string;
  chunk: string;
  chunkNumber: number;
  totalChunks: number;
}

export const createTranslatorPrompt = (input: TranslatorPromptInput): string => `
# Translation Task

**Objective:** Translate the source content below into ${input.targetLanguage} while preserving the original format.
**Constraints:** You MUST strictly adhere to the provided Entity Dictionary and Style Guide.

## 1. Context & Guidelines
* **Document type:** ${FORMAT_INSTRUCTIONS[input.format]}
* **Position:** This is part ${input.chunkNumber} of ${input.totalChunks} of a longer document. Translate only this part; do not summarize or continue it.

## 2. Style Guide
${input.style}

## 3. Entity Dictionary (Strict Adherence Required)
*Use these exact translations for the following terms:*
${input.entities}

## 4. Source Content
---
${input.chunk}
---

**Output:** Return ONLY the translated text. Preserve original format exactly. Do not include preamble or explanations.
`;
