/**
 * Prompts for metadata extraction
 *
 * Run once per session over a preview of the document: one call for the
 * entity dictionary, one for the style guide.
 */

export const createEntityExtractionPrompt = (text: string, targetLanguage: string): string => `
Analyze the provided document below. Your task is to extract all critical entities that require consistent translation into ${targetLanguage}.

**Entities to Extract:**
* **Named Entities:** People, geographic locations, organizations.
* **Terminology:** Technical terms, specialized vocabulary, domain-specific jargon.
* **Branding:** Product names, brand names, trademarks.
* **Abbreviations:** Acronyms and initialisms.

**Output Format:**
Return ONLY a JSON dictionary.
* **Key:** The source term as it appears in the text.
* **Value:** An object containing:
    * "context": A brief description of how the term is used.
    * "suggested_translation": The recommended translation only in ${targetLanguage}.

**Document Content:**
${text}
`;

export const createStyleExtractionPrompt = (text: string, targetLanguage: string): string => `
Analyze the provided document below. Your task is to generate a comprehensive style guide for its translation to ${targetLanguage}.

**Style Guide Components:**
* **Tone & Voice:** Define the formality level (e.g., highly technical, casual, persuasive) and emotional resonance.
* **Target Audience:** Identify who will read this text and their expected knowledge level.
* **Convention & Formatting:** Note any specific formatting rules, capitalization preferences, or structural requirements typical for this document type.
* **Cultural Nuances:** Highlight any cultural references, idioms, or sensitivities that must be adapted for the target locale (${targetLanguage}).

**Document Content:**
${text}

**Output:** Provide clear, actionable style instructions that a human or AI translator can follow.
`;
