import { describe, it, expect } from 'vitest';
import { GlossaryManager, parseEntityDictionary, stripCodeFence } from './glossary-manager.js';

describe('parseEntityDictionary', () => {
  it('reads the context and suggested translation of each entity', () => {
    const text = '```json\n{"Acme": {"context": "a company", "suggested_translation": "Acmé"}}\n```';

    expect(parseEntityDictionary(text)).toEqual([
      { term: 'Acme', context: 'a company', suggestedTranslation: 'Acmé' },
    ]);
  });

  it('takes a bare string as the suggested translation', () => {
    expect(parseEntityDictionary('{"Paris": "Paris"}')).toEqual([
      { term: 'Paris', context: '', suggestedTranslation: 'Paris' },
    ]);
  });

  it('returns no terms for text that is not a dictionary', () => {
    expect(parseEntityDictionary('Acme: a company')).toEqual([]);
    expect(parseEntityDictionary('[1, 2]')).toEqual([]);
    expect(parseEntityDictionary('{"Acme": 42}')).toEqual([]);
  });
});

describe('stripCodeFence', () => {
  it('leaves unfenced text alone apart from trimming', () => {
    expect(stripCodeFence('  {"a": 1}\n')).toBe('{"a": 1}');
  });

  it('removes a fence without a language tag', () => {
    expect(stripCodeFence('```\nplain\n```')).toBe('plain');
  });
});

describe('GlossaryManager', () => {
  const glossary = GlossaryManager.create({
    entities: '{"Old Harbor": {"context": "a district", "suggested_translation": "Vieux-Port"}}',
    style: 'Formal register.',
    entitiesOrigin: 'extracted',
    styleOrigin: 'provided',
  });

  it('keeps the raw metadata', () => {
    expect(glossary.style).toBe('Formal register.');
    expect(glossary.entities).toContain('"Old Harbor"');
    expect(glossary.terms).toEqual([
      { term: 'Old Harbor', context: 'a district', suggestedTranslation: 'Vieux-Port' },
    ]);
  });
});
