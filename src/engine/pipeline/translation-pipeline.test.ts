import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { TranslationPipeline } from './translation-pipeline.js';
import { MemoryArtifactStore } from '../../services/storage/memory.js';
import { CodecRegistry, CatalogCodec, EbookCodec, PlainTextCodec } from '../../services/import/index.js';
import type { EncodedArtifact } from '../../services/import/types.js';
import type { ArtifactLocator, IArtifactStore } from '../interfaces/artifact-store.js';
import type { GenerationService, ValidationService } from '../interfaces/services.js';
import type { SessionParams } from '../types/common.js';
import type { SessionState } from '../types/pipeline.js';
import { chunkText } from '../utils/chunker.js';
import {
  CancelledError,
  ConfigurationError,
  DecodeError,
  GenerationFailure,
  ValidationFailure,
} from '../errors.js';

const ENTITIES = '{"Acme": {"context": "a company", "suggested_translation": "Acmé"}}';
const STYLE = 'Formal tone.';

const SOURCE_START = '## 4. Source Content\n---\n';
const SOURCE_END = '\n---\n\n**Output:**';

/** Chunk text embedded in a translation prompt */
function sourceOf(prompt: string): string {
  const start = prompt.indexOf(SOURCE_START) + SOURCE_START.length;
  return prompt.slice(start, prompt.lastIndexOf(SOURCE_END));
}

type Translate = (chunk: string, prompt: string) => string | Promise<string>;

class FakeGeneration implements GenerationService {
  prompts: string[] = [];
  temperatures: number[] = [];

  constructor(private translate: Translate = (chunk) => chunk) {}

  async generate(prompt: string, temperature: number): Promise<string> {
    this.prompts.push(prompt);
    this.temperatures.push(temperature);

    if (prompt.includes('# Translation Task')) {
      return this.translate(sourceOf(prompt), prompt);
    }
    if (prompt.includes('extract all critical entities')) {
      return ENTITIES;
    }
    return STYLE;
  }

  get translationPrompts(): string[] {
    return this.prompts.filter((p) => p.includes('# Translation Task'));
  }
}

/** Uppercases chunks, except chunk 2 (throws) and chunk 3 (blank output) */
class FakeValidation implements ValidationService {
  constructor(private store: IArtifactStore) {}

  async validate(_prompt: ArtifactLocator, translated: ArtifactLocator): Promise<string> {
    if (translated.key.endsWith('_0002.txt')) {
      throw new ValidationFailure('reviewer unavailable');
    }
    if (translated.key.endsWith('_0003.txt')) {
      return '   ';
    }
    return (await this.store.getText(translated)).toUpperCase();
  }
}

const TEXT = Array.from(
  { length: 10 },
  (_, i) => `Paragraph ${i + 1}. ` + 'Lorem ipsum dolor sit amet. '.repeat(3)
).join('\n\n');

const CHUNKS = chunkText(TEXT, 200);

function makeSession(overrides: Partial<SessionParams> = {}) {
  return TranslationPipeline.createSession({
    id: 'sess-1',
    sourceRef: 'story.txt',
    targetLanguage: 'French',
    maxChunkSize: 200,
    metadataPreviewSize: 1000,
    model: 'test-model',
    temperature: 0.5,
    validationEnabled: false,
    concurrency: 2,
    ...overrides,
  });
}

const textSource = { kind: 'buffer', bytes: Buffer.from(TEXT, 'utf-8'), filename: 'story.txt' } as const;

describe('TranslationPipeline', () => {
  let store: MemoryArtifactStore;
  let states: SessionState[];

  const lastState = (): SessionState | undefined => states[states.length - 1];

  beforeEach(() => {
    store = new MemoryArtifactStore();
    states = [];
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function pipeline(deps: { generation?: GenerationService | null; validation?: ValidationService | null; codecs?: CodecRegistry }) {
    return new TranslationPipeline({
      store,
      onStateChange: (state) => {
        states.push(state);
      },
      ...deps,
    });
  }

  it('reassembles an identity translation into the source text', async () => {
    expect(CHUNKS.length).toBeGreaterThanOrEqual(3);
    const generation = new FakeGeneration();

    const result = await pipeline({ generation }).execute(makeSession(), { source: textSource });

    expect(result.finalArtifact?.key).toBe('sess-1/FINAL_story.txt');
    expect(await store.getText('sess-1/FINAL_story.txt')).toBe(TEXT);
    expect(result.reencodedArtifact).toBeNull();
    expect(result.chunkCount).toBe(CHUNKS.length);
    expect(result.state.stage).toBe('Done');
    expect(result.state.counters).toEqual({
      chunksCreated: CHUNKS.length,
      promptsBuilt: CHUNKS.length,
      translationsCompleted: CHUNKS.length,
      validationsCompleted: 0,
      validationsFailed: 0,
    });
    expect(lastState()?.stage).toBe('Done');
  });

  it('stores every intermediate artifact', async () => {
    await pipeline({ generation: new FakeGeneration() }).execute(makeSession(), { source: textSource });

    expect(await store.getText('sess-1/source/story.txt')).toBe(TEXT);
    expect(await store.getText('sess-1/entity_extraction.txt')).toBe(ENTITIES);
    expect(await store.getText('sess-1/style_instructions.txt')).toBe(STYLE);
    expect(await store.getText('sess-1/original_chunks/original_chunk_0001.txt')).toBe(CHUNKS[0]);

    const prompt = await store.getText('sess-1/prompts_for_translation/translation_prompt_chunk_0002.txt');
    expect(prompt).toContain(`This is part 2 of ${CHUNKS.length}`);
    expect(prompt).toContain(ENTITIES);
    expect(prompt).toContain(STYLE);
    expect(sourceOf(prompt)).toBe(CHUNKS[1]);

    expect((await store.listByPrefix('sess-1/translated_chunks/final_')).length).toBe(CHUNKS.length);
  });

  it('moves through the stages in order, skipping Validating when disabled', async () => {
    await pipeline({ generation: new FakeGeneration() }).execute(makeSession(), { source: textSource });

    const stages = states.map((s) => s.stage).filter((stage, i, all) => stage !== all[i - 1]);
    expect(stages).toEqual([
      'Initializing',
      'MetadataReady',
      'Chunked',
      'PromptsBuilt',
      'Translating',
      'Reassembling',
      'Done',
    ]);
  });

  it('passes the session temperature to every generation call', async () => {
    const generation = new FakeGeneration();
    await pipeline({ generation }).execute(makeSession({ temperature: 0.2 }), { source: textSource });

    expect(generation.prompts).toHaveLength(CHUNKS.length + 2);
    expect(new Set(generation.temperatures)).toEqual(new Set([0.2]));
  });

  it('uses caller-supplied metadata verbatim', async () => {
    const generation = new FakeGeneration();

    await pipeline({ generation }).execute(makeSession(), {
      source: textSource,
      entities: 'Acme = Acmé',
      style: 'Casual.',
    });

    expect(generation.prompts).toHaveLength(CHUNKS.length);
    expect(generation.translationPrompts[0]).toContain('Acme = Acmé');
    expect(await store.getText('sess-1/entity_extraction.txt')).toBe('Acme = Acmé');
    expect(await store.getText('sess-1/style_instructions.txt')).toBe('Casual.');
  });

  it('falls back to the raw translation when validation fails or returns nothing', async () => {
    const generation = new FakeGeneration();
    const validation = new FakeValidation(store);

    const result = await pipeline({ generation, validation }).execute(makeSession({ validationEnabled: true }), {
      source: textSource,
    });

    const expected = CHUNKS.map((chunk, i) => (i === 1 || i === 2 ? chunk : chunk.toUpperCase())).join('');
    expect(await store.getText('sess-1/FINAL_story.txt')).toBe(expected);
    expect(result.fallbackChunks).toEqual([2, 3]);
    expect(result.state.counters.validationsCompleted).toBe(CHUNKS.length - 2);
    expect(result.state.counters.validationsFailed).toBe(2);
    expect(states.some((s) => s.stage === 'Validating')).toBe(true);
    expect(result.state.stage).toBe('Done');
  });

  it('truncates to the maximum chunk count', async () => {
    const result = await pipeline({ generation: new FakeGeneration() }).execute(makeSession({ maxChunkCount: 2 }), {
      source: textSource,
    });

    expect(result.chunkCount).toBe(2);
    expect(result.truncation).toEqual({ originalCount: CHUNKS.length, keptCount: 2 });
    expect(result.state.warnings).toContain(`Document truncated: ${CHUNKS.length} chunks, keeping the first 2`);
    expect(await store.getText('sess-1/FINAL_story.txt')).toBe(CHUNKS[0] + CHUNKS[1]);
    expect(await store.listByPrefix('sess-1/original_chunks/')).toHaveLength(2);
  });

  it('fails the session on a generation failure, keeping finished work', async () => {
    const generation = new FakeGeneration((chunk, prompt) => {
      if (prompt.includes('This is part 3 of')) {
        throw new GenerationFailure('model unavailable');
      }
      return chunk;
    });

    await expect(
      pipeline({ generation }).execute(makeSession({ concurrency: 1 }), { source: textSource })
    ).rejects.toBeInstanceOf(GenerationFailure);

    const state = lastState();
    expect(state?.stage).toBe('Failed');
    expect(state?.lastError).toEqual({ kind: 'GenerationFailure', message: 'model unavailable', stage: 'Translating' });
    expect(state?.counters.chunksCreated).toBe(CHUNKS.length);
    expect(state?.counters.translationsCompleted).toBe(2);
    expect(await store.exists('sess-1/translated_chunks/translated_chunk_0002.txt')).toBe(true);
    expect(await store.exists('sess-1/FINAL_story.txt')).toBe(false);
  });

  it('resumes a failed session without repeating finished calls', async () => {
    const failing = new FakeGeneration((chunk, prompt) => {
      if (prompt.includes('This is part 3 of')) {
        throw new GenerationFailure('model unavailable');
      }
      return chunk;
    });
    await expect(
      pipeline({ generation: failing }).execute(makeSession({ concurrency: 1 }), { source: textSource })
    ).rejects.toThrow('model unavailable');

    const generation = new FakeGeneration();
    const result = await pipeline({ generation }).execute(makeSession({ concurrency: 1 }), {
      source: { kind: 'artifact', key: 'sess-1/source/story.txt' },
      resume: true,
    });

    expect(generation.prompts).toHaveLength(CHUNKS.length - 2);
    expect(generation.translationPrompts[0]).toContain('This is part 3 of');
    expect(result.state.counters.translationsCompleted).toBe(CHUNKS.length);
    expect(await store.getText('sess-1/FINAL_story.txt')).toBe(TEXT);
  });

  it('records a plain generation error as a generation failure', async () => {
    const generation = new FakeGeneration((chunk, prompt) => {
      if (prompt.includes('This is part 2 of')) {
        throw new Error('boom');
      }
      return chunk;
    });

    await expect(
      pipeline({ generation }).execute(makeSession({ concurrency: 1 }), { source: textSource })
    ).rejects.toBeInstanceOf(GenerationFailure);

    expect(lastState()?.lastError).toEqual({
      kind: 'GenerationFailure',
      message: 'Generation failed: boom',
      stage: 'Translating',
    });
  });

  it('leaves nothing running after a generation failure', async () => {
    const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));
    const generation = new FakeGeneration(async (chunk, prompt) => {
      if (prompt.includes('This is part 1 of')) {
        await delay(5);
        throw new GenerationFailure('model unavailable');
      }
      await delay(40);
      return chunk;
    });

    await expect(
      pipeline({ generation }).execute(makeSession({ concurrency: 3 }), { source: textSource })
    ).rejects.toThrow('model unavailable');

    const failed = lastState();
    const stateCount = states.length;
    const translated = await store.listByPrefix('sess-1/translated_chunks/translated_');
    expect(failed?.stage).toBe('Failed');
    expect(failed?.counters.translationsCompleted).toBe(2);
    expect(translated.map((l) => l.key)).toEqual([
      'sess-1/translated_chunks/translated_chunk_0002.txt',
      'sess-1/translated_chunks/translated_chunk_0003.txt',
    ]);

    await delay(100);
    expect(states).toHaveLength(stateCount);
    expect(generation.translationPrompts).toHaveLength(3);
    expect(await store.listByPrefix('sess-1/translated_chunks/translated_')).toHaveLength(2);
  });

  it('restores fallback outcomes of reused final chunks on resume', async () => {
    await pipeline({ generation: new FakeGeneration(), validation: new FakeValidation(store) }).execute(
      makeSession({ validationEnabled: true }),
      { source: textSource }
    );

    const validate = vi.fn(async () => 'unused');
    const result = await pipeline({ generation: new FakeGeneration(), validation: { validate } }).execute(
      makeSession({ validationEnabled: true }),
      { source: { kind: 'artifact', key: 'sess-1/source/story.txt' }, resume: true, fallbackChunks: [2, 3] }
    );

    expect(validate).not.toHaveBeenCalled();
    expect(result.fallbackChunks).toEqual([2, 3]);
    expect(result.state.counters.validationsFailed).toBe(2);
    expect(result.state.counters.validationsCompleted).toBe(CHUNKS.length - 2);
  });

  it('rejects an incomplete configuration before doing any work', async () => {
    const generation = new FakeGeneration();

    await expect(
      pipeline({ generation }).execute(makeSession({ validationEnabled: true }), { source: textSource })
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(generation.prompts).toHaveLength(0);
    expect(lastState()?.lastError?.kind).toBe('ConfigurationError');
    expect(lastState()?.lastError?.stage).toBe('Initializing');

    await expect(
      pipeline({ generation }).execute(makeSession({ targetLanguage: ' ' }), { source: textSource })
    ).rejects.toThrow('Target language is required');
    await expect(pipeline({}).execute(makeSession(), { source: textSource })).rejects.toThrow(
      'No generation service configured'
    );
  });

  it('rejects unsupported and unreadable sources', async () => {
    const generation = new FakeGeneration();

    await expect(
      pipeline({ generation }).execute(makeSession({ sourceRef: 'notes.docx' }), {
        source: { kind: 'buffer', bytes: Buffer.from('x'), filename: 'notes.docx' },
      })
    ).rejects.toBeInstanceOf(DecodeError);
    expect(lastState()?.lastError?.kind).toBe('DecodeError');

    await expect(
      pipeline({ generation }).execute(makeSession({ sourceRef: path.join(os.tmpdir(), 'missing-source-file.txt') }))
    ).rejects.toThrow('Cannot read source');
  });

  it('reads the source from its path by default', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-'));
    const sourcePath = path.join(dir, 'story.txt');
    await fs.writeFile(sourcePath, TEXT, 'utf-8');

    try {
      const result = await pipeline({ generation: new FakeGeneration() }).execute(makeSession({ sourceRef: sourcePath }));
      expect(result.finalArtifact?.key).toBe('sess-1/FINAL_story.txt');
      expect(await store.getText('sess-1/FINAL_story.txt')).toBe(TEXT);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('stops with Cancelled when the signal fires', async () => {
    const controller = new AbortController();
    const generation = new FakeGeneration((chunk, prompt) => {
      if (prompt.includes('This is part 2 of')) {
        controller.abort();
      }
      return chunk;
    });

    await expect(
      pipeline({ generation }).execute(makeSession({ concurrency: 1 }), {
        source: textSource,
        signal: controller.signal,
      })
    ).rejects.toBeInstanceOf(CancelledError);

    expect(lastState()?.stage).toBe('Failed');
    expect(lastState()?.lastError?.kind).toBe('Cancelled');
    expect(lastState()?.lastError?.stage).toBe('Translating');
    expect(await store.exists('sess-1/FINAL_story.txt')).toBe(false);
  });

  it('does not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const generation = new FakeGeneration();

    await expect(
      pipeline({ generation }).execute(makeSession(), { source: textSource, signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(generation.prompts).toHaveLength(0);
  });

  describe('catalog documents', () => {
    const CATALOG = 'msgid ""\nmsgstr "Language: fr\\n"\n\nmsgid "Hello"\nmsgstr ""\n\nmsgid "Bye"\nmsgstr "Au revoir"\n';
    const catalogSource = { kind: 'buffer', bytes: Buffer.from(CATALOG, 'utf-8'), filename: 'app.po' } as const;

    it('re-encodes the translated catalog', async () => {
      const generation = new FakeGeneration((chunk) =>
        chunk.replace('Translation:\n(not translated)', 'Translation:\nBonjour')
      );

      const result = await pipeline({ generation }).execute(makeSession({ sourceRef: 'app.po', maxChunkSize: 5000 }), {
        source: catalogSource,
      });

      expect(result.chunkCount).toBe(1);
      expect(result.reencodedArtifact?.key).toBe('sess-1/assembled_app.po');
      expect(await store.getText('sess-1/assembled_app.po')).toBe(
        'msgid ""\nmsgstr "Language: fr\\n"\n\nmsgid "Hello"\nmsgstr "Bonjour"\n\nmsgid "Bye"\nmsgstr "Au revoir"\n'
      );
      expect(result.state.reencode).toEqual({
        attempted: true,
        succeeded: true,
        artifactKey: 'sess-1/assembled_app.po',
      });
      expect(store.contentTypeOf('sess-1/assembled_app.po')).toBe('text/x-gettext-translation');
    });

    it('keeps the final document when re-encoding fails', async () => {
      class BrokenCatalogCodec extends CatalogCodec {
        async encode(): Promise<EncodedArtifact> {
          throw new Error('disk full');
        }
      }
      const codecs = new CodecRegistry({
        plain: new PlainTextCodec(),
        catalog: new BrokenCatalogCodec(),
        ebook: new EbookCodec(),
      });

      const result = await pipeline({ generation: new FakeGeneration(), codecs }).execute(
        makeSession({ sourceRef: 'app.po', maxChunkSize: 5000 }),
        { source: catalogSource }
      );

      const message = 'Failed to re-encode catalog document: disk full';
      expect(result.state.stage).toBe('Done');
      expect(result.reencodedArtifact).toBeNull();
      expect(result.state.reencode).toEqual({ attempted: true, succeeded: false, error: message });
      expect(result.state.warnings).toContain(`ReassemblyEncodeFailure: ${message}`);
      expect(await store.exists('sess-1/FINAL_app.po')).toBe(true);
    });
  });
});

describe('TranslationPipeline.createSession', () => {
  it('assigns an id and freezes the session', () => {
    const session = TranslationPipeline.createSession({
      sourceRef: 'a.txt',
      targetLanguage: 'German',
      maxChunkSize: 100,
      metadataPreviewSize: 100,
      model: 'test-model',
      temperature: 1,
      validationEnabled: false,
      concurrency: 1,
    });

    expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(Object.isFrozen(session)).toBe(true);
  });
});
