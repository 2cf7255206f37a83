import { describe, it, expect } from 'vitest';
import { createArtifactStore, SupabaseArtifactStore } from './index.js';
import { loadConfig } from '../../config.js';

describe('createArtifactStore', () => {
  it('defaults to the filesystem backend', () => {
    const store = createArtifactStore(loadConfig({ ARTIFACTS_DIR: './tmp-artifacts' }));
    expect(store.name).toBe('filesystem');
  });

  it('creates a supabase store for the supabase backend', () => {
    const store = createArtifactStore(
      loadConfig({
        STORAGE_BACKEND: 'supabase',
        SUPABASE_URL: 'http://localhost:54321',
        SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
        SUPABASE_BUCKET: 'books',
      })
    );

    expect(store).toBeInstanceOf(SupabaseArtifactStore);
    expect(store.locate('s1/FINAL_story.txt').uri).toBe('supabase://books/s1/FINAL_story.txt');
  });

  it('requires supabase credentials', () => {
    expect(() => SupabaseArtifactStore.fromConfig({ url: '', serviceRoleKey: '', bucket: 'books' })).toThrow(
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set'
    );
  });
});
