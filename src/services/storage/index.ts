/**
 * Artifact store backends
 */

import type { IArtifactStore } from '../../engine/interfaces/artifact-store.js';
import type { AppConfig } from '../../config.js';
import { FileSystemArtifactStore } from './filesystem.js';
import { SupabaseArtifactStore } from './supabase.js';

export { BaseArtifactStore, normalizeKey, guessContentType, DEFAULT_SIGNED_URL_TTL } from './base.js';
export { MemoryArtifactStore } from './memory.js';
export { FileSystemArtifactStore } from './filesystem.js';
export { SupabaseArtifactStore } from './supabase.js';

export function createArtifactStore(config: AppConfig): IArtifactStore {
  switch (config.storage.backend) {
    case 'supabase':
      return SupabaseArtifactStore.fromConfig(config.supabase);
    case 'filesystem':
      return new FileSystemArtifactStore(config.storage.artifactsDir);
  }
}
