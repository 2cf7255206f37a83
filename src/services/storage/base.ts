/**
 * Shared behavior of artifact store backends: key normalization, text
 * encoding, prefix filtering and ordering, error wrapping.
 */

import type {
  IArtifactStore,
  ArtifactLocator,
  ArtifactBody,
} from '../../engine/interfaces/artifact-store.js';
import { StorageError, errorMessage } from '../../engine/errors.js';

export const DEFAULT_SIGNED_URL_TTL = 60 * 15;

export abstract class BaseArtifactStore implements IArtifactStore {
  abstract readonly name: string;

  protected abstract write(key: string, bytes: Buffer, contentType: string): Promise<void>;
  protected abstract read(key: string): Promise<Buffer>;
  /** Candidate keys for a prefix; may return extra keys, never fewer */
  protected abstract listKeys(prefix: string): Promise<string[]>;
  protected abstract has(key: string): Promise<boolean>;
  protected abstract uriFor(key: string): string;
  protected abstract createSignedUrl(key: string, expiresInSeconds: number): Promise<string>;

  async put(key: string, body: ArtifactBody, contentType?: string): Promise<ArtifactLocator> {
    const normalized = normalizeKey(key);
    const bytes = typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.from(body);

    try {
      await this.write(normalized, bytes, contentType ?? guessContentType(normalized));
    } catch (error) {
      throw new StorageError(
        `Failed to write ${normalized} to ${this.name}: ${errorMessage(error)}`,
        { key: normalized },
        error
      );
    }

    return this.locate(normalized);
  }

  async get(locator: ArtifactLocator | string): Promise<Buffer> {
    const key = normalizeKey(typeof locator === 'string' ? locator : locator.key);
    try {
      return await this.read(key);
    } catch (error) {
      throw new StorageError(
        `Failed to read ${key} from ${this.name}: ${errorMessage(error)}`,
        { key },
        error
      );
    }
  }

  async getText(locator: ArtifactLocator | string): Promise<string> {
    const bytes = await this.get(locator);
    return bytes.toString('utf-8');
  }

  async listByPrefix(prefix: string): Promise<ArtifactLocator[]> {
    const normalized = prefix.replace(/^\/+/, '');
    let keys: string[];
    try {
      keys = await this.listKeys(normalized);
    } catch (error) {
      throw new StorageError(
        `Failed to list ${normalized} in ${this.name}: ${errorMessage(error)}`,
        { prefix: normalized },
        error
      );
    }

    return keys
      .filter((key) => key.startsWith(normalized))
      .sort(compareKeys)
      .map((key) => this.locate(key));
  }

  async exists(key: string): Promise<boolean> {
    return this.has(normalizeKey(key));
  }

  locate(key: string): ArtifactLocator {
    const normalized = normalizeKey(key);
    return { key: normalized, uri: this.uriFor(normalized) };
  }

  async signedUrl(key: string, expiresInSeconds: number = DEFAULT_SIGNED_URL_TTL): Promise<string> {
    return this.createSignedUrl(normalizeKey(key), expiresInSeconds);
  }
}

/**
 * Strips leading and trailing slashes, rejects empty and parent segments
 */
export function normalizeKey(key: string): string {
  const normalized = key.replace(/^\/+|\/+$/g, '');
  const segments = normalized.split('/');
  if (normalized.length === 0 || segments.some((s) => s === '' || s === '.' || s === '..')) {
    throw new StorageError(`Invalid artifact key: "${key}"`, { key });
  }
  return normalized;
}

/** Plain code-unit ordering, independent of locale */
export function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function guessContentType(key: string): string {
  const extension = key.toLowerCase().split('.').pop() ?? '';
  switch (extension) {
    case 'txt':
    case 'md':
      return 'text/plain; charset=utf-8';
    case 'po':
    case 'pot':
      return 'text/x-gettext-translation';
    case 'epub':
      return 'application/epub+zip';
    case 'json':
      return 'application/json';
    default:
      return 'application/octet-stream';
  }
}
