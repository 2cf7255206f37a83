/**
 * Artifact store interface - staged, durable storage of pipeline artifacts
 *
 * Keys are namespaced by session id. Every key has exactly one writer, so
 * backends need no locking; a second write to a key overwrites it.
 */

export interface ArtifactLocator {
  key: string;
  uri: string;   // Backend address handed to external readers
}

export type ArtifactBody = string | Uint8Array;

export interface IArtifactStore {
  readonly name: string;

  put(key: string, body: ArtifactBody, contentType?: string): Promise<ArtifactLocator>;

  get(locator: ArtifactLocator | string): Promise<Buffer>;

  getText(locator: ArtifactLocator | string): Promise<string>;

  /**
   * Locators whose key starts with `prefix`, sorted lexicographically by key
   */
  listByPrefix(prefix: string): Promise<ArtifactLocator[]>;

  exists(key: string): Promise<boolean>;

  locate(key: string): ArtifactLocator;

  /**
   * Time-limited URL an outside service can read the artifact from
   */
  signedUrl(key: string, expiresInSeconds?: number): Promise<string>;
}
