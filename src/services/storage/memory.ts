/**
 * In-process artifact store
 */

import { BaseArtifactStore } from './base.js';

export class MemoryArtifactStore extends BaseArtifactStore {
  readonly name = 'memory';

  private objects = new Map<string, { bytes: Buffer; contentType: string }>();

  protected async write(key: string, bytes: Buffer, contentType: string): Promise<void> {
    this.objects.set(key, { bytes: Buffer.from(bytes), contentType });
  }

  protected async read(key: string): Promise<Buffer> {
    const object = this.objects.get(key);
    if (!object) {
      throw new Error(`Artifact not found: ${key}`);
    }
    return Buffer.from(object.bytes);
  }

  protected async listKeys(prefix: string): Promise<string[]> {
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix));
  }

  protected async has(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  protected uriFor(key: string): string {
    return `memory://${key}`;
  }

  protected async createSignedUrl(key: string, expiresInSeconds: number): Promise<string> {
    const expires = Date.now() + expiresInSeconds * 1000;
    return `memory://${key}?expires=${expires}`;
  }

  /** Every stored key, sorted */
  keys(): string[] {
    return [...this.objects.keys()].sort();
  }

  contentTypeOf(key: string): string | undefined {
    return this.objects.get(key)?.contentType;
  }
}
