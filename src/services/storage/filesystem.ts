/**
 * Artifact store on the local filesystem
 *
 * Keys map to paths under the root directory; `/` in a key is a directory
 * separator.
 */

import fs from 'fs/promises';
import path from 'path';
import { pathToFileURL } from 'url';
import { BaseArtifactStore } from './base.js';

export class FileSystemArtifactStore extends BaseArtifactStore {
  readonly name = 'filesystem';
  readonly rootDir: string;

  constructor(rootDir: string) {
    super();
    this.rootDir = path.resolve(rootDir);
  }

  protected async write(key: string, bytes: Buffer): Promise<void> {
    const filePath = this.pathFor(key);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, bytes);
  }

  protected async read(key: string): Promise<Buffer> {
    return fs.readFile(this.pathFor(key));
  }

  protected async listKeys(prefix: string): Promise<string[]> {
    // Only the directory holding the prefix needs walking
    const slash = prefix.lastIndexOf('/');
    const dirKey = slash >= 0 ? prefix.slice(0, slash) : '';
    const dirPath = dirKey ? path.join(this.rootDir, ...dirKey.split('/')) : this.rootDir;

    let entries: string[];
    try {
      entries = await fs.readdir(dirPath, { recursive: true });
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const keys: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry);
      const stat = await fs.stat(fullPath);
      if (stat.isFile()) {
        keys.push(path.relative(this.rootDir, fullPath).split(path.sep).join('/'));
      }
    }
    return keys;
  }

  protected async has(key: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.pathFor(key));
      return stat.isFile();
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  protected uriFor(key: string): string {
    return pathToFileURL(this.pathFor(key)).href;
  }

  protected async createSignedUrl(key: string): Promise<string> {
    // Local files are not access controlled
    return this.uriFor(key);
  }

  private pathFor(key: string): string {
    return path.join(this.rootDir, ...key.split('/'));
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
