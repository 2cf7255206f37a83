/**
 * Artifact store on Supabase Storage
 *
 * Listing is per folder (Supabase does not list recursively), which covers
 * every prefix the pipeline asks for: a stage directory plus a file name
 * prefix.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { BaseArtifactStore } from './base.js';

const LIST_PAGE_SIZE = 100;

export interface SupabaseStoreConfig {
  url: string;
  serviceRoleKey: string;
  bucket: string;
}

export class SupabaseArtifactStore extends BaseArtifactStore {
  readonly name = 'supabase';
  readonly bucket: string;

  private client: SupabaseClient;

  constructor(client: SupabaseClient, bucket: string) {
    super();
    this.client = client;
    this.bucket = bucket;
  }

  static fromConfig(config: SupabaseStoreConfig): SupabaseArtifactStore {
    if (!config.url || !config.serviceRoleKey) {
      throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set for the supabase backend');
    }
    return new SupabaseArtifactStore(createClient(config.url, config.serviceRoleKey), config.bucket);
  }

  protected async write(key: string, bytes: Buffer, contentType: string): Promise<void> {
    const { error } = await this.client.storage.from(this.bucket).upload(key, bytes, {
      contentType,
      upsert: true,
      cacheControl: '3600',
    });

    if (error) {
      throw new Error(`Failed to upload file to ${this.bucket}: ${error.message}`);
    }
  }

  protected async read(key: string): Promise<Buffer> {
    const { data, error } = await this.client.storage.from(this.bucket).download(key);

    if (error || !data) {
      throw new Error(`Failed to download ${this.bucket}/${key}: ${error?.message || 'Unknown error'}`);
    }

    return Buffer.from(await data.arrayBuffer());
  }

  protected async listKeys(prefix: string): Promise<string[]> {
    const slash = prefix.lastIndexOf('/');
    const folder = slash >= 0 ? prefix.slice(0, slash) : '';
    const namePrefix = prefix.slice(slash + 1);

    const names = await this.listFolder(folder, namePrefix);
    return names
      .filter((name) => name.startsWith(namePrefix))
      .map((name) => (folder ? `${folder}/${name}` : name));
  }

  protected async has(key: string): Promise<boolean> {
    const slash = key.lastIndexOf('/');
    const folder = slash >= 0 ? key.slice(0, slash) : '';
    const name = key.slice(slash + 1);

    const names = await this.listFolder(folder, name);
    return names.includes(name);
  }

  protected uriFor(key: string): string {
    return `supabase://${this.bucket}/${key}`;
  }

  protected async createSignedUrl(key: string, expiresInSeconds: number): Promise<string> {
    const { data, error } = await this.client.storage
      .from(this.bucket)
      .createSignedUrl(key, expiresInSeconds);

    if (error || !data?.signedUrl) {
      throw new Error(`Failed to create signed URL for ${this.bucket}/${key}: ${error?.message || 'Unknown error'}`);
    }

    return data.signedUrl;
  }

  /**
   * File names in one folder matching `search`. Paginated via offset/limit,
   * continuing until a page comes back short.
   */
  private async listFolder(folder: string, search: string): Promise<string[]> {
    let offset = 0;
    const names: string[] = [];

    // eslint-disable-next-line no-constant-condition
    while (true) {
      const { data, error } = await this.client.storage.from(this.bucket).list(folder, {
        limit: LIST_PAGE_SIZE,
        offset,
        search: search || undefined,
        sortBy: { column: 'name', order: 'asc' },
      });

      if (error) {
        throw new Error(`Failed to list files in ${this.bucket}/${folder}: ${error.message}`);
      }

      const page = data ?? [];
      // Folder placeholders come back without an id
      names.push(...page.filter((item) => Boolean(item.id)).map((item) => item.name));

      if (page.length < LIST_PAGE_SIZE) break;
      offset += LIST_PAGE_SIZE;
    }

    return names;
  }
}
