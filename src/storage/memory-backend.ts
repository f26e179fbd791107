/**
 * In-Memory Blob Backend
 *
 * Keeps files in a Map keyed by path. Directories exist implicitly while
 * any file lives below them, like on object stores.
 */

import { Lookup } from '../core/types';
import { BlobBackend, BlobBackendType, BlobEntry, BlobFile } from './types';

function normalize(path: string): string {
  return path.replace(/\/+/g, '/').replace(/^\/|\/$/g, '');
}

export class MemoryBackend implements BlobBackend {
  readonly type: BlobBackendType = 'memory';
  readonly name = 'Memory';

  private readonly files = new Map<string, Buffer>();

  constructor(initial: Record<string, string | Buffer> = {}) {
    for (const [path, data] of Object.entries(initial)) {
      this.files.set(normalize(path), typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data));
    }
  }

  async get(path: string): Promise<Lookup<Buffer>> {
    const data = this.files.get(normalize(path));
    return data ? Lookup.found(Buffer.from(data)) : Lookup.absent<Buffer>();
  }

  async put(path: string, data: Buffer): Promise<void> {
    this.files.set(normalize(path), Buffer.from(data));
  }

  async delete(path: string): Promise<void> {
    this.files.delete(normalize(path));
  }

  async listRecursive(path: string): Promise<Lookup<BlobEntry[]>> {
    const dir = normalize(path);
    const prefix = dir === '' ? '' : `${dir}/`;
    const directories = new Set<string>();
    const entries: BlobEntry[] = [];

    for (const key of [...this.files.keys()].sort()) {
      if (!key.startsWith(prefix)) continue;

      const relative = key.slice(prefix.length);
      const parts = relative.split('/');
      for (let i = 1; i < parts.length; i++) {
        const parent = parts.slice(0, i).join('/');
        if (!directories.has(parent)) {
          directories.add(parent);
          entries.push({ path: parent, isDirectory: true });
        }
      }
      entries.push({ path: relative, isDirectory: false });
    }

    return entries.length === 0 ? Lookup.absent<BlobEntry[]>() : Lookup.found(entries);
  }

  async putBatch(files: BlobFile[]): Promise<void> {
    for (const file of files) {
      await this.put(file.path, file.data);
    }
  }

  /**
   * Paths of every stored file, sorted
   */
  paths(): string[] {
    return [...this.files.keys()].sort();
  }

  has(path: string): boolean {
    return this.files.has(normalize(path));
  }
}
