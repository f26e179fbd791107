/**
 * Local Directory Blob Backend
 *
 * Stores files below a root directory on the local filesystem, for
 * repositories on mounted or synced drives.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Lookup } from '../core/types';
import { Errors, HelperError } from '../core/errors';
import { BlobBackend, BlobBackendType, BlobEntry, BlobFile } from './types';

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isMissing(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

// =============================================================================
// Directory Backend
// =============================================================================

export class DirectoryBackend implements BlobBackend {
  readonly type: BlobBackendType = 'directory';
  readonly name: string;

  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
    this.name = `Directory: ${this.root}`;
  }

  /**
   * Map a backend key onto the filesystem, refusing keys that escape the root
   */
  private resolve(key: string): string {
    const resolved = path.resolve(this.root, ...key.split('/').filter(Boolean));
    if (resolved !== this.root && !resolved.startsWith(this.root + path.sep)) {
      throw Errors.transport(key, 'path escapes the backend root');
    }
    return resolved;
  }

  private failure(key: string, error: unknown): HelperError {
    return Errors.transport(key, errnoCode(error), error);
  }

  async get(key: string): Promise<Lookup<Buffer>> {
    try {
      return Lookup.found(await fs.promises.readFile(this.resolve(key)));
    } catch (error) {
      if (isMissing(error) || errnoCode(error) === 'EISDIR') {
        return Lookup.absent();
      }
      return Lookup.failed(error instanceof HelperError ? error : this.failure(key, error));
    }
  }

  async put(key: string, data: Buffer): Promise<void> {
    const filePath = this.resolve(key);

    // Write atomically (write to temp, then rename)
    const tempPath = `${filePath}.tmp.${process.pid}`;
    try {
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      await fs.promises.writeFile(tempPath, data);
      await fs.promises.rename(tempPath, filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw this.failure(key, error);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.promises.unlink(this.resolve(key));
    } catch (error) {
      if (!isMissing(error)) {
        throw this.failure(key, error);
      }
    }
  }

  async listRecursive(key: string): Promise<Lookup<BlobEntry[]>> {
    const base = this.resolve(key);
    const entries: BlobEntry[] = [];
    const pending: string[] = [''];

    try {
      const stat = await fs.promises.stat(base);
      if (!stat.isDirectory()) {
        return Lookup.absent();
      }

      while (pending.length > 0) {
        const relative = pending.pop() ?? '';
        const children = await fs.promises.readdir(path.join(base, relative), { withFileTypes: true });

        for (const child of children) {
          const childPath = relative ? `${relative}/${child.name}` : child.name;
          if (child.isDirectory()) {
            entries.push({ path: childPath, isDirectory: true });
            pending.push(childPath);
          } else if (!child.name.includes('.tmp.')) {
            entries.push({ path: childPath, isDirectory: false });
          }
        }
      }
    } catch (error) {
      if (isMissing(error)) {
        return Lookup.absent();
      }
      return Lookup.failed(this.failure(key, error));
    }

    entries.sort((a, b) => a.path.localeCompare(b.path));
    return Lookup.found(entries);
  }

  async putBatch(files: BlobFile[]): Promise<void> {
    for (const file of files) {
      await this.put(file.path, file.data);
    }
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createDirectoryBackend(root: string): DirectoryBackend {
  return new DirectoryBackend(root);
}
