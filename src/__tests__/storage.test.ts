/**
 * Blob Backend Tests (memory and directory)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ErrorCode } from '../core/errors';
import { BlobBackend } from '../storage/types';
import { MemoryBackend } from '../storage/memory-backend';
import { DirectoryBackend } from '../storage/directory-backend';

function contentOf(lookup: Awaited<ReturnType<BlobBackend['get']>>): string | undefined {
  return lookup.status === 'found' ? lookup.value.toString('utf8') : undefined;
}

/**
 * Behaviour every backend shares
 */
function backendContract(name: string, create: () => BlobBackend): void {
  describe(`${name} contract`, () => {
    let backend: BlobBackend;

    beforeEach(() => {
      backend = create();
    });

    it('should read back what was written', async () => {
      await backend.put('repo/HEAD', Buffer.from('ref: refs/heads/main\n'));
      expect(contentOf(await backend.get('repo/HEAD'))).toBe('ref: refs/heads/main\n');
    });

    it('should replace existing content', async () => {
      await backend.put('repo/refs/heads/main', Buffer.from('one'));
      await backend.put('repo/refs/heads/main', Buffer.from('two'));
      expect(contentOf(await backend.get('repo/refs/heads/main'))).toBe('two');
    });

    it('should report a missing file as absent', async () => {
      expect((await backend.get('repo/missing')).status).toBe('absent');
    });

    it('should delete files and accept deleting missing ones', async () => {
      await backend.put('repo/refs/heads/topic', Buffer.from('x'));
      await backend.delete('repo/refs/heads/topic');
      await backend.delete('repo/refs/heads/topic');
      expect((await backend.get('repo/refs/heads/topic')).status).toBe('absent');
    });

    it('should list a directory recursively', async () => {
      await backend.put('repo/refs/heads/main', Buffer.from('1'));
      await backend.put('repo/refs/tags/v1', Buffer.from('2'));
      await backend.put('repo/objects/ab/cdef', Buffer.from('3'));

      const listing = await backend.listRecursive('repo/refs');
      expect(listing).toEqual({
        status: 'found',
        value: [
          { path: 'heads', isDirectory: true },
          { path: 'heads/main', isDirectory: false },
          { path: 'tags', isDirectory: true },
          { path: 'tags/v1', isDirectory: false },
        ],
      });
    });

    it('should report listing a missing directory as absent', async () => {
      expect((await backend.listRecursive('repo/refs')).status).toBe('absent');
    });

    it('should write every file of a batch', async () => {
      await backend.putBatch([
        { path: 'repo/objects/aa/1111', data: Buffer.from('a') },
        { path: 'repo/objects/bb/2222', data: Buffer.from('b') },
      ]);
      expect(contentOf(await backend.get('repo/objects/aa/1111'))).toBe('a');
      expect(contentOf(await backend.get('repo/objects/bb/2222'))).toBe('b');
    });
  });
}

describe('MemoryBackend', () => {
  backendContract('memory', () => new MemoryBackend());

  it('should accept initial content', async () => {
    const backend = new MemoryBackend({ '/repo//HEAD': 'ref: refs/heads/main\n' });
    expect(backend.paths()).toEqual(['repo/HEAD']);
    expect(backend.has('repo/HEAD')).toBe(true);
  });

  it('should return copies so stored bytes cannot be changed from outside', async () => {
    const backend = new MemoryBackend();
    const data = Buffer.from('abc');
    await backend.put('file', data);
    data.write('x');

    const lookup = await backend.get('file');
    expect(contentOf(lookup)).toBe('abc');
  });
});

describe('DirectoryBackend', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'blob-backend-test-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  backendContract('directory', () => new DirectoryBackend(root));

  it('should lay files out under the root', async () => {
    const backend = new DirectoryBackend(root);
    await backend.put('repo/objects/ab/cdef', Buffer.from('data'));
    expect(fs.readFileSync(path.join(root, 'repo', 'objects', 'ab', 'cdef'), 'utf8')).toBe('data');
  });

  it('should refuse paths outside the root', async () => {
    const backend = new DirectoryBackend(root);
    const lookup = await backend.get('../outside');
    expect(lookup.status).toBe('failed');
    if (lookup.status === 'failed') {
      expect(lookup.error.code).toBe(ErrorCode.TRANSPORT_FAILED);
    }
  });

  it('should leave no temporary files behind', async () => {
    const backend = new DirectoryBackend(root);
    await backend.put('repo/refs/heads/main', Buffer.from('x'));
    expect(fs.readdirSync(path.join(root, 'repo', 'refs', 'heads'))).toEqual(['main']);
  });
});
