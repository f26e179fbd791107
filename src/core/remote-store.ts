/**
 * Remote Object Store
 *
 * Maps object hashes and ref names onto backend paths:
 *
 *   <prefix>/objects/<first 2 hex chars>/<remaining chars>   deflated loose object
 *   <prefix>/refs/<ref path>                                 "<hash>\n" or "ref: <target>\n"
 *   <prefix>/HEAD                                            "ref: <target>\n"
 *
 * It keeps no state of its own.
 */

import { Lookup, ObjectHash, Ref } from './types';
import { Errors } from './errors';
import type { TransferMode } from './config';
import { BlobBackend } from '../storage/types';
import { DEFAULT_HASH_ALGORITHM, HashAlgorithm, isValidHash } from '../utils/hash';
import { DEFAULT_CONCURRENCY, mapPool } from '../utils/pool';
import { Logger, silentLogger } from '../utils/logger';

const SYMBOLIC_PREFIX = 'ref: ';

/** Symbolic refs pointing at symbolic refs are followed at most this deep */
const MAX_SYMREF_DEPTH = 5;

/**
 * An encoded object ready to be written
 */
export interface StoredObject {
  hash: ObjectHash;
  data: Buffer;
}

export function isRefName(name: string): boolean {
  return name.startsWith('refs/') && !name.split('/').some(part => part === '' || part === '..');
}

export interface RemoteObjectStoreOptions {
  /** Repository location inside the backend ('' for the backend root) */
  prefix: string;
  algorithm?: HashAlgorithm;
  /** Parallel uploads in sequential transfer mode, parallel ref reads in listings */
  concurrency?: number;
  logger?: Logger;
}

export class RemoteObjectStore {
  readonly prefix: string;
  private readonly algorithm: HashAlgorithm;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(private readonly backend: BlobBackend, options: RemoteObjectStoreOptions) {
    this.prefix = options.prefix.replace(/^\/+|\/+$/g, '');
    this.algorithm = options.algorithm ?? DEFAULT_HASH_ALGORITHM;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'store' });
  }

  private join(relative: string): string {
    return this.prefix ? `${this.prefix}/${relative}` : relative;
  }

  // ===========================================================================
  // Paths
  // ===========================================================================

  objectPath(hash: ObjectHash): string {
    return this.join(`objects/${hash.slice(0, 2)}/${hash.slice(2)}`);
  }

  /**
   * Path of a ref file; only names under refs/ are accepted
   */
  refPath(name: string): string {
    if (!isRefName(name)) throw Errors.invalidRef(name);
    return this.join(name);
  }

  /**
   * Path of a ref that may hold a symbolic target: HEAD or a name under refs/
   */
  symbolicPath(name: string): string {
    return name === 'HEAD' ? this.join(name) : this.refPath(name);
  }

  refsRoot(): string {
    return this.join('refs');
  }

  // ===========================================================================
  // Objects
  // ===========================================================================

  async getObject(hash: ObjectHash): Promise<Lookup<Buffer>> {
    const path = this.objectPath(hash);
    this.logger.debug('fetching', { path });
    return this.backend.get(path);
  }

  async putObject(hash: ObjectHash, data: Buffer): Promise<void> {
    const path = this.objectPath(hash);
    this.logger.debug('uploading', { path });
    await this.backend.put(path, data);
  }

  /**
   * Write a set of objects, either staged into one backend transfer or one by one
   * Resolves only after every object was written.
   */
  async putObjects(objects: StoredObject[], mode: TransferMode): Promise<void> {
    if (objects.length === 0) return;

    if (mode === 'batch') {
      await this.backend.putBatch(objects.map(obj => ({ path: this.objectPath(obj.hash), data: obj.data })));
      return;
    }

    await mapPool(objects, this.concurrency, obj => this.putObject(obj.hash, obj.data));
  }

  // ===========================================================================
  // Refs
  // ===========================================================================

  private async readRefFile(path: string): Promise<Lookup<string>> {
    const lookup = await this.backend.get(path);
    if (lookup.status !== 'found') return lookup;
    return Lookup.found(lookup.value.toString('utf8').trim());
  }

  /**
   * Read a ref, following symbolic refs to the hash they end at
   */
  async getRef(name: string): Promise<Lookup<ObjectHash>> {
    let path = this.refPath(name);

    for (let depth = 0; depth <= MAX_SYMREF_DEPTH; depth++) {
      const lookup = await this.readRefFile(path);
      if (lookup.status !== 'found') return lookup;

      const content = lookup.value;
      if (content.startsWith(SYMBOLIC_PREFIX)) {
        const target = content.slice(SYMBOLIC_PREFIX.length).trim();
        if (!isRefName(target)) {
          this.logger.debug('symbolic ref points outside refs/', { ref: name, target });
          return Lookup.absent();
        }
        path = this.join(target);
        continue;
      }

      if (!isValidHash(content, this.algorithm)) {
        return Lookup.failed(Errors.transport(path, `ref file does not contain a hash`));
      }
      return Lookup.found(content);
    }

    this.logger.debug('symbolic ref chain too deep', { ref: name });
    return Lookup.absent();
  }

  async putRef(name: string, hash: ObjectHash): Promise<void> {
    await this.backend.put(this.refPath(name), Buffer.from(`${hash}\n`, 'utf8'));
  }

  async deleteRef(name: string): Promise<void> {
    await this.backend.delete(this.refPath(name));
  }

  /**
   * Target of a symbolic ref; a ref holding a plain hash reads as absent
   */
  async getSymbolic(name: string): Promise<Lookup<string>> {
    const lookup = await this.readRefFile(this.symbolicPath(name));
    if (lookup.status !== 'found') return lookup;

    const content = lookup.value;
    if (!content.startsWith(SYMBOLIC_PREFIX)) return Lookup.absent();
    return Lookup.found(content.slice(SYMBOLIC_PREFIX.length).trim());
  }

  async putSymbolic(name: string, target: string): Promise<void> {
    this.refPath(target);
    await this.backend.put(this.symbolicPath(name), Buffer.from(`${SYMBOLIC_PREFIX}${target}\n`, 'utf8'));
  }

  /**
   * List every ref under refs/, resolved to hashes and sorted by name
   *
   * A missing refs directory is an empty repository when preparing a push and
   * an error otherwise. A ref deleted between listing and reading is skipped.
   */
  async listRefs(forPush: boolean): Promise<Lookup<Ref[]>> {
    const listing = await this.backend.listRecursive(this.refsRoot());

    if (listing.status === 'absent') {
      return forPush ? Lookup.found([]) : Lookup.failed(Errors.repositoryNotFound(this.prefix || '/'));
    }
    if (listing.status === 'failed') return listing;

    const names = listing.value
      .filter(entry => !entry.isDirectory)
      .map(entry => `refs/${entry.path}`);

    const lookups = await mapPool(names, this.concurrency, name => this.getRef(name));

    const refs: Ref[] = [];
    for (let i = 0; i < names.length; i++) {
      const lookup = lookups[i];
      switch (lookup.status) {
        case 'found':
          refs.push({ name: names[i], hash: lookup.value });
          break;
        case 'absent':
          this.logger.debug('ref vanished while listing', { ref: names[i] });
          break;
        case 'failed':
          return lookup;
      }
    }

    refs.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return Lookup.found(refs);
  }
}
