/**
 * Object graph closures
 *
 * Both walks follow the same edges (commit -> tree, parents; tree -> entries;
 * tag -> target) and use an explicit frontier, so history depth never turns
 * into call-stack depth.
 */

import { ObjectHash, expectFound } from './types';
import { Errors } from './errors';
import { decode, hashOf, inflateLoose, verify } from './object-codec';
import { referencesOf } from './references';
import { LocalRepository } from './local-repository';
import { RemoteObjectStore } from './remote-store';
import { DEFAULT_HASH_ALGORITHM, HashAlgorithm } from '../utils/hash';
import { DEFAULT_CONCURRENCY, drainQueue } from '../utils/pool';
import { Logger, silentLogger } from '../utils/logger';

/**
 * Objects reachable from `root` in the local repository that the remote lacks
 *
 * Anything in `present` is assumed to be on the remote together with
 * everything it references (objects are immutable and content-addressed), so
 * the walk does not descend into it. Each hash appears once; an object comes
 * before the objects it references.
 */
export async function objectsToUpload(
  root: ObjectHash,
  present: ReadonlySet<ObjectHash>,
  local: LocalRepository
): Promise<ObjectHash[]> {
  const seen = new Set<ObjectHash>();
  const stack: ObjectHash[] = [root];
  const result: ObjectHash[] = [];

  while (stack.length > 0) {
    const hash = stack.pop();
    if (hash === undefined || seen.has(hash)) continue;
    seen.add(hash);

    if (present.has(hash)) continue;
    result.push(hash);

    const children = await local.referencedObjects(hash);
    // Reverse so the first reference is visited first
    for (let i = children.length - 1; i >= 0; i--) {
      if (!seen.has(children[i])) {
        stack.push(children[i]);
      }
    }
  }

  return result;
}

export interface FetchOptions {
  store: RemoteObjectStore;
  local: LocalRepository;
  algorithm?: HashAlgorithm;
  concurrency?: number;
  logger?: Logger;
  /**
   * Hashes already fetched; shared across the fetch lines of one batch so
   * refs with common history do not download it twice
   */
  seen?: Set<ObjectHash>;
}

/**
 * Download `root` and everything it references into the local repository
 *
 * Every object is verified against the hash it was requested by before it is
 * written locally; a mismatch aborts the whole fetch with INTEGRITY_FAILED.
 * Returns the number of objects downloaded.
 */
export async function fetchAll(root: ObjectHash, options: FetchOptions): Promise<number> {
  const { store, local } = options;
  const algorithm = options.algorithm ?? DEFAULT_HASH_ALGORITHM;
  const logger = options.logger ?? silentLogger();
  const seen = options.seen ?? new Set<ObjectHash>();

  if (seen.has(root)) return 0;
  seen.add(root);

  let fetched = 0;

  await drainQueue([root], options.concurrency ?? DEFAULT_CONCURRENCY, async (hash, enqueue) => {
    const stored = expectFound(await store.getObject(hash), () => Errors.objectNotFound(hash, 'remote'));
    const raw = inflateLoose(stored);

    if (!verify(hash, raw, algorithm)) {
      throw Errors.integrity(hash, hashOf(raw, algorithm));
    }

    const obj = decode(raw);
    await local.writeObject(obj);
    fetched++;
    logger.debug('fetched object', { hash, type: obj.type });

    for (const child of referencesOf(obj, algorithm)) {
      if (!seen.has(child)) {
        seen.add(child);
        enqueue(child);
      }
    }
  });

  return fetched;
}
