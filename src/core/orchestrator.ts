/**
 * Push / fetch orchestration
 *
 * A push of one ref runs: conflict check, closure, object transfer, ref
 * update. The ref is written strictly after every object it needs, so a
 * reader never sees a ref pointing at missing objects. Nothing locks the
 * remote: two helpers pushing the same ref at once can both pass the
 * fast-forward check, and the last ref write wins.
 */

import { ObjectHash, PushIntent, PushResult, foundOrUndefined } from './types';
import { ErrorCode, Errors, HelperError, isHelperError } from './errors';
import { objectsToUpload, fetchAll } from './closure';
import { encodeLoose } from './object-codec';
import { LocalRepository } from './local-repository';
import { RemoteObjectStore } from './remote-store';
import { RemoteRefs } from './refs';
import { Session } from './session';
import type { TransferMode } from './config';
import { DEFAULT_HASH_ALGORITHM, HashAlgorithm, shortHash } from '../utils/hash';
import { DEFAULT_CONCURRENCY, mapPool } from '../utils/pool';
import { Logger, silentLogger } from '../utils/logger';

/**
 * Failures that only affect the ref being pushed; anything else ends the session
 */
const PER_REF_ERRORS: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.TRANSPORT_FAILED,
  ErrorCode.REF_NOT_FOUND,
  ErrorCode.INVALID_REF,
  ErrorCode.OBJECT_NOT_FOUND,
  ErrorCode.LOCAL_GIT_FAILED,
]);

/**
 * Failures while choosing or writing the remote HEAD; the refs are already published
 */
const HEAD_UPDATE_ERRORS: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.TRANSPORT_FAILED,
  ErrorCode.LOCAL_GIT_FAILED,
]);

export const NON_FAST_FORWARD_REASON = 'non-fast-forward';

/**
 * Parse the argument of a `push` command: "[+]<src>:<dst>"
 */
export function parsePushSpec(spec: string): PushIntent | null {
  const colon = spec.lastIndexOf(':');
  if (colon === -1) return null;

  let source = spec.slice(0, colon);
  const destination = spec.slice(colon + 1);
  if (!destination) return null;

  let force = false;
  if (source.startsWith('+')) {
    source = source.slice(1);
    force = true;
  }

  return { source, destination, force };
}

export interface OrchestratorOptions {
  store: RemoteObjectStore;
  refs: RemoteRefs;
  local: LocalRepository;
  session: Session;
  transferMode?: TransferMode;
  concurrency?: number;
  algorithm?: HashAlgorithm;
  logger?: Logger;
}

/**
 * A ref update that went through, remembered until its batch ends
 */
interface CompletedPush {
  source: string;
  destination: string;
}

export class Orchestrator {
  private readonly store: RemoteObjectStore;
  private readonly refs: RemoteRefs;
  private readonly local: LocalRepository;
  private readonly session: Session;
  private readonly transferMode: TransferMode;
  private readonly concurrency: number;
  private readonly algorithm: HashAlgorithm;
  private readonly logger: Logger;

  private batchPushes: CompletedPush[] = [];
  private batchFetched = new Set<ObjectHash>();

  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.refs = options.refs;
    this.local = options.local;
    this.session = options.session;
    this.transferMode = options.transferMode ?? 'batch';
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.algorithm = options.algorithm ?? DEFAULT_HASH_ALGORITHM;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'orchestrator' });
  }

  // ===========================================================================
  // Push
  // ===========================================================================

  /**
   * Update one remote ref; an empty source deletes it
   * Conflicts and per-ref failures come back as error results, not exceptions.
   */
  async push(intent: PushIntent): Promise<PushResult> {
    const { destination } = intent;

    if (intent.source === '') {
      return this.delete(destination);
    }

    try {
      return await this.pushRef(intent);
    } catch (error) {
      return this.perRefFailure(destination, error);
    }
  }

  private async pushRef(intent: PushIntent): Promise<PushResult> {
    const { source, destination, force } = intent;

    const current = foundOrUndefined(await this.refs.resolve(destination));
    const proposed = await this.local.resolveRef(source);

    if (current !== undefined && current !== proposed && !force) {
      if (!(await this.local.isAncestor(current, proposed))) {
        const conflict = Errors.nonFastForward(destination, current, proposed);
        this.logger.info(conflict.message, { current: shortHash(current), proposed: shortHash(proposed) });
        return { ref: destination, status: 'error', reason: NON_FAST_FORWARD_REASON };
      }
    }

    // Every object reachable from a listed remote ref counts as present. This
    // is coarse (unrelated refs count too) but needs no remote object scan.
    const listing = await this.refs.list(true);
    if (listing.status === 'failed') throw listing.error;
    const present = new Set<ObjectHash>(
      listing.status === 'found' ? listing.value.map(ref => ref.hash) : []
    );

    const objects = await objectsToUpload(proposed, present, this.local);
    this.logger.debug('push closure computed', { ref: destination, objects: objects.length });

    const timer = this.logger.startTimer('objects transferred', { ref: destination, mode: this.transferMode });
    const encoded = await mapPool(objects, this.concurrency, async hash => ({
      hash,
      data: encodeLoose(await this.local.readObject(hash)),
    }));
    await this.store.putObjects(encoded, this.transferMode);
    timer.end({ count: encoded.length });

    await this.refs.update(destination, proposed);
    this.logger.info(`updated ${destination}`, { from: current ? shortHash(current) : null, to: shortHash(proposed), force });

    this.batchPushes.push({ source, destination });
    return { ref: destination, status: 'ok' };
  }

  /**
   * Delete a remote ref; one that is already gone counts as deleted
   */
  async delete(ref: string): Promise<PushResult> {
    try {
      this.logger.debug(`deleting ref ${ref}`);
      await this.refs.delete(ref);
      return { ref, status: 'ok' };
    } catch (error) {
      return this.perRefFailure(ref, error);
    }
  }

  private perRefFailure(ref: string, error: unknown): PushResult {
    if (isHelperError(error) && PER_REF_ERRORS.has(error.code)) {
      this.logger.error(error.message, { ref, code: error.code });
      return { ref, status: 'error', reason: oneLine(error) };
    }
    throw error;
  }

  /**
   * Called when git ends a push batch
   *
   * On the first batch of the session that published something, point the
   * remote HEAD at the branch that is checked out locally, unless the remote
   * already has a HEAD.
   */
  async finishPushBatch(): Promise<void> {
    const pushed = this.batchPushes;
    this.batchPushes = [];

    if (!this.session.firstPush || pushed.length === 0) return;
    this.session.firstPush = false;

    try {
      const branch = await this.local.currentBranch();
      const candidate = pushed.find(p => p.source === branch);
      if (!candidate) {
        this.logger.debug('first push did not include the current branch; remote HEAD left alone');
        return;
      }

      const head = await this.refs.getHead();
      if (head.status === 'failed') throw head.error;
      if (head.status === 'found') return;

      await this.refs.setHeadSymbolic(candidate.destination);
      this.logger.debug(`set remote HEAD to ${candidate.destination}`);
    } catch (error) {
      if (!isHelperError(error) || !HEAD_UPDATE_ERRORS.has(error.code)) throw error;
      this.logger.info('failed to set default branch on remote', { error: error.message });
    }
  }

  // ===========================================================================
  // Fetch
  // ===========================================================================

  /**
   * Download the closure of one object; objects already fetched in this
   * batch are not downloaded again
   */
  async fetch(hash: ObjectHash): Promise<number> {
    const timer = this.logger.startTimer('fetch finished', { hash: shortHash(hash) });
    const count = await fetchAll(hash, {
      store: this.store,
      local: this.local,
      algorithm: this.algorithm,
      concurrency: this.concurrency,
      logger: this.logger,
      seen: this.batchFetched,
    });
    timer.end({ objects: count });
    return count;
  }

  finishFetchBatch(): void {
    this.batchFetched = new Set();
  }
}

/**
 * Protocol replies are single lines
 */
function oneLine(error: HelperError): string {
  return error.message.replace(/\s+/g, ' ').trim();
}
