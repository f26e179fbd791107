import { Lookup, ObjectHash, Ref } from './types';
import { RemoteObjectStore } from './remote-store';
import { Session } from './session';

/**
 * Reference manager for the remote repository: branches, tags and HEAD
 *
 * Reads and writes go through the RemoteObjectStore. Listings are cached on
 * the session and kept current as this session updates refs.
 */
export class RemoteRefs {
  constructor(
    private readonly store: RemoteObjectStore,
    private readonly session: Session
  ) {}

  /**
   * All refs under refs/, sorted by name
   * Only `list(true)` treats a missing repository as empty.
   */
  async list(forPush: boolean): Promise<Lookup<Ref[]>> {
    const cached = this.session.cachedRefs();
    if (cached) return Lookup.found(cached);

    const lookup = await this.store.listRefs(forPush);
    if (lookup.status === 'found' && lookup.value.length > 0) {
      this.session.cacheRefs(lookup.value);
    }
    return lookup;
  }

  /**
   * Current value of one ref
   */
  resolve(name: string): Promise<Lookup<ObjectHash>> {
    return this.store.getRef(name);
  }

  async update(name: string, hash: ObjectHash): Promise<void> {
    await this.store.putRef(name, hash);
    this.session.recordRefUpdate(name, hash);
  }

  /**
   * Delete a ref; deleting a missing ref succeeds
   */
  async delete(name: string): Promise<void> {
    await this.store.deleteRef(name);
    this.session.recordRefUpdate(name, null);
  }

  /**
   * Branch the remote HEAD points at
   */
  getHead(): Promise<Lookup<string>> {
    return this.store.getSymbolic('HEAD');
  }

  async setHeadSymbolic(ref: string): Promise<void> {
    await this.store.putSymbolic('HEAD', ref);
  }
}
