import { ObjectHash, Ref } from './types';

/**
 * State of one protocol conversation with git
 *
 * Created when the helper starts and dropped when it exits; never shared
 * between processes. The protocol engine owns it, the orchestrator only flips
 * `firstPush` once the first push batch has published a ref.
 */
export class Session {
  /** Verbosity negotiated with `option verbosity` (git's default is 1) */
  verbosity = 1;

  /** True until a push batch in this session has updated a ref */
  firstPush = true;

  private refListing: Ref[] | null = null;

  setVerbosity(verbosity: number): void {
    this.verbosity = verbosity;
  }

  /**
   * Ref listing fetched earlier in this session, if any
   */
  cachedRefs(): Ref[] | null {
    return this.refListing ? [...this.refListing] : null;
  }

  cacheRefs(refs: Ref[]): void {
    this.refListing = [...refs].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /**
   * Keep the cached listing in step with a ref this session wrote or deleted
   */
  recordRefUpdate(name: string, hash: ObjectHash | null): void {
    if (!this.refListing) return;

    const others = this.refListing.filter(ref => ref.name !== name);
    this.cacheRefs(hash === null ? others : [...others, { name, hash }]);
  }
}
