/**
 * Blob Backend Types
 *
 * Defines the interface for the byte stores a repository can live on.
 * Supports rclone remotes, a local directory and an in-memory store.
 */

import type { Lookup } from '../core/types';

// =============================================================================
// Blob Backend Types
// =============================================================================

/**
 * Supported blob backend types
 */
export type BlobBackendType = 'rclone' | 'directory' | 'memory';

/**
 * One entry returned by a recursive listing
 */
export interface BlobEntry {
  /** Path relative to the listed directory, '/'-separated */
  path: string;
  /** Whether the entry is a directory */
  isDirectory: boolean;
}

/**
 * A file to write as part of a batch
 */
export interface BlobFile {
  /** Full path inside the backend */
  path: string;
  /** Content to write */
  data: Buffer;
}

// =============================================================================
// Blob Backend Interface
// =============================================================================

/**
 * Blob Backend Interface
 *
 * Keys are '/'-separated path strings. Absence is reported as a Lookup status,
 * never as an error; every other failure is a TRANSPORT_FAILED HelperError.
 * Timeouts and retries belong to the implementation.
 */
export interface BlobBackend {
  /** The backend type */
  readonly type: BlobBackendType;

  /** Human-readable name */
  readonly name: string;

  /**
   * Read a file
   */
  get(path: string): Promise<Lookup<Buffer>>;

  /**
   * Write a file, replacing any previous content
   * @throws HelperError (TRANSPORT_FAILED) when the write did not happen
   */
  put(path: string, data: Buffer): Promise<void>;

  /**
   * Delete a file; deleting a missing file succeeds
   */
  delete(path: string): Promise<void>;

  /**
   * List every entry below a directory, recursively
   * Returns `absent` when the directory itself does not exist.
   */
  listRecursive(path: string): Promise<Lookup<BlobEntry[]>>;

  /**
   * Write several files as one transfer
   *
   * Files are staged and sent together to narrow the window in which some of
   * them are visible without the others. This is not a transaction: a failure
   * can leave any subset written.
   */
  putBatch(files: BlobFile[]): Promise<void>;
}
