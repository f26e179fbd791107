import type { HelperError } from './errors';

/**
 * Git object types
 */
export type ObjectType = 'blob' | 'tree' | 'commit' | 'tag';

export const OBJECT_TYPES: readonly ObjectType[] = ['blob', 'tree', 'commit', 'tag'];

/**
 * Hex digest identifying an object by content
 */
export type ObjectHash = string;

/**
 * A decoded loose object
 */
export interface GitObject {
  type: ObjectType;
  content: Buffer;
}

/**
 * File modes in Git
 */
export enum FileMode {
  REGULAR = '100644',
  EXECUTABLE = '100755',
  SYMLINK = '120000',
  DIRECTORY = '40000',
  SUBMODULE = '160000',
}

/**
 * A ref resolved to an object
 */
export interface Ref {
  name: string;
  hash: ObjectHash;
}

/**
 * One `push <src>:<dst>` request
 * An empty source asks for the destination to be deleted.
 */
export interface PushIntent {
  source: string;
  destination: string;
  force: boolean;
}

/**
 * Outcome of a single ref update, as reported back to git
 */
export type PushResult =
  | { ref: string; status: 'ok' }
  | { ref: string; status: 'error'; reason: string };

/**
 * Result of reading something that may legitimately be missing
 */
export type Lookup<T> =
  | { status: 'found'; value: T }
  | { status: 'absent' }
  | { status: 'failed'; error: HelperError };

export const Lookup = {
  found<T>(value: T): Lookup<T> {
    return { status: 'found', value };
  },
  absent<T>(): Lookup<T> {
    return { status: 'absent' };
  },
  failed<T>(error: HelperError): Lookup<T> {
    return { status: 'failed', error };
  },
};

/**
 * Unwrap a lookup, turning absence into the supplied error
 */
export function expectFound<T>(lookup: Lookup<T>, onAbsent: () => HelperError): T {
  switch (lookup.status) {
    case 'found':
      return lookup.value;
    case 'absent':
      throw onAbsent();
    case 'failed':
      throw lookup.error;
  }
}

/**
 * Unwrap a lookup where absence is a normal outcome
 */
export function foundOrUndefined<T>(lookup: Lookup<T>): T | undefined {
  switch (lookup.status) {
    case 'found':
      return lookup.value;
    case 'absent':
      return undefined;
    case 'failed':
      throw lookup.error;
  }
}
