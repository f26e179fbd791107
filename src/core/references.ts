import { FileMode, GitObject, ObjectHash } from './types';
import { Errors } from './errors';
import { DEFAULT_HASH_ALGORITHM, getHashByteLength, HashAlgorithm, isValidHash } from '../utils/hash';

/**
 * A tree entry represents a file or subdirectory in a tree
 */
export interface TreeEntry {
  mode: string;
  name: string;
  hash: ObjectHash;
}

/**
 * Parse the binary tree format: repeated "{mode} {name}\0{raw hash}"
 */
export function parseTreeEntries(content: Buffer, algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM): TreeEntry[] {
  const hashLength = getHashByteLength(algorithm);
  const entries: TreeEntry[] = [];
  let offset = 0;

  while (offset < content.length) {
    const spaceIndex = content.indexOf(0x20, offset);
    if (spaceIndex === -1) {
      throw Errors.malformedObject('tree entry without mode');
    }

    const mode = content.subarray(offset, spaceIndex).toString('utf8');

    const nullIndex = content.indexOf(0, spaceIndex + 1);
    if (nullIndex === -1) {
      throw Errors.malformedObject('tree entry without name terminator');
    }

    const name = content.subarray(spaceIndex + 1, nullIndex).toString('utf8');

    const hashEnd = nullIndex + 1 + hashLength;
    if (hashEnd > content.length) {
      throw Errors.malformedObject(`tree entry '${name}' is truncated`);
    }

    const hash = content.subarray(nullIndex + 1, hashEnd).toString('hex');
    entries.push({ mode, name, hash });
    offset = hashEnd;
  }

  return entries;
}

/**
 * Read the header lines of a commit or tag (everything before the first blank line)
 * Continuation lines of multi-line headers such as gpgsig start with a space and are skipped.
 */
function headerLines(content: Buffer): string[] {
  const text = content.toString('utf8');
  const end = text.indexOf('\n\n');
  const header = end === -1 ? text : text.slice(0, end);
  return header.split('\n').filter(line => line !== '' && !line.startsWith(' '));
}

function headerHash(line: string, prefix: string, algorithm: HashAlgorithm): ObjectHash {
  const hash = line.slice(prefix.length).trim();
  if (!isValidHash(hash, algorithm)) {
    throw Errors.malformedObject(`invalid hash in '${line}'`);
  }
  return hash;
}

/**
 * Objects directly referenced by an object:
 * commit -> tree and parents, tree -> entries, tag -> target, blob -> nothing.
 *
 * Gitlink entries (submodule commits) live in another repository and are not followed.
 */
export function referencesOf(obj: GitObject, algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM): ObjectHash[] {
  switch (obj.type) {
    case 'blob':
      return [];

    case 'tree':
      return parseTreeEntries(obj.content, algorithm)
        .filter(entry => entry.mode !== FileMode.SUBMODULE)
        .map(entry => entry.hash);

    case 'commit': {
      const refs: ObjectHash[] = [];
      for (const line of headerLines(obj.content)) {
        if (line.startsWith('tree ')) {
          refs.push(headerHash(line, 'tree ', algorithm));
        } else if (line.startsWith('parent ')) {
          refs.push(headerHash(line, 'parent ', algorithm));
        }
      }
      if (refs.length === 0) {
        throw Errors.malformedObject('commit without tree');
      }
      return refs;
    }

    case 'tag': {
      const target = headerLines(obj.content).find(line => line.startsWith('object '));
      if (!target) {
        throw Errors.malformedObject('tag without target object');
      }
      return [headerHash(target, 'object ', algorithm)];
    }
  }
}
