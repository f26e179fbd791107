import * as zlib from 'zlib';
import { GitObject, ObjectHash, ObjectType, OBJECT_TYPES } from './types';
import { Errors, describeError } from './errors';
import { computeHash, DEFAULT_HASH_ALGORITHM, HashAlgorithm } from '../utils/hash';

function isObjectType(value: string): value is ObjectType {
  return OBJECT_TYPES.some(type => type === value);
}

/**
 * Parse the loose form "{type} {size}\0{content}" back into an object
 */
export function decode(raw: Buffer): GitObject {
  const nullIndex = raw.indexOf(0);
  if (nullIndex === -1) {
    throw Errors.malformedObject('no null byte found');
  }

  const header = raw.subarray(0, nullIndex).toString('utf8');
  const spaceIndex = header.indexOf(' ');
  if (spaceIndex === -1) {
    throw Errors.malformedObject('no space in header');
  }

  const type = header.slice(0, spaceIndex);
  if (!isObjectType(type)) {
    throw Errors.malformedObject(`unknown object type '${type}'`);
  }

  const sizeText = header.slice(spaceIndex + 1);
  if (!/^\d+$/.test(sizeText)) {
    throw Errors.malformedObject(`invalid size '${sizeText}'`);
  }

  const size = parseInt(sizeText, 10);
  const content = raw.subarray(nullIndex + 1);
  if (content.length !== size) {
    throw Errors.malformedObject(`size mismatch: expected ${size}, got ${content.length}`);
  }

  return { type, content: Buffer.from(content) };
}

/**
 * Create the loose form of an object
 */
export function encode(obj: GitObject): Buffer {
  const header = Buffer.from(`${obj.type} ${obj.content.length}\0`);
  return Buffer.concat([header, obj.content]);
}

/**
 * Hash of an encoded object (the exact bytes, header included)
 */
export function hashOf(raw: Buffer, algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM): ObjectHash {
  return computeHash(raw, algorithm);
}

/**
 * Hash an object without keeping its encoded form around
 */
export function hashObject(obj: GitObject, algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM): ObjectHash {
  return hashOf(encode(obj), algorithm);
}

export function verify(hash: ObjectHash, raw: Buffer, algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM): boolean {
  return hashOf(raw, algorithm) === hash;
}

/**
 * Encode and deflate, the representation stored in objects/xx/yyyy
 */
export function encodeLoose(obj: GitObject): Buffer {
  return zlib.deflateSync(encode(obj));
}

/**
 * Inflate stored bytes back into the loose form
 */
export function inflateLoose(stored: Buffer): Buffer {
  try {
    return zlib.inflateSync(stored);
  } catch (error) {
    throw Errors.malformedObject(`cannot inflate: ${describeError(error)}`);
  }
}

export function decodeLoose(stored: Buffer): GitObject {
  return decode(inflateLoose(stored));
}
