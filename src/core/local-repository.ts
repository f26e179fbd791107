/**
 * Local repository access
 *
 * The helper never owns the local object database; git does. Everything it
 * needs from it goes through this interface, implemented on top of the git CLI.
 */

import { GitObject, ObjectHash, OBJECT_TYPES } from './types';
import { Errors, describeError } from './errors';
import { referencesOf } from './references';
import { CommandResult, CommandRunner, SpawnRunner } from '../utils/process';
import { DEFAULT_HASH_ALGORITHM, HashAlgorithm, isValidHash } from '../utils/hash';

export interface LocalRepository {
  /** Resolve a ref name (or hash) to the object it names */
  resolveRef(name: string): Promise<ObjectHash>;

  /** Read an object; throws OBJECT_NOT_FOUND when git does not have it */
  readObject(hash: ObjectHash): Promise<GitObject>;

  /** Store an object and return its hash */
  writeObject(obj: GitObject): Promise<ObjectHash>;

  /** Whether `ancestor` is reachable from `descendant` (a commit is its own ancestor) */
  isAncestor(ancestor: ObjectHash, descendant: ObjectHash): Promise<boolean>;

  /** Objects directly referenced by an object */
  referencedObjects(hash: ObjectHash): Promise<ObjectHash[]>;

  /** Full name of the checked-out branch, or null on a detached HEAD */
  currentBranch(): Promise<string | null>;
}

/**
 * Parse the output of `git cat-file --batch` for a single requested object
 *
 *   <hash> <type> <size>\n<content>\n
 *   <name> missing\n
 */
export function parseCatFileBatch(output: Buffer, requested: string): GitObject | null {
  const newline = output.indexOf(0x0a);
  if (newline === -1) {
    throw Errors.malformedObject('cat-file printed no header', requested);
  }

  const header = output.subarray(0, newline).toString('utf8').split(' ');
  if (header[1] === 'missing') {
    return null;
  }

  if (header.length !== 3) {
    throw Errors.malformedObject(`unexpected cat-file header '${header.join(' ')}'`, requested);
  }

  const [, type, sizeText] = header;
  const objectType = OBJECT_TYPES.find(t => t === type);
  if (!objectType || !/^\d+$/.test(sizeText)) {
    throw Errors.malformedObject(`unexpected cat-file header '${header.join(' ')}'`, requested);
  }

  const size = parseInt(sizeText, 10);
  const start = newline + 1;
  if (output.length < start + size) {
    throw Errors.malformedObject(`cat-file output truncated: expected ${size} bytes`, requested);
  }

  return { type: objectType, content: Buffer.from(output.subarray(start, start + size)) };
}

export interface GitCliRepositoryOptions {
  /** git executable */
  binary?: string;
  /** Repository directory; defaults to whatever git set up for the helper */
  gitDir?: string;
  algorithm?: HashAlgorithm;
  runner?: CommandRunner;
}

/**
 * LocalRepository implemented by running git plumbing commands
 */
export class GitCliRepository implements LocalRepository {
  private readonly binary: string;
  private readonly gitDir?: string;
  private readonly algorithm: HashAlgorithm;
  private readonly runner: CommandRunner;

  constructor(options: GitCliRepositoryOptions = {}) {
    this.binary = options.binary ?? 'git';
    this.gitDir = options.gitDir;
    this.algorithm = options.algorithm ?? DEFAULT_HASH_ALGORITHM;
    this.runner = options.runner ?? new SpawnRunner();
  }

  private async git(args: string[], input?: Buffer): Promise<CommandResult> {
    try {
      return await this.runner.run(this.binary, args, {
        input,
        env: this.gitDir ? { GIT_DIR: this.gitDir } : undefined,
      });
    } catch (error) {
      throw Errors.localGit(args, describeError(error), null);
    }
  }

  /**
   * Run git and require a zero exit status
   */
  private async gitOk(args: string[], input?: Buffer): Promise<Buffer> {
    const result = await this.git(args, input);
    if (result.exitCode !== 0) {
      throw Errors.localGit(args, result.stderr, result.exitCode);
    }
    return result.stdout;
  }

  async resolveRef(name: string): Promise<ObjectHash> {
    const result = await this.git(['rev-parse', '--verify', '--quiet', name]);
    const hash = result.stdout.toString('utf8').trim();
    if (result.exitCode !== 0 || !isValidHash(hash, this.algorithm)) {
      throw Errors.refNotFound(name);
    }
    return hash;
  }

  async readObject(hash: ObjectHash): Promise<GitObject> {
    const output = await this.gitOk(['cat-file', '--batch'], Buffer.from(`${hash}\n`, 'utf8'));
    const obj = parseCatFileBatch(output, hash);
    if (!obj) {
      throw Errors.objectNotFound(hash, 'local');
    }
    return obj;
  }

  async writeObject(obj: GitObject): Promise<ObjectHash> {
    const output = await this.gitOk(['hash-object', '-w', '--stdin', '-t', obj.type], obj.content);
    return output.toString('utf8').trim();
  }

  /**
   * `merge-base --is-ancestor` exits 0 for yes and 1 for no. Any other status
   * (usually 128: the remote commit is unknown locally) also means git cannot
   * show a fast-forward.
   */
  async isAncestor(ancestor: ObjectHash, descendant: ObjectHash): Promise<boolean> {
    const result = await this.git(['merge-base', '--is-ancestor', ancestor, descendant]);
    return result.exitCode === 0;
  }

  async referencedObjects(hash: ObjectHash): Promise<ObjectHash[]> {
    return referencesOf(await this.readObject(hash), this.algorithm);
  }

  async currentBranch(): Promise<string | null> {
    const result = await this.git(['symbolic-ref', '-q', 'HEAD']);
    if (result.exitCode !== 0) {
      return null;
    }
    return result.stdout.toString('utf8').trim() || null;
  }
}
