/**
 * rclone Blob Backend
 *
 * Stores files on any remote rclone can reach (Dropbox, Drive, S3, ...) by
 * shelling out to the rclone CLI. Absence is detected from rclone's exit
 * codes: 3 means "directory not found" and 4 means "file not found".
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { Lookup } from '../core/types';
import { Errors, HelperError } from '../core/errors';
import { CommandResult, CommandRunner, SpawnRunner } from '../utils/process';
import { Logger, silentLogger } from '../utils/logger';
import { BlobBackend, BlobBackendType, BlobEntry, BlobFile } from './types';

export const RCLONE_EXIT_DIRECTORY_NOT_FOUND = 3;
export const RCLONE_EXIT_FILE_NOT_FOUND = 4;

/**
 * Shape of one `rclone lsjson` entry; other fields are ignored
 */
const lsjsonSchema = z.array(
  z.object({
    Path: z.string(),
    IsDir: z.boolean(),
  })
);

export interface RcloneBackendOptions {
  /** Name of the configured rclone remote (the part before ':') */
  remote: string;
  /** rclone executable */
  binary?: string;
  runner?: CommandRunner;
  logger?: Logger;
}

function isAbsence(result: CommandResult): boolean {
  return result.exitCode === RCLONE_EXIT_DIRECTORY_NOT_FOUND || result.exitCode === RCLONE_EXIT_FILE_NOT_FOUND;
}

// =============================================================================
// rclone Backend
// =============================================================================

export class RcloneBackend implements BlobBackend {
  readonly type: BlobBackendType = 'rclone';
  readonly name: string;

  private readonly remote: string;
  private readonly binary: string;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(options: RcloneBackendOptions) {
    this.remote = options.remote;
    this.binary = options.binary ?? 'rclone';
    this.runner = options.runner ?? new SpawnRunner();
    this.logger = (options.logger ?? silentLogger()).child({ component: 'rclone' });
    this.name = `rclone: ${this.remote}`;
  }

  /**
   * rclone addresses files as "remote:relative/path"
   */
  remotePath(key: string): string {
    return `${this.remote}:${key.replace(/^\/+/, '')}`;
  }

  private async rclone(args: string[], input?: Buffer): Promise<CommandResult> {
    this.logger.debug('rclone command', { args });
    let result: CommandResult;
    try {
      result = await this.runner.run(this.binary, args, { input });
    } catch (error) {
      throw Errors.transport(args[args.length - 1] ?? '', `cannot run ${this.binary}`, error);
    }
    this.logger.debug('rclone finished', { exitCode: result.exitCode, stdoutBytes: result.stdout.length });
    if (result.stderr) {
      this.logger.debug('rclone stderr', { stderr: result.stderr.slice(0, 1000) });
    }
    return result;
  }

  private failure(key: string, result: CommandResult): HelperError {
    const detail = result.stderr.trim().split('\n').pop() ?? '';
    return Errors.transport(this.remotePath(key), `rclone exited with ${result.exitCode}${detail ? `: ${detail}` : ''}`);
  }

  async get(key: string): Promise<Lookup<Buffer>> {
    let result: CommandResult;
    try {
      result = await this.rclone(['cat', this.remotePath(key)]);
    } catch (error) {
      if (error instanceof HelperError) return Lookup.failed(error);
      throw error;
    }

    if (result.exitCode === 0) return Lookup.found(result.stdout);
    if (isAbsence(result)) return Lookup.absent();
    return Lookup.failed(this.failure(key, result));
  }

  async put(key: string, data: Buffer): Promise<void> {
    const result = await this.rclone(['rcat', this.remotePath(key)], data);
    if (result.exitCode !== 0) {
      throw this.failure(key, result);
    }
  }

  async delete(key: string): Promise<void> {
    const result = await this.rclone(['deletefile', this.remotePath(key)]);
    if (result.exitCode !== 0 && !isAbsence(result)) {
      throw this.failure(key, result);
    }
  }

  async listRecursive(key: string): Promise<Lookup<BlobEntry[]>> {
    let result: CommandResult;
    try {
      result = await this.rclone(['lsjson', '--recursive', this.remotePath(key)]);
    } catch (error) {
      if (error instanceof HelperError) return Lookup.failed(error);
      throw error;
    }

    if (isAbsence(result)) return Lookup.absent();
    if (result.exitCode !== 0) return Lookup.failed(this.failure(key, result));

    let parsed: unknown;
    try {
      parsed = JSON.parse(result.stdout.toString('utf8'));
    } catch {
      return Lookup.failed(Errors.transport(this.remotePath(key), 'rclone lsjson printed invalid JSON'));
    }

    const entries = lsjsonSchema.safeParse(parsed);
    if (!entries.success) {
      return Lookup.failed(Errors.transport(this.remotePath(key), `unexpected lsjson output: ${entries.error.issues[0]?.message}`));
    }

    return Lookup.found(
      entries.data
        .map(entry => ({ path: entry.Path, isDirectory: entry.IsDir }))
        .sort((a, b) => a.path.localeCompare(b.path))
    );
  }

  /**
   * Stage every file in a scratch directory laid out like the remote, then
   * send the whole tree with a single `rclone copy`.
   */
  async putBatch(files: BlobFile[]): Promise<void> {
    if (files.length === 0) return;

    const stagingDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'rclone-batch-'));
    this.logger.debug('Started batch', { stagingDir, files: files.length });

    try {
      for (const file of files) {
        const localPath = path.join(stagingDir, ...file.path.split('/').filter(Boolean));
        await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
        await fs.promises.writeFile(localPath, file.data);
      }

      this.logger.info(`Executing batch copy with ${files.length} files`);
      const result = await this.rclone(['copy', '-v', stagingDir, `${this.remote}:`]);
      if (result.exitCode !== 0) {
        throw this.failure('', result);
      }
      this.logger.debug('Batch copy completed');
    } finally {
      await fs.promises.rm(stagingDir, { recursive: true, force: true });
    }
  }
}
