/**
 * Storage Backend Factory
 *
 * Turns the URL git hands the helper into a backend and the repository prefix
 * inside it.
 *
 *   rclone://<remote>/<path>    rclone remote (as named in rclone.conf)
 *   blobdir:///<absolute path>  local directory
 */

import { Errors } from '../core/errors';
import { CommandRunner } from '../utils/process';
import { Logger } from '../utils/logger';
import { BlobBackend } from './types';
import { RcloneBackend } from './rclone-backend';
import { createDirectoryBackend } from './directory-backend';

// =============================================================================
// URL Parsing
// =============================================================================

export type RemoteLocation =
  | { scheme: 'rclone'; remote: string; prefix: string }
  | { scheme: 'blobdir'; root: string; prefix: string };

const RCLONE_URL = /^rclone:\/\/([^/]+)(\/.*)?$/;
const BLOBDIR_URL = /^blobdir:\/\/(\/.+)$/;

/**
 * Parse a remote URL
 * @throws HelperError (INVALID_URL) for unknown schemes and missing parts
 */
export function parseRemoteUrl(url: string): RemoteLocation {
  if (url.startsWith('rclone:')) {
    const match = RCLONE_URL.exec(url);
    if (!match) {
      throw Errors.invalidUrl(url, 'rclone://<remote>/<path>');
    }
    return {
      scheme: 'rclone',
      remote: decodeURIComponent(match[1]),
      prefix: trimSlashes(decodeURIComponent(match[2] ?? '')),
    };
  }

  if (url.startsWith('blobdir:')) {
    const match = BLOBDIR_URL.exec(url);
    if (!match) {
      throw Errors.invalidUrl(url, 'blobdir:///<absolute path>');
    }
    // The whole path is the backend root; the repository sits at its top
    return { scheme: 'blobdir', root: decodeURIComponent(match[1]), prefix: '' };
  }

  throw Errors.invalidUrl(url, 'rclone://<remote>/<path> or blobdir:///<absolute path>');
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

// =============================================================================
// Backend Creation
// =============================================================================

export interface CreateBackendOptions {
  /** rclone executable */
  rcloneBinary?: string;
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Create the backend a parsed URL points at
 */
export function createBackend(location: RemoteLocation, options: CreateBackendOptions = {}): BlobBackend {
  switch (location.scheme) {
    case 'rclone':
      return new RcloneBackend({
        remote: location.remote,
        binary: options.rcloneBinary,
        runner: options.runner,
        logger: options.logger,
      });
    case 'blobdir':
      return createDirectoryBackend(location.root);
  }
}
