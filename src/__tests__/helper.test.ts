/**
 * Remote URL and Helper Wiring Tests
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, isHelperError } from '../core/errors';
import { parseConfig } from '../core/config';
import { createRemoteHelper, remoteUrlFromArgs } from '../core/helper';
import { createBackend, parseRemoteUrl } from '../storage/factory';
import { MemoryBackend } from '../storage/memory-backend';
import { MemoryRepository, OutputBuffer, linesOf } from './test-utils';

function errorCodeOf(fn: () => unknown): ErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    return isHelperError(error) ? error.code : undefined;
  }
  return undefined;
}

describe('parseRemoteUrl', () => {
  it('should read the rclone remote and repository path', () => {
    expect(parseRemoteUrl('rclone://gdrive/backups/project.git')).toEqual({
      scheme: 'rclone',
      remote: 'gdrive',
      prefix: 'backups/project.git',
    });
  });

  it('should allow a repository at the root of the remote', () => {
    expect(parseRemoteUrl('rclone://gdrive')).toEqual({ scheme: 'rclone', remote: 'gdrive', prefix: '' });
    expect(parseRemoteUrl('rclone://gdrive/')).toEqual({ scheme: 'rclone', remote: 'gdrive', prefix: '' });
  });

  it('should decode escaped characters', () => {
    expect(parseRemoteUrl('rclone://my%20drive/team%20repos/app')).toEqual({
      scheme: 'rclone',
      remote: 'my drive',
      prefix: 'team repos/app',
    });
  });

  it('should read a directory URL', () => {
    expect(parseRemoteUrl('blobdir:///srv/git/project')).toEqual({ scheme: 'blobdir', root: '/srv/git/project', prefix: '' });
  });

  it('should reject malformed URLs', () => {
    expect(errorCodeOf(() => parseRemoteUrl('rclone:///no-remote'))).toBe(ErrorCode.INVALID_URL);
    expect(errorCodeOf(() => parseRemoteUrl('blobdir://relative/path'))).toBe(ErrorCode.INVALID_URL);
    expect(errorCodeOf(() => parseRemoteUrl('https://example.com/repo.git'))).toBe(ErrorCode.INVALID_URL);
  });

  it('should create the backend a URL names', () => {
    expect(createBackend(parseRemoteUrl('rclone://gdrive/repo')).name).toBe('rclone: gdrive');
    expect(createBackend(parseRemoteUrl('blobdir:///srv/git/project')).type).toBe('directory');
  });
});

describe('remoteUrlFromArgs', () => {
  it('should prefer the URL argument over the remote name', () => {
    expect(remoteUrlFromArgs(['origin', 'rclone://gdrive/repo'])).toBe('rclone://gdrive/repo');
  });

  it('should use the name when git passes the URL alone', () => {
    expect(remoteUrlFromArgs(['rclone://gdrive/repo'])).toBe('rclone://gdrive/repo');
  });

  it('should report a missing URL with a usage hint', () => {
    let caught: unknown;
    try {
      remoteUrlFromArgs([]);
    } catch (error) {
      caught = error;
    }

    expect(isHelperError(caught, ErrorCode.INVALID_URL)).toBe(true);
    if (isHelperError(caught)) {
      expect(caught.message).toBe('No remote URL given');
      expect(caught.format(false)).toBe(
        'error: No remote URL given\n\nhint:\n  usage: git-remote-<scheme> <remote-name> [<url>]\n'
      );
    }
  });
});

describe('createRemoteHelper', () => {
  it('should use the URL path as the repository prefix', () => {
    const helper = createRemoteHelper({
      url: 'rclone://gdrive/backups/project',
      config: parseConfig({}),
      output: new OutputBuffer(),
      backend: new MemoryBackend(),
      local: new MemoryRepository(),
    });

    expect(helper.store.prefix).toBe('backups/project');
    expect(helper.engine.state).toBe('idle');
  });

  it('should push from one session and clone from another', async () => {
    const backend = new MemoryBackend();
    const config = parseConfig({ GIT_REMOTE_BLOB_TRANSFER: 'sequential' });

    const origin = new MemoryRepository();
    const { commit, tree, blob } = origin.addSnapshot('README.md', 'shared\n');
    origin.setRef('refs/heads/main', commit);
    origin.branch = 'refs/heads/main';

    const pushOutput = new OutputBuffer();
    const pusher = createRemoteHelper({ url: 'rclone://gdrive/repo', config, output: pushOutput, backend, local: origin });
    await pusher.engine.run(linesOf('capabilities', 'list for-push', 'push refs/heads/main:refs/heads/main', '', ''));
    expect(pushOutput.text).toBe('option\npush\nfetch\n\n\nok refs/heads/main\n\n');

    const clone = new MemoryRepository();
    const cloneOutput = new OutputBuffer();
    const cloner = createRemoteHelper({ url: 'rclone://gdrive/repo', config, output: cloneOutput, backend, local: clone });
    await cloner.engine.run(linesOf('list', `fetch ${commit} refs/heads/main`, '', ''));

    expect(cloneOutput.text).toBe(`${commit} refs/heads/main\n@refs/heads/main HEAD\n\n\n`);
    expect(clone.has(commit)).toBe(true);
    expect(clone.has(tree)).toBe(true);
    expect(clone.has(blob)).toBe(true);
  });
});
