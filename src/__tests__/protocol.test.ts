/**
 * Remote Helper Protocol Tests
 * Each test replays a conversation git would have with the helper.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ErrorCode, isHelperError } from '../core/errors';
import { Orchestrator } from '../core/orchestrator';
import { ProtocolEngine } from '../core/protocol';
import { RemoteObjectStore } from '../core/remote-store';
import { RemoteRefs } from '../core/refs';
import { Session } from '../core/session';
import { MemoryBackend } from '../storage/memory-backend';
import { Logger } from '../utils/logger';
import { MemoryRepository, OutputBuffer, linesOf, seedRemote } from './test-utils';

interface Conversation {
  engine: ProtocolEngine;
  output: OutputBuffer;
  session: Session;
  logger: Logger;
}

function converse(local: MemoryRepository, backend: MemoryBackend): Conversation {
  const output = new OutputBuffer();
  const logger = new Logger({}, { level: 'info', sink: new OutputBuffer() });
  const session = new Session();
  const store = new RemoteObjectStore(backend, { prefix: 'repo' });
  const refs = new RemoteRefs(store, session);
  const orchestrator = new Orchestrator({ store, refs, local, session, logger });
  const engine = new ProtocolEngine({ orchestrator, refs, session, output, logger });
  return { engine, output, session, logger };
}

async function failureOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('ProtocolEngine', () => {
  let local: MemoryRepository;
  let backend: MemoryBackend;
  let commit: string;

  beforeEach(() => {
    local = new MemoryRepository();
    commit = local.addSnapshot('README.md', 'hello\n').commit;
    local.setRef('refs/heads/main', commit);
    local.branch = 'refs/heads/main';
    backend = new MemoryBackend();
  });

  describe('capabilities and options', () => {
    it('should advertise its capabilities', async () => {
      const { engine, output } = converse(local, backend);

      await engine.run(linesOf('capabilities', ''));

      expect(output.text).toBe('option\npush\nfetch\n\n');
      expect(engine.state).toBe('terminal');
    });

    it('should strip carriage returns', async () => {
      const { engine, output } = converse(local, backend);
      await engine.run(linesOf('capabilities\r'));
      expect(output.text).toBe('option\npush\nfetch\n\n');
    });

    it('should accept verbosity and adjust logging', async () => {
      const { engine, output, session, logger } = converse(local, backend);

      await engine.run(linesOf('option verbosity 2', 'option verbosity 0'));

      expect(output.text).toBe('ok\nok\n');
      expect(session.verbosity).toBe(0);
      expect(logger.level).toBe('error');
    });

    it('should answer unsupported for other options', async () => {
      const { engine, output } = converse(local, backend);
      await engine.run(linesOf('option progress true', 'option verbosity loud'));
      expect(output.text).toBe('unsupported\nunsupported\n');
    });
  });

  describe('list', () => {
    it('should list refs and the HEAD symref', async () => {
      const other = '3'.repeat(40);
      backend = new MemoryBackend({
        'repo/refs/heads/main': `${commit}\n`,
        'repo/refs/tags/v1': `${other}\n`,
        'repo/HEAD': 'ref: refs/heads/main\n',
      });
      const { engine, output } = converse(local, backend);

      await engine.run(linesOf('list'));

      expect(output.text).toBe(`${commit} refs/heads/main\n${other} refs/tags/v1\n@refs/heads/main HEAD\n\n`);
    });

    it('should omit a HEAD pointing at a missing branch', async () => {
      backend = new MemoryBackend({
        'repo/refs/heads/main': `${commit}\n`,
        'repo/HEAD': 'ref: refs/heads/master\n',
      });
      const { engine, output } = converse(local, backend);

      await engine.run(linesOf('list'));

      expect(output.text).toBe(`${commit} refs/heads/main\n\n`);
    });

    it('should leave out symbolic refs pointing outside refs/', async () => {
      backend = new MemoryBackend({
        'repo/refs/heads/main': `${commit}\n`,
        'repo/refs/heads/alias': 'ref: main\n',
      });
      const { engine, output } = converse(local, backend);

      await engine.run(linesOf('list', ''));

      expect(output.text).toBe(`${commit} refs/heads/main\n\n`);
      expect(engine.state).toBe('terminal');
    });

    it('should list an empty repository for push', async () => {
      const { engine, output } = converse(local, backend);
      await engine.run(linesOf('list for-push'));
      expect(output.text).toBe('\n');
    });

    it('should fail to list a repository that does not exist', async () => {
      const { engine } = converse(local, backend);
      const error = await failureOf(engine.run(linesOf('list')));
      expect(isHelperError(error, ErrorCode.REPOSITORY_NOT_FOUND)).toBe(true);
    });

    it('should reject unknown list arguments', async () => {
      const { engine } = converse(local, backend);
      const error = await failureOf(engine.run(linesOf('list everything')));
      expect(isHelperError(error, ErrorCode.PROTOCOL_ERROR)).toBe(true);
    });
  });

  describe('push', () => {
    it('should reply to every push of a batch after the blank line', async () => {
      const { engine, output } = converse(local, backend);

      await engine.run(linesOf(
        'capabilities',
        'list for-push',
        'push refs/heads/main:refs/heads/main',
        'push refs/heads/nope:refs/heads/nope',
        '',
        ''
      ));

      expect(output.text).toBe([
        'option',
        'push',
        'fetch',
        '',
        '',
        'ok refs/heads/main',
        'error refs/heads/nope Ref not found: refs/heads/nope',
        '',
        '',
      ].join('\n'));
      expect(backend.has('repo/refs/heads/main')).toBe(true);
      expect(backend.has('repo/HEAD')).toBe(true);
      expect(engine.state).toBe('terminal');
    });

    it('should report a non-fast-forward', async () => {
      backend = new MemoryBackend({ 'repo/refs/heads/main': `${commit}\n` });
      const rewrite = local.addSnapshot('README.md', 'rewritten\n').commit;
      local.setRef('refs/heads/rewrite', rewrite);
      const { engine, output } = converse(local, backend);

      await engine.run(linesOf('push refs/heads/rewrite:refs/heads/main', ''));

      expect(output.text).toBe('error refs/heads/main non-fast-forward\n\n');
    });

    it('should refuse HEAD as a push or delete destination', async () => {
      backend = new MemoryBackend({ 'repo/HEAD': 'ref: refs/heads/main\n' });
      const { engine, output } = converse(local, backend);

      await engine.run(linesOf('push +refs/heads/main:HEAD', 'push :HEAD', ''));

      expect(output.text).toBe(
        "error HEAD Invalid ref name 'HEAD': must start with refs/\n" +
          "error HEAD Invalid ref name 'HEAD': must start with refs/\n\n"
      );
      expect(backend.paths()).toEqual(['repo/HEAD']);
    });

    it('should delete refs', async () => {
      backend = new MemoryBackend({ 'repo/refs/heads/old': `${commit}\n` });
      const { engine, output } = converse(local, backend);

      await engine.run(linesOf('push :refs/heads/old', ''));

      expect(output.text).toBe('ok refs/heads/old\n\n');
      expect(backend.has('repo/refs/heads/old')).toBe(false);
    });

    it('should reject a malformed push line', async () => {
      const { engine } = converse(local, backend);
      const error = await failureOf(engine.run(linesOf('push refs/heads/main')));
      expect(isHelperError(error, ErrorCode.PROTOCOL_ERROR)).toBe(true);
      expect(engine.state).toBe('terminal');
    });

    it('should reject other commands inside a push batch', async () => {
      const { engine } = converse(local, backend);
      const error = await failureOf(engine.run(linesOf('push refs/heads/main:refs/heads/main', 'list')));
      expect(isHelperError(error, ErrorCode.PROTOCOL_ERROR)).toBe(true);
    });

    it('should reject input that ends inside a push batch', async () => {
      const { engine, output } = converse(local, backend);
      const error = await failureOf(engine.run(linesOf('push refs/heads/main:refs/heads/main')));
      expect(isHelperError(error, ErrorCode.PROTOCOL_ERROR)).toBe(true);
      expect(output.text).toBe('');
    });
  });

  describe('fetch', () => {
    it('should fetch every requested object and end the batch with a blank line', async () => {
      const source = new MemoryRepository();
      const fetched = source.addSnapshot('a.txt', 'remote\n');
      await seedRemote(backend, source, 'repo');
      const { engine, output } = converse(local, backend);

      await engine.run(linesOf(`fetch ${fetched.commit} refs/heads/main`, `fetch ${fetched.commit} refs/heads/copy`, ''));

      expect(output.text).toBe('\n');
      expect(local.has(fetched.tree)).toBe(true);
      expect(local.written).toHaveLength(3);
    });

    it('should reject a fetch line without a valid hash', async () => {
      const { engine } = converse(local, backend);
      const error = await failureOf(engine.run(linesOf('fetch 1234 refs/heads/main')));
      expect(isHelperError(error, ErrorCode.PROTOCOL_ERROR)).toBe(true);
    });
  });

  it('should reject unknown commands', async () => {
    const { engine } = converse(local, backend);
    const error = await failureOf(engine.run(linesOf('connect git-upload-pack')));
    expect(isHelperError(error, ErrorCode.PROTOCOL_ERROR)).toBe(true);
    expect(engine.state).toBe('terminal');
  });

  it('should refuse commands after the conversation ended', async () => {
    const { engine } = converse(local, backend);
    await engine.run(linesOf(''));
    await expect(engine.handle('capabilities')).rejects.toThrow("Unexpected protocol input 'capabilities': session already ended");
  });
});
