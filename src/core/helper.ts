import { EnvConfig } from './config';
import { Errors } from './errors';
import { GitCliRepository, LocalRepository } from './local-repository';
import { Orchestrator } from './orchestrator';
import { ProtocolEngine, ProtocolOutput } from './protocol';
import { RemoteObjectStore } from './remote-store';
import { RemoteRefs } from './refs';
import { Session } from './session';
import { BlobBackend } from '../storage/types';
import { createBackend, parseRemoteUrl } from '../storage/factory';
import { Logger, silentLogger } from '../utils/logger';

export interface RemoteHelperOptions {
  /** Remote URL as passed by git */
  url: string;
  config: EnvConfig;
  output: ProtocolOutput;
  logger?: Logger;
  /** Overrides the backend the URL names */
  backend?: BlobBackend;
  /** Overrides the git CLI repository */
  local?: LocalRepository;
}

export interface RemoteHelper {
  engine: ProtocolEngine;
  session: Session;
  store: RemoteObjectStore;
  backend: BlobBackend;
}

/**
 * URL from the helper's arguments: `<remote-name> [<url>]`
 * git passes the URL alone as the name when the remote was given as a URL.
 */
export function remoteUrlFromArgs(argv: string[]): string {
  const url = argv[1] || argv[0];
  if (!url) throw Errors.missingUrl();
  return url;
}

/**
 * Wire up one helper session for a remote URL
 */
export function createRemoteHelper(options: RemoteHelperOptions): RemoteHelper {
  const { config } = options;
  const logger = options.logger ?? silentLogger();
  const location = parseRemoteUrl(options.url);

  const backend = options.backend ?? createBackend(location, {
    rcloneBinary: config.GIT_REMOTE_BLOB_RCLONE,
    logger,
  });
  const local = options.local ?? new GitCliRepository({
    binary: config.GIT_REMOTE_BLOB_GIT,
    gitDir: config.GIT_DIR,
    algorithm: config.GIT_REMOTE_BLOB_HASH,
  });

  const session = new Session();
  const store = new RemoteObjectStore(backend, {
    prefix: location.prefix,
    algorithm: config.GIT_REMOTE_BLOB_HASH,
    concurrency: config.GIT_REMOTE_BLOB_CONCURRENCY,
    logger,
  });
  const refs = new RemoteRefs(store, session);
  const orchestrator = new Orchestrator({
    store,
    refs,
    local,
    session,
    transferMode: config.GIT_REMOTE_BLOB_TRANSFER,
    concurrency: config.GIT_REMOTE_BLOB_CONCURRENCY,
    algorithm: config.GIT_REMOTE_BLOB_HASH,
    logger,
  });
  const engine = new ProtocolEngine({
    orchestrator,
    refs,
    session,
    output: options.output,
    algorithm: config.GIT_REMOTE_BLOB_HASH,
    logger,
  });

  logger.debug('helper ready', { backend: backend.name, prefix: store.prefix || '/' });
  return { engine, session, store, backend };
}
