/**
 * git-remote-blob
 * git remote helper storing repositories as loose objects on blob backends
 */

// Core
export * from './core/types';
export * from './core/errors';
export { decode, encode, hashOf, hashObject, verify, encodeLoose, inflateLoose, decodeLoose } from './core/object-codec';
export { parseTreeEntries, referencesOf } from './core/references';
export type { TreeEntry } from './core/references';
export { RemoteObjectStore } from './core/remote-store';
export type { RemoteObjectStoreOptions, StoredObject } from './core/remote-store';
export { RemoteRefs } from './core/refs';
export { Session } from './core/session';
export { objectsToUpload, fetchAll } from './core/closure';
export type { FetchOptions } from './core/closure';
export { Orchestrator, parsePushSpec, NON_FAST_FORWARD_REASON } from './core/orchestrator';
export type { OrchestratorOptions } from './core/orchestrator';
export { ProtocolEngine, CAPABILITIES } from './core/protocol';
export type { ProtocolEngineOptions, ProtocolOutput, ProtocolState } from './core/protocol';
export { GitCliRepository, parseCatFileBatch } from './core/local-repository';
export type { LocalRepository, GitCliRepositoryOptions } from './core/local-repository';
export { createRemoteHelper, remoteUrlFromArgs } from './core/helper';
export type { RemoteHelper, RemoteHelperOptions } from './core/helper';
export { loadConfig, parseConfig, resetConfig } from './core/config';
export type { EnvConfig, TransferMode } from './core/config';

// Storage
export * from './storage/types';
export { MemoryBackend } from './storage/memory-backend';
export { DirectoryBackend, createDirectoryBackend } from './storage/directory-backend';
export { RcloneBackend } from './storage/rclone-backend';
export type { RcloneBackendOptions } from './storage/rclone-backend';
export { parseRemoteUrl, createBackend } from './storage/factory';
export type { RemoteLocation, CreateBackendOptions } from './storage/factory';

// Utils
export { Logger, levelForVerbosity, silentLogger } from './utils/logger';
export type { LogLevel, LogFormat, LogSink, LoggerOptions } from './utils/logger';
export { DEFAULT_HASH_ALGORITHM, isValidHash, computeHash, shortHash } from './utils/hash';
export type { HashAlgorithm } from './utils/hash';
export { SpawnRunner } from './utils/process';
export type { CommandRunner, CommandResult, CommandOptions } from './utils/process';
export { mapPool, drainQueue, DEFAULT_CONCURRENCY } from './utils/pool';
