/**
 * Remote helper protocol engine
 *
 * git writes newline-terminated commands to the helper's stdin and reads
 * replies from its stdout. Commands arrive one batch at a time:
 *
 *   idle        capabilities | option | list   -> reply, stay idle
 *   idle        push <spec>                    -> push-batch
 *   push-batch  push <spec>                    -> execute, buffer reply
 *   push-batch  <blank>                        -> flush replies + blank, idle
 *   idle        fetch <hash> <name>            -> fetch-batch
 *   fetch-batch fetch <hash> <name>            -> execute
 *   fetch-batch <blank>                        -> blank, idle
 *   idle        <blank> or end of input        -> terminal
 *   any         anything else                  -> PROTOCOL_ERROR, terminal
 */

import { PushResult } from './types';
import { Errors, HelperError } from './errors';
import { Orchestrator, parsePushSpec } from './orchestrator';
import { RemoteRefs } from './refs';
import { Session } from './session';
import { DEFAULT_HASH_ALGORITHM, HashAlgorithm, isValidHash } from '../utils/hash';
import { Logger, levelForVerbosity, silentLogger } from '../utils/logger';

export type ProtocolState = 'idle' | 'push-batch' | 'fetch-batch' | 'terminal';

export const CAPABILITIES = ['option', 'push', 'fetch'] as const;

/**
 * Where protocol replies go (process.stdout in production)
 */
export interface ProtocolOutput {
  write(chunk: string): unknown;
}

export interface ProtocolEngineOptions {
  orchestrator: Orchestrator;
  refs: RemoteRefs;
  session: Session;
  output: ProtocolOutput;
  algorithm?: HashAlgorithm;
  logger?: Logger;
}

export class ProtocolEngine {
  private stateValue: ProtocolState = 'idle';
  private pendingReplies: PushResult[] = [];

  private readonly orchestrator: Orchestrator;
  private readonly refs: RemoteRefs;
  private readonly session: Session;
  private readonly output: ProtocolOutput;
  private readonly algorithm: HashAlgorithm;
  private readonly logger: Logger;

  constructor(options: ProtocolEngineOptions) {
    this.orchestrator = options.orchestrator;
    this.refs = options.refs;
    this.session = options.session;
    this.output = options.output;
    this.algorithm = options.algorithm ?? DEFAULT_HASH_ALGORITHM;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'protocol' });
  }

  get state(): ProtocolState {
    return this.stateValue;
  }

  /**
   * Process commands until git ends the conversation
   * Rejects with a HelperError when the conversation cannot continue.
   */
  async run(lines: AsyncIterable<string>): Promise<void> {
    for await (const line of lines) {
      await this.handle(line);
      if (this.stateValue === 'terminal') return;
    }
    this.endOfInput();
  }

  /**
   * Handle the end of stdin
   */
  endOfInput(): void {
    const state = this.stateValue;
    this.stateValue = 'terminal';
    if (state === 'push-batch' || state === 'fetch-batch') {
      throw Errors.protocol('<end of input>', `input ended inside a ${state}`);
    }
  }

  /**
   * Handle one command line (without its trailing newline)
   */
  async handle(rawLine: string): Promise<void> {
    if (this.stateValue === 'terminal') {
      throw Errors.protocol(rawLine, 'session already ended');
    }

    const line = rawLine.replace(/\r$/, '');
    this.logger.debug('helper recv', { line });

    try {
      switch (this.stateValue) {
        case 'idle':
          await this.handleIdle(line);
          break;
        case 'push-batch':
          await this.handlePushBatch(line);
          break;
        case 'fetch-batch':
          await this.handleFetchBatch(line);
          break;
      }
    } catch (error) {
      this.stateValue = 'terminal';
      throw error;
    }
  }

  private write(message: string = ''): void {
    this.logger.debug('helper send', { line: message || '<blank>' });
    this.output.write(`${message}\n`);
  }

  private unexpected(line: string, details: string): HelperError {
    return Errors.protocol(line, details);
  }

  // ===========================================================================
  // States
  // ===========================================================================

  private async handleIdle(line: string): Promise<void> {
    const [command] = line.split(' ');

    if (line === '') {
      this.stateValue = 'terminal';
      return;
    }

    if (line === 'capabilities') {
      for (const capability of CAPABILITIES) {
        this.write(capability);
      }
      this.write();
      return;
    }

    if (command === 'option') {
      this.handleOption(line);
      return;
    }

    if (line === 'list' || line === 'list for-push') {
      await this.handleList(line === 'list for-push');
      return;
    }

    if (command === 'push') {
      this.stateValue = 'push-batch';
      await this.handlePushLine(line);
      return;
    }

    if (command === 'fetch') {
      this.stateValue = 'fetch-batch';
      await this.handleFetchLine(line);
      return;
    }

    throw this.unexpected(line, 'unsupported command');
  }

  private async handlePushBatch(line: string): Promise<void> {
    if (line === '') {
      await this.orchestrator.finishPushBatch();
      const replies = this.pendingReplies;
      this.pendingReplies = [];
      for (const reply of replies) {
        this.write(reply.status === 'ok' ? `ok ${reply.ref}` : `error ${reply.ref} ${reply.reason}`);
      }
      this.write();
      this.stateValue = 'idle';
      return;
    }

    if (!line.startsWith('push ')) {
      throw this.unexpected(line, 'expected another push or a blank line');
    }
    await this.handlePushLine(line);
  }

  private async handleFetchBatch(line: string): Promise<void> {
    if (line === '') {
      this.orchestrator.finishFetchBatch();
      this.write();
      this.stateValue = 'idle';
      return;
    }

    if (!line.startsWith('fetch ')) {
      throw this.unexpected(line, 'expected another fetch or a blank line');
    }
    await this.handleFetchLine(line);
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  private handleOption(line: string): void {
    const parts = line.split(' ');
    if (parts.length === 3 && parts[1] === 'verbosity' && /^-?\d+$/.test(parts[2])) {
      const verbosity = parseInt(parts[2], 10);
      this.session.setVerbosity(verbosity);
      this.logger.setLevel(levelForVerbosity(verbosity));
      this.write('ok');
      return;
    }
    this.write('unsupported');
  }

  private async handleList(forPush: boolean): Promise<void> {
    const listing = await this.refs.list(forPush);
    if (listing.status === 'failed') throw listing.error;
    const refs = listing.status === 'found' ? listing.value : [];

    for (const ref of refs) {
      this.write(`${ref.hash} ${ref.name}`);
    }

    const head = await this.refs.getHead();
    if (head.status === 'failed') throw head.error;
    if (head.status === 'found' && refs.some(ref => ref.name === head.value)) {
      this.write(`@${head.value} HEAD`);
    }

    this.write();
  }

  private async handlePushLine(line: string): Promise<void> {
    const intent = parsePushSpec(line.slice('push '.length));
    if (!intent) {
      throw this.unexpected(line, 'expected push [+]<src>:<dst>');
    }

    const result = await this.orchestrator.push(intent);
    this.pendingReplies.push(result);
  }

  private async handleFetchLine(line: string): Promise<void> {
    const parts = line.split(' ');
    if (parts.length !== 3 || !isValidHash(parts[1], this.algorithm)) {
      throw this.unexpected(line, 'expected fetch <hash> <name>');
    }

    await this.orchestrator.fetch(parts[1]);
  }
}
