import { spawn } from 'child_process';

/**
 * Captured result of running an external command
 */
export interface CommandResult {
  exitCode: number | null;
  stdout: Buffer;
  stderr: string;
}

export interface CommandOptions {
  /** Bytes written to the child's stdin, which is then closed */
  input?: Buffer;
  /** Working directory */
  cwd?: string;
  /** Extra environment variables */
  env?: Record<string, string | undefined>;
  /** Kill the child after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Runs external commands (rclone, git)
 * Injected so tests can answer without spawning anything.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

/**
 * Runner backed by child_process.spawn
 * A non-zero exit is not an error here; callers interpret exit codes.
 */
export class SpawnRunner implements CommandRunner {
  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: ['pipe', 'pipe', 'pipe'],
        timeout: options.timeoutMs,
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', reject);
      child.on('close', (code) => {
        resolve({
          exitCode: code,
          stdout: Buffer.concat(stdout),
          stderr: Buffer.concat(stderr).toString('utf8'),
        });
      });

      // EPIPE when the child exits without reading its input; the exit status reports that failure
      child.stdin.on('error', () => undefined);
      child.stdin.end(options.input);
    });
  }
}
