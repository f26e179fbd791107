/**
 * Error handling for the remote helper
 * Every failure the helper can report is a HelperError with a code, so callers
 * branch on `code` rather than on message text.
 */

/**
 * Error codes for different types of errors
 */
export enum ErrorCode {
  // Protocol errors
  PROTOCOL_ERROR = 'PROTOCOL_ERROR',

  // Backend errors
  TRANSPORT_FAILED = 'TRANSPORT_FAILED',
  REPOSITORY_NOT_FOUND = 'REPOSITORY_NOT_FOUND',

  // Object errors
  OBJECT_NOT_FOUND = 'OBJECT_NOT_FOUND',
  MALFORMED_OBJECT = 'MALFORMED_OBJECT',
  INTEGRITY_FAILED = 'INTEGRITY_FAILED',

  // Reference errors
  REF_NOT_FOUND = 'REF_NOT_FOUND',
  INVALID_REF = 'INVALID_REF',
  NON_FAST_FORWARD = 'NON_FAST_FORWARD',

  // Environment errors
  INVALID_URL = 'INVALID_URL',
  CONFIG_INVALID = 'CONFIG_INVALID',
  LOCAL_GIT_FAILED = 'LOCAL_GIT_FAILED',
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  [key: string]: unknown;
}

/**
 * Main error class for the helper
 * Provides structured errors with suggestions and context
 */
export class HelperError extends Error {
  public readonly code: ErrorCode;
  public readonly suggestions: string[];
  public readonly context: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode,
    suggestions: string[] = [],
    context: ErrorContext = {}
  ) {
    super(message);
    this.name = 'HelperError';
    this.code = code;
    this.suggestions = suggestions;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HelperError);
    }
  }

  /**
   * Format error for display on stderr
   *
   * Output format:
   *   error: [Short, clear description]
   *
   *   hint: [Actionable suggestions]
   */
  format(colors: boolean = false): string {
    const red = colors ? '\x1b[31m' : '';
    const yellow = colors ? '\x1b[33m' : '';
    const dim = colors ? '\x1b[2m' : '';
    const reset = colors ? '\x1b[0m' : '';

    let output = `${red}error${reset}: ${this.message}\n`;

    if (this.suggestions.length > 0) {
      output += `\n${yellow}hint${reset}:\n`;
      for (const suggestion of this.suggestions) {
        output += `  ${dim}${suggestion}${reset}\n`;
      }
    }

    return output;
  }
}

/**
 * Check whether an unknown thrown value is a HelperError, optionally of a given code
 */
export function isHelperError(error: unknown, code?: ErrorCode): error is HelperError {
  return error instanceof HelperError && (code === undefined || error.code === code);
}

/**
 * Render any thrown value as a one-line message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Factory functions for common errors
 */
export const Errors = {
  protocol(line: string, details: string): HelperError {
    return new HelperError(
      `Unexpected protocol input '${line}': ${details}`,
      ErrorCode.PROTOCOL_ERROR,
      ['This helper is meant to be started by git, not run by hand'],
      { line }
    );
  },

  transport(path: string, details?: string, cause?: unknown): HelperError {
    return new HelperError(
      `Storage backend failed on '${path}'${details ? `: ${details}` : ''}`,
      ErrorCode.TRANSPORT_FAILED,
      [
        'Check that the backend is reachable and the credentials are valid',
        'Try again in a few moments',
      ],
      { path, details, cause: cause === undefined ? undefined : describeError(cause) }
    );
  },

  repositoryNotFound(path: string): HelperError {
    return new HelperError(
      `No repository found at '${path}'`,
      ErrorCode.REPOSITORY_NOT_FOUND,
      [
        'git push <remote> <branch>    # Push once to create the repository',
        'Verify the remote URL is correct',
      ],
      { path }
    );
  },

  objectNotFound(hash: string, where: 'remote' | 'local'): HelperError {
    return new HelperError(
      `Object not found in ${where} repository: ${hash}`,
      ErrorCode.OBJECT_NOT_FOUND,
      where === 'remote'
        ? ['The remote repository is incomplete; push the branch again from a full clone']
        : ['git fsck    # Check the local object database'],
      { hash, where }
    );
  },

  malformedObject(reason: string, hash?: string): HelperError {
    return new HelperError(
      `Malformed object${hash ? ` ${hash}` : ''}: ${reason}`,
      ErrorCode.MALFORMED_OBJECT,
      [],
      { hash, reason }
    );
  },

  integrity(expected: string, actual: string): HelperError {
    return new HelperError(
      `Hash mismatch: expected ${expected}, got ${actual}`,
      ErrorCode.INTEGRITY_FAILED,
      ['The remote object store is corrupt or has been tampered with'],
      { expected, actual }
    );
  },

  refNotFound(name: string): HelperError {
    return new HelperError(
      `Ref not found: ${name}`,
      ErrorCode.REF_NOT_FOUND,
      ['git show-ref    # List local refs'],
      { ref: name }
    );
  },

  invalidRef(name: string): HelperError {
    return new HelperError(
      `Invalid ref name '${name}': must start with refs/`,
      ErrorCode.INVALID_REF,
      [],
      { ref: name }
    );
  },

  nonFastForward(name: string, current: string, proposed: string): HelperError {
    return new HelperError(
      `Updates to '${name}' were rejected because the remote contains work that you do not have`,
      ErrorCode.NON_FAST_FORWARD,
      [
        'git fetch    # Integrate the remote changes first',
        'git push --force    # Overwrite the remote ref (use carefully)',
      ],
      { ref: name, current, proposed }
    );
  },

  invalidUrl(url: string, expected: string): HelperError {
    return new HelperError(
      `Invalid remote URL '${url}'. Expected: ${expected}`,
      ErrorCode.INVALID_URL,
      [
        'git remote add origin rclone://<remote>/<path>',
        'git remote add origin blobdir:///absolute/path',
      ],
      { url, expected }
    );
  },

  missingUrl(): HelperError {
    return new HelperError(
      'No remote URL given',
      ErrorCode.INVALID_URL,
      ['usage: git-remote-<scheme> <remote-name> [<url>]'],
      {}
    );
  },

  configInvalid(issues: string[]): HelperError {
    return new HelperError(
      `Invalid environment configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`,
      ErrorCode.CONFIG_INVALID,
      [],
      { issues }
    );
  },

  localGit(args: string[], stderr: string, exitCode: number | null): HelperError {
    return new HelperError(
      `git ${args.join(' ')} failed${exitCode === null ? '' : ` with exit code ${exitCode}`}${stderr ? `: ${stderr.trim()}` : ''}`,
      ErrorCode.LOCAL_GIT_FAILED,
      [],
      { args, stderr, exitCode }
    );
  },
};
