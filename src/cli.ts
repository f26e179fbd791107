#!/usr/bin/env node

/**
 * git remote helper entry point
 *
 * git runs `git-remote-<scheme> <remote-name> <url>` and talks to it over
 * stdin/stdout. Installed as git-remote-rclone and git-remote-blobdir.
 */

import * as readline from 'readline';
import { loadConfig } from './core/config';
import { HelperError, describeError } from './core/errors';
import { createRemoteHelper, remoteUrlFromArgs } from './core/helper';
import { Logger } from './utils/logger';

async function main(argv: string[]): Promise<void> {
  const url = remoteUrlFromArgs(argv);
  const config = loadConfig();
  const logger = new Logger(
    { service: 'git-remote-blob' },
    {
      level: 'info',
      format: config.LOG_FORMAT,
      sink: process.stderr,
      colors: process.stderr.isTTY === true,
    }
  );

  const { engine } = createRemoteHelper({ url, config, output: process.stdout, logger });

  const lines = readline.createInterface({ input: process.stdin, crlfDelay: Infinity });
  try {
    await engine.run(lines);
  } finally {
    lines.close();
  }
}

main(process.argv.slice(2))
  .catch((error: unknown) => {
    if (error instanceof HelperError) {
      process.stderr.write(error.format(process.stderr.isTTY === true));
    } else {
      process.stderr.write(`error: ${describeError(error)}\n`);
    }
    process.exitCode = 1;
  })
  .finally(() => {
    process.stdin.destroy();
  });
