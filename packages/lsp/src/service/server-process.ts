import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

import type { ServerLaunchConfig } from '../config.js';
import { DebugLogger } from '../debug/DebugLogger.js';

export interface ServerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned or signalled. */
  error?: Error;
}

export interface LanguageServerProcess {
  pid: number | undefined;
  /** The server's stdin. */
  toServer: Writable;
  /** The server's stdout. */
  fromServer: Readable;
  /** Settles once; never rejects. */
  exited: Promise<ServerExit>;
  kill(signal?: NodeJS.Signals): void;
}

export interface SpawnLanguageServerOptions {
  env?: NodeJS.ProcessEnv;
  logger?: DebugLogger;
}

/**
 * Starts a language server with piped stdio. stderr is drained line by line
 * into the debug log.
 */
export function spawnLanguageServer(
  config: ServerLaunchConfig,
  options: SpawnLanguageServerOptions = {},
): LanguageServerProcess {
  const logger = options.logger ?? DebugLogger.getLogger('lsp-pipe:server');
  const cwd =
    config.cwd !== undefined && existsSync(config.cwd)
      ? config.cwd
      : process.cwd();

  const child = spawn(config.command, config.args, {
    cwd,
    env: options.env ?? process.env,
    stdio: ['pipe', 'pipe', 'pipe'],
  });

  const label = [config.command, ...config.args].join(' ');
  logger.debug(() => `spawned '${label}' (pid ${String(child.pid)})`);

  const exited = new Promise<ServerExit>((resolve) => {
    child.once('exit', (code, signal) => {
      logger.debug(
        () =>
          `'${label}' exited (code=${code ?? 'null'}, signal=${signal ?? 'null'})`,
      );
      resolve({ code, signal });
    });
    child.once('error', (error: Error) => {
      logger.error(() => `'${label}' process error: ${error.message}`);
      resolve({ code: null, signal: null, error });
    });
  });

  // Logged only. The client reports stream failures.
  child.stdin.on('error', (error: Error) => {
    logger.debug(() => `'${label}' stdin error: ${error.message}`);
  });
  child.stdout.on('error', (error: Error) => {
    logger.debug(() => `'${label}' stdout error: ${error.message}`);
  });

  const stderrLines = createInterface({ input: child.stderr });
  stderrLines.on('line', (line) => {
    logger.debug(() => `[stderr] ${line}`);
  });

  let killed = false;
  const kill = (signal: NodeJS.Signals = 'SIGTERM'): void => {
    if (killed) {
      return;
    }
    killed = true;
    if (!child.stdin.destroyed) {
      child.stdin.end();
    }
    if (child.exitCode === null && child.signalCode === null) {
      child.kill(signal);
    }
  };

  return {
    pid: child.pid,
    toServer: child.stdin,
    fromServer: child.stdout,
    exited,
    kill,
  };
}
