#!/usr/bin/env node
import { stderr, stdout } from 'node:process';

import {
  LogMessageNotification,
  MessageType,
  ShowMessageNotification,
} from 'vscode-languageserver-protocol';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import { z } from 'zod';

import {
  loadBootstrapConfig,
  resolveClientConfig,
  type LspClientConfigInput,
  type ServerLaunchConfig,
} from './config.js';
import { DebugLogger } from './debug/DebugLogger.js';
import { ConfigError } from './errors.js';
import type { NotificationMessage } from './protocol/messages.js';
import {
  defaultInitializeParams,
  initializeServer,
  shutdownServer,
} from './service/handshake.js';
import { createLspClient, type LspClient } from './service/lsp-client.js';
import {
  spawnLanguageServer,
  type LanguageServerProcess,
} from './service/server-process.js';

const logger = DebugLogger.getLogger('lsp-pipe:main');

export interface CliOptions {
  command?: string;
  args: string[];
  timeoutMs?: number;
  rootUri?: string;
}

export interface HandshakeReport {
  server: string | null;
  version: string | null;
  capabilities: string[];
}

const ServerMessageSchema = z.object({
  type: z.number(),
  message: z.string(),
});

export function parseCliArgs(argv: string[]): CliOptions {
  const parsed = yargs(argv)
    .locale('en')
    .scriptName('lsp-pipe')
    .usage(
      'Usage: $0 [--timeout ms] [--root-uri uri] -- <command> [args..]\n\n' +
        'Starts a language server, runs the initialize handshake and prints its capabilities.',
    )
    .option('timeout', {
      type: 'number',
      description: 'Per-request timeout in milliseconds (0 waits forever)',
    })
    .option('root-uri', {
      type: 'string',
      description: 'rootUri sent in the initialize request',
    })
    .help()
    .parseSync();

  const [command, ...args] = parsed._.map((value) => String(value));
  return {
    ...(command !== undefined ? { command } : {}),
    args,
    ...(parsed.timeout !== undefined ? { timeoutMs: parsed.timeout } : {}),
    ...(parsed['root-uri'] !== undefined ? { rootUri: parsed['root-uri'] } : {}),
  };
}

/** Forwards window/showMessage and window/logMessage to the debug log. */
export function logServerMessage(notification: NotificationMessage): void {
  if (
    notification.method !== ShowMessageNotification.type.method &&
    notification.method !== LogMessageNotification.type.method
  ) {
    return;
  }

  const parsed = ServerMessageSchema.safeParse(notification.params);
  if (!parsed.success) {
    logger.warn(`Malformed ${notification.method} params`);
    return;
  }

  const { type, message } = parsed.data;
  if (type === MessageType.Error) {
    logger.error(message);
  } else if (type === MessageType.Warning) {
    logger.warn(message);
  } else {
    logger.log(message);
  }
}

/**
 * Spawns the server, runs initialize and shutdown, and stops the process
 * whatever happens. An invalid client config is rejected before spawning.
 */
export async function runHandshake(
  server: ServerLaunchConfig,
  clientConfig: LspClientConfigInput,
  rootUri: string | null = null,
  spawnServer: (config: ServerLaunchConfig) => LanguageServerProcess = spawnLanguageServer,
): Promise<HandshakeReport> {
  const config = resolveClientConfig(clientConfig);
  const proc = spawnServer(server);
  let client: LspClient | undefined;

  try {
    client = createLspClient({
      toServer: proc.toServer,
      fromServer: proc.fromServer,
      name: server.command,
      config,
      onNotification: logServerMessage,
    });
    const result = await initializeServer(
      client,
      defaultInitializeParams(rootUri),
    );
    await shutdownServer(client);
    return {
      server: result.serverInfo?.name ?? null,
      version: result.serverInfo?.version ?? null,
      capabilities: Object.keys(result.capabilities).sort(),
    };
  } finally {
    await client?.shutdown();
    proc.kill();
    const exit = await proc.exited;
    logger.debug(
      () => `server exited (code=${exit.code ?? 'null'}, signal=${exit.signal ?? 'null'})`,
    );
  }
}

export async function main(
  argv: string[] = hideBin(process.argv),
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const cli = parseCliArgs(argv);
  const bootstrap = loadBootstrapConfig(env);

  const server: ServerLaunchConfig | undefined =
    cli.command !== undefined
      ? { command: cli.command, args: cli.args }
      : bootstrap.server;
  if (!server) {
    throw new ConfigError(
      'No server command: pass one after -- or set server.command in LSP_PIPE_BOOTSTRAP',
      ['server.command'],
    );
  }

  const clientConfig = resolveClientConfig(
    cli.timeoutMs !== undefined
      ? { ...bootstrap.client, requestTimeoutMs: cli.timeoutMs }
      : bootstrap.client,
  );

  const report = await runHandshake(server, clientConfig, cli.rootUri ?? null);
  stdout.write(`${JSON.stringify(report)}\n`);
}

const isMainModule = (): boolean => {
  const argvEntry = process.argv[1];
  if (!argvEntry || !import.meta.url.startsWith('file://')) {
    return false;
  }

  try {
    return import.meta.url === new URL(argvEntry, 'file://').href;
  } catch {
    return false;
  }
};

if (isMainModule()) {
  void main().then(
    () => process.exit(0),
    (error: unknown) => {
      stderr.write(
        `lsp-pipe: ${error instanceof Error ? error.message : String(error)}\n`,
      );
      process.exit(1);
    },
  );
}
