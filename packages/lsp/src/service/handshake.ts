import {
  ExitNotification,
  InitializedNotification,
  InitializeRequest,
  ShutdownRequest,
  type InitializeParams,
} from 'vscode-languageserver-protocol';
import { z } from 'zod';

import { unwrapResult, type LspClient, type RequestOptions } from './lsp-client.js';

/**
 * The part of `InitializeResult` this package relies on. Capabilities are
 * kept opaque; servers add vendor keys freely.
 */
export const InitializeResultSchema = z
  .object({
    capabilities: z.record(z.unknown()),
    serverInfo: z
      .object({
        name: z.string(),
        version: z.string().optional(),
      })
      .optional(),
  })
  .passthrough();
export type InitializeResultSummary = z.infer<typeof InitializeResultSchema>;

export function defaultInitializeParams(
  rootUri: string | null = null,
): InitializeParams {
  return {
    processId: process.pid,
    rootUri,
    capabilities: {
      workspace: { configuration: true },
      textDocument: {
        hover: { contentFormat: ['plaintext'] },
      },
    },
    clientInfo: { name: 'lsp-pipe', version: '0.1.0' },
  };
}

/**
 * Runs `initialize` followed by the `initialized` notification. A server
 * error response is thrown as a ResponseError.
 */
export async function initializeServer(
  client: LspClient,
  params: InitializeParams,
  options?: RequestOptions,
): Promise<InitializeResultSummary> {
  const result = unwrapResult(
    await client.request(
      InitializeRequest.type.method,
      params,
      InitializeResultSchema,
      options,
    ),
  );
  await client.notify(InitializedNotification.type.method, {});
  return result;
}

/**
 * Asks the server to shut down, tells it to exit and closes the client, so
 * the server closing its stdout is not reported as a transport failure.
 */
export async function shutdownServer(
  client: LspClient,
  options?: RequestOptions,
): Promise<void> {
  unwrapResult(
    await client.request(ShutdownRequest.type.method, undefined, z.null(), options),
  );
  await client.notify(ExitNotification.type.method);
  await client.shutdown();
}
