import { z } from 'zod';

import { ConfigError } from './errors.js';
import {
  DEFAULT_MAX_BODY_BYTES,
  DEFAULT_MAX_HEADER_BYTES,
} from './transport/framing.js';

export const BOOTSTRAP_ENV = 'LSP_PIPE_BOOTSTRAP';
export const REQUEST_TIMEOUT_ENV = 'LSP_PIPE_REQUEST_TIMEOUT_MS';

/** Largest delay setTimeout honours; anything above fires after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/** A timeout in milliseconds; 0 waits forever. */
export const TimeoutMsSchema = z.number().int().nonnegative().max(MAX_TIMER_MS);

/**
 * Zod schema for the client's tunables. `requestTimeoutMs` of 0 waits
 * forever. `shutdownFlushMs` bounds how long shutdown waits for queued
 * writes.
 */
export const LspClientConfigSchema = z.object({
  requestTimeoutMs: TimeoutMsSchema.default(0),
  shutdownFlushMs: z.number().int().nonnegative().max(MAX_TIMER_MS).default(1000),
  maxHeaderBytes: z.number().int().positive().default(DEFAULT_MAX_HEADER_BYTES),
  maxBodyBytes: z.number().int().positive().default(DEFAULT_MAX_BODY_BYTES),
  notificationQueueLimit: z.number().int().positive().default(1000),
});
export type LspClientConfig = z.infer<typeof LspClientConfigSchema>;
export type LspClientConfigInput = z.input<typeof LspClientConfigSchema>;

export const ServerLaunchConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
});
export type ServerLaunchConfig = z.infer<typeof ServerLaunchConfigSchema>;

export const BootstrapConfigSchema = z.object({
  server: ServerLaunchConfigSchema.optional(),
  client: LspClientConfigSchema.default({}),
});
export type BootstrapConfig = z.infer<typeof BootstrapConfigSchema>;

export const defaultLspClientConfig: LspClientConfig =
  LspClientConfigSchema.parse({});

export function resolveClientConfig(
  input: LspClientConfigInput = {},
): LspClientConfig {
  return validate(LspClientConfigSchema, input, 'client config');
}

/**
 * Reads the bootstrap JSON from the environment and applies the single-value
 * overrides on top of it.
 */
export function loadBootstrapConfig(
  env: NodeJS.ProcessEnv = process.env,
): BootstrapConfig {
  let raw: unknown = {};
  const bootstrap = env[BOOTSTRAP_ENV];
  if (bootstrap !== undefined && bootstrap.trim() !== '') {
    try {
      raw = JSON.parse(bootstrap);
    } catch (error) {
      throw new ConfigError(
        `${BOOTSTRAP_ENV} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  const config = validate(BootstrapConfigSchema, raw, BOOTSTRAP_ENV);

  const timeout = env[REQUEST_TIMEOUT_ENV];
  if (timeout !== undefined && timeout.trim() !== '') {
    const value = TimeoutMsSchema.safeParse(Number(timeout));
    if (!value.success) {
      throw new ConfigError(
        `${REQUEST_TIMEOUT_ENV} must be an integer from 0 to ${MAX_TIMER_MS}, got '${timeout}'`,
        [REQUEST_TIMEOUT_ENV],
      );
    }
    config.client.requestTimeoutMs = value.data;
  }

  return config;
}

function validate<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  label: string,
): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const paths = parsed.error.issues.map(
      (issue) => issue.path.join('.') || '<root>',
    );
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${label}: ${details}`, paths);
  }
  return parsed.data;
}
