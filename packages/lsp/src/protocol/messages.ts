import { z } from 'zod';

/** Ids this client assigns. Servers may echo anything back. */
export type RequestId = number;

export type MessageId = number | string;

export const ResponseErrorPayloadSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});
export type ResponseErrorPayload = z.infer<typeof ResponseErrorPayloadSchema>;

const MessageIdSchema = z.union([z.number(), z.string()]);

const ResponseSchema = z.object({
  id: MessageIdSchema.nullable(),
  result: z.unknown().optional(),
  error: ResponseErrorPayloadSchema.optional(),
});

const NotificationSchema = z.object({
  method: z.string(),
  params: z.unknown().optional(),
});

const ServerRequestSchema = z.object({
  id: MessageIdSchema,
  method: z.string(),
  params: z.unknown().optional(),
});

export type ResponseMessage = {
  kind: 'response';
  id: MessageId | null;
  result: unknown;
  error?: ResponseErrorPayload;
};

export type NotificationMessage = {
  kind: 'notification';
  method: string;
  params?: unknown;
};

export type ServerRequestMessage = {
  kind: 'request';
  id: MessageId;
  method: string;
  params?: unknown;
};

export type InboundMessage =
  | ResponseMessage
  | NotificationMessage
  | ServerRequestMessage;

export type ParseOutcome =
  | { ok: true; message: InboundMessage }
  | {
      ok: false;
      reason: 'invalid-json' | 'invalid-message';
      detail: string;
      /** Set when a malformed response still carries a usable id. */
      responseId?: MessageId;
    };

type JsonRpcEnvelope = {
  jsonrpc: '2.0';
  id?: MessageId | null;
  method?: string;
  params?: unknown;
  result?: unknown;
  error?: ResponseErrorPayload;
};

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function stringify(envelope: JsonRpcEnvelope): string {
  return JSON.stringify(envelope);
}

export function serializeRequest(
  id: RequestId,
  method: string,
  params?: unknown,
): string {
  return stringify(
    params === undefined
      ? { jsonrpc: '2.0', id, method }
      : { jsonrpc: '2.0', id, method, params },
  );
}

export function serializeNotification(method: string, params?: unknown): string {
  return stringify(
    params === undefined
      ? { jsonrpc: '2.0', method }
      : { jsonrpc: '2.0', method, params },
  );
}

export function serializeResponse(
  id: MessageId,
  outcome: { result: unknown } | { error: ResponseErrorPayload },
): string {
  if ('error' in outcome) {
    return stringify({ jsonrpc: '2.0', id, error: outcome.error });
  }
  // A missing result is not valid JSON-RPC; send null instead.
  return stringify({ jsonrpc: '2.0', id, result: outcome.result ?? null });
}

export function parseMessage(body: string): ParseOutcome {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    return {
      ok: false,
      reason: 'invalid-json',
      detail: error instanceof Error ? error.message : String(error),
    };
  }

  if (!isObject(raw)) {
    return {
      ok: false,
      reason: 'invalid-message',
      detail: 'message is not a JSON object',
    };
  }

  const hasMethod = 'method' in raw;
  const hasId = 'id' in raw;

  if (hasMethod && hasId) {
    const parsed = ServerRequestSchema.safeParse(raw);
    if (!parsed.success) {
      return invalid(parsed.error);
    }
    return {
      ok: true,
      message: { kind: 'request', ...parsed.data },
    };
  }

  if (hasMethod) {
    const parsed = NotificationSchema.safeParse(raw);
    if (!parsed.success) {
      return invalid(parsed.error);
    }
    return {
      ok: true,
      message: { kind: 'notification', ...parsed.data },
    };
  }

  if (hasId) {
    const parsed = ResponseSchema.safeParse(raw);
    if (!parsed.success) {
      const id = MessageIdSchema.safeParse(raw.id);
      return id.success
        ? { ...invalid(parsed.error), responseId: id.data }
        : invalid(parsed.error);
    }
    const { id, result, error } = parsed.data;
    return {
      ok: true,
      message:
        error === undefined
          ? { kind: 'response', id, result: result === undefined ? null : result }
          : { kind: 'response', id, result: null, error },
    };
  }

  return {
    ok: false,
    reason: 'invalid-message',
    detail: 'message has neither an id nor a method',
  };
}

function invalid(error: z.ZodError): Extract<ParseOutcome, { ok: false }> {
  return {
    ok: false,
    reason: 'invalid-message',
    detail: error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; '),
  };
}
