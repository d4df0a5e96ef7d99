import { z } from 'zod';

import type { ApiError, PageInfo, PaginationInfo, PipelineOutcome, RawHttpResponse } from './types';

const apiErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
});

const messageSchema = z.union([
  z.string(),
  z.object({ message: z.string() }).passthrough().transform((value) => value.message),
]);

const count = z.number().int().nonnegative();

const resultInfoSchema = z
  .object({
    page: count.optional(),
    per_page: count.optional(),
    count: count.optional(),
    total_count: count.optional(),
    total_pages: count.optional(),
    cursor: z.string().nullish(),
  })
  .passthrough();

const cursorResultInfoSchema = z
  .object({
    count: count.optional(),
    per_page: count.optional(),
    cursor: z.string().nullish(),
  })
  .passthrough();

const envelopeSchema = z.object({
  success: z.boolean(),
  errors: z
    .array(apiErrorSchema)
    .nullish()
    .transform((value) => value ?? []),
  messages: z
    .array(messageSchema)
    .nullish()
    .transform((value) => value ?? []),
  result: z.unknown(),
  result_info: resultInfoSchema.nullish(),
  cursor_result_info: cursorResultInfoSchema.nullish(),
});

type RawEnvelope = z.output<typeof envelopeSchema>;

/** Schema for the caller's `result` payload; input is whatever JSON the server sent. */
export type ResultSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const textDecoder = new TextDecoder();

export function bodyText(response: RawHttpResponse): string {
  return textDecoder.decode(response.body);
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function emptyCursor(cursor: string | null | undefined): string | null {
  return cursor === undefined || cursor === null || cursor === '' ? null : cursor;
}

function toPagination(envelope: RawEnvelope): PaginationInfo | null {
  const cursorInfo = envelope.cursor_result_info;
  if (cursorInfo) {
    return {
      type: 'cursor',
      count: cursorInfo.count ?? 0,
      perPage: cursorInfo.per_page ?? 0,
      cursor: emptyCursor(cursorInfo.cursor),
    };
  }

  const info = envelope.result_info;
  if (!info) return null;

  if (info.page !== undefined) {
    const page: PageInfo = {
      type: 'page',
      page: info.page,
      perPage: info.per_page ?? 0,
      count: info.count ?? 0,
      totalCount: info.total_count ?? 0,
      totalPages: info.total_pages ?? 0,
    };
    if (info.cursor !== undefined) {
      page.cursor = emptyCursor(info.cursor);
    }
    return page;
  }

  if (info.cursor !== undefined) {
    return {
      type: 'cursor',
      count: info.count ?? 0,
      perPage: info.per_page ?? 0,
      cursor: emptyCursor(info.cursor),
    };
  }

  return null;
}

type ParsedBody = { ok: true; envelope: RawEnvelope } | { ok: false; error: unknown };

function parseEnvelope(text: string): ParsedBody {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return { ok: false, error };
  }
  const parsed = envelopeSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: parsed.error };
  }
  return { ok: true, envelope: parsed.data };
}

/** Best-effort extraction of envelope errors from an error body; never fails. */
function errorsFromBody(text: string): ApiError[] | undefined {
  if (text.trim() === '') return undefined;
  const parsed = parseEnvelope(text);
  if (!parsed.ok || parsed.envelope.errors.length === 0) return undefined;
  return parsed.envelope.errors;
}

function httpStatusFailure<T>(response: RawHttpResponse, text: string): PipelineOutcome<T> {
  const errors = errorsFromBody(text);
  return {
    kind: 'transportFailure',
    reason: 'http_status',
    status: response.status,
    headers: response.headers,
    body: text,
    ...(errors ? { errors } : {}),
  };
}

/**
 * Classifies one response:
 * - non-2xx: `transportFailure` (`http_status`), envelope not trusted
 * - 2xx with unparseable JSON or an unexpected shape: `transportFailure` (`malformed_response`)
 * - 2xx with `success: false`: `applicationFailure` with every error in order, `result` dropped
 * - otherwise `success`, with `result` validated by `resultSchema` when one is given
 */
export function decodeEnvelope(response: RawHttpResponse): PipelineOutcome<unknown>;
export function decodeEnvelope<T>(response: RawHttpResponse, resultSchema: ResultSchema<T>): PipelineOutcome<T>;
export function decodeEnvelope<T>(
  response: RawHttpResponse,
  resultSchema?: ResultSchema<T>,
): PipelineOutcome<T | unknown> {
  const text = bodyText(response);
  if (!isSuccessStatus(response.status)) {
    return httpStatusFailure(response, text);
  }

  const parsed = parseEnvelope(text);
  if (!parsed.ok) {
    return {
      kind: 'transportFailure',
      reason: 'malformed_response',
      status: response.status,
      headers: response.headers,
      body: text,
      error: parsed.error,
    };
  }

  const { envelope } = parsed;
  if (!envelope.success) {
    return {
      kind: 'applicationFailure',
      errors: envelope.errors,
      messages: envelope.messages,
      status: response.status,
      headers: response.headers,
    };
  }

  let value: unknown = envelope.result ?? null;
  if (resultSchema) {
    const result = resultSchema.safeParse(envelope.result ?? null);
    if (!result.success) {
      return {
        kind: 'transportFailure',
        reason: 'malformed_response',
        status: response.status,
        headers: response.headers,
        body: text,
        error: result.error,
      };
    }
    value = result.data;
  }

  return {
    kind: 'success',
    value,
    status: response.status,
    headers: response.headers,
    messages: envelope.messages,
    pagination: toPagination(envelope),
  };
}

/** Decodes a list endpoint; a `null` result on success is an empty page. */
export function decodeListEnvelope<T>(response: RawHttpResponse, itemSchema: ResultSchema<T>): PipelineOutcome<T[]> {
  const listSchema = z
    .array(itemSchema)
    .nullable()
    .transform((items) => items ?? []);
  return decodeEnvelope(response, listSchema);
}

/**
 * For raw endpoints that return no envelope: 2xx yields the body, 404 yields a `null`
 * success, anything else is an `http_status` failure.
 */
export function decodeRaw(response: RawHttpResponse, as: 'text'): PipelineOutcome<string | null>;
export function decodeRaw(response: RawHttpResponse, as: 'bytes'): PipelineOutcome<Uint8Array | null>;
export function decodeRaw(
  response: RawHttpResponse,
  as: 'text' | 'bytes',
): PipelineOutcome<string | Uint8Array | null> {
  if (response.status === 404) {
    return success(response, null);
  }
  if (!isSuccessStatus(response.status)) {
    return httpStatusFailure(response, bodyText(response));
  }
  return success(response, as === 'text' ? bodyText(response) : new Uint8Array(response.body));
}

function success<T>(response: RawHttpResponse, value: T): PipelineOutcome<T> {
  return {
    kind: 'success',
    value,
    status: response.status,
    headers: response.headers,
    messages: [],
    pagination: null,
  };
}
