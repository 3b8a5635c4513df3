/**
 * Mapping of decoded pCloud responses onto typed results or errors.
 */

import type { z } from 'zod';
import { ServerError } from '../errors';
import { ResultEnvelope, ResultEnvelopeSchema } from '../types';
import type { HttpResponse } from '../transport';

/**
 * A schema whose decoded output is T, whatever its input
 */
export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Read the `result` envelope. Fails on HTTP errors and bodies without a result code.
 */
export function readEnvelope(response: HttpResponse): ResultEnvelope {
  const envelope = ResultEnvelopeSchema.safeParse(response.data);
  if (response.status >= 400) {
    if (envelope.success && envelope.data.result !== 0) {
      throw new ServerError(envelope.data.error ?? `HTTP ${response.status}`, envelope.data.result, response.status);
    }
    throw ServerError.fromStatus(response.status);
  }
  if (!envelope.success) {
    throw ServerError.invalidResponse('missing result code');
  }
  return envelope.data;
}

/**
 * Decode a body against its schema
 */
export function decodeBody<T>(data: unknown, schema: ResponseSchema<T>): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw ServerError.invalidResponse(issue ? `${issue.path.join('.')}: ${issue.message}` : 'schema mismatch');
  }
  return parsed.data;
}

/**
 * Decode a response, raising ServerError for a non-zero result
 */
export function decodeResponse<T>(response: HttpResponse, schema: ResponseSchema<T>): T {
  const envelope = readEnvelope(response);
  if (envelope.result !== 0) {
    throw ServerError.fromResult(envelope.result, envelope.error);
  }
  return decodeBody(response.data, schema);
}
