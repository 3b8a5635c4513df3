/**
 * HTTP transport layer for the pCloud API.
 */

import { randomUUID } from 'crypto';
import { PCloudError, ServerError, TransportError } from '../errors';

export type HttpMethod = 'GET' | 'POST';

export type QueryValue = string | number | undefined;

export type QueryParams = Record<string, QueryValue>;

/**
 * File content accepted for multipart uploads
 */
export type UploadPayload = string | Uint8Array | ArrayBuffer | Blob | AsyncIterable<Uint8Array>;

/**
 * One named file inside a multipart body
 */
export interface MultipartFilePart {
  field: string;
  filename: string;
  payload: UploadPayload;
}

/**
 * HTTP request
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  query?: QueryParams;
  headers?: Record<string, string>;
  multipart?: MultipartFilePart[];
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * HTTP response with a decoded JSON body
 */
export interface HttpResponse<T = unknown> {
  status: number;
  headers: Record<string, string>;
  data: T;
}

/**
 * Raw response handle; the body is materialized by the caller
 */
export interface DownloadResponse {
  status: number;
  headers: Record<string, string>;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
  bytes(): Promise<Uint8Array>;
  /** discard a body that will not be read */
  cancel(): Promise<void>;
}

/**
 * Transport interface
 */
export interface HttpTransport {
  request(request: HttpRequest): Promise<HttpResponse>;
  download(request: HttpRequest): Promise<DownloadResponse>;
}

/**
 * Append the defined query values to a url
 */
export function buildUrl(url: string, query: QueryParams = {}): string {
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      target.searchParams.append(key, String(value));
    }
  }
  return target.toString();
}

/**
 * Payloads produced while the request is being sent
 */
export function isStreamedPayload(payload: UploadPayload): payload is AsyncIterable<Uint8Array> {
  return typeof payload === 'object' && Symbol.asyncIterator in payload;
}

/**
 * Read any supported payload into a Blob
 */
export async function toBlob(payload: UploadPayload): Promise<Blob> {
  if (payload instanceof Blob) return payload;
  if (typeof payload === 'string' || payload instanceof Uint8Array || payload instanceof ArrayBuffer) {
    return new Blob([payload]);
  }
  const chunks: Uint8Array[] = [];
  for await (const chunk of payload) {
    chunks.push(chunk);
  }
  return new Blob(chunks);
}

async function toFormData(parts: MultipartFilePart[]): Promise<FormData> {
  const form = new FormData();
  for (const part of parts) {
    form.append(part.field, await toBlob(part.payload), part.filename);
  }
  return form;
}

const CRLF = '\r\n';

function quoted(value: string): string {
  return value.replace(/"/g, '%22').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}

async function* payloadChunks(payload: UploadPayload): AsyncGenerator<Uint8Array> {
  if (typeof payload === 'string') {
    yield new TextEncoder().encode(payload);
  } else if (payload instanceof Uint8Array) {
    yield payload;
  } else if (payload instanceof ArrayBuffer) {
    yield new Uint8Array(payload);
  } else if (payload instanceof Blob) {
    yield new Uint8Array(await payload.arrayBuffer());
  } else {
    yield* payload;
  }
}

/**
 * multipart/form-data body, encoded part by part as it is sent
 */
export async function* encodeMultipart(parts: MultipartFilePart[], boundary: string): AsyncGenerator<Uint8Array> {
  const encoder = new TextEncoder();
  for (const part of parts) {
    yield encoder.encode(
      `--${boundary}${CRLF}` +
        `Content-Disposition: form-data; name="${quoted(part.field)}"; filename="${quoted(part.filename)}"${CRLF}` +
        `Content-Type: application/octet-stream${CRLF}${CRLF}`
    );
    yield* payloadChunks(part.payload);
    yield encoder.encode(CRLF);
  }
  yield encoder.encode(`--${boundary}--${CRLF}`);
}

interface EncodedBody {
  body: FormData | AsyncIterable<Uint8Array>;
  headers: Record<string, string>;
}

// in-memory parts go out as FormData; any streamed part streams the whole body
async function encodeBody(parts: MultipartFilePart[]): Promise<EncodedBody> {
  if (!parts.some((part) => isStreamedPayload(part.payload))) {
    return { body: await toFormData(parts), headers: {} };
  }
  const boundary = `pcloud-${randomUUID()}`;
  return {
    body: encodeMultipart(parts, boundary),
    headers: { 'Content-Type': `multipart/form-data; boundary=${boundary}` },
  };
}

function collectHeaders(response: Response): Record<string, string> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key.toLowerCase()] = value;
  });
  return headers;
}

async function readBody<T>(read: () => Promise<T>): Promise<T> {
  try {
    return await read();
  } catch (error) {
    throw new TransportError(error instanceof Error ? error.message : 'Failed to read response body');
  }
}

/**
 * Default fetch-based transport
 */
export class FetchTransport implements HttpTransport {
  private readonly defaultHeaders: Record<string, string>;
  private readonly defaultTimeout: number;

  constructor(options: { defaultHeaders?: Record<string, string>; defaultTimeout?: number } = {}) {
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.defaultTimeout = options.defaultTimeout ?? 30000;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    return this.send(request, async (response) => {
      let data: unknown;
      try {
        data = await response.json();
      } catch (error) {
        if (error instanceof SyntaxError) {
          throw ServerError.invalidResponse(`body is not JSON (HTTP ${response.status})`);
        }
        throw error;
      }
      return { status: response.status, headers: collectHeaders(response), data };
    });
  }

  async download(request: HttpRequest): Promise<DownloadResponse> {
    return this.send(request, async (response) => ({
      status: response.status,
      headers: collectHeaders(response),
      text: () => readBody(() => response.text()),
      arrayBuffer: () => readBody(() => response.arrayBuffer()),
      bytes: async () => new Uint8Array(await readBody(() => response.arrayBuffer())),
      cancel: () => readBody(async () => response.body?.cancel()),
    }));
  }

  private async send<T>(request: HttpRequest, handle: (response: Response) => Promise<T>): Promise<T> {
    const timeout = request.timeout ?? this.defaultTimeout;
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);

    const callerSignal = request.signal;
    const onAbort = (): void => controller.abort();
    if (callerSignal?.aborted) {
      clearTimeout(timeoutId);
      throw TransportError.cancelled();
    }
    callerSignal?.addEventListener('abort', onAbort, { once: true });

    try {
      const encoded = request.multipart ? await encodeBody(request.multipart) : undefined;
      const response = await fetch(buildUrl(request.url, request.query), {
        method: request.method,
        headers: { ...this.defaultHeaders, ...request.headers, ...encoded?.headers },
        body: encoded?.body,
        duplex: 'half',
        signal: controller.signal,
      });
      return await handle(response);
    } catch (error) {
      if (error instanceof PCloudError) throw error;
      if (timedOut) throw TransportError.timeout(timeout);
      if (callerSignal?.aborted) throw TransportError.cancelled();
      throw new TransportError(error instanceof Error ? error.message : 'Unknown network error');
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener('abort', onAbort);
    }
  }
}
