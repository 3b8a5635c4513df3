/**
 * Tests for the fetch-based transport.
 */

import { ReadableStream } from 'stream/web';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { buildUrl, FetchTransport, toBlob } from '../transport';
import { ServerError, TransportError } from '../errors';

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function stubFetch(handler: (...args: FetchArgs) => Promise<Response>) {
  const fetchMock = vi.fn(handler);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function hangUntilAborted(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
  });
}

function isAsyncIterable(value: unknown): value is AsyncIterable<Uint8Array> {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value;
}

async function* chunks(): AsyncGenerator<Uint8Array> {
  yield new TextEncoder().encode('hel');
  yield new TextEncoder().encode('lo');
}

describe('FetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should send query parameters and decode JSON', async () => {
    const fetchMock = stubFetch(async () => new Response(JSON.stringify({ result: 0, hosts: ['c1.pcloud.com'] })));
    const transport = new FetchTransport({ defaultHeaders: { 'User-Agent': 'test-agent' } });

    const response = await transport.request({
      method: 'GET',
      url: 'https://eapi.pcloud.com/getfilelink',
      query: { fileid: 5, revisionid: undefined },
    });

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ result: 0, hosts: ['c1.pcloud.com'] });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://eapi.pcloud.com/getfilelink?fileid=5');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({ 'User-Agent': 'test-agent' });
  });

  it('should send in-memory files as form data under their field and filename', async () => {
    const fetchMock = stubFetch(async () => new Response(JSON.stringify({ result: 0 })));
    const transport = new FetchTransport();

    await transport.request({
      method: 'POST',
      url: 'https://eapi.pcloud.com/uploadfile',
      multipart: [
        { field: 'part', filename: 'a.txt', payload: 'first' },
        { field: 'part', filename: 'b.txt', payload: new TextEncoder().encode('hello') },
      ],
    });

    const body = fetchMock.mock.calls[0][1]?.body;
    expect(body).toBeInstanceOf(FormData);
    if (!(body instanceof FormData)) return;
    const files = body.getAll('part');
    expect(files).toHaveLength(2);
    const [first, second] = files;
    if (typeof first === 'string' || typeof second === 'string') {
      throw new Error('expected file entries');
    }
    expect(first.name).toBe('a.txt');
    expect(await first.text()).toBe('first');
    expect(second.name).toBe('b.txt');
    expect(await second.text()).toBe('hello');
  });

  it('should start sending a streamed upload before its source is exhausted', async () => {
    let produced = 0;
    async function* source(): AsyncGenerator<Uint8Array> {
      for (let i = 0; i < 5; i++) {
        produced++;
        yield new TextEncoder().encode(`chunk${i}`);
      }
    }
    let producedAtSend = -1;
    let sent = '';
    let contentType: string | null = null;
    const fetchMock = stubFetch(async (_input, init) => {
      producedAtSend = produced;
      contentType = new Headers(init?.headers).get('content-type');
      const body = init?.body;
      if (isAsyncIterable(body)) {
        const decoder = new TextDecoder();
        for await (const chunk of body) {
          sent += decoder.decode(chunk, { stream: true });
        }
      }
      return new Response(JSON.stringify({ result: 0 }));
    });

    await new FetchTransport().request({
      method: 'POST',
      url: 'https://eapi.pcloud.com/uploadfile',
      multipart: [
        { field: 'part', filename: 'notes.txt', payload: 'first' },
        { field: 'part', filename: 'big.bin', payload: source() },
      ],
    });

    expect(producedAtSend).toBe(0);
    expect(fetchMock.mock.calls[0][1]?.duplex).toBe('half');
    const boundary = String(contentType).replace('multipart/form-data; boundary=', '');
    expect(boundary).toMatch(/^pcloud-/);
    expect(sent).toBe(
      `--${boundary}\r\n` +
        'Content-Disposition: form-data; name="part"; filename="notes.txt"\r\n' +
        'Content-Type: application/octet-stream\r\n\r\n' +
        'first\r\n' +
        `--${boundary}\r\n` +
        'Content-Disposition: form-data; name="part"; filename="big.bin"\r\n' +
        'Content-Type: application/octet-stream\r\n\r\n' +
        'chunk0chunk1chunk2chunk3chunk4\r\n' +
        `--${boundary}--\r\n`
    );
  });

  it('should map a timeout to TransportError', async () => {
    stubFetch(hangUntilAborted);
    const transport = new FetchTransport({ defaultTimeout: 10 });

    const error = await transport.request({ method: 'GET', url: 'https://eapi.pcloud.com/diff' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ kind: 'timeout', message: 'Transport error: Request timeout after 10ms' });
  });

  it('should map a caller abort to a cancelled TransportError', async () => {
    stubFetch(hangUntilAborted);
    const transport = new FetchTransport();
    const controller = new AbortController();

    const pending = transport.request({ method: 'GET', url: 'https://eapi.pcloud.com/diff', signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: 'cancelled' });
  });

  it('should not call fetch when already aborted', async () => {
    const fetchMock = stubFetch(async () => new Response(JSON.stringify({ result: 0 })));
    const controller = new AbortController();
    controller.abort();

    await expect(
      new FetchTransport().request({ method: 'GET', url: 'https://eapi.pcloud.com/stat', signal: controller.signal })
    ).rejects.toMatchObject({ kind: 'cancelled' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should map network failures to connection errors', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(
      new FetchTransport().request({ method: 'GET', url: 'https://eapi.pcloud.com/stat' })
    ).rejects.toMatchObject({ kind: 'connection', message: 'Transport error: fetch failed' });
  });

  it('should reject bodies that are not JSON', async () => {
    stubFetch(async () => new Response('<html>maintenance</html>', { status: 503 }));

    await expect(
      new FetchTransport().request({ method: 'GET', url: 'https://eapi.pcloud.com/stat' })
    ).rejects.toThrow(ServerError);
  });

  it('should hand back raw download bodies', async () => {
    stubFetch(async () => new Response('hello', { status: 200, headers: { 'Content-Type': 'text/plain' } }));

    const response = await new FetchTransport().download({ method: 'GET', url: 'https://c1.pcloud.com/abc/test.txt' });

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('text/plain');
    expect(await response.text()).toBe('hello');
  });

  it('should cancel a download body that will not be read', async () => {
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(new TextEncoder().encode('never read'));
      },
    });
    const cancel = vi.spyOn(body, 'cancel');
    stubFetch(async () => new Response(body, { status: 404 }));

    const response = await new FetchTransport().download({ method: 'GET', url: 'https://c1.pcloud.com/abc/gone.txt' });
    await response.cancel();

    expect(cancel).toHaveBeenCalledTimes(1);
  });
});

describe('transport helpers', () => {
  it('should skip undefined query values', () => {
    expect(buildUrl('https://eapi.pcloud.com/listfolder', { path: '/a b', recursive: 1, nofiles: undefined })).toBe(
      'https://eapi.pcloud.com/listfolder?path=%2Fa+b&recursive=1'
    );
  });

  it('should read every payload kind into a blob', async () => {
    const bytes = new TextEncoder().encode('hello');
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);

    expect(await (await toBlob('hello')).text()).toBe('hello');
    expect(await (await toBlob(bytes)).text()).toBe('hello');
    expect(await (await toBlob(buffer)).text()).toBe('hello');
    expect(await (await toBlob(new Blob(['hello']))).text()).toBe('hello');
    expect(await (await toBlob(chunks())).text()).toBe('hello');
  });
});
