/**
 * Mocks for testing pCloud integrations.
 */

import { PCloudError, TransportError } from '../errors';
import { buildUrl, DownloadResponse, HttpRequest, HttpResponse, HttpTransport } from '../transport';

/**
 * Mock response configuration
 */
export interface MockResponse {
  /** decoded JSON body served by request() */
  data?: unknown;
  /** raw body served by download() */
  body?: string | Uint8Array;
  status?: number;
  headers?: Record<string, string>;
  delay?: number;
  /** fail instead of responding */
  error?: PCloudError;
}

/**
 * Mock request matcher
 */
export interface MockMatcher {
  /** substring or pattern of the url without query */
  url?: string | RegExp;
  method?: string;
  /** every listed query value must be present */
  query?: Record<string, string>;
}

export interface RecordedCall {
  /** full url including the query string */
  url: string;
  kind: 'request' | 'download';
  request: HttpRequest;
}

interface MockEntry {
  matcher: MockMatcher;
  response: MockResponse;
  once: boolean;
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(TransportError.cancelled());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Mock HTTP transport for testing
 */
export class MockHttpTransport implements HttpTransport {
  private mocks: MockEntry[] = [];
  private calls: RecordedCall[] = [];
  private cancelled = 0;
  private defaultResponse: MockResponse = { data: { result: 0 }, status: 200, headers: {} };

  /**
   * Add mock response
   */
  mock(matcher: MockMatcher | string, response: MockResponse): this {
    return this.add(matcher, response, false);
  }

  /**
   * Add mock response served to the first matching call only
   */
  mockOnce(matcher: MockMatcher | string, response: MockResponse): this {
    return this.add(matcher, response, true);
  }

  /**
   * Set default response
   */
  setDefaultResponse(response: MockResponse): this {
    this.defaultResponse = response;
    return this;
  }

  /**
   * Get all calls made
   */
  getCalls(): RecordedCall[] {
    return [...this.calls];
  }

  /**
   * Get calls whose url contains the given endpoint
   */
  getCallsTo(url: string | RegExp): RecordedCall[] {
    return this.calls.filter((call) => {
      const base = call.request.url;
      return typeof url === 'string' ? base.includes(url) : url.test(base);
    });
  }

  /**
   * Number of download bodies discarded unread
   */
  getCancelledDownloads(): number {
    return this.cancelled;
  }

  /**
   * Clear all mocks and calls
   */
  reset(): this {
    this.mocks = [];
    this.calls = [];
    this.cancelled = 0;
    return this;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.respond('request', request);
    return {
      status: response.status ?? 200,
      headers: response.headers ?? {},
      data: response.data ?? { result: 0 },
    };
  }

  async download(request: HttpRequest): Promise<DownloadResponse> {
    const response = await this.respond('download', request);
    const body = response.body ?? '';
    const bytes = typeof body === 'string' ? new TextEncoder().encode(body) : body;
    return {
      status: response.status ?? 200,
      headers: response.headers ?? {},
      text: async () => new TextDecoder().decode(bytes),
      arrayBuffer: async () => {
        const copy = new ArrayBuffer(bytes.byteLength);
        new Uint8Array(copy).set(bytes);
        return copy;
      },
      bytes: async () => bytes.slice(),
      cancel: async () => {
        this.cancelled++;
      },
    };
  }

  private add(matcher: MockMatcher | string, response: MockResponse, once: boolean): this {
    const normalized = typeof matcher === 'string' ? { url: matcher } : matcher;
    this.mocks.push({ matcher: normalized, response, once });
    return this;
  }

  private async respond(kind: RecordedCall['kind'], request: HttpRequest): Promise<MockResponse> {
    this.calls.push({ url: buildUrl(request.url, request.query), kind, request });

    if (request.signal?.aborted) {
      throw TransportError.cancelled();
    }

    const response = this.take(request) ?? this.defaultResponse;

    if (response.delay) {
      await wait(response.delay, request.signal);
    }
    if (response.error) {
      throw response.error;
    }
    return response;
  }

  private take(request: HttpRequest): MockResponse | undefined {
    const index = this.mocks.findIndex(({ matcher }) => this.matches(matcher, request));
    if (index < 0) return undefined;
    const entry = this.mocks[index];
    if (entry.once) {
      this.mocks.splice(index, 1);
    }
    return entry.response;
  }

  private matches(matcher: MockMatcher, request: HttpRequest): boolean {
    if (matcher.url) {
      const matched = typeof matcher.url === 'string' ? request.url.includes(matcher.url) : matcher.url.test(request.url);
      if (!matched) return false;
    }

    if (matcher.method && request.method !== matcher.method) {
      return false;
    }

    if (matcher.query) {
      for (const [key, value] of Object.entries(matcher.query)) {
        if (String(request.query?.[key]) !== value) return false;
      }
    }

    return true;
  }
}

export const MOCK_DATE = 'Wed, 25 Jan 2023 12:09:14 +0000';

/**
 * File metadata as sent by the server
 */
export function createMockFileMetadata(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    parentfolderid: 10,
    isfolder: false,
    ismine: true,
    isshared: false,
    name: 'test.txt',
    id: 'f100',
    fileid: 100,
    path: '/test-folder/test.txt',
    created: MOCK_DATE,
    modified: MOCK_DATE,
    icon: 'document',
    category: 4,
    thumb: false,
    size: 5,
    contenttype: 'text/plain',
    hash: 1234567890,
    ...overrides,
  };
}

/**
 * Folder metadata as sent by the server
 */
export function createMockFolderMetadata(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    parentfolderid: 0,
    isfolder: true,
    ismine: true,
    isshared: false,
    name: 'test-folder',
    id: 'd10',
    folderid: 10,
    path: '/test-folder',
    created: MOCK_DATE,
    modified: MOCK_DATE,
    icon: 'folder',
    thumb: false,
    ...overrides,
  };
}
