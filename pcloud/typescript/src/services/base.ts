/**
 * Shared plumbing for request builders.
 */

import { ConfigurationError } from '../errors';
import type { IdentifierParam } from '../identifier';
import type { Logger } from '../observability';
import type { DownloadResponse, MultipartFilePart, QueryParams } from '../transport';
import type { ResponseSchema } from '../client/response';

/**
 * Per-call transport overrides
 */
export interface CallOptions {
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * What builders need from the client: authenticated calls decoded against a schema
 */
export interface RequestExecutor {
  readonly logger: Logger;
  get<T>(method: string, params: QueryParams, schema: ResponseSchema<T>, options?: CallOptions): Promise<T>;
  post<T>(method: string, params: QueryParams, schema: ResponseSchema<T>, options?: CallOptions): Promise<T>;
  upload<T>(
    method: string,
    params: QueryParams,
    parts: MultipartFilePart[],
    schema: ResponseSchema<T>,
    options?: CallOptions
  ): Promise<T>;
  /** unauthenticated fetch of a content url */
  fetchLink(url: string, options?: CallOptions): Promise<DownloadResponse>;
}

/**
 * Base for single-use builders: setters are chainable until the terminal call,
 * which can run once.
 */
export abstract class RequestBuilder {
  private executed = false;

  protected constructor(
    protected readonly executor: RequestExecutor,
    private readonly operation: string
  ) {}

  get isExecuted(): boolean {
    return this.executed;
  }

  protected assertOpen(): void {
    if (this.executed) {
      throw ConfigurationError.alreadyExecuted(this.operation);
    }
  }

  protected consume(): void {
    this.assertOpen();
    this.executed = true;
  }
}

/**
 * pCloud flags are present with value 1 or absent
 */
export function flag(enabled: boolean): number | undefined {
  return enabled ? 1 : undefined;
}

export function param(identifier: IdentifierParam): QueryParams {
  return { [identifier.name]: identifier.value };
}

/**
 * Wait for the given time; resolves early when the signal aborts
 */
export function pause(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
