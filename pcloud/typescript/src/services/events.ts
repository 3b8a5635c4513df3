/**
 * Account event feed (`diff`).
 * see https://docs.pcloud.com/methods/general/diff.html
 */

import { TransportError } from '../errors';
import type { QueryParams } from '../transport';
import { Diff, DiffEntry, DiffSchema, formatPCloudDate } from '../types';
import { CallOptions, flag, RequestBuilder, RequestExecutor } from './base';

/**
 * Lists or follows the events of the account
 */
export class DiffRequestBuilder extends RequestBuilder {
  private diffId?: number;
  private afterTime?: Date;
  private last?: number;
  private blocking = false;
  private blockTimeoutMs?: number;
  private batchLimit?: number;

  constructor(executor: RequestExecutor) {
    super(executor, 'Diff');
  }

  /** only events after this diff id */
  afterDiffId(value: number): this {
    this.assertOpen();
    this.diffId = value;
    return this;
  }

  /** only events after this time; ignored once a diff id is known */
  after(value: Date): this {
    this.assertOpen();
    this.afterTime = value;
    return this;
  }

  /** the given number of most recent events */
  onlyLast(value: number): this {
    this.assertOpen();
    this.last = value;
    return this;
  }

  /** wait for an event to arrive; only honoured together with a diff id */
  block(value = true): this {
    this.assertOpen();
    this.blocking = value;
    return this;
  }

  /** timeout of a blocking request, in ms */
  blockTimeout(ms: number): this {
    this.assertOpen();
    this.blockTimeoutMs = ms;
    return this;
  }

  /** upper bound of entries per batch; the server sends about 100 without it */
  limit(value: number): this {
    this.assertOpen();
    this.batchLimit = value;
    return this;
  }

  /**
   * Fetch one batch. Not every event may fit; continue from the returned diffid.
   */
  async get(options?: CallOptions): Promise<Diff> {
    this.consume();
    return this.fetch(this.diffId, this.blocking, options?.signal, options?.timeout);
  }

  /**
   * Follow the feed with blocking requests until the signal aborts. Timeouts of
   * an idle blocking request are skipped; any other error ends the stream.
   */
  stream(signal?: AbortSignal): AsyncIterable<DiffEntry> {
    this.consume();
    return this.follow(signal);
  }

  private async *follow(signal?: AbortSignal): AsyncGenerator<DiffEntry> {
    let cursor = this.diffId;

    while (!signal?.aborted) {
      let batch: Diff;
      try {
        batch = await this.fetch(cursor, true, signal, this.blockTimeoutMs);
      } catch (error) {
        if (error instanceof TransportError && error.kind === 'timeout') {
          this.executor.logger.debug('No events before timeout', { diffid: cursor });
          continue;
        }
        if (error instanceof TransportError && error.kind === 'cancelled' && signal?.aborted) {
          return;
        }
        throw error;
      }

      this.executor.logger.debug('Received events', { count: batch.entries.length });
      for (const entry of batch.entries) {
        if (cursor === undefined || entry.diffid > cursor) {
          yield entry;
        }
      }
      cursor = batch.diffid;
    }
  }

  private fetch(diffId: number | undefined, block: boolean, signal?: AbortSignal, timeout?: number): Promise<Diff> {
    const params: QueryParams = {
      diffid: diffId,
      // the server mixes up after and diffid when both are sent
      after: diffId === undefined && this.afterTime ? formatPCloudDate(this.afterTime) : undefined,
      last: this.last,
      limit: this.batchLimit,
      block: flag(block && diffId !== undefined),
    };
    return this.executor.get('diff', params, DiffSchema, { signal, timeout: timeout ?? this.blockTimeoutMs });
  }
}

/**
 * Pass on only the entries accepted by the predicate
 */
export async function* filterEvents(
  source: AsyncIterable<DiffEntry>,
  predicate: (entry: DiffEntry) => boolean
): AsyncGenerator<DiffEntry> {
  for await (const entry of source) {
    if (predicate(entry)) {
      yield entry;
    }
  }
}
