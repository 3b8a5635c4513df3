/**
 * Download links, public links and content downloads.
 */

import { PCloudResultCode, ServerError } from '../errors';
import { Identifier, identifierParam } from '../identifier';
import type { DownloadResponse } from '../transport';
import {
  DownloadLink,
  DownloadLinkSchema,
  formatPCloudDate,
  PublicFileLink,
  PublicFileLinkSchema,
} from '../types';
import { CallOptions, flag, param, RequestBuilder, RequestExecutor } from './base';

/**
 * Content url of a download link; the first host is the preferred one
 */
export function downloadUrl(link: DownloadLink): string {
  const host = link.hosts[0];
  if (host === undefined) {
    throw ServerError.fromResult(PCloudResultCode.ProvideUrl, 'Download link carries no host');
  }
  return `https://${host}${link.path}`;
}

/**
 * Fetch the content behind a download link. Content hosts take no credentials.
 */
export async function downloadLink(
  executor: RequestExecutor,
  link: DownloadLink,
  options?: CallOptions
): Promise<DownloadResponse> {
  const url = downloadUrl(link);
  executor.logger.debug('Downloading file link', { url });
  const response = await executor.fetchLink(url, options);
  if (response.status >= 400) {
    await response.cancel();
    throw ServerError.fromStatus(response.status);
  }
  return response;
}

/**
 * Requests a short-lived download link for a file
 */
export class FileLinkRequestBuilder extends RequestBuilder {
  private revision?: number;

  constructor(
    executor: RequestExecutor,
    private readonly file: Identifier
  ) {
    super(executor, 'File link');
  }

  withRevision(revisionId: number): this {
    this.assertOpen();
    this.revision = revisionId;
    return this;
  }

  async get(options?: CallOptions): Promise<DownloadLink> {
    this.consume();
    return this.executor.get(
      'getfilelink',
      { ...param(identifierParam(this.file, 'file')), revisionid: this.revision },
      DownloadLinkSchema,
      options
    );
  }
}

/**
 * Creates a public link to a file
 */
export class PublicLinkRequestBuilder extends RequestBuilder {
  private expiresAt?: Date;
  private downloadLimit?: number;
  private trafficLimit?: number;
  private withShortLink = false;
  private password?: string;
  private revision?: number;

  constructor(
    executor: RequestExecutor,
    private readonly file: Identifier
  ) {
    super(executor, 'Public link');
  }

  expire(value: Date): this {
    this.assertOpen();
    this.expiresAt = value;
    return this;
  }

  maxDownloads(value: number): this {
    this.assertOpen();
    this.downloadLimit = value;
    return this;
  }

  /** traffic limit in bytes */
  maxTraffic(value: number): this {
    this.assertOpen();
    this.trafficLimit = value;
    return this;
  }

  shortLink(value = true): this {
    this.assertOpen();
    this.withShortLink = value;
    return this;
  }

  linkPassword(value: string): this {
    this.assertOpen();
    this.password = value;
    return this;
  }

  withRevision(revisionId: number): this {
    this.assertOpen();
    this.revision = revisionId;
    return this;
  }

  async get(options?: CallOptions): Promise<PublicFileLink> {
    this.consume();
    return this.executor.get(
      'getfilepublink',
      {
        ...param(identifierParam(this.file, 'file')),
        expire: this.expiresAt ? formatPCloudDate(this.expiresAt) : undefined,
        maxdownloads: this.downloadLimit,
        maxtraffic: this.trafficLimit,
        shortlink: flag(this.withShortLink),
        linkpassword: this.password,
        revisionid: this.revision,
      },
      PublicFileLinkSchema,
      options
    );
  }
}

/**
 * Download link for a public link code; fileId picks a file inside a public folder
 */
export async function getPublicDownloadLink(
  executor: RequestExecutor,
  code: string,
  fileId?: number,
  options?: CallOptions
): Promise<DownloadLink> {
  return executor.get('getpublinkdownload', { code, fileid: fileId }, DownloadLinkSchema, options);
}
