/**
 * pCloud API client.
 */

import { AuthScheme, Credentials, fromOAuth, login } from '../auth';
import { ChecksumAlgorithm, checksumAlgorithmsForHost } from '../checksum';
import { PCloudConfig, PCloudConfigInput, regionForHost, validateConfig } from '../config';
import { ConfigurationError, ServerError } from '../errors';
import type { IdentifierLike } from '../identifier';
import { Logger, NoopLogger } from '../observability';
import {
  AccountService,
  CallOptions,
  EventsService,
  FilesService,
  FoldersService,
  LinksService,
  RequestExecutor,
  UploadRequestBuilder,
} from '../services';
import {
  DownloadResponse,
  FetchTransport,
  HttpMethod,
  HttpTransport,
  MultipartFilePart,
  QueryParams,
} from '../transport';
import { decodeResponse, ResponseSchema } from './response';

export * from './response';

/**
 * Client options
 */
export interface ClientOptions {
  config: PCloudConfig;
  credentials: Credentials;
  transport?: HttpTransport;
}

/**
 * Options of the factory constructors
 */
export interface ClientFactoryOptions extends Omit<PCloudConfigInput, 'host'> {
  transport?: HttpTransport;
  /** after login, move to the account's nearest API server (default true) */
  useBestApiServer?: boolean;
}

/**
 * Default transport for a configuration
 */
export function createTransport(config: PCloudConfig): HttpTransport {
  return new FetchTransport({
    defaultTimeout: config.timeout,
    defaultHeaders: config.userAgent ? { 'User-Agent': config.userAgent } : {},
  });
}

/**
 * pCloud API client.
 *
 * Clones share the credentials of the original; a login session is logged out
 * once every clone has been released.
 *
 * @example
 * ```typescript
 * const client = await PCloudClient.withUsernameAndPassword(PCLOUD_HOSTS.european, user, password);
 * try {
 *   await client.uploadFileIntoFolder('/notes').withFile('todo.txt', 'buy milk').upload();
 * } finally {
 *   await client.release();
 * }
 * ```
 */
export class PCloudClient implements RequestExecutor {
  readonly config: PCloudConfig;
  readonly logger: Logger;
  readonly folders: FoldersService;
  readonly files: FilesService;
  readonly links: LinksService;
  readonly events: EventsService;
  readonly account: AccountService;
  private readonly transport: HttpTransport;
  private readonly credentials: Credentials;

  constructor(options: ClientOptions) {
    this.config = options.config;
    this.credentials = options.credentials;
    this.transport = options.transport ?? createTransport(options.config);
    this.logger = (options.config.logger ?? new NoopLogger()).child({ host: options.config.host });

    this.folders = new FoldersService(this);
    this.files = new FilesService(this);
    this.links = new LinksService(this);
    this.events = new EventsService(this);
    this.account = new AccountService(this);
  }

  /**
   * Client on a caller-owned OAuth2 token. Makes no network call.
   */
  static withOAuth(host: string, token: string, options: ClientFactoryOptions = {}): PCloudClient {
    const { transport, ...rest } = options;
    const config = validateConfig({ ...rest, host });
    return new PCloudClient({ config, credentials: fromOAuth(token), transport });
  }

  /**
   * Client on a new login session
   */
  static async withUsernameAndPassword(
    host: string,
    username: string,
    password: string,
    options: ClientFactoryOptions = {}
  ): Promise<PCloudClient> {
    const { transport: given, useBestApiServer = true, ...rest } = options;
    const config = validateConfig({ ...rest, host });
    const transport = given ?? createTransport(config);
    const credentials = await login({
      host: config.host,
      username,
      password,
      transport,
      logger: config.logger,
      timeout: config.timeout,
    });
    const client = new PCloudClient({ config, credentials, transport });
    return useBestApiServer ? client.moveToBestApiServer() : client;
  }

  get host(): string {
    return this.config.host;
  }

  get authScheme(): AuthScheme {
    return this.credentials.scheme;
  }

  get released(): boolean {
    return this.credentials.released;
  }

  /**
   * Another handle on the same credentials. No I/O.
   */
  clone(): PCloudClient {
    this.ensureActive();
    return new PCloudClient({
      config: this.config,
      credentials: this.credentials.clone(),
      transport: this.transport,
    });
  }

  /**
   * Give up this handle. Releasing twice is a no-op; the promise never rejects.
   */
  release(): Promise<void> {
    return this.credentials.release();
  }

  /**
   * Algorithms the host guarantees in checksum responses
   */
  checksumAlgorithms(): readonly ChecksumAlgorithm[] {
    return checksumAlgorithmsForHost(this.config.host, this.config.region);
  }

  /**
   * Start an upload of one or more files into a folder
   */
  uploadFileIntoFolder(folder: IdentifierLike): UploadRequestBuilder {
    return this.files.upload(folder);
  }

  /**
   * Download the current revision of a file. The body is left to the caller.
   */
  async downloadFile(file: IdentifierLike, options?: CallOptions): Promise<DownloadResponse> {
    this.ensureActive();
    // the session stays alive until the content request has been answered
    return this.credentials.track(
      (async () => {
        const link = await this.links.downloadLinkFor(file).get(options);
        return this.links.download(link, options);
      })()
    );
  }

  async get<T>(method: string, params: QueryParams, schema: ResponseSchema<T>, options?: CallOptions): Promise<T> {
    return this.call('GET', method, params, schema, undefined, options);
  }

  async post<T>(method: string, params: QueryParams, schema: ResponseSchema<T>, options?: CallOptions): Promise<T> {
    return this.call('POST', method, params, schema, undefined, options);
  }

  async upload<T>(
    method: string,
    params: QueryParams,
    parts: MultipartFilePart[],
    schema: ResponseSchema<T>,
    options?: CallOptions
  ): Promise<T> {
    return this.call('POST', method, params, schema, parts, options);
  }

  async fetchLink(url: string, options?: CallOptions): Promise<DownloadResponse> {
    return this.transport.download({
      method: 'GET',
      url,
      timeout: options?.timeout ?? this.config.timeout,
      signal: options?.signal,
    });
  }

  private async call<T>(
    httpMethod: HttpMethod,
    method: string,
    params: QueryParams,
    schema: ResponseSchema<T>,
    multipart: MultipartFilePart[] | undefined,
    options: CallOptions | undefined
  ): Promise<T> {
    this.ensureActive();
    this.logger.debug('Calling pCloud method', { method, httpMethod });

    const request = this.credentials.attach({
      method: httpMethod,
      url: `${this.config.host}/${method}`,
      query: params,
      multipart,
      timeout: options?.timeout ?? this.config.timeout,
      signal: options?.signal,
    });

    const response = await this.credentials.track(this.transport.request(request));
    return decodeResponse(response, schema);
  }

  /**
   * Same session on the nearest API server. The checksum policy keeps the
   * region of the configured host.
   */
  private async moveToBestApiServer(): Promise<PCloudClient> {
    try {
      const best = await this.account.bestApiServer();
      if (best === this.host) return this;
      const config = validateConfig({
        ...this.config,
        host: best,
        region: this.config.region ?? regionForHost(this.config.host),
      });
      this.logger.debug('Using nearest API server', { apiServer: config.host });
      return new PCloudClient({ config, credentials: this.credentials, transport: this.transport });
    } catch (error) {
      if (error instanceof ServerError) {
        this.logger.debug('Keeping configured API server', { error: error.message });
        return this;
      }
      await this.release();
      throw error;
    }
  }

  private ensureActive(): void {
    if (this.credentials.released) {
      throw ConfigurationError.released();
    }
  }
}
