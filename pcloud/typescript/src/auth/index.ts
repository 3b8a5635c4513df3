/**
 * Credentials and session lifecycle for pCloud.
 *
 * OAuth tokens are caller-owned and need no teardown. Session tokens come from
 * a login call and are shared by every clone of a client; the last release
 * logs the session out.
 */

import { SecretString } from '../config';
import { AuthenticationError, ConfigurationError, describeResultCode, ServerError } from '../errors';
import { Logger, NoopLogger } from '../observability';
import { HttpRequest, HttpTransport } from '../transport';
import { LogoutResponseSchema, UserInfoSchema } from '../types';
import { decodeBody, readEnvelope } from '../client/response';

export type AuthScheme = 'oauth' | 'session';

/**
 * A handle on credentials. Each handle is released at most once.
 */
export interface Credentials {
  readonly scheme: AuthScheme;
  readonly released: boolean;
  /** add the auth parameter or header to an outgoing request */
  attach(request: HttpRequest): HttpRequest;
  /** register a dispatched request so teardown waits for it */
  track<T>(operation: Promise<T>): Promise<T>;
  clone(): Credentials;
  release(): Promise<void>;
}

/**
 * Long-lived OAuth2 access token
 */
export class OAuthCredentials implements Credentials {
  readonly scheme = 'oauth';
  private isReleased = false;

  constructor(private readonly token: SecretString) {}

  get released(): boolean {
    return this.isReleased;
  }

  attach(request: HttpRequest): HttpRequest {
    return {
      ...request,
      headers: { ...request.headers, Authorization: `Bearer ${this.token.expose()}` },
    };
  }

  track<T>(operation: Promise<T>): Promise<T> {
    return operation;
  }

  clone(): OAuthCredentials {
    return new OAuthCredentials(this.token);
  }

  async release(): Promise<void> {
    this.isReleased = true;
  }
}

interface SessionOptions {
  host: string;
  token: SecretString;
  transport: HttpTransport;
  logger: Logger;
  timeout?: number;
}

/**
 * Server-issued token shared by all handles of one login
 */
class SharedSession {
  private handles = 1;
  private readonly inflight = new Set<Promise<unknown>>();

  constructor(private readonly options: SessionOptions) {}

  get token(): SecretString {
    return this.options.token;
  }

  get handleCount(): number {
    return this.handles;
  }

  retain(): void {
    if (this.handles === 0) {
      throw ConfigurationError.released();
    }
    this.handles += 1;
  }

  track<T>(operation: Promise<T>): Promise<T> {
    this.inflight.add(operation);
    const settle = (): void => {
      this.inflight.delete(operation);
    };
    void operation.then(settle, settle);
    return operation;
  }

  async release(): Promise<void> {
    this.handles -= 1;
    if (this.handles > 0) return;

    await Promise.allSettled([...this.inflight]);
    await this.logout();
  }

  private async logout(): Promise<void> {
    const { host, token, transport, logger, timeout } = this.options;
    try {
      const response = await transport.request({
        method: 'GET',
        url: `${host}/logout`,
        query: { auth: token.expose() },
        timeout,
      });
      const envelope = readEnvelope(response);
      if (envelope.result !== 0) {
        throw ServerError.fromResult(envelope.result, envelope.error);
      }
      const { auth_deleted: deleted } = decodeBody(response.data, LogoutResponseSchema);
      logger.info('Session logged out', { host, deleted });
    } catch (error) {
      logger.warn('Logout failed; session token left to expire', {
        host,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Handle on a shared login session
 */
export class SessionCredentials implements Credentials {
  readonly scheme = 'session';
  private isReleased = false;

  private constructor(private readonly session: SharedSession) {}

  /**
   * Wrap an already issued session token. The new session has one handle.
   */
  static fromToken(options: SessionOptions): SessionCredentials {
    return new SessionCredentials(new SharedSession(options));
  }

  get released(): boolean {
    return this.isReleased;
  }

  /**
   * Number of live handles sharing the session
   */
  get shareCount(): number {
    return this.session.handleCount;
  }

  attach(request: HttpRequest): HttpRequest {
    return {
      ...request,
      query: { ...request.query, auth: this.session.token.expose() },
    };
  }

  track<T>(operation: Promise<T>): Promise<T> {
    return this.session.track(operation);
  }

  clone(): SessionCredentials {
    if (this.isReleased) {
      throw ConfigurationError.released();
    }
    this.session.retain();
    return new SessionCredentials(this.session);
  }

  /**
   * Give up this handle. Resolves once the logout of the last handle has been
   * attempted; never rejects.
   */
  async release(): Promise<void> {
    if (this.isReleased) return;
    this.isReleased = true;
    await this.session.release();
  }
}

/**
 * Credentials from a caller-supplied OAuth2 token
 */
export function fromOAuth(token: string): OAuthCredentials {
  return new OAuthCredentials(new SecretString(token));
}

export interface LoginOptions {
  host: string;
  username: string;
  password: string;
  transport: HttpTransport;
  logger?: Logger;
  timeout?: number;
}

/**
 * Exchange username and password for a session token
 */
export async function login(options: LoginOptions): Promise<SessionCredentials> {
  const { host, username, password, transport, timeout } = options;
  const logger = options.logger ?? new NoopLogger();

  const response = await transport.request({
    method: 'GET',
    url: `${host}/userinfo`,
    query: { getauth: 1, username, password },
    timeout,
  });

  const envelope = readEnvelope(response);
  if (envelope.result !== 0) {
    logger.warn('Login rejected', { host, result: envelope.result });
    throw new AuthenticationError(envelope.error ?? describeResultCode(envelope.result), envelope.result);
  }

  const info = decodeBody(response.data, UserInfoSchema);
  if (!info.auth) {
    throw ServerError.invalidResponse('login succeeded without an auth token');
  }

  logger.info('Session established', { host, userid: info.userid });
  return SessionCredentials.fromToken({
    host,
    token: new SecretString(info.auth),
    transport,
    logger,
    timeout,
  });
}

/**
 * Attach credentials to an outgoing request
 */
export function attach(credentials: Credentials, request: HttpRequest): HttpRequest {
  return credentials.attach(request);
}
