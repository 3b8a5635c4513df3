/**
 * Tests for credentials and the shared session lifecycle.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { attach, fromOAuth, login, SessionCredentials } from '../auth';
import { PCloudClient } from '../client';
import { PCLOUD_HOSTS, SecretString } from '../config';
import { AuthenticationError, ConfigurationError, TransportError } from '../errors';
import { MockHttpTransport, createMockFileMetadata } from '../mocks';
import { InMemoryLogger } from '../observability';
import type { HttpRequest, HttpResponse } from '../transport';

const HOST = PCLOUD_HOSTS.european;

function mockLogin<T extends MockHttpTransport>(transport: T): T {
  transport
    .mock('/userinfo', { data: { result: 0, auth: 'test-session-token', userid: 1, email: 'user@example.com' } })
    .mock('/getapiserver', { data: { result: 0, api: ['eapi.pcloud.com'], binapi: ['ebinapi.pcloud.com'] } })
    .mock('/logout', { data: { result: 0, auth_deleted: true } });
  return transport;
}

/**
 * Records when each request starts and ends
 */
class OrderedTransport extends MockHttpTransport {
  readonly events: string[] = [];

  async request(request: HttpRequest): Promise<HttpResponse> {
    const path = new URL(request.url).pathname;
    this.events.push(`start ${path}`);
    try {
      return await super.request(request);
    } finally {
      this.events.push(`end ${path}`);
    }
  }
}

describe('credentials', () => {
  describe('attach', () => {
    it('should send OAuth tokens as a bearer header', () => {
      const request = attach(fromOAuth('test-token'), { method: 'GET', url: `${HOST}/stat` });

      expect(request.headers).toEqual({ Authorization: 'Bearer test-token' });
      expect(request.query).toBeUndefined();
    });

    it('should send session tokens as the auth parameter', () => {
      const session = SessionCredentials.fromToken({
        host: HOST,
        token: new SecretString('test-session-token'),
        transport: new MockHttpTransport(),
        logger: new InMemoryLogger(),
      });

      const request = attach(session, { method: 'GET', url: `${HOST}/stat`, query: { fileid: '5' } });

      expect(request.query).toEqual({ fileid: '5', auth: 'test-session-token' });
      expect(request.headers).toBeUndefined();
    });
  });

  describe('login', () => {
    let transport: MockHttpTransport;

    beforeEach(() => {
      transport = new MockHttpTransport();
    });

    it('should exchange username and password for a session token', async () => {
      mockLogin(transport);

      const session = await login({ host: HOST, username: 'user@example.com', password: 'test-secret', transport });

      expect(session.scheme).toBe('session');
      expect(session.shareCount).toBe(1);
      const [call] = transport.getCallsTo('/userinfo');
      expect(call.request.query).toEqual({ getauth: 1, username: 'user@example.com', password: 'test-secret' });
      expect(call.url).toBe(`${HOST}/userinfo?getauth=1&username=user%40example.com&password=test-secret`);
    });

    it('should raise AuthenticationError with the server reason', async () => {
      transport.mock('/userinfo', { data: { result: 2000, error: 'Log in failed.' } });

      const error = await login({ host: HOST, username: 'user@example.com', password: 'wrong', transport }).catch(
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({ reason: 'Log in failed.', resultCode: 2000 });
    });

    it('should fall back to the documented reason', async () => {
      transport.mock('/userinfo', { data: { result: 4000 } });

      await expect(
        login({ host: HOST, username: 'user@example.com', password: 'test-secret', transport })
      ).rejects.toThrow('Authentication error: Too many login tries from this IP address');
    });

    it('should propagate network failures as TransportError', async () => {
      transport.mock('/userinfo', { error: new TransportError('connection refused') });

      await expect(
        login({ host: HOST, username: 'user@example.com', password: 'test-secret', transport })
      ).rejects.toThrow(TransportError);
    });
  });
});

describe('session sharing', () => {
  let transport: MockHttpTransport;

  beforeEach(() => {
    transport = mockLogin(new MockHttpTransport());
  });

  async function connect(logger = new InMemoryLogger()): Promise<PCloudClient> {
    return PCloudClient.withUsernameAndPassword(HOST, 'user@example.com', 'test-secret', { transport, logger });
  }

  it('should log out once, after the last of n+1 handles is released', async () => {
    const client = await connect();
    const clones = Array.from({ length: 5 }, () => client.clone());

    await client.release();
    for (const clone of clones.slice(0, -1)) {
      await clone.release();
      expect(transport.getCallsTo('/logout')).toHaveLength(0);
    }
    await clones[4].release();

    const logouts = transport.getCallsTo('/logout');
    expect(logouts).toHaveLength(1);
    expect(logouts[0].request.query).toEqual({ auth: 'test-session-token' });
  });

  it('should log out once whatever the release order', async () => {
    const orders = [
      [0, 1, 2, 3],
      [3, 2, 1, 0],
      [2, 0, 3, 1],
      [1, 3, 0, 2],
    ];

    for (const order of orders) {
      transport.reset();
      mockLogin(transport);
      const client = await connect();
      const handles = [client, client.clone(), client.clone(), client.clone()];

      for (const index of order) {
        await handles[index].release();
      }

      expect(transport.getCallsTo('/logout')).toHaveLength(1);
    }
  });

  it('should log out once when all handles are released concurrently', async () => {
    const client = await connect();
    const clone = client.clone();
    const handles = [client, clone, clone.clone(), client.clone()];

    await Promise.all(handles.map((handle) => handle.release()));

    expect(transport.getCallsTo('/logout')).toHaveLength(1);
  });

  it('should count a repeated release of one handle once', async () => {
    const client = await connect();
    const clone = client.clone();

    await client.release();
    await client.release();
    expect(transport.getCallsTo('/logout')).toHaveLength(0);

    await clone.release();
    expect(transport.getCallsTo('/logout')).toHaveLength(1);
  });

  it('should reuse the login token on every clone', async () => {
    transport.mock('/stat', { data: { result: 0, metadata: createMockFileMetadata() } });
    const client = await connect();
    const clone = client.clone();

    await clone.files.metadata(100);

    expect(transport.getCallsTo('/userinfo')).toHaveLength(1);
    expect(transport.getCallsTo('/stat')[0].request.query).toEqual({ fileid: '100', auth: 'test-session-token' });
  });

  it('should wait for in-flight requests before logging out', async () => {
    const ordered = mockLogin(new OrderedTransport());
    ordered.mock('/stat', { data: { result: 0, metadata: createMockFileMetadata() }, delay: 20 });
    const client = await PCloudClient.withUsernameAndPassword(HOST, 'user@example.com', 'test-secret', {
      transport: ordered,
    });

    const pending = client.files.metadata(100);
    await client.release();
    await pending;

    expect(ordered.events).toEqual([
      'start /userinfo',
      'end /userinfo',
      'start /getapiserver',
      'end /getapiserver',
      'start /stat',
      'end /stat',
      'start /logout',
      'end /logout',
    ]);
  });

  it('should finish a download started before the last release', async () => {
    transport
      .mock('/getfilelink', { data: { result: 0, path: '/dl/a.txt', hosts: ['c1.pcloud.com'] }, delay: 20 })
      .mock('c1.pcloud.com', { body: 'hello' });
    const client = await connect();

    const pending = client.downloadFile('/test-folder/a.txt');
    await client.release();
    const response = await pending;

    expect(await response.text()).toBe('hello');
    expect(transport.getCalls().map((call) => new URL(call.url).pathname)).toEqual([
      '/userinfo',
      '/getapiserver',
      '/getfilelink',
      '/dl/a.txt',
      '/logout',
    ]);
  });

  it('should refuse a download on a released handle', async () => {
    const client = await connect();
    await client.release();

    await expect(client.downloadFile('/test-folder/a.txt')).rejects.toThrow(ConfigurationError);
    expect(transport.getCallsTo('/getfilelink')).toHaveLength(0);
  });

  it('should refuse requests and clones on a released handle', async () => {
    const client = await connect();
    const clone = client.clone();
    await client.release();

    expect(client.released).toBe(true);
    expect(() => client.clone()).toThrow(ConfigurationError);
    await expect(client.files.metadata(100)).rejects.toThrow(ConfigurationError);
    expect(clone.released).toBe(false);
    await clone.release();
  });

  it('should swallow a failed logout and log a warning', async () => {
    transport.reset();
    transport
      .mock('/userinfo', { data: { result: 0, auth: 'test-session-token' } })
      .mock('/logout', { error: new TransportError('connection refused') });
    const logger = new InMemoryLogger();
    const client = await connect(logger);

    await expect(client.release()).resolves.toBeUndefined();

    const warnings = logger.getLogsByLevel('warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toBe('Logout failed; session token left to expire');
    expect(warnings[0].context.error).toBe('Transport error: connection refused');
  });

  it('should treat a rejected logout as failed', async () => {
    transport.reset();
    transport
      .mock('/userinfo', { data: { result: 0, auth: 'test-session-token' } })
      .mock('/logout', { data: { result: 1000, error: 'Log in required.' } });
    const logger = new InMemoryLogger();
    const client = await connect(logger);

    await client.release();

    expect(logger.getLogsByLevel('warn')[0].context.error).toBe('Server error: Log in required.');
  });
});

describe('API server selection', () => {
  let transport: MockHttpTransport;

  beforeEach(() => {
    transport = new MockHttpTransport()
      .mock('/userinfo', { data: { result: 0, auth: 'test-session-token' } })
      .mock('/logout', { data: { result: 0, auth_deleted: true } });
  });

  it('should move to the nearest API server after login', async () => {
    transport
      .mock('/getapiserver', { data: { result: 0, api: ['eapi3.pcloud.com', 'eapi.pcloud.com'] } })
      .mock('/stat', { data: { result: 0, metadata: createMockFileMetadata() } });

    const client = await PCloudClient.withUsernameAndPassword(HOST, 'user@example.com', 'test-secret', { transport });
    await client.files.metadata(100);

    expect(client.host).toBe('https://eapi3.pcloud.com');
    expect(client.checksumAlgorithms()).toEqual(['sha1', 'sha256']);
    expect(transport.getCallsTo('/getapiserver')[0].url).toBe(`${HOST}/getapiserver?auth=test-session-token`);
    expect(transport.getCallsTo('/stat')[0].request.url).toBe('https://eapi3.pcloud.com/stat');

    await client.release();
    expect(transport.getCallsTo('/logout')).toHaveLength(1);
  });

  it('should keep the configured host when the server list is unavailable', async () => {
    transport.mock('/getapiserver', { data: { result: 5000, error: 'Internal error. Try again later.' } });

    const client = await PCloudClient.withUsernameAndPassword(HOST, 'user@example.com', 'test-secret', { transport });

    expect(client.host).toBe(HOST);
    await client.release();
  });

  it('should skip the lookup when asked to', async () => {
    const client = await PCloudClient.withUsernameAndPassword(HOST, 'user@example.com', 'test-secret', {
      transport,
      useBestApiServer: false,
    });

    expect(transport.getCallsTo('/getapiserver')).toHaveLength(0);
    await client.release();
  });

  it('should log out again when the lookup cannot be sent', async () => {
    transport.mock('/getapiserver', { error: new TransportError('connection reset') });

    await expect(
      PCloudClient.withUsernameAndPassword(HOST, 'user@example.com', 'test-secret', { transport })
    ).rejects.toThrow('Transport error: connection reset');
    expect(transport.getCallsTo('/logout')).toHaveLength(1);
  });
});

describe('OAuth credentials', () => {
  it('should never log out', async () => {
    const transport = new MockHttpTransport();
    const client = PCloudClient.withOAuth(HOST, 'test-token', { transport });
    const clone = client.clone();

    await client.release();
    await clone.release();

    expect(transport.getCalls()).toHaveLength(0);
  });
});
