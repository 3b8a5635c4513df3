/**
 * Tests for configuration.
 */

import { describe, it, expect } from 'vitest';
import {
  createConfigFromEnv,
  DEFAULT_TIMEOUT_MS,
  PCloudConfigBuilder,
  regionForHost,
  SecretString,
  validateConfig,
} from '../config';
import { ConfigurationError } from '../errors';
import { PCloudClient } from '../client';
import { MockHttpTransport } from '../mocks';

describe('config', () => {
  describe('validateConfig', () => {
    it('should apply defaults and normalize the host', () => {
      expect(validateConfig({ host: 'https://eapi.pcloud.com/' })).toEqual({
        host: 'https://eapi.pcloud.com',
        timeout: DEFAULT_TIMEOUT_MS,
        logger: undefined,
      });
    });

    it('should reject malformed and insecure hosts', () => {
      for (const host of ['not a url', 'http://api.pcloud.com', 'https://api.pcloud.com/v1', '']) {
        expect(() => validateConfig({ host })).toThrow(ConfigurationError);
      }
    });

    it('should carry the zod issues', () => {
      try {
        validateConfig({ host: 'http://api.pcloud.com' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error).toMatchObject({ issues: [{ message: 'host must use HTTPS' }] });
      }
    });

    it('should reject non-positive timeouts', () => {
      expect(() => validateConfig({ host: 'https://api.pcloud.com', timeout: 0 })).toThrow(ConfigurationError);
    });
  });

  describe('PCloudConfigBuilder', () => {
    it('should build a validated config', () => {
      const config = new PCloudConfigBuilder()
        .host('https://proxy.example.com')
        .region('european')
        .timeout(5000)
        .userAgent('backup-job/1.0')
        .build();

      expect(config).toMatchObject({
        host: 'https://proxy.example.com',
        region: 'european',
        timeout: 5000,
        userAgent: 'backup-job/1.0',
      });
    });

    it('should require a host', () => {
      expect(() => new PCloudConfigBuilder().build()).toThrow('Configuration error: host is required');
    });
  });

  describe('createConfigFromEnv', () => {
    it('should read host, region and timeout', () => {
      const config = createConfigFromEnv({
        PCLOUD_HOST: 'https://eapi.pcloud.com',
        PCLOUD_REGION: 'european',
        PCLOUD_TIMEOUT_MS: '1500',
      });

      expect(config).toMatchObject({ host: 'https://eapi.pcloud.com', region: 'european', timeout: 1500 });
    });

    it('should default to the international host', () => {
      expect(createConfigFromEnv({}).host).toBe('https://api.pcloud.com');
    });

    it('should reject unknown regions', () => {
      expect(() => createConfigFromEnv({ PCLOUD_REGION: 'mars' })).toThrow(ConfigurationError);
    });
  });

  it('should map the documented hosts to regions', () => {
    expect(regionForHost('https://api.pcloud.com')).toBe('international');
    expect(regionForHost('https://eapi.pcloud.com')).toBe('european');
    expect(regionForHost('https://example.com')).toBeUndefined();
  });

  it('should keep secrets out of strings and JSON', () => {
    const secret = new SecretString('test-secret');

    expect(secret.expose()).toBe('test-secret');
    expect(`${secret}`).toBe('[REDACTED]');
    expect(JSON.stringify({ secret })).toBe('{"secret":"[REDACTED]"}');
  });
});

describe('withOAuth', () => {
  it('should not touch the network', () => {
    const transport = new MockHttpTransport();

    const client = PCloudClient.withOAuth('https://eapi.pcloud.com', 'test-token', { transport });

    expect(client.authScheme).toBe('oauth');
    expect(client.host).toBe('https://eapi.pcloud.com');
    expect(transport.getCalls()).toHaveLength(0);
  });

  it('should fail on a malformed host', () => {
    expect(() => PCloudClient.withOAuth('eapi.pcloud.com', 'test-token')).toThrow(ConfigurationError);
  });
});
