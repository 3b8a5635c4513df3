/**
 * Configuration management for the pCloud client.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import type { Logger } from '../observability';

/**
 * pCloud data regions. Accounts live in exactly one of them.
 */
export type PCloudRegion = 'international' | 'european';

/**
 * Documented API endpoints per region
 */
export const PCLOUD_HOSTS: Readonly<Record<PCloudRegion, string>> = {
  international: 'https://api.pcloud.com',
  european: 'https://eapi.pcloud.com',
};

const REGION_BY_HOST: Readonly<Record<string, PCloudRegion>> = {
  'https://api.pcloud.com': 'international',
  'https://eapi.pcloud.com': 'european',
};

/**
 * Region of a documented host, undefined for any other host
 */
export function regionForHost(host: string): PCloudRegion | undefined {
  return REGION_BY_HOST[host];
}

export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Wrapper that keeps secrets out of logs and serialized output
 */
export class SecretString {
  constructor(private readonly value: string) {}

  /**
   * Exposes the secret value
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

/**
 * Absolute https origin; a trailing slash is dropped
 */
export const HostSchema = z
  .string()
  .url()
  .transform((value, ctx) => {
    const url = new URL(value);
    if (url.protocol !== 'https:') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'host must use HTTPS' });
      return z.NEVER;
    }
    if (url.pathname !== '/' || url.search !== '' || url.hash !== '') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'host must not carry a path, query or fragment' });
      return z.NEVER;
    }
    return url.origin;
  });

const PCloudConfigSchema = z.object({
  host: HostSchema,
  region: z.enum(['international', 'european']).optional(),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  userAgent: z.string().min(1).optional(),
});

/**
 * pCloud client configuration
 */
export interface PCloudConfig {
  /** API origin, e.g. https://eapi.pcloud.com */
  host: string;
  /** region override for hosts outside the documented pair */
  region?: PCloudRegion;
  /** per-request timeout in ms */
  timeout: number;
  userAgent?: string;
  logger?: Logger;
}

export type PCloudConfigInput = Omit<PCloudConfig, 'timeout'> & { timeout?: number };

/**
 * Validate configuration input and apply defaults
 */
export function validateConfig(input: PCloudConfigInput): PCloudConfig {
  const result = PCloudConfigSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid pCloud configuration (${detail})`, result.error.issues);
  }
  return { ...result.data, logger: input.logger };
}

/**
 * Configuration builder
 */
export class PCloudConfigBuilder {
  private config: Partial<PCloudConfigInput> = {};

  host(host: string): this {
    this.config.host = host;
    return this;
  }

  region(region: PCloudRegion): this {
    this.config.region = region;
    return this;
  }

  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  logger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  build(): PCloudConfig {
    const { host, ...rest } = this.config;
    if (host === undefined) {
      throw new ConfigurationError('host is required');
    }
    return validateConfig({ ...rest, host });
  }
}

/**
 * Create configuration from environment variables
 */
export function createConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  prefix = 'PCLOUD_'
): PCloudConfig {
  const builder = new PCloudConfigBuilder().host(env[`${prefix}HOST`] ?? PCLOUD_HOSTS.international);

  const region = env[`${prefix}REGION`];
  if (region !== undefined) {
    if (region !== 'international' && region !== 'european') {
      throw new ConfigurationError(`${prefix}REGION must be "international" or "european"`);
    }
    builder.region(region);
  }

  const timeout = env[`${prefix}TIMEOUT_MS`];
  if (timeout !== undefined) {
    builder.timeout(Number(timeout));
  }

  return builder.build();
}
