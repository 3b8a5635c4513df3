/**
 * pCloud API client - TypeScript
 *
 * Typed asynchronous access to the pCloud REST API:
 * - OAuth2 and login-session authentication with shared, reference-counted sessions
 * - Files and folders addressed by path or id
 * - Multi-file uploads with per-file outcomes
 * - Region-aware checksum validation
 */

export * from './errors';
export * from './config';
export * from './types';
export * from './identifier';
export * from './observability';
export * from './transport';
export * from './auth';
export * from './checksum';
export * from './client';
export * from './services';

// Testing utilities
export * from './mocks';

import { PCloudClient } from './client';

export default PCloudClient;
