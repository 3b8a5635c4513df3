/**
 * Account information and API server selection.
 */

import { ServerError } from '../errors';
import { ApiServersSchema, UserInfo, UserInfoSchema } from '../types';
import type { CallOptions, RequestExecutor } from './base';

export async function getUserInfo(executor: RequestExecutor, options?: CallOptions): Promise<UserInfo> {
  return executor.get('userinfo', {}, UserInfoSchema, options);
}

/**
 * Nearest API host for the account, as an https origin
 */
export async function getBestApiServer(executor: RequestExecutor, options?: CallOptions): Promise<string> {
  const { api } = await executor.get('getapiserver', {}, ApiServersSchema, options);
  const best = api[0];
  if (best === undefined) {
    throw ServerError.invalidResponse('no api server returned');
  }
  return `https://${best}`;
}
