import type { AppConfig } from '../config.js';
import type { AccessStore, AccessValidator } from '../types.js';
import { OfflineValidator } from './offlineValidator.js';
import { OnlineValidator, type RemoteAuthority } from './onlineValidator.js';
import { HttpRemoteAuthority } from './remoteAuthority.js';

export interface AccessValidatorDeps {
  store: AccessStore;
  remote?: RemoteAuthority;
  clock?: () => Date;
}

/**
 * Offline mode answers from the store alone. Online mode asks the remote
 * authority and keeps the offline validator as its fallback.
 */
export const createAccessValidator = (
  validation: AppConfig['validation'],
  deps: AccessValidatorDeps
): AccessValidator => {
  const offline = new OfflineValidator(deps.store, {
    antiPassbackWindowMs: validation.antiPassbackWindowMs,
    logDenials: validation.logDenials,
    clock: deps.clock
  });

  if (validation.mode === 'offline') {
    return offline;
  }

  const remote = deps.remote ?? new HttpRemoteAuthority({ url: validation.online.url, apiKey: validation.online.apiKey });
  return new OnlineValidator(remote, offline, {
    timeoutMs: validation.online.timeoutMs,
    retries: validation.online.retries,
    retryDelayMs: validation.online.retryDelayMs
  });
};
