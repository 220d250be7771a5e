import PocketBase, { AsyncAuthStore } from 'pocketbase';
import { info } from 'firebase-functions/logger';
import type { AppConfig } from '../../config/app-config.js';
import type { SettingsStore } from '../../settings/settings-store.js';
import type { AuthSession } from '../types.js';

export const AUTH_STORE_KEY = 'pb_auth';

/**
 * Keeps the PocketBase auth token in the settings store so a restarted
 * client resumes its session.
 */
export async function createPersistentAuthStore(store: SettingsStore): Promise<AsyncAuthStore> {
  const initial = await store.getString(AUTH_STORE_KEY);
  return new AsyncAuthStore({
    save: async (serialized) => store.setString(AUTH_STORE_KEY, serialized),
    clear: async () => store.remove(AUTH_STORE_KEY),
    ...(initial !== null && { initial }),
  });
}

/**
 * Builds the shared client. Every request gets the configured timeout.
 * Auto-cancellation is off so parallel requests to one endpoint all complete.
 */
export function createPocketBaseClient(
  config: Pick<AppConfig, 'pocketbaseUrl' | 'requestTimeoutMs'>,
  authStore?: AsyncAuthStore
): PocketBase {
  const pb = new PocketBase(config.pocketbaseUrl, authStore);
  pb.autoCancellation(false);
  pb.beforeSend = (url, options) => {
    options.signal = options.signal ?? AbortSignal.timeout(config.requestTimeoutMs);
    return { url, options };
  };
  info('PocketBase client created', { url: config.pocketbaseUrl });
  return pb;
}

export function pocketBaseSession(pb: PocketBase): AuthSession {
  return {
    currentUserId: () => (pb.authStore.isValid ? (pb.authStore.record?.id ?? null) : null),
    isAuthenticated: () => pb.authStore.isValid,
  };
}
