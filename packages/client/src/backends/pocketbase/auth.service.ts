import type PocketBase from 'pocketbase';
import type { RecordModel } from 'pocketbase';
import { info, warn } from 'firebase-functions/logger';
import {
  fail,
  ok,
  signInSchema,
  signUpSchema,
  validateFirst,
  type Result,
  type User,
} from '@periolifts/shared';
import { COLLECTIONS } from '../../config/app-config.js';
import { toAuthError } from '../../errors/auth-messages.js';
import { toAppError } from '../../errors/error-mapper.js';
import { parseUser } from '../parsers.js';
import { readOptionalString } from '../type-guards.js';
import type { AuthBackend, AuthChangeListener, AuthSession } from '../types.js';
import { pocketBaseSession } from './pocketbase-client.js';

function toUser(record: RecordModel): User {
  const created = readOptionalString(record, 'created');
  const updated = readOptionalString(record, 'updated');
  return parseUser(
    {
      id: record.id,
      ...(created !== undefined && { created }),
      ...(updated !== undefined && { updated }),
    },
    record
  );
}

/**
 * Email/password auth against the `users` collection. The session lives in
 * the client's auth store, which may be persisted (see
 * createPersistentAuthStore).
 */
export class PocketBaseAuthService implements AuthBackend {
  private readonly session: AuthSession;

  constructor(private readonly pb: PocketBase) {
    this.session = pocketBaseSession(pb);
  }

  private get users() {
    return this.pb.collection(COLLECTIONS.users);
  }

  isAuthenticated(): boolean {
    return this.session.isAuthenticated();
  }

  currentUserId(): string | null {
    return this.session.currentUserId();
  }

  currentUser(): User | null {
    const record = this.pb.authStore.record;
    if (!this.pb.authStore.isValid || record === null) {
      return null;
    }
    return toUser(record);
  }

  async signIn(email: string, password: string): Promise<Result<User>> {
    const valid = validateFirst(signInSchema, { email, password });
    if (!valid.success) {
      return valid;
    }

    try {
      const auth = await this.users.authWithPassword(valid.data.email, valid.data.password);
      const user = toUser(auth.record);
      info('User signed in', { userId: user.id });
      return ok(user);
    } catch (error) {
      return fail(toAuthError(toAppError(error, 'Sign in failed')));
    }
  }

  /**
   * Creates the account, then signs in with the same credentials.
   */
  async signUp(email: string, password: string, name: string): Promise<Result<User>> {
    const valid = validateFirst(signUpSchema, { email, password, name });
    if (!valid.success) {
      return valid;
    }

    try {
      await this.users.create({
        email: valid.data.email,
        password: valid.data.password,
        passwordConfirm: valid.data.password,
        name: valid.data.name,
      });
    } catch (error) {
      return fail(toAuthError(toAppError(error, 'Sign up failed')));
    }
    return this.signIn(valid.data.email, valid.data.password);
  }

  async signOut(): Promise<Result<void>> {
    const userId = this.currentUserId();
    this.pb.authStore.clear();
    info('User signed out', { userId });
    return ok(undefined);
  }

  /**
   * Renews the token of a restored session. An expired or revoked session
   * is cleared.
   */
  async refreshSession(): Promise<Result<User>> {
    try {
      const auth = await this.users.authRefresh();
      return ok(toUser(auth.record));
    } catch (error) {
      const appError = toAppError(error, 'Session refresh failed');
      warn('Session refresh failed', { code: appError.code });
      if (appError.code === 'AUTHENTICATION_ERROR' || appError.code === 'NOT_FOUND') {
        this.pb.authStore.clear();
      }
      return fail(toAuthError(appError));
    }
  }

  /**
   * Revalidates a persisted session. Resolves to null when nobody is
   * signed in or the stored session was rejected.
   */
  async restoreSession(): Promise<Result<User | null>> {
    if (!this.isAuthenticated()) {
      return ok(null);
    }
    const refreshed = await this.refreshSession();
    if (!refreshed.success && !this.isAuthenticated()) {
      return ok(null);
    }
    return refreshed;
  }

  onAuthChange(listener: AuthChangeListener): () => void {
    return this.pb.authStore.onChange((_token, record) => {
      listener(record !== null && this.pb.authStore.isValid ? toUser(record) : null);
    });
  }
}
