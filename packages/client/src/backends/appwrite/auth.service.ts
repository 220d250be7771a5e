import { ID, type Models } from 'node-appwrite';
import { info } from 'firebase-functions/logger';
import {
  fail,
  ok,
  signInSchema,
  signUpSchema,
  validateFirst,
  type Result,
  type User,
} from '@periolifts/shared';
import { toAuthError } from '../../errors/auth-messages.js';
import { toAppError } from '../../errors/error-mapper.js';
import { parseUser } from '../parsers.js';
import type { AuthBackend, AuthChangeListener } from '../types.js';
import type { AppwriteContext } from './appwrite-client.js';

function toUser(account: Models.User<Models.Preferences>): User {
  return parseUser(
    { id: account.$id, created: account.$createdAt, updated: account.$updatedAt },
    { ...account.prefs, ...account }
  );
}

/**
 * Email/password sessions on the Appwrite account API. The signed-in user
 * is held in memory; `restoreSession` reloads it from an existing session.
 */
export class AppwriteAuthService implements AuthBackend {
  private user: User | null = null;
  private readonly listeners = new Set<AuthChangeListener>();

  constructor(private readonly appwrite: Pick<AppwriteContext, 'client' | 'account'>) {}

  isAuthenticated(): boolean {
    return this.user !== null;
  }

  currentUserId(): string | null {
    return this.user?.id ?? null;
  }

  currentUser(): User | null {
    return this.user;
  }

  async restoreSession(): Promise<Result<User | null>> {
    try {
      const account = await this.appwrite.account.get();
      this.setUser(toUser(account));
      return ok(this.user);
    } catch (error) {
      const appError = toAppError(error, 'Failed to restore session');
      if (appError.code === 'AUTHENTICATION_ERROR') {
        this.setUser(null);
        return ok(null);
      }
      return fail(appError);
    }
  }

  async signIn(email: string, password: string): Promise<Result<User>> {
    const valid = validateFirst(signInSchema, { email, password });
    if (!valid.success) {
      return valid;
    }

    try {
      const session = await this.appwrite.account.createEmailPasswordSession(
        valid.data.email,
        valid.data.password
      );
      if (session.secret !== '') {
        this.appwrite.client.setSession(session.secret);
      }
      const user = toUser(await this.appwrite.account.get());
      this.setUser(user);
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
      await this.appwrite.account.create(
        ID.unique(),
        valid.data.email,
        valid.data.password,
        valid.data.name
      );
    } catch (error) {
      return fail(toAuthError(toAppError(error, 'Sign up failed')));
    }
    return this.signIn(valid.data.email, valid.data.password);
  }

  async signOut(): Promise<Result<void>> {
    const userId = this.currentUserId();
    try {
      await this.appwrite.account.deleteSession('current');
    } catch (error) {
      return fail(toAppError(error, 'Sign out failed'));
    }
    this.setUser(null);
    info('User signed out', { userId });
    return ok(undefined);
  }

  onAuthChange(listener: AuthChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private setUser(user: User | null): void {
    this.user = user;
    for (const listener of [...this.listeners]) {
      listener(user);
    }
  }
}
