import type { AppError, Result, User } from '@periolifts/shared';
import type { AuthBackend } from '../backends/types.js';
import { StateNotifier } from './state-notifier.js';

export interface AuthState {
  user: User | null;
  isLoading: boolean;
  error: AppError | null;
  isAuthenticated: boolean;
}

function authState(user: User | null, isLoading = false, error: AppError | null = null): AuthState {
  return { user, isLoading, error, isAuthenticated: user !== null };
}

/**
 * Signed-in user as observable state. Follows the backend's auth changes,
 * including sign-outs that happen elsewhere.
 */
export class AuthNotifier extends StateNotifier<AuthState> {
  private readonly unsubscribe: () => void;

  constructor(private readonly auth: AuthBackend) {
    super(authState(auth.currentUser()));
    this.unsubscribe = auth.onAuthChange((user) => {
      this.setState(authState(user, this.getState().isLoading));
    });
  }

  restoreSession(): Promise<Result<User | null>> {
    return this.run(() => this.auth.restoreSession());
  }

  signIn(email: string, password: string): Promise<Result<User>> {
    return this.run(() => this.auth.signIn(email, password));
  }

  signUp(email: string, password: string, name: string): Promise<Result<User>> {
    return this.run(() => this.auth.signUp(email, password, name));
  }

  signOut(): Promise<Result<void>> {
    return this.run(() => this.auth.signOut());
  }

  clearError(): void {
    this.setState({ ...this.getState(), error: null });
  }

  override dispose(): void {
    this.unsubscribe();
    super.dispose();
  }

  private async run<T>(action: () => Promise<Result<T>>): Promise<Result<T>> {
    this.setState({ ...this.getState(), isLoading: true, error: null });
    const result = await action();
    this.setState(
      authState(this.auth.currentUser(), false, result.success ? null : result.error)
    );
    return result;
  }
}
