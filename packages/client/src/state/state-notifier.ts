import { BehaviorSubject, type Observable } from 'rxjs';

/**
 * Holds one immutable state value and publishes every replacement.
 * Updates after `dispose()` are ignored.
 */
export class StateNotifier<S> {
  private readonly subject: BehaviorSubject<S>;
  private disposed = false;

  constructor(initial: S) {
    this.subject = new BehaviorSubject(initial);
  }

  get state$(): Observable<S> {
    return this.subject.asObservable();
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  getState(): S {
    return this.subject.getValue();
  }

  /**
   * Calls `listener` with the current state and every later one.
   */
  subscribe(listener: (state: S) => void): () => void {
    const subscription = this.subject.subscribe(listener);
    return () => subscription.unsubscribe();
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.subject.complete();
  }

  protected setState(next: S): void {
    if (this.disposed) {
      return;
    }
    this.subject.next(next);
  }
}
