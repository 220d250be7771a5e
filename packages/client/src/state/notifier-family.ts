import { filterKey } from './filter-key.js';

interface Disposable {
  dispose(): void;
}

/**
 * One notifier per structurally equal filter. Notifiers are created on
 * first `get` and live until disposed here.
 */
export class NotifierFamily<F extends object, N extends Disposable> {
  private readonly notifiers = new Map<string, N>();

  constructor(private readonly create: (filter: F) => N) {}

  get size(): number {
    return this.notifiers.size;
  }

  get(filter: F): N {
    const key = filterKey(filter);
    const existing = this.notifiers.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const notifier = this.create(filter);
    this.notifiers.set(key, notifier);
    return notifier;
  }

  dispose(filter: F): void {
    const key = filterKey(filter);
    this.notifiers.get(key)?.dispose();
    this.notifiers.delete(key);
  }

  disposeAll(): void {
    for (const notifier of this.notifiers.values()) {
      notifier.dispose();
    }
    this.notifiers.clear();
  }
}
