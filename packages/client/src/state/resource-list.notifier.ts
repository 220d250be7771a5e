import { warn } from 'firebase-functions/logger';
import type { PageRequest, Result } from '@periolifts/shared';
import {
  dataState,
  errorState,
  loadingState,
  type ResourceListState,
} from './resource-list-state.js';
import { StateNotifier } from './state-notifier.js';

/**
 * The remote operations one list needs. `fetchPage` receives the window
 * the notifier wants; sources may return items it already holds.
 */
export interface ResourceSource<T, F, C, U> {
  fetchPage(filter: F, request: PageRequest): Promise<Result<T[]>>;
  create(input: C): Promise<Result<T>>;
  update(id: string, input: U): Promise<Result<T>>;
  delete(id: string): Promise<Result<void>>;
}

export interface ResourceListOptions {
  pageSize: number;
  /** Where created items appear */
  insertAt: 'head' | 'tail';
  /** Name used in log messages */
  name: string;
}

/**
 * A live, paginated list for one immutable filter. Every change goes
 * through the source; a failed mutation leaves the last good list in an
 * error state.
 */
export class ResourceListNotifier<
  T extends { id: string },
  F,
  C,
  U = C,
> extends StateNotifier<ResourceListState<T>> {
  private generation = 0;
  private refreshing = false;
  private loadingMore = false;
  private more = true;

  constructor(
    protected readonly source: ResourceSource<T, F, C, U>,
    readonly filter: F,
    protected readonly options: ResourceListOptions
  ) {
    super(loadingState<T>());
    void this.refresh();
  }

  get items(): T[] {
    return this.getState().items;
  }

  get isLoading(): boolean {
    return this.refreshing || this.loadingMore;
  }

  get hasMore(): boolean {
    return this.more;
  }

  /**
   * Reloads the first page. Responses to earlier refreshes and to
   * in-flight `loadMore` calls are discarded.
   */
  async refresh(): Promise<void> {
    const generation = ++this.generation;
    this.refreshing = true;
    this.loadingMore = false;
    this.setState(loadingState(this.items));

    const result = await this.source.fetchPage(this.filter, {
      offset: 0,
      limit: this.options.pageSize,
    });
    if (generation !== this.generation) {
      return;
    }
    this.refreshing = false;

    if (result.success) {
      this.more = result.data.length >= this.options.pageSize;
      this.setState(dataState(result.data));
    } else {
      this.setState(errorState(result.error, this.items));
    }
  }

  async loadMore(): Promise<void> {
    if (this.isLoading || !this.more || this.isDisposed) {
      return;
    }
    const generation = this.generation;
    this.loadingMore = true;

    const result = await this.source.fetchPage(this.filter, {
      offset: this.items.length,
      limit: this.options.pageSize,
    });
    if (generation !== this.generation) {
      return;
    }
    this.loadingMore = false;

    if (!result.success) {
      warn(`${this.options.name}: loadMore failed`, {
        code: result.error.code,
        message: result.error.message,
      });
      return;
    }
    const known = new Set(this.items.map((item) => item.id));
    const fresh = result.data.filter((item) => !known.has(item.id));
    this.more = result.data.length >= this.options.pageSize;
    this.setState(dataState([...this.items, ...fresh]));
  }

  async create(input: C): Promise<Result<T>> {
    const result = await this.source.create(input);
    if (result.success) {
      const rest = this.items.filter((item) => item.id !== result.data.id);
      this.setState(
        dataState(
          this.options.insertAt === 'head' ? [result.data, ...rest] : [...rest, result.data]
        )
      );
    } else {
      this.setState(errorState(result.error, this.items));
    }
    return result;
  }

  async update(id: string, input: U): Promise<Result<T>> {
    return this.replaceWith(await this.source.update(id, input));
  }

  async delete(id: string): Promise<Result<void>> {
    const result = await this.source.delete(id);
    if (result.success) {
      this.setState(dataState(this.items.filter((item) => item.id !== id)));
    } else {
      this.setState(errorState(result.error, this.items));
    }
    return result;
  }

  /**
   * Puts a changed item in place of the one with the same id.
   */
  protected replaceWith(result: Result<T>): Result<T> {
    if (result.success) {
      this.setState(
        dataState(this.items.map((item) => (item.id === result.data.id ? result.data : item)))
      );
    } else {
      this.setState(errorState(result.error, this.items));
    }
    return result;
  }
}
