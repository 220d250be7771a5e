import { describe, it, expect, vi } from 'vitest';
import { warn } from 'firebase-functions/logger';
import { NetworkError, ValidationError, fail, ok, type Result } from '@periolifts/shared';
import { ResourceListNotifier, type ResourceSource } from './resource-list.notifier.js';
import { flushPromises } from '../test-utils/flush.js';

interface Item {
  id: string;
  name: string;
}

interface Filter {
  search?: string;
}

const item = (id: string, name = `Item ${id}`): Item => ({ id, name });
const items = (from: number, to: number): Item[] =>
  Array.from({ length: to - from + 1 }, (_, index) => item(String(from + index)));

function createSource() {
  return {
    fetchPage: vi.fn<ResourceSource<Item, Filter, string, string>['fetchPage']>(),
    create: vi.fn<ResourceSource<Item, Filter, string, string>['create']>(),
    update: vi.fn<ResourceSource<Item, Filter, string, string>['update']>(),
    delete: vi.fn<ResourceSource<Item, Filter, string, string>['delete']>(),
  };
}

async function setup(
  firstPage: Item[] = items(1, 3),
  options: { pageSize?: number; insertAt?: 'head' | 'tail' } = {}
) {
  const source = createSource();
  source.fetchPage.mockResolvedValueOnce(ok(firstPage));
  const notifier = new ResourceListNotifier<Item, Filter, string>(
    source,
    { search: 'bench' },
    { pageSize: options.pageSize ?? 3, insertAt: options.insertAt ?? 'tail', name: 'items' }
  );
  await flushPromises();
  return { source, notifier };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('ResourceListNotifier', () => {
  describe('initial load', () => {
    it('should start loading and then publish the first page', async () => {
      const source = createSource();
      const page = deferred<Result<Item[]>>();
      source.fetchPage.mockReturnValueOnce(page.promise);

      const notifier = new ResourceListNotifier<Item, Filter, string>(
        source,
        { search: 'bench' },
        { pageSize: 3, insertAt: 'tail', name: 'items' }
      );

      expect(notifier.getState()).toEqual({ status: 'loading', items: [] });
      expect(notifier.isLoading).toBe(true);
      expect(source.fetchPage).toHaveBeenCalledWith({ search: 'bench' }, { offset: 0, limit: 3 });

      page.resolve(ok(items(1, 2)));
      await flushPromises();

      expect(notifier.getState()).toEqual({ status: 'data', items: items(1, 2) });
      expect(notifier.isLoading).toBe(false);
      expect(notifier.hasMore).toBe(false);
    });

    it('should publish an error with an empty list when the first page fails', async () => {
      const source = createSource();
      const error = new NetworkError('Network request failed');
      source.fetchPage.mockResolvedValueOnce(fail(error));

      const notifier = new ResourceListNotifier<Item, Filter, string>(
        source,
        {},
        { pageSize: 3, insertAt: 'tail', name: 'items' }
      );
      await flushPromises();

      expect(notifier.getState()).toEqual({ status: 'error', error, items: [] });
      expect(source.fetchPage).toHaveBeenCalledTimes(1);
    });
  });

  describe('refresh', () => {
    it('should keep the previous items while loading', async () => {
      const { source, notifier } = await setup();
      const states: string[] = [];
      notifier.subscribe((state) => states.push(`${state.status}:${state.items.length}`));
      source.fetchPage.mockResolvedValueOnce(ok(items(1, 3)));

      await notifier.refresh();

      expect(states).toEqual(['data:3', 'loading:3', 'data:3']);
    });

    it('should yield the same list as an independent fetch when nothing changed', async () => {
      const { source, notifier } = await setup();
      const before = notifier.items;
      source.fetchPage.mockResolvedValueOnce(ok(items(1, 3)));

      await notifier.refresh();

      expect(notifier.items).toEqual(before);
    });

    it('should discard a response from an older refresh', async () => {
      const { source, notifier } = await setup();
      const slow = deferred<Result<Item[]>>();
      source.fetchPage
        .mockReturnValueOnce(slow.promise)
        .mockResolvedValueOnce(ok([item('fresh')]));

      const first = notifier.refresh();
      await notifier.refresh();
      slow.resolve(ok([item('stale')]));
      await first;

      expect(notifier.items).toEqual([item('fresh')]);
    });

    it('should discard an in-flight loadMore once a refresh starts', async () => {
      const { source, notifier } = await setup();
      const more = deferred<Result<Item[]>>();
      source.fetchPage.mockReturnValueOnce(more.promise).mockResolvedValueOnce(ok(items(1, 3)));

      const loading = notifier.loadMore();
      await notifier.refresh();
      more.resolve(ok(items(4, 6)));
      await loading;

      expect(notifier.items).toEqual(items(1, 3));
      expect(notifier.isLoading).toBe(false);
    });
  });

  describe('loadMore', () => {
    it('should append by offset and skip ids already present', async () => {
      const { source, notifier } = await setup();
      source.fetchPage.mockResolvedValueOnce(ok([item('3'), item('4'), item('5')]));

      await notifier.loadMore();

      expect(source.fetchPage).toHaveBeenLastCalledWith(
        { search: 'bench' },
        { offset: 3, limit: 3 }
      );
      expect(notifier.items.map((entry) => entry.id)).toEqual(['1', '2', '3', '4', '5']);
      expect(notifier.hasMore).toBe(true);
    });

    it('should stop when a short page arrives', async () => {
      const { source, notifier } = await setup();
      source.fetchPage.mockResolvedValueOnce(ok([item('4')]));

      await notifier.loadMore();

      expect(notifier.hasMore).toBe(false);
    });

    it('should not call the source when there is nothing more', async () => {
      const { source, notifier } = await setup(items(1, 2));
      const state = notifier.getState();

      await notifier.loadMore();

      expect(source.fetchPage).toHaveBeenCalledTimes(1);
      expect(notifier.getState()).toBe(state);
    });

    it('should ignore a second call while one is in flight', async () => {
      const { source, notifier } = await setup();
      const more = deferred<Result<Item[]>>();
      source.fetchPage.mockReturnValueOnce(more.promise);

      const first = notifier.loadMore();
      await notifier.loadMore();
      more.resolve(ok(items(4, 5)));
      await first;

      expect(source.fetchPage).toHaveBeenCalledTimes(2);
      expect(notifier.items).toHaveLength(5);
    });

    it('should keep the list and log a warning when a page fails', async () => {
      const { source, notifier } = await setup();
      const state = notifier.getState();
      source.fetchPage.mockResolvedValueOnce(fail(new NetworkError('Network request failed')));

      await notifier.loadMore();

      expect(notifier.getState()).toBe(state);
      expect(warn).toHaveBeenCalledWith('items: loadMore failed', {
        code: 'NETWORK_ERROR',
        message: 'Network request failed',
      });
      expect(notifier.isLoading).toBe(false);
    });
  });

  describe('mutations', () => {
    it('should append a created item at the tail', async () => {
      const { source, notifier } = await setup();
      source.create.mockResolvedValueOnce(ok(item('new')));

      const result = await notifier.create('New');

      expect(result).toEqual(ok(item('new')));
      expect(notifier.items.map((entry) => entry.id)).toEqual(['1', '2', '3', 'new']);
    });

    it('should insert a created item at the head', async () => {
      const { source, notifier } = await setup(items(1, 3), { insertAt: 'head' });
      source.create.mockResolvedValueOnce(ok(item('new')));

      await notifier.create('New');

      expect(notifier.items.map((entry) => entry.id)).toEqual(['new', '1', '2', '3']);
    });

    it('should replace an updated item in place', async () => {
      const { source, notifier } = await setup();
      source.update.mockResolvedValueOnce(ok(item('2', 'Renamed')));

      await notifier.update('2', 'Renamed');

      expect(source.update).toHaveBeenCalledWith('2', 'Renamed');
      expect(notifier.items).toEqual([item('1'), item('2', 'Renamed'), item('3')]);
    });

    it('should remove a deleted item', async () => {
      const { source, notifier } = await setup();
      source.delete.mockResolvedValueOnce(ok(undefined));

      await notifier.delete('2');

      expect(notifier.items.map((entry) => entry.id)).toEqual(['1', '3']);
    });

    it('should keep the last good list when a mutation fails', async () => {
      const { source, notifier } = await setup();
      const error = new ValidationError('Workout name cannot be empty');
      source.create.mockResolvedValueOnce(fail(error));

      const result = await notifier.create('');

      expect(result).toEqual(fail(error));
      expect(notifier.getState()).toEqual({ status: 'error', error, items: items(1, 3) });
    });
  });

  describe('dispose', () => {
    it('should complete the stream and ignore late responses', async () => {
      const { source, notifier } = await setup();
      const late = deferred<Result<Item[]>>();
      source.fetchPage.mockReturnValueOnce(late.promise);
      const complete = vi.fn();
      notifier.state$.subscribe({ complete });

      const refreshing = notifier.refresh();
      notifier.dispose();
      late.resolve(ok([item('late')]));
      await refreshing;

      expect(complete).toHaveBeenCalledTimes(1);
      expect(notifier.isDisposed).toBe(true);
      expect(notifier.items).toEqual(items(1, 3));
    });
  });
});
