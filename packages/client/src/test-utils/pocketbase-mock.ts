import { vi } from 'vitest';
import type PocketBase from 'pocketbase';
import { ClientResponseError, type ListResult, type RecordModel } from 'pocketbase';

export interface MockRecordService {
  getList: ReturnType<typeof vi.fn>;
  getFullList: ReturnType<typeof vi.fn>;
  getOne: ReturnType<typeof vi.fn>;
  create: ReturnType<typeof vi.fn>;
  update: ReturnType<typeof vi.fn>;
  delete: ReturnType<typeof vi.fn>;
  authWithPassword: ReturnType<typeof vi.fn>;
  authRefresh: ReturnType<typeof vi.fn>;
}

type AuthListener = (token: string, record: RecordModel | null) => void;

export interface MockAuthStore {
  isValid: boolean;
  token: string;
  record: RecordModel | null;
  clear: ReturnType<typeof vi.fn>;
  save: ReturnType<typeof vi.fn>;
  onChange: ReturnType<typeof vi.fn>;
}

export interface PocketBaseMocks {
  mockPb: {
    collection: ReturnType<typeof vi.fn>;
    authStore: MockAuthStore;
  };
  authStore: MockAuthStore;
  collection(name: string): MockRecordService;
  emitAuthChange(): void;
}

export function createMockRecord(
  id: string,
  data: Record<string, unknown>,
  collectionName = 'test'
): RecordModel {
  return {
    collectionId: `${collectionName}_id`,
    collectionName,
    created: '2026-01-01 00:00:00.000Z',
    updated: '2026-01-01 00:00:00.000Z',
    ...data,
    id,
  };
}

export function createMockListResult(
  items: RecordModel[],
  page = 1,
  perPage = 30
): ListResult<RecordModel> {
  return {
    page,
    perPage,
    totalItems: items.length,
    totalPages: items.length === 0 ? 0 : 1,
    items,
  };
}

export function createNotFoundError(): ClientResponseError {
  return new ClientResponseError({
    status: 404,
    response: { code: 404, message: "The requested resource wasn't found.", data: {} },
  });
}

export function createMockRecordService(collectionName: string): MockRecordService {
  return {
    getList: vi.fn().mockResolvedValue(createMockListResult([])),
    getFullList: vi.fn().mockResolvedValue([]),
    getOne: vi.fn().mockRejectedValue(createNotFoundError()),
    create: vi.fn(async (body: Record<string, unknown>) =>
      createMockRecord('generated-id', body, collectionName)
    ),
    update: vi.fn(async (id: string, body: Record<string, unknown>) =>
      createMockRecord(id, body, collectionName)
    ),
    delete: vi.fn().mockResolvedValue(true),
    authWithPassword: vi.fn(),
    authRefresh: vi.fn(),
  };
}

/**
 * In-process stand-in for a PocketBase client. Collections are created on
 * first access and reused, so tests can program them before or after the
 * service under test touches them.
 */
export function createPocketBaseMocks(userId: string | null = 'user-1'): PocketBaseMocks {
  const collections = new Map<string, MockRecordService>();
  const listeners: AuthListener[] = [];

  const getCollection = (name: string): MockRecordService => {
    const existing = collections.get(name);
    if (existing !== undefined) {
      return existing;
    }
    const created = createMockRecordService(name);
    collections.set(name, created);
    return created;
  };

  const authStore: MockAuthStore = {
    isValid: userId !== null,
    token: userId === null ? '' : 'test-token',
    record:
      userId === null
        ? null
        : createMockRecord(userId, { email: 'lifter@example.com', name: 'Test Lifter' }, 'users'),
    clear: vi.fn(),
    save: vi.fn(),
    onChange: vi.fn((listener: AuthListener) => {
      listeners.push(listener);
      return () => {
        const index = listeners.indexOf(listener);
        if (index >= 0) {
          listeners.splice(index, 1);
        }
      };
    }),
  };

  const emitAuthChange = (): void => {
    for (const listener of [...listeners]) {
      listener(authStore.token, authStore.record);
    }
  };

  authStore.clear.mockImplementation(() => {
    authStore.isValid = false;
    authStore.token = '';
    authStore.record = null;
    emitAuthChange();
  });
  authStore.save.mockImplementation((token: string, record: RecordModel | null) => {
    authStore.isValid = token !== '';
    authStore.token = token;
    authStore.record = record;
    emitAuthChange();
  });

  return {
    mockPb: {
      collection: vi.fn((name: string) => getCollection(name)),
      authStore,
    },
    authStore,
    collection: getCollection,
    emitAuthChange,
  };
}

export function asPocketBase(mocks: PocketBaseMocks): PocketBase {
  return mocks.mockPb as unknown as PocketBase;
}
