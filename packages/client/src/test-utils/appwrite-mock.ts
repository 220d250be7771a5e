import { vi } from 'vitest';
import {
  AppwriteException,
  type Account,
  type Client,
  type Databases,
  type Models,
} from 'node-appwrite';
import type { AppwriteContext } from '../backends/appwrite/appwrite-client.js';
import type { AuthSession } from '../backends/types.js';

export const TEST_DATABASE_ID = 'test-db';

export interface MockDatabases {
  listDocuments: ReturnType<typeof vi.fn>;
  getDocument: ReturnType<typeof vi.fn>;
  createDocument: ReturnType<typeof vi.fn>;
  updateDocument: ReturnType<typeof vi.fn>;
  deleteDocument: ReturnType<typeof vi.fn>;
}

export interface MockAccount {
  get: ReturnType<typeof vi.fn>;
  create: ReturnType<typeof vi.fn>;
  createEmailPasswordSession: ReturnType<typeof vi.fn>;
  deleteSession: ReturnType<typeof vi.fn>;
}

export interface AppwriteMocks {
  databases: MockDatabases;
  account: MockAccount;
  client: { setSession: ReturnType<typeof vi.fn> };
  context: AppwriteContext;
}

export function createMockDocument(
  id: string,
  data: Record<string, unknown>,
  collectionId = 'test'
): Models.Document {
  return {
    $collectionId: collectionId,
    $databaseId: TEST_DATABASE_ID,
    $createdAt: '2026-01-01T00:00:00.000+00:00',
    $updatedAt: '2026-01-01T00:00:00.000+00:00',
    $permissions: [],
    ...data,
    $id: id,
  };
}

export function createMockDocumentList(
  documents: Models.Document[]
): Models.DocumentList<Models.Document> {
  return { total: documents.length, documents };
}

export function createAppwriteError(code: number, message: string, type = ''): AppwriteException {
  return new AppwriteException(message, code, type);
}

/**
 * In-process stand-in for the Appwrite databases and account APIs. Writes
 * echo their data back as a document.
 */
export function createAppwriteMocks(): AppwriteMocks {
  const databases: MockDatabases = {
    listDocuments: vi.fn().mockResolvedValue(createMockDocumentList([])),
    getDocument: vi
      .fn()
      .mockRejectedValue(
        createAppwriteError(404, 'Document with the requested ID could not be found.')
      ),
    createDocument: vi.fn(
      async (_db: string, collectionId: string, _id: string, data: Record<string, unknown>) =>
        createMockDocument('generated-id', data, collectionId)
    ),
    updateDocument: vi.fn(
      async (_db: string, collectionId: string, id: string, data: Record<string, unknown>) =>
        createMockDocument(id, data, collectionId)
    ),
    deleteDocument: vi.fn().mockResolvedValue({}),
  };
  const account: MockAccount = {
    get: vi.fn().mockRejectedValue(createAppwriteError(401, 'User (role: guests) missing scope')),
    create: vi.fn(),
    createEmailPasswordSession: vi.fn(),
    deleteSession: vi.fn().mockResolvedValue({}),
  };
  const client = { setSession: vi.fn() };

  return {
    databases,
    account,
    client,
    context: {
      client: client as unknown as Client,
      databases: databases as unknown as Databases,
      account: account as unknown as Account,
      databaseId: TEST_DATABASE_ID,
    },
  };
}

export function createTestSession(userId: string | null = 'user-1'): AuthSession {
  return {
    currentUserId: () => userId,
    isAuthenticated: () => userId !== null,
  };
}
