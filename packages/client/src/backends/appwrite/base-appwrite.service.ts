import { ID, Permission, Query, Role, type Models } from 'node-appwrite';
import { AuthenticationError, UnknownError, fail, ok, type Result } from '@periolifts/shared';
import type { CollectionName } from '../../config/app-config.js';
import type { RecordMeta } from '../parsers.js';
import { runServiceCall } from '../service-call.js';
import type { AuthSession, PageQuery } from '../types.js';
import type { AppwriteDatabase } from './appwrite-client.js';

/** Largest page Appwrite returns for one list call. */
export const APPWRITE_MAX_LIMIT = 100;

/**
 * Appwrite attributes are flat: nested lists and objects are stored as JSON
 * strings, and unset datetimes as null rather than "".
 */
export function encodeDocument(data: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(data).map(([key, value]) => {
      if (typeof value === 'object' && value !== null) {
        return [key, JSON.stringify(value)];
      }
      if (value === '' && (key.endsWith('_at') || key.endsWith('_date'))) {
        return [key, null];
      }
      return [key, value];
    })
  );
}

export function pageQueries(page: Required<PageQuery>): string[] {
  return [Query.limit(page.perPage), Query.offset((page.page - 1) * page.perPage)];
}

/**
 * Common plumbing for services backed by one Appwrite collection. Documents
 * are created readable and writable by their owner only.
 */
export abstract class BaseAppwriteService<T> {
  constructor(
    protected readonly db: AppwriteDatabase,
    protected readonly collectionId: CollectionName,
    protected readonly session: AuthSession
  ) {}

  protected abstract parseRecord(meta: RecordMeta, data: Record<string, unknown>): T | null;

  protected get currentUserId(): string | null {
    return this.session.isAuthenticated() ? this.session.currentUserId() : null;
  }

  protected requireUser(message: string): Result<string> {
    const userId = this.currentUserId;
    if (userId === null) {
      return fail(new AuthenticationError(message));
    }
    return ok(userId);
  }

  protected toEntity(document: Models.Document): T | null {
    return this.parseRecord(
      { id: document.$id, created: document.$createdAt, updated: document.$updatedAt },
      document
    );
  }

  protected requireEntity(document: Models.Document): T {
    const entity = this.toEntity(document);
    if (entity === null) {
      throw new UnknownError(`Received an unreadable ${this.collectionId} document`, {
        id: document.$id,
      });
    }
    return entity;
  }

  protected async list(queries: string[]): Promise<T[]> {
    const result = await this.db.databases.listDocuments(
      this.db.databaseId,
      this.collectionId,
      queries
    );
    return result.documents.map((document) => this.requireEntity(document));
  }

  /**
   * Pages through every matching document.
   */
  protected async listAll(queries: string[]): Promise<T[]> {
    const entities: T[] = [];
    for (let offset = 0; ; offset += APPWRITE_MAX_LIMIT) {
      const result = await this.db.databases.listDocuments(this.db.databaseId, this.collectionId, [
        ...queries,
        Query.limit(APPWRITE_MAX_LIMIT),
        Query.offset(offset),
      ]);
      entities.push(...result.documents.map((document) => this.requireEntity(document)));
      if (result.documents.length < APPWRITE_MAX_LIMIT) {
        return entities;
      }
    }
  }

  protected async fetchOne(id: string): Promise<T> {
    return this.requireEntity(
      await this.db.databases.getDocument(this.db.databaseId, this.collectionId, id)
    );
  }

  protected async createDocument(ownerId: string, data: Record<string, unknown>): Promise<T> {
    const owner = Role.user(ownerId);
    return this.requireEntity(
      await this.db.databases.createDocument(
        this.db.databaseId,
        this.collectionId,
        ID.unique(),
        encodeDocument(data),
        [Permission.read(owner), Permission.update(owner), Permission.delete(owner)]
      )
    );
  }

  protected async updateDocument(id: string, data: Record<string, unknown>): Promise<T> {
    return this.requireEntity(
      await this.db.databases.updateDocument(
        this.db.databaseId,
        this.collectionId,
        id,
        encodeDocument(data)
      )
    );
  }

  protected async deleteDocument(id: string): Promise<void> {
    await this.db.databases.deleteDocument(this.db.databaseId, this.collectionId, id);
  }

  protected execute<R>(
    operation: string,
    fallbackMessage: string,
    action: () => Promise<R>
  ): Promise<Result<R>> {
    return runServiceCall(this.collectionId, operation, fallbackMessage, action);
  }
}
