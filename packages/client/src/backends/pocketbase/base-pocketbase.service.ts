import type PocketBase from 'pocketbase';
import type { RecordModel, RecordService } from 'pocketbase';
import { AuthenticationError, UnknownError, fail, ok, type Result } from '@periolifts/shared';
import type { CollectionName } from '../../config/app-config.js';
import type { AuthSession } from '../types.js';
import { readOptionalString } from '../type-guards.js';
import type { RecordMeta } from '../parsers.js';
import { runServiceCall } from '../service-call.js';
import { pocketBaseSession } from './pocketbase-client.js';
import { userFilter } from './filter.js';

export interface ListParams {
  page: number;
  perPage: number;
  filter?: string;
  sort?: string;
  expand?: string;
}

/**
 * Common plumbing for services backed by one PocketBase collection:
 * authentication checks, list queries and error conversion.
 */
export abstract class BasePocketBaseService<T> {
  protected readonly session: AuthSession;

  constructor(
    protected readonly pb: PocketBase,
    protected readonly collectionName: CollectionName,
    session?: AuthSession
  ) {
    this.session = session ?? pocketBaseSession(pb);
  }

  protected abstract parseRecord(meta: RecordMeta, data: Record<string, unknown>): T | null;

  protected get collection(): RecordService {
    return this.pb.collection(this.collectionName);
  }

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

  protected userFilter(userId: string, field = 'user_id'): string {
    return userFilter(userId, field);
  }

  protected toEntity(record: RecordModel): T | null {
    const meta: RecordMeta = {
      id: record.id,
      ...this.timestamps(record),
    };
    return this.parseRecord(meta, record);
  }

  /**
   * Every record of a page must parse; a page is never returned short.
   */
  protected toEntities(records: RecordModel[]): T[] {
    return records.map((record) => this.requireEntity(record));
  }

  protected async list(params: ListParams): Promise<T[]> {
    const result = await this.collection.getList(params.page, params.perPage, {
      ...(params.filter !== undefined && params.filter !== '' && { filter: params.filter }),
      ...(params.sort !== undefined && { sort: params.sort }),
      ...(params.expand !== undefined && { expand: params.expand }),
    });
    return this.toEntities(result.items);
  }

  protected async listAll(params: Omit<ListParams, 'page' | 'perPage'>): Promise<T[]> {
    const records = await this.collection.getFullList({
      ...(params.filter !== undefined && params.filter !== '' && { filter: params.filter }),
      ...(params.sort !== undefined && { sort: params.sort }),
      ...(params.expand !== undefined && { expand: params.expand }),
    });
    return this.toEntities(records);
  }

  protected async fetchOne(id: string, expand?: string): Promise<T> {
    const record = await this.collection.getOne(id, expand === undefined ? undefined : { expand });
    return this.requireEntity(record);
  }

  protected requireEntity(record: RecordModel): T {
    const entity = this.toEntity(record);
    if (entity === null) {
      throw new UnknownError(`Received an unreadable ${this.collectionName} record`, {
        id: record.id,
      });
    }
    return entity;
  }

  protected execute<R>(
    operation: string,
    fallbackMessage: string,
    action: () => Promise<R>
  ): Promise<Result<R>> {
    return runServiceCall(this.collectionName, operation, fallbackMessage, action);
  }

  private timestamps(record: RecordModel): Omit<RecordMeta, 'id'> {
    const created = readOptionalString(record, 'created');
    const updated = readOptionalString(record, 'updated');
    return {
      ...(created !== undefined && { created }),
      ...(updated !== undefined && { updated }),
    };
  }
}
