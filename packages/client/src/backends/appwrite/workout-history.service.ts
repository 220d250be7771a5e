import { Query } from 'node-appwrite';
import {
  PermissionError,
  buildWorkoutHistoryStats,
  paginationSchema,
  recentLimitSchema,
  startOfUtcMonth,
  validateFirst,
  validateId,
  workoutHistoryEntrySchema,
  type Result,
  type WorkoutHistoryEntry,
  type WorkoutHistoryInput,
  type WorkoutHistoryStats,
} from '@periolifts/shared';
import { COLLECTIONS } from '../../config/app-config.js';
import { parseWorkoutHistory, serializeWorkoutHistory, type RecordMeta } from '../parsers.js';
import type {
  AuthSession,
  DateRange,
  WorkoutHistoryBackend,
  WorkoutHistoryQuery,
} from '../types.js';
import type { AppwriteDatabase } from './appwrite-client.js';
import { BaseAppwriteService, pageQueries } from './base-appwrite.service.js';

const HISTORY_ORDER = [
  Query.orderDesc('completed_at'),
  Query.orderDesc('started_at'),
  Query.orderDesc('$createdAt'),
];

export class AppwriteWorkoutHistoryService
  extends BaseAppwriteService<WorkoutHistoryEntry>
  implements WorkoutHistoryBackend
{
  constructor(db: AppwriteDatabase, session: AuthSession) {
    super(db, COLLECTIONS.workoutHistory, session);
  }

  protected parseRecord(meta: RecordMeta, data: Record<string, unknown>): WorkoutHistoryEntry | null {
    return parseWorkoutHistory(meta, data);
  }

  async getWorkoutHistory(query: WorkoutHistoryQuery = {}): Promise<Result<WorkoutHistoryEntry[]>> {
    const page = validateFirst(paginationSchema, {
      page: query.page ?? 1,
      perPage: query.perPage ?? 20,
    });
    if (!page.success) {
      return page;
    }
    const user = this.requireUser('Authentication required to access workout history');
    if (!user.success) {
      return user;
    }

    const exerciseName = query.exerciseName?.trim();
    const workoutName = query.workoutName?.trim();
    const queries = [
      Query.equal('user_id', user.data),
      ...(query.startDate
        ? [Query.greaterThanEqual('started_at', query.startDate.toISOString())]
        : []),
      ...(query.endDate
        ? [Query.lessThanEqual('completed_at', query.endDate.toISOString())]
        : []),
      ...(query.status ? [Query.equal('status', query.status)] : []),
      ...(exerciseName ? [Query.contains('exercises', exerciseName)] : []),
      ...(workoutName ? [Query.contains('name', workoutName)] : []),
      ...HISTORY_ORDER,
      ...pageQueries(page.data),
    ];

    return this.execute('getWorkoutHistory', 'Failed to fetch workout history', () =>
      this.list(queries)
    );
  }

  async getWorkoutHistoryById(id: string): Promise<Result<WorkoutHistoryEntry>> {
    const validId = validateId(id, 'History ID');
    if (!validId.success) {
      return validId;
    }
    const user = this.requireUser('Authentication required to access workout history');
    if (!user.success) {
      return user;
    }

    return this.execute('getWorkoutHistoryById', 'Failed to fetch workout history entry', () =>
      this.ownedEntry(id, user.data, 'access')
    );
  }

  async createWorkoutHistory(entry: WorkoutHistoryInput): Promise<Result<WorkoutHistoryEntry>> {
    const valid = validateFirst(workoutHistoryEntrySchema, entry);
    if (!valid.success) {
      return valid;
    }
    const user = this.requireUser('Authentication required to create workout history');
    if (!user.success) {
      return user;
    }

    return this.execute('createWorkoutHistory', 'Failed to create workout history', () =>
      this.createDocument(user.data, serializeWorkoutHistory(user.data, entry))
    );
  }

  async updateWorkoutHistory(
    id: string,
    entry: WorkoutHistoryInput
  ): Promise<Result<WorkoutHistoryEntry>> {
    const validId = validateId(id, 'History ID');
    if (!validId.success) {
      return validId;
    }
    const valid = validateFirst(workoutHistoryEntrySchema, entry);
    if (!valid.success) {
      return valid;
    }
    const user = this.requireUser('Authentication required to update workout history');
    if (!user.success) {
      return user;
    }

    return this.execute('updateWorkoutHistory', 'Failed to update workout history', async () => {
      await this.ownedEntry(id, user.data, 'update');
      return this.updateDocument(id, serializeWorkoutHistory(user.data, entry));
    });
  }

  async deleteWorkoutHistory(id: string): Promise<Result<void>> {
    const validId = validateId(id, 'History ID');
    if (!validId.success) {
      return validId;
    }
    const user = this.requireUser('Authentication required to delete workout history');
    if (!user.success) {
      return user;
    }

    return this.execute('deleteWorkoutHistory', 'Failed to delete workout history', async () => {
      await this.ownedEntry(id, user.data, 'delete');
      await this.deleteDocument(id);
    });
  }

  async getUserWorkoutStats(range: DateRange = {}): Promise<Result<WorkoutHistoryStats>> {
    const user = this.requireUser('Authentication required to access workout statistics');
    if (!user.success) {
      return user;
    }

    const queries = [
      Query.equal('user_id', user.data),
      ...(range.startDate
        ? [Query.greaterThanEqual('completed_at', range.startDate.toISOString())]
        : []),
      ...(range.endDate
        ? [Query.lessThanEqual('completed_at', range.endDate.toISOString())]
        : []),
      Query.orderDesc('completed_at'),
    ];

    return this.execute('getUserWorkoutStats', 'Failed to fetch workout statistics', async () => {
      const entries = await this.listAll(queries);
      const now = new Date();
      return buildWorkoutHistoryStats(
        user.data,
        entries,
        range.startDate ?? startOfUtcMonth(now),
        range.endDate ?? now
      );
    });
  }

  async getRecentWorkouts(limit = 10): Promise<Result<WorkoutHistoryEntry[]>> {
    const validLimit = validateFirst(recentLimitSchema, limit);
    if (!validLimit.success) {
      return validLimit;
    }
    const user = this.requireUser('Authentication required to access recent workouts');
    if (!user.success) {
      return user;
    }

    return this.execute('getRecentWorkouts', 'Failed to fetch recent workouts', () =>
      this.list([Query.equal('user_id', user.data), ...HISTORY_ORDER, Query.limit(limit)])
    );
  }

  private async ownedEntry(
    id: string,
    userId: string,
    action: 'access' | 'update' | 'delete'
  ): Promise<WorkoutHistoryEntry> {
    const entry = await this.fetchOne(id);
    if (entry.userId !== userId) {
      throw new PermissionError(`You can only ${action} your own workout history`);
    }
    return entry;
  }
}
