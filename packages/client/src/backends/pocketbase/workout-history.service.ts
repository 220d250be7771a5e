import type PocketBase from 'pocketbase';
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
import { BasePocketBaseService } from './base-pocketbase.service.js';
import { combineFilters, compare, eq, like } from './filter.js';

export const HISTORY_SORT = '-completed_at,-started_at,-created';

export class PocketBaseWorkoutHistoryService
  extends BasePocketBaseService<WorkoutHistoryEntry>
  implements WorkoutHistoryBackend
{
  constructor(pb: PocketBase, session?: AuthSession) {
    super(pb, COLLECTIONS.workoutHistory, session);
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

    const filter = combineFilters([
      this.userFilter(user.data),
      query.startDate && compare('started_at', '>=', query.startDate),
      query.endDate && compare('completed_at', '<=', query.endDate),
      query.status && eq('status', query.status),
      query.exerciseName?.trim() ? like('exercises', query.exerciseName.trim()) : undefined,
      query.workoutName?.trim() ? like('name', query.workoutName.trim()) : undefined,
    ]);

    return this.execute('getWorkoutHistory', 'Failed to fetch workout history', () =>
      this.list({ ...page.data, filter, sort: HISTORY_SORT })
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

    return this.execute('getWorkoutHistoryById', 'Failed to fetch workout history entry', async () => {
      const entry = await this.fetchOne(id);
      if (entry.userId !== user.data) {
        throw new PermissionError('You can only access your own workout history');
      }
      return entry;
    });
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

    return this.execute('createWorkoutHistory', 'Failed to create workout history', async () =>
      this.requireEntity(await this.collection.create(serializeWorkoutHistory(user.data, entry)))
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
      const existing = await this.fetchOne(id);
      if (existing.userId !== user.data) {
        throw new PermissionError('You can only update your own workout history');
      }
      return this.requireEntity(
        await this.collection.update(id, serializeWorkoutHistory(user.data, entry))
      );
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
      const existing = await this.fetchOne(id);
      if (existing.userId !== user.data) {
        throw new PermissionError('You can only delete your own workout history');
      }
      await this.collection.delete(id);
    });
  }

  async getUserWorkoutStats(range: DateRange = {}): Promise<Result<WorkoutHistoryStats>> {
    const user = this.requireUser('Authentication required to access workout statistics');
    if (!user.success) {
      return user;
    }

    const filter = combineFilters([
      this.userFilter(user.data),
      range.startDate && compare('completed_at', '>=', range.startDate),
      range.endDate && compare('completed_at', '<=', range.endDate),
    ]);

    return this.execute('getUserWorkoutStats', 'Failed to fetch workout statistics', async () => {
      const entries = await this.listAll({ filter, sort: '-completed_at' });
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
      this.list({ page: 1, perPage: limit, filter: this.userFilter(user.data), sort: HISTORY_SORT })
    );
  }
}
