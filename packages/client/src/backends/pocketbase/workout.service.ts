import type PocketBase from 'pocketbase';
import {
  DEFAULT_PAGE_SIZE,
  PermissionError,
  paginationSchema,
  validateFirst,
  validateId,
  workoutSchema,
  type CreateWorkoutInput,
  type Result,
  type UpdateWorkoutInput,
  type Workout,
} from '@periolifts/shared';
import { COLLECTIONS } from '../../config/app-config.js';
import { parseWorkout, serializeWorkout, type RecordMeta } from '../parsers.js';
import type { AuthSession, PageQuery, WorkoutStore } from '../types.js';
import { BasePocketBaseService } from './base-pocketbase.service.js';
import { anyOf, combineFilters, like } from './filter.js';

export interface WorkoutQuery extends PageQuery {
  searchQuery?: string;
  /** Only the signed-in user's workouts; otherwise everything the rules expose */
  userOnly?: boolean;
}

/**
 * Workout templates and tracked workouts in the `workouts` collection.
 */
export class PocketBaseWorkoutService extends BasePocketBaseService<Workout> implements WorkoutStore {
  constructor(pb: PocketBase, session?: AuthSession) {
    super(pb, COLLECTIONS.workouts, session);
  }

  protected parseRecord(meta: RecordMeta, data: Record<string, unknown>): Workout | null {
    return parseWorkout(meta, data);
  }

  async getWorkouts(query: WorkoutQuery = {}): Promise<Result<Workout[]>> {
    const page = validateFirst(paginationSchema, {
      page: query.page ?? 1,
      perPage: query.perPage ?? DEFAULT_PAGE_SIZE,
    });
    if (!page.success) {
      return page;
    }

    let ownerFilter: string | undefined;
    if (query.userOnly ?? true) {
      const user = this.requireUser('Authentication required to access workouts');
      if (!user.success) {
        return user;
      }
      ownerFilter = this.userFilter(user.data);
    }

    const search = query.searchQuery?.trim();
    const filter = combineFilters([
      ownerFilter,
      search ? anyOf([like('name', search), like('description', search)]) : undefined,
    ]);

    return this.execute('getWorkouts', 'Failed to fetch workouts', () =>
      this.list({ ...page.data, filter, sort: '-created' })
    );
  }

  async getWorkoutById(id: string): Promise<Result<Workout>> {
    const validId = validateId(id, 'Workout ID');
    if (!validId.success) {
      return validId;
    }

    return this.execute('getWorkoutById', 'Failed to fetch workout', () => this.fetchOne(id));
  }

  async createWorkout(input: CreateWorkoutInput): Promise<Result<Workout>> {
    const valid = validateFirst(workoutSchema, input);
    if (!valid.success) {
      return valid;
    }
    const user = this.requireUser('Authentication required to create workouts');
    if (!user.success) {
      return user;
    }

    return this.execute('createWorkout', 'Failed to create workout', async () =>
      this.requireEntity(await this.collection.create(serializeWorkout(user.data, input)))
    );
  }

  async updateWorkout(id: string, input: UpdateWorkoutInput): Promise<Result<Workout>> {
    const validId = validateId(id, 'Workout ID');
    if (!validId.success) {
      return validId;
    }
    const valid = validateFirst(workoutSchema, input);
    if (!valid.success) {
      return valid;
    }
    const user = this.requireUser('Authentication required to update workouts');
    if (!user.success) {
      return user;
    }

    return this.execute('updateWorkout', 'Failed to update workout', async () => {
      await this.assertOwned(id, user.data, 'You can only update your own workouts');
      return this.requireEntity(await this.collection.update(id, serializeWorkout(user.data, input)));
    });
  }

  async deleteWorkout(id: string): Promise<Result<void>> {
    const validId = validateId(id, 'Workout ID');
    if (!validId.success) {
      return validId;
    }
    const user = this.requireUser('Authentication required to delete workouts');
    if (!user.success) {
      return user;
    }

    return this.execute('deleteWorkout', 'Failed to delete workout', async () => {
      await this.assertOwned(id, user.data, 'You can only delete your own workouts');
      await this.collection.delete(id);
    });
  }

  // Workouts created before ownership was recorded have no user_id.
  private async assertOwned(id: string, userId: string, message: string): Promise<void> {
    const existing = await this.fetchOne(id);
    if (existing.userId !== '' && existing.userId !== userId) {
      throw new PermissionError(message);
    }
  }
}
