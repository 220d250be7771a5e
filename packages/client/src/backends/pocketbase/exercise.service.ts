import type PocketBase from 'pocketbase';
import {
  PermissionError,
  ValidationError,
  exerciseSchema,
  fail,
  isBuiltInExercise,
  ok,
  paginationSchema,
  validateFirst,
  validateId,
  type Exercise,
  type ExerciseInput,
  type Result,
} from '@periolifts/shared';
import { COLLECTIONS } from '../../config/app-config.js';
import { parseExercise, serializeExercise, type RecordMeta } from '../parsers.js';
import type { AuthSession, PageQuery } from '../types.js';
import { BasePocketBaseService } from './base-pocketbase.service.js';
import { anyOf, combineFilters, eq, like } from './filter.js';

export interface ExerciseQuery extends PageQuery {
  category?: string;
  muscleGroup?: string;
  /** true: the user's custom exercises; false: built-in only */
  isCustom?: boolean;
  searchQuery?: string;
  /** Restrict to the user's exercises when `isCustom` is unset */
  includeUserOnly?: boolean;
}

export class PocketBaseExerciseService extends BasePocketBaseService<Exercise> {
  constructor(pb: PocketBase, session?: AuthSession) {
    super(pb, COLLECTIONS.exercises, session);
  }

  protected parseRecord(meta: RecordMeta, data: Record<string, unknown>): Exercise | null {
    return parseExercise(meta, data);
  }

  async getExercises(query: ExerciseQuery = {}): Promise<Result<Exercise[]>> {
    const page = validateFirst(paginationSchema, {
      page: query.page ?? 1,
      perPage: query.perPage ?? 50,
    });
    if (!page.success) {
      return page;
    }

    let ownerFilter: string | undefined;
    if (query.isCustom === false) {
      ownerFilter = eq('user_id', '');
    } else if (query.isCustom === true || query.includeUserOnly === true) {
      const user = this.requireUser(
        query.isCustom === true
          ? 'User must be authenticated to view custom exercises'
          : 'User must be authenticated to view user-specific exercises'
      );
      if (!user.success) {
        return user;
      }
      ownerFilter = this.userFilter(user.data);
    }

    const search = query.searchQuery?.trim();
    const filter = combineFilters([
      query.category ? eq('category', query.category) : undefined,
      query.muscleGroup ? like('muscle_groups', query.muscleGroup) : undefined,
      ownerFilter,
      search ? anyOf([like('name', search), like('description', search)]) : undefined,
    ]);

    return this.execute('getExercises', 'Unexpected error retrieving exercises', () =>
      this.list({ ...page.data, filter, sort: 'name' })
    );
  }

  /**
   * Loads several exercises in one request, keyed by id.
   */
  async getExercisesBatch(ids: string[]): Promise<Result<Map<string, Exercise>>> {
    const unique = [...new Set(ids.filter((id) => id.trim() !== ''))];
    if (unique.length === 0) {
      return ok(new Map());
    }

    return this.execute('getExercisesBatch', 'Unexpected error retrieving exercises', async () => {
      const exercises = await this.list({
        page: 1,
        perPage: unique.length,
        filter: anyOf(unique.map((id) => eq('id', id))),
      });
      return new Map(exercises.map((exercise) => [exercise.id, exercise]));
    });
  }

  async getExerciseById(id: string): Promise<Result<Exercise>> {
    const validId = validateId(id, 'Exercise ID');
    if (!validId.success) {
      return validId;
    }

    return this.execute('getExerciseById', 'Unexpected error retrieving exercise', () =>
      this.fetchOne(id)
    );
  }

  async createExercise(input: ExerciseInput): Promise<Result<Exercise>> {
    const valid = validateFirst(exerciseSchema, withoutBlankUrls(input));
    if (!valid.success) {
      return valid;
    }
    const user = this.requireUser('User must be authenticated to create exercises');
    if (!user.success) {
      return user;
    }

    return this.execute('createExercise', 'Unexpected error creating exercise', async () =>
      this.requireEntity(await this.collection.create(this.customExercise(user.data, input)))
    );
  }

  async updateExercise(id: string, input: ExerciseInput): Promise<Result<Exercise>> {
    if (id.trim() === '') {
      return fail(new ValidationError('Exercise ID is required for updates', { field: 'id' }));
    }
    const valid = validateFirst(exerciseSchema, withoutBlankUrls(input));
    if (!valid.success) {
      return valid;
    }
    const user = this.requireUser('User must be authenticated to update exercises');
    if (!user.success) {
      return user;
    }

    return this.execute('updateExercise', 'Unexpected error updating exercise', async () => {
      await this.assertEditable(id, user.data, 'update');
      return this.requireEntity(
        await this.collection.update(id, this.customExercise(user.data, input))
      );
    });
  }

  async deleteExercise(id: string): Promise<Result<void>> {
    const validId = validateId(id, 'Exercise ID');
    if (!validId.success) {
      return validId;
    }
    const user = this.requireUser('User must be authenticated to delete exercises');
    if (!user.success) {
      return user;
    }

    return this.execute('deleteExercise', 'Unexpected error deleting exercise', async () => {
      await this.assertEditable(id, user.data, 'delete');
      await this.collection.delete(id);
    });
  }

  /**
   * Built-in exercises plus the user's own in one category.
   */
  async getExercisesByCategory(
    category: string,
    query: PageQuery = {}
  ): Promise<Result<Exercise[]>> {
    if (category === '') {
      return fail(new ValidationError('Category cannot be empty', { field: 'category' }));
    }
    const page = validateFirst(paginationSchema, {
      page: query.page ?? 1,
      perPage: query.perPage ?? 50,
    });
    if (!page.success) {
      return page;
    }

    const userId = this.currentUserId;
    const filter = combineFilters([
      eq('category', category),
      userId === null ? eq('user_id', '') : anyOf([eq('user_id', ''), eq('user_id', userId)]),
    ]);

    return this.execute(
      'getExercisesByCategory',
      'Unexpected error retrieving exercises by category',
      () => this.list({ ...page.data, filter, sort: 'name' })
    );
  }

  async getExercisesByMuscleGroup(
    muscleGroup: string,
    query: PageQuery = {}
  ): Promise<Result<Exercise[]>> {
    if (muscleGroup === '') {
      return fail(new ValidationError('Muscle group cannot be empty', { field: 'muscleGroup' }));
    }
    return this.getExercises({ ...query, muscleGroup });
  }

  async searchExercises(searchQuery: string, query: PageQuery = {}): Promise<Result<Exercise[]>> {
    if (searchQuery.trim() === '') {
      return fail(new ValidationError('Search query cannot be empty', { field: 'query' }));
    }
    return this.getExercises({ ...query, searchQuery });
  }

  async getExerciseCategories(): Promise<Result<string[]>> {
    const exercises = await this.getExercises({ perPage: 100 });
    if (!exercises.success) {
      return exercises;
    }
    return ok(sortedUnique(exercises.data.map((exercise) => exercise.category)));
  }

  async getMuscleGroups(): Promise<Result<string[]>> {
    const exercises = await this.getExercises({ perPage: 100 });
    if (!exercises.success) {
      return exercises;
    }
    return ok(sortedUnique(exercises.data.flatMap((exercise) => exercise.muscleGroups)));
  }

  private customExercise(userId: string, input: ExerciseInput): Record<string, unknown> {
    return serializeExercise({
      name: input.name,
      category: input.category,
      description: input.description ?? '',
      muscleGroups: input.muscleGroups,
      ...(input.imageUrl ? { imageUrl: input.imageUrl } : {}),
      ...(input.videoUrl ? { videoUrl: input.videoUrl } : {}),
      isCustom: true,
      userId,
    });
  }

  private async assertEditable(
    id: string,
    userId: string,
    action: 'update' | 'delete'
  ): Promise<void> {
    const existing = await this.fetchOne(id);
    if (!existing.isCustom) {
      throw new PermissionError(
        action === 'update'
          ? 'Built-in exercises cannot be updated'
          : 'Built-in exercises cannot be deleted',
        { exerciseId: id }
      );
    }
    if (isBuiltInExercise(existing) || existing.userId !== userId) {
      throw new PermissionError(`You can only ${action} your own custom exercises`, {
        exerciseId: id,
      });
    }
  }
}

// Empty URL fields mean "no URL".
function withoutBlankUrls(input: ExerciseInput): ExerciseInput {
  const { imageUrl, videoUrl, ...rest } = input;
  return {
    ...rest,
    ...(imageUrl ? { imageUrl } : {}),
    ...(videoUrl ? { videoUrl } : {}),
  };
}

function sortedUnique(values: string[]): string[] {
  return [...new Set(values.filter((value) => value !== ''))].sort();
}
