import type PocketBase from 'pocketbase';
import {
  PermissionError,
  activatePlan,
  addWorkoutToDate,
  deactivatePlan,
  getWorkoutsForDate,
  hasFutureWorkouts,
  ok,
  paginationSchema,
  removeWorkoutFromDate,
  validateAll,
  validateId,
  validateFirst,
  workoutPlanSchema,
  type Result,
  type WorkoutPlan,
  type WorkoutPlanInput,
} from '@periolifts/shared';
import { COLLECTIONS } from '../../config/app-config.js';
import { parseWorkoutPlan, serializeWorkoutPlan, type RecordMeta } from '../parsers.js';
import type { AuthSession, PageQuery } from '../types.js';
import { BasePocketBaseService } from './base-pocketbase.service.js';
import { anyOf, combineFilters, eq, like } from './filter.js';

export interface WorkoutPlanQuery extends PageQuery {
  searchQuery?: string;
  activeOnly?: boolean;
}

type PlanDraft = Omit<WorkoutPlan, 'id' | 'created' | 'updated'>;

const PLAN_VALIDATION_FAILED = 'Workout plan validation failed';

export class PocketBaseWorkoutPlanService extends BasePocketBaseService<WorkoutPlan> {
  constructor(pb: PocketBase, session?: AuthSession) {
    super(pb, COLLECTIONS.workoutPlans, session);
  }

  protected parseRecord(meta: RecordMeta, data: Record<string, unknown>): WorkoutPlan | null {
    return parseWorkoutPlan(meta, data);
  }

  async getWorkoutPlans(query: WorkoutPlanQuery = {}): Promise<Result<WorkoutPlan[]>> {
    const page = validateFirst(paginationSchema, {
      page: query.page ?? 1,
      perPage: query.perPage ?? 50,
    });
    if (!page.success) {
      return page;
    }
    const user = this.requireUser('Authentication required');
    if (!user.success) {
      return user;
    }

    const search = query.searchQuery?.trim();
    const filter = combineFilters([
      this.userFilter(user.data),
      query.activeOnly === true ? eq('is_active', true) : undefined,
      search ? anyOf([like('name', search), like('description', search)]) : undefined,
    ]);

    return this.execute('getWorkoutPlans', 'Failed to fetch workout plans', () =>
      this.list({ ...page.data, filter, sort: '-created' })
    );
  }

  async getWorkoutPlan(id: string): Promise<Result<WorkoutPlan>> {
    const validId = validateId(id, 'Workout plan ID');
    if (!validId.success) {
      return validId;
    }

    return this.execute('getWorkoutPlan', 'Failed to fetch workout plan', () => this.ownedPlan(id));
  }

  async createWorkoutPlan(input: WorkoutPlanInput): Promise<Result<WorkoutPlan>> {
    const user = this.requireUser('Authentication required');
    if (!user.success) {
      return user;
    }
    const draft: PlanDraft = {
      userId: user.data,
      name: input.name,
      description: input.description ?? '',
      startDate: input.startDate ?? new Date().toISOString(),
      schedule: input.schedule ?? {},
      isActive: input.isActive ?? true,
    };
    const valid = validateAll(workoutPlanSchema, draft, PLAN_VALIDATION_FAILED);
    if (!valid.success) {
      return valid;
    }

    return this.execute('createWorkoutPlan', 'Failed to create workout plan', async () =>
      this.requireEntity(await this.collection.create(serializeWorkoutPlan(draft)))
    );
  }

  updateWorkoutPlan(id: string, input: WorkoutPlanInput): Promise<Result<WorkoutPlan>> {
    return this.modify(id, 'updateWorkoutPlan', (plan) => ({
      ...plan,
      name: input.name,
      ...(input.description !== undefined && { description: input.description }),
      ...(input.startDate !== undefined && { startDate: input.startDate }),
      ...(input.schedule !== undefined && { schedule: input.schedule }),
      ...(input.isActive !== undefined && { isActive: input.isActive }),
    }));
  }

  async deleteWorkoutPlan(id: string): Promise<Result<void>> {
    const validId = validateId(id, 'Workout plan ID');
    if (!validId.success) {
      return validId;
    }
    const user = this.requireUser('Authentication required');
    if (!user.success) {
      return user;
    }

    return this.execute('deleteWorkoutPlan', 'Failed to delete workout plan', async () => {
      await this.ownedPlan(id);
      await this.collection.delete(id);
    });
  }

  getActivePlans(): Promise<Result<WorkoutPlan[]>> {
    return this.getWorkoutPlans({ activeOnly: true });
  }

  activatePlan(id: string): Promise<Result<WorkoutPlan>> {
    return this.modify(id, 'activatePlan', activatePlan);
  }

  deactivatePlan(id: string): Promise<Result<WorkoutPlan>> {
    return this.modify(id, 'deactivatePlan', deactivatePlan);
  }

  addWorkoutToDate(planId: string, date: Date, workoutId: string): Promise<Result<WorkoutPlan>> {
    return this.modify(planId, 'addWorkoutToDate', (plan) =>
      addWorkoutToDate(plan, date, workoutId)
    );
  }

  removeWorkoutFromDate(
    planId: string,
    date: Date,
    workoutId: string
  ): Promise<Result<WorkoutPlan>> {
    return this.modify(planId, 'removeWorkoutFromDate', (plan) =>
      removeWorkoutFromDate(plan, date, workoutId)
    );
  }

  async getPlansForDate(date: Date): Promise<Result<WorkoutPlan[]>> {
    const plans = await this.getActivePlans();
    if (!plans.success) {
      return plans;
    }
    return ok(plans.data.filter((plan) => getWorkoutsForDate(plan, date).length > 0));
  }

  async getWorkoutIdsForDate(date: Date): Promise<Result<string[]>> {
    const plans = await this.getPlansForDate(date);
    if (!plans.success) {
      return plans;
    }
    const ids = new Set(plans.data.flatMap((plan) => getWorkoutsForDate(plan, date)));
    return ok([...ids]);
  }

  async hasActiveProgramsWithFutureWorkouts(today: Date = new Date()): Promise<Result<boolean>> {
    const plans = await this.getActivePlans();
    if (!plans.success) {
      return plans;
    }
    return ok(plans.data.some((plan) => hasFutureWorkouts(plan, today)));
  }

  private async ownedPlan(id: string): Promise<WorkoutPlan> {
    const plan = await this.fetchOne(id);
    const userId = this.currentUserId;
    if (userId !== null && plan.userId !== userId) {
      throw new PermissionError('You do not have permission to access this workout plan', {
        planId: id,
      });
    }
    return plan;
  }

  /**
   * Loads an owned plan, applies `change` and saves the validated result.
   */
  private async modify(
    id: string,
    operation: string,
    change: (plan: WorkoutPlan) => WorkoutPlan
  ): Promise<Result<WorkoutPlan>> {
    const validId = validateId(id, 'Workout plan ID');
    if (!validId.success) {
      return validId;
    }
    const user = this.requireUser('Authentication required');
    if (!user.success) {
      return user;
    }

    return this.execute(operation, 'Failed to update workout plan', async () => {
      const updated = change(await this.ownedPlan(id));
      const draft: PlanDraft = {
        userId: updated.userId,
        name: updated.name,
        description: updated.description,
        startDate: updated.startDate,
        schedule: updated.schedule,
        isActive: updated.isActive,
      };
      const valid = validateAll(workoutPlanSchema, draft, PLAN_VALIDATION_FAILED);
      if (!valid.success) {
        throw valid.error;
      }
      return this.requireEntity(await this.collection.update(id, serializeWorkoutPlan(draft)));
    });
  }
}
