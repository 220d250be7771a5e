import { pageForOffset, type Result, type WorkoutPlan, type WorkoutPlanInput } from '@periolifts/shared';
import type { PocketBaseWorkoutPlanService } from '../backends/pocketbase/workout-plan.service.js';
import { NotifierFamily } from './notifier-family.js';
import { ResourceListNotifier } from './resource-list.notifier.js';

export interface WorkoutPlansFilter {
  readonly searchQuery?: string;
  readonly activeOnly: boolean;
  readonly perPage: number;
}

export function workoutPlansFilter(filter: Partial<WorkoutPlansFilter> = {}): WorkoutPlansFilter {
  return { activeOnly: false, perPage: 50, ...filter };
}

export type WorkoutPlanListService = Pick<
  PocketBaseWorkoutPlanService,
  | 'getWorkoutPlans'
  | 'createWorkoutPlan'
  | 'updateWorkoutPlan'
  | 'deleteWorkoutPlan'
  | 'activatePlan'
  | 'deactivatePlan'
>;

/**
 * Workout plans, newest first.
 */
export class WorkoutPlansNotifier extends ResourceListNotifier<
  WorkoutPlan,
  WorkoutPlansFilter,
  WorkoutPlanInput
> {
  constructor(
    private readonly service: WorkoutPlanListService,
    filter: WorkoutPlansFilter
  ) {
    super(
      {
        fetchPage: (current, request) =>
          service.getWorkoutPlans({
            ...pageForOffset(request),
            searchQuery: current.searchQuery,
            activeOnly: current.activeOnly,
          }),
        create: (input) => service.createWorkoutPlan(input),
        update: (id, input) => service.updateWorkoutPlan(id, input),
        delete: (id) => service.deleteWorkoutPlan(id),
      },
      filter,
      { pageSize: filter.perPage, insertAt: 'head', name: 'WorkoutPlansNotifier' }
    );
  }

  async activate(id: string): Promise<Result<WorkoutPlan>> {
    return this.replaceWith(await this.service.activatePlan(id));
  }

  async deactivate(id: string): Promise<Result<WorkoutPlan>> {
    return this.replaceWith(await this.service.deactivatePlan(id));
  }
}

export function workoutPlansFamily(
  service: WorkoutPlanListService
): NotifierFamily<WorkoutPlansFilter, WorkoutPlansNotifier> {
  return new NotifierFamily((filter) => new WorkoutPlansNotifier(service, filter));
}
