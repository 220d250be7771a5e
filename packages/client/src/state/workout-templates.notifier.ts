import {
  pageForOffset,
  type CreateWorkoutInput,
  type UpdateWorkoutInput,
  type Workout,
} from '@periolifts/shared';
import type { PocketBaseWorkoutService } from '../backends/pocketbase/workout.service.js';
import { NotifierFamily } from './notifier-family.js';
import { ResourceListNotifier } from './resource-list.notifier.js';

export interface WorkoutTemplatesFilter {
  readonly searchQuery?: string;
  readonly userOnly: boolean;
  readonly perPage: number;
}

export function workoutTemplatesFilter(
  filter: Partial<WorkoutTemplatesFilter> = {}
): WorkoutTemplatesFilter {
  return { userOnly: true, perPage: 50, ...filter };
}

export type WorkoutTemplateService = Pick<
  PocketBaseWorkoutService,
  'getWorkouts' | 'createWorkout' | 'updateWorkout' | 'deleteWorkout'
>;

/**
 * Workout templates; new templates are appended.
 */
export class WorkoutTemplatesNotifier extends ResourceListNotifier<
  Workout,
  WorkoutTemplatesFilter,
  CreateWorkoutInput,
  UpdateWorkoutInput
> {
  constructor(service: WorkoutTemplateService, filter: WorkoutTemplatesFilter) {
    super(
      {
        fetchPage: (current, request) =>
          service.getWorkouts({
            ...pageForOffset(request),
            searchQuery: current.searchQuery,
            userOnly: current.userOnly,
          }),
        create: (input) => service.createWorkout(input),
        update: (id, input) => service.updateWorkout(id, input),
        delete: (id) => service.deleteWorkout(id),
      },
      filter,
      { pageSize: filter.perPage, insertAt: 'tail', name: 'WorkoutTemplatesNotifier' }
    );
  }
}

export function workoutTemplatesFamily(
  service: WorkoutTemplateService
): NotifierFamily<WorkoutTemplatesFilter, WorkoutTemplatesNotifier> {
  return new NotifierFamily((filter) => new WorkoutTemplatesNotifier(service, filter));
}
