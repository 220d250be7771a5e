import { pageForOffset, type Exercise, type ExerciseInput } from '@periolifts/shared';
import type { PocketBaseExerciseService } from '../backends/pocketbase/exercise.service.js';
import { NotifierFamily } from './notifier-family.js';
import { ResourceListNotifier } from './resource-list.notifier.js';

export interface ExercisesFilter {
  readonly category?: string;
  readonly muscleGroup?: string;
  readonly isCustom?: boolean;
  readonly searchQuery?: string;
  readonly perPage: number;
}

export function exercisesFilter(filter: Partial<ExercisesFilter> = {}): ExercisesFilter {
  return { perPage: 50, ...filter };
}

export type ExerciseListService = Pick<
  PocketBaseExerciseService,
  'getExercises' | 'createExercise' | 'updateExercise' | 'deleteExercise'
>;

export class ExercisesNotifier extends ResourceListNotifier<
  Exercise,
  ExercisesFilter,
  ExerciseInput
> {
  constructor(service: ExerciseListService, filter: ExercisesFilter) {
    super(
      {
        fetchPage: (current, request) =>
          service.getExercises({
            ...pageForOffset(request),
            category: current.category,
            muscleGroup: current.muscleGroup,
            isCustom: current.isCustom,
            searchQuery: current.searchQuery,
          }),
        create: (input) => service.createExercise(input),
        update: (id, input) => service.updateExercise(id, input),
        delete: (id) => service.deleteExercise(id),
      },
      filter,
      { pageSize: filter.perPage, insertAt: 'tail', name: 'ExercisesNotifier' }
    );
  }
}

export function exercisesFamily(
  service: ExerciseListService
): NotifierFamily<ExercisesFilter, ExercisesNotifier> {
  return new NotifierFamily((filter) => new ExercisesNotifier(service, filter));
}
