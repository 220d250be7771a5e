import {
  pageForOffset,
  type WorkoutHistoryEntry,
  type WorkoutHistoryInput,
  type WorkoutHistoryStatus,
} from '@periolifts/shared';
import type { WorkoutHistoryBackend } from '../backends/types.js';
import { NotifierFamily } from './notifier-family.js';
import { ResourceListNotifier } from './resource-list.notifier.js';

export interface WorkoutHistoryFilter {
  readonly startDate?: Date;
  readonly endDate?: Date;
  readonly status?: WorkoutHistoryStatus;
  readonly exerciseName?: string;
  readonly workoutName?: string;
  readonly limit: number;
}

export function workoutHistoryFilter(
  filter: Partial<WorkoutHistoryFilter> = {}
): WorkoutHistoryFilter {
  return { limit: 20, ...filter };
}

/**
 * Completed and planned workout history, most recent first.
 */
export class WorkoutHistoryNotifier extends ResourceListNotifier<
  WorkoutHistoryEntry,
  WorkoutHistoryFilter,
  WorkoutHistoryInput
> {
  constructor(backend: WorkoutHistoryBackend, filter: WorkoutHistoryFilter) {
    super(
      {
        fetchPage: (current, request) =>
          backend.getWorkoutHistory({
            ...pageForOffset(request),
            startDate: current.startDate,
            endDate: current.endDate,
            status: current.status,
            exerciseName: current.exerciseName,
            workoutName: current.workoutName,
          }),
        create: (input) => backend.createWorkoutHistory(input),
        update: (id, input) => backend.updateWorkoutHistory(id, input),
        delete: (id) => backend.deleteWorkoutHistory(id),
      },
      filter,
      { pageSize: filter.limit, insertAt: 'head', name: 'WorkoutHistoryNotifier' }
    );
  }
}

export function workoutHistoryFamily(
  backend: WorkoutHistoryBackend
): NotifierFamily<WorkoutHistoryFilter, WorkoutHistoryNotifier> {
  return new NotifierFamily((filter) => new WorkoutHistoryNotifier(backend, filter));
}
