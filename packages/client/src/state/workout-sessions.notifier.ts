import {
  pageForOffset,
  type WorkoutSession,
  type WorkoutSessionInput,
  type WorkoutSessionStatus,
} from '@periolifts/shared';
import type { WorkoutSessionBackend } from '../backends/types.js';
import { NotifierFamily } from './notifier-family.js';
import { ResourceListNotifier } from './resource-list.notifier.js';

export interface WorkoutSessionsFilter {
  readonly status?: WorkoutSessionStatus;
  readonly startDate?: Date;
  readonly endDate?: Date;
  readonly limit: number;
}

export function workoutSessionsFilter(
  filter: Partial<WorkoutSessionsFilter> = {}
): WorkoutSessionsFilter {
  return { limit: 20, ...filter };
}

export class WorkoutSessionsNotifier extends ResourceListNotifier<
  WorkoutSession,
  WorkoutSessionsFilter,
  WorkoutSessionInput
> {
  constructor(backend: WorkoutSessionBackend, filter: WorkoutSessionsFilter) {
    super(
      {
        fetchPage: (current, request) =>
          backend.getWorkoutSessions({
            ...pageForOffset(request),
            status: current.status,
            startDate: current.startDate,
            endDate: current.endDate,
          }),
        create: (input) => backend.createWorkoutSession(input),
        update: (id, input) => backend.updateWorkoutSession(id, input),
        delete: (id) => backend.deleteWorkoutSession(id),
      },
      filter,
      { pageSize: filter.limit, insertAt: 'head', name: 'WorkoutSessionsNotifier' }
    );
  }
}

export function workoutSessionsFamily(
  backend: WorkoutSessionBackend
): NotifierFamily<WorkoutSessionsFilter, WorkoutSessionsNotifier> {
  return new NotifierFamily((filter) => new WorkoutSessionsNotifier(backend, filter));
}
