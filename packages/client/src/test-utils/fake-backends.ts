import { vi, type Mocked } from 'vitest';
import {
  ok,
  type CreateWorkoutInput,
  type UpdateWorkoutInput,
  type WorkoutHistoryEntry,
  type WorkoutHistoryInput,
  type WorkoutSession,
  type WorkoutSessionInput,
} from '@periolifts/shared';
import type { WorkoutHistoryBackend, WorkoutSessionBackend, WorkoutStore } from '../backends/types.js';

export function historyEntry(
  id: string,
  overrides: Partial<WorkoutHistoryEntry> = {}
): WorkoutHistoryEntry {
  return {
    id,
    userId: 'user-1',
    name: `Workout ${id}`,
    status: 'completed',
    exercises: [],
    totalSets: 0,
    totalReps: 0,
    totalWeightLifted: 0,
    notes: '',
    ...overrides,
  };
}

export function workoutSession(id: string, overrides: Partial<WorkoutSession> = {}): WorkoutSession {
  return {
    id,
    userId: 'user-1',
    name: `Session ${id}`,
    description: '',
    status: 'planned',
    exercises: [],
    ...overrides,
  };
}

/**
 * History backend whose writes echo the input back as a stored entry.
 */
export function createFakeHistoryBackend(): Mocked<WorkoutHistoryBackend> {
  const stored = (id: string, input: WorkoutHistoryInput): WorkoutHistoryEntry => ({
    ...input,
    id,
    userId: 'user-1',
  });
  return {
    getWorkoutHistory: vi.fn().mockResolvedValue(ok([])),
    getWorkoutHistoryById: vi.fn(),
    createWorkoutHistory: vi.fn(async (input: WorkoutHistoryInput) =>
      ok(stored('generated-id', input))
    ),
    updateWorkoutHistory: vi.fn(async (id: string, input: WorkoutHistoryInput) =>
      ok(stored(id, input))
    ),
    deleteWorkoutHistory: vi.fn().mockResolvedValue(ok(undefined)),
    getUserWorkoutStats: vi.fn(),
    getRecentWorkouts: vi.fn().mockResolvedValue(ok([])),
  };
}

export function createFakeSessionBackend(): Mocked<WorkoutSessionBackend> {
  const stored = (id: string, input: WorkoutSessionInput): WorkoutSession =>
    workoutSession(id, { ...input });
  return {
    getWorkoutSessions: vi.fn().mockResolvedValue(ok([])),
    getWorkoutSession: vi.fn(),
    createWorkoutSession: vi.fn(async (input: WorkoutSessionInput) =>
      ok(stored('generated-id', input))
    ),
    updateWorkoutSession: vi.fn(async (id: string, input: WorkoutSessionInput) =>
      ok(stored(id, input))
    ),
    deleteWorkoutSession: vi.fn().mockResolvedValue(ok(undefined)),
    startWorkoutSession: vi.fn(),
    completeWorkoutSession: vi.fn(),
    updateSetData: vi.fn(),
    getWorkoutStats: vi.fn(),
    getCompletedSessions: vi.fn(),
    createSessionFromTemplate: vi.fn(),
    getActiveWorkoutSession: vi.fn().mockResolvedValue(ok(null)),
    resumeWorkoutSession: vi.fn(),
  };
}

export function createFakeWorkoutStore(): Mocked<WorkoutStore> {
  return {
    createWorkout: vi.fn(async (input: CreateWorkoutInput) =>
      ok({
        id: 'generated-id',
        userId: 'user-1',
        description: '',
        isCompleted: false,
        isInProgress: false,
        ...input,
      })
    ),
    updateWorkout: vi.fn(async (id: string, input: UpdateWorkoutInput) =>
      ok({
        id,
        userId: 'user-1',
        description: '',
        isCompleted: false,
        isInProgress: false,
        ...input,
      })
    ),
  };
}
