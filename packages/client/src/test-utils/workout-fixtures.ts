import type { Workout } from '@periolifts/shared';

export const START = new Date('2026-04-01T10:00:00.000Z');

/**
 * Two exercises: bench press with two sets, squat with one.
 */
export function trackedWorkout(overrides: Partial<Workout> = {}): Workout {
  return {
    id: 'workout-1',
    userId: 'user-1',
    name: 'Push Day',
    description: 'Heavy',
    scheduledDate: '2026-04-01T00:00:00.000Z',
    exercises: [
      {
        exerciseId: 'bench',
        exerciseName: 'Bench Press',
        sets: [
          { reps: 8, weight: 60, restTimeSeconds: 90 },
          { reps: 8, weight: 60, restTimeSeconds: 90 },
        ],
      },
      {
        exerciseId: 'squat',
        exerciseName: 'Squat',
        sets: [{ reps: 5, weight: 100 }],
      },
    ],
    isCompleted: false,
    isInProgress: false,
    ...overrides,
  };
}
