import {
  NotFoundError,
  type WorkoutSession,
  type WorkoutSessionInput,
  type WorkoutSessionSet,
} from '@periolifts/shared';

export function toSessionInput(session: WorkoutSession): WorkoutSessionInput {
  return {
    name: session.name,
    description: session.description,
    status: session.status,
    exercises: session.exercises,
    ...(session.scheduledDate !== undefined && { scheduledDate: session.scheduledDate }),
    ...(session.startedAt !== undefined && { startedAt: session.startedAt }),
    ...(session.completedAt !== undefined && { completedAt: session.completedAt }),
  };
}

/**
 * Returns a copy of the session with one set replaced.
 */
export function replaceSessionSet(
  session: WorkoutSession,
  exerciseId: string,
  setId: string,
  set: WorkoutSessionSet
): WorkoutSession {
  const exercise = session.exercises.find((candidate) => candidate.exerciseId === exerciseId);
  if (exercise === undefined) {
    throw new NotFoundError('Exercise not found in workout session');
  }
  if (!exercise.sets.some((candidate) => candidate.setId === setId)) {
    throw new NotFoundError('Set not found in exercise');
  }

  return {
    ...session,
    exercises: session.exercises.map((candidate) =>
      candidate === exercise
        ? {
            ...candidate,
            sets: candidate.sets.map((existing) => (existing.setId === setId ? set : existing)),
          }
        : candidate
    ),
  };
}
