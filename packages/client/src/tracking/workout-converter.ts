import {
  calculateTotalReps,
  calculateTotalSets,
  calculateTotalWeightLifted,
  type Workout,
  type WorkoutHistoryEntry,
  type WorkoutHistoryExercise,
  type WorkoutHistoryInput,
  type WorkoutProgress,
  type WorkoutSession,
  type WorkoutSet,
} from '@periolifts/shared';
import type { WorkoutTrackingState } from './workout-tracking.state.js';

function withRest(reps: number, weight: number, restTimeSeconds: number | undefined): WorkoutSet {
  return { reps, weight, ...(restTimeSeconds !== undefined && { restTimeSeconds }) };
}

/**
 * History entry for a tracked workout. Sets carry the tracked values; the
 * entry is completed only when the tracking state says so.
 */
export function trackingStateToHistoryEntry(
  state: WorkoutTrackingState,
  durationSeconds: number,
  now: Date = new Date()
): WorkoutHistoryInput {
  const exercises: WorkoutHistoryExercise[] = state.workout.exercises.map((exercise, index) => {
    const completed = state.completedSets[index] ?? [];
    const modified = state.modifiedSets[index] ?? [];
    return {
      exerciseId: exercise.exerciseId,
      exerciseName: exercise.exerciseName,
      sets: exercise.sets.map((planned, setIndex) => {
        const set = modified[setIndex] ?? planned;
        return {
          ...withRest(set.reps, set.weight, set.restTimeSeconds),
          completed: completed[setIndex] ?? false,
        };
      }),
    };
  });

  return {
    name: state.workout.name,
    status: state.isWorkoutCompleted ? 'completed' : 'in_progress',
    ...(state.workout.scheduledDate !== undefined && {
      scheduledDate: state.workout.scheduledDate,
    }),
    startedAt: new Date(now.getTime() - durationSeconds * 1000).toISOString(),
    ...(state.isWorkoutCompleted && { completedAt: now.toISOString() }),
    durationSeconds,
    exercises,
    totalSets: calculateTotalSets(exercises),
    totalReps: calculateTotalReps(exercises),
    totalWeightLifted: calculateTotalWeightLifted(exercises),
    notes: '',
  };
}

export function historyEntryToWorkout(entry: WorkoutHistoryEntry, now: Date = new Date()): Workout {
  return {
    id: entry.id,
    userId: entry.userId,
    name: entry.name,
    description: entry.notes,
    scheduledDate: entry.scheduledDate ?? now.toISOString(),
    exercises: entry.exercises.map((exercise) => ({
      exerciseId: exercise.exerciseId,
      exerciseName: exercise.exerciseName,
      sets: exercise.sets.map((set) => withRest(set.reps, set.weight, set.restTimeSeconds)),
    })),
    isCompleted: entry.status === 'completed',
    ...(entry.completedAt !== undefined && { completedDate: entry.completedAt }),
    isInProgress: false,
  };
}

/**
 * A session as a trackable workout, planned from its target values.
 */
export function sessionToWorkout(session: WorkoutSession, now: Date = new Date()): Workout {
  return {
    id: session.id,
    userId: session.userId,
    name: session.name,
    description: session.description,
    scheduledDate: session.scheduledDate ?? now.toISOString(),
    exercises: session.exercises.map((exercise) => ({
      exerciseId: exercise.exerciseId,
      exerciseName: exercise.exerciseName,
      sets: exercise.sets.map((set) =>
        withRest(set.targetReps, set.targetWeight, set.restTimeSeconds)
      ),
    })),
    isCompleted: session.status === 'completed',
    ...(session.completedAt !== undefined && { completedDate: session.completedAt }),
    isInProgress: session.status === 'in_progress',
  };
}

/**
 * Progress that resumes an unfinished history entry at its first
 * incomplete set. Null for completed entries.
 */
export function progressFromHistoryEntry(
  entry: WorkoutHistoryEntry,
  now: Date = new Date()
): WorkoutProgress | null {
  if (entry.status === 'completed') {
    return null;
  }
  let currentExerciseIndex = 0;
  let currentSetIndex = 0;
  for (const [exerciseIndex, exercise] of entry.exercises.entries()) {
    const setIndex = exercise.sets.findIndex((set) => !set.completed);
    if (setIndex !== -1) {
      currentExerciseIndex = exerciseIndex;
      currentSetIndex = setIndex;
      break;
    }
  }

  return {
    currentExerciseIndex,
    currentSetIndex,
    completedSets: entry.exercises.map((exercise) => exercise.sets.map((set) => set.completed)),
    modifiedSets: entry.exercises.map((exercise) =>
      exercise.sets.map((set) => withRest(set.reps, set.weight, set.restTimeSeconds))
    ),
    lastSavedAt: now.toISOString(),
  };
}
