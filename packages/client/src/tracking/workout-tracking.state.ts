import type {
  AppError,
  Workout,
  WorkoutExercise,
  WorkoutProgress,
  WorkoutSet,
} from '@periolifts/shared';

export type WorkoutView = 'exerciseSelection' | 'exerciseTracking';

export type ExerciseStatus = 'notStarted' | 'inProgress' | 'completed';

/**
 * Everything the tracking screen shows for one workout. Replaced as a
 * whole on every change.
 */
export interface WorkoutTrackingState {
  workout: Workout;
  view: WorkoutView;
  currentExerciseIndex: number;
  currentSetIndex: number;
  selectedExerciseIndex: number | null;
  selectedSetIndex: number | null;
  /** completedSets[exercise][set] */
  completedSets: boolean[][];
  /** Sets as adjusted during the workout; starts as a copy of the plan */
  modifiedSets: WorkoutSet[][];
  exerciseStatuses: ExerciseStatus[];
  startedAt: Date;
  isWorkoutCompleted: boolean;
  isLoading: boolean;
  error: AppError | null;
}

function copySet(set: WorkoutSet): WorkoutSet {
  return {
    reps: set.reps,
    weight: set.weight,
    ...(set.restTimeSeconds !== undefined && { restTimeSeconds: set.restTimeSeconds }),
  };
}

export function calculateExerciseStatuses(
  exerciseCount: number,
  completedSets: boolean[][]
): ExerciseStatus[] {
  return Array.from({ length: exerciseCount }, (_, index) => {
    const sets = completedSets[index] ?? [];
    if (sets.length > 0 && sets.every(Boolean)) {
      return 'completed';
    }
    return sets.some(Boolean) ? 'inProgress' : 'notStarted';
  });
}

export function initialTrackingState(workout: Workout, now: Date = new Date()): WorkoutTrackingState {
  const completedSets = workout.exercises.map((exercise) => exercise.sets.map(() => false));
  return {
    workout,
    view: 'exerciseSelection',
    currentExerciseIndex: 0,
    currentSetIndex: 0,
    selectedExerciseIndex: null,
    selectedSetIndex: null,
    completedSets,
    modifiedSets: workout.exercises.map((exercise) => exercise.sets.map(copySet)),
    exerciseStatuses: calculateExerciseStatuses(workout.exercises.length, completedSets),
    startedAt: now,
    isWorkoutCompleted: false,
    isLoading: false,
    error: null,
  };
}

// Saved progress must have one entry per planned set to be usable.
function matchesShape<T>(rows: T[][], exercises: WorkoutExercise[]): boolean {
  return (
    rows.length === exercises.length &&
    exercises.every((exercise, index) => rows[index]?.length === exercise.sets.length)
  );
}

/**
 * Resumes a workout from saved progress. Progress that no longer fits the
 * workout's exercises is ignored piecewise.
 */
export function trackingStateFromProgress(
  workout: Workout,
  progress: WorkoutProgress,
  now: Date = new Date()
): WorkoutTrackingState {
  const initial = initialTrackingState(workout, now);
  const completedSets = matchesShape(progress.completedSets, workout.exercises)
    ? progress.completedSets.map((sets) => [...sets])
    : initial.completedSets;
  const modifiedSets = matchesShape(progress.modifiedSets, workout.exercises)
    ? progress.modifiedSets.map((sets) => sets.map(copySet))
    : initial.modifiedSets;
  const exerciseIndex = clampIndex(progress.currentExerciseIndex, workout.exercises.length);
  const setCount = workout.exercises[exerciseIndex]?.sets.length ?? 0;

  return {
    ...initial,
    view: 'exerciseTracking',
    currentExerciseIndex: exerciseIndex,
    currentSetIndex: clampIndex(progress.currentSetIndex, setCount),
    selectedExerciseIndex: exerciseIndex,
    completedSets,
    modifiedSets,
    exerciseStatuses: calculateExerciseStatuses(workout.exercises.length, completedSets),
  };
}

function clampIndex(index: number, length: number): number {
  return Math.min(Math.max(0, index), Math.max(0, length - 1));
}

/**
 * Tracking state for a workout: resumed when it is in progress with saved
 * progress, fresh otherwise.
 */
export function createTrackingState(workout: Workout, now: Date = new Date()): WorkoutTrackingState {
  return workout.isInProgress && workout.progress !== undefined
    ? trackingStateFromProgress(workout, workout.progress, now)
    : initialTrackingState(workout, now);
}

export function currentSet(state: WorkoutTrackingState): WorkoutSet | undefined {
  return state.modifiedSets[state.currentExerciseIndex]?.[state.currentSetIndex];
}

export function totalSetsCount(state: WorkoutTrackingState): number {
  return state.workout.exercises.reduce((sum, exercise) => sum + exercise.sets.length, 0);
}

export function completedSetsCount(state: WorkoutTrackingState): number {
  return state.completedSets.reduce((sum, sets) => sum + sets.filter(Boolean).length, 0);
}

/** Completed share of all sets, 0..1 */
export function workoutProgress(state: WorkoutTrackingState): number {
  const total = totalSetsCount(state);
  return total > 0 ? completedSetsCount(state) / total : 0;
}

export function areAllExercisesCompleted(state: WorkoutTrackingState): boolean {
  return (
    state.exerciseStatuses.every((status) => status === 'completed') &&
    matchesShape(state.completedSets, state.workout.exercises) &&
    state.completedSets.every((sets) => sets.every(Boolean))
  );
}

export function workoutDurationSeconds(state: WorkoutTrackingState, now: Date = new Date()): number {
  return Math.max(0, Math.floor((now.getTime() - state.startedAt.getTime()) / 1000));
}

/**
 * The planned exercises with the sets as tracked.
 */
export function trackedExercises(state: WorkoutTrackingState): WorkoutExercise[] {
  return state.workout.exercises.map((exercise, index) => ({
    exerciseId: exercise.exerciseId,
    exerciseName: exercise.exerciseName,
    sets: state.modifiedSets[index] ?? exercise.sets,
  }));
}

export function toWorkoutProgress(state: WorkoutTrackingState, now: Date = new Date()): WorkoutProgress {
  return {
    currentExerciseIndex: state.currentExerciseIndex,
    currentSetIndex: state.currentSetIndex,
    completedSets: state.completedSets.map((sets) => [...sets]),
    modifiedSets: state.modifiedSets.map((sets) => sets.map(copySet)),
    lastSavedAt: now.toISOString(),
  };
}
