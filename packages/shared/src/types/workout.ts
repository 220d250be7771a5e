/**
 * Workout templates and tracked workouts.
 */

/**
 * A single planned set of an exercise
 */
export interface WorkoutSet {
  /** Target repetitions */
  reps: number;
  /** Target weight in the user's stored unit */
  weight: number;
  /** Rest after this set, in seconds */
  restTimeSeconds?: number;
}

/**
 * An exercise within a workout, with its ordered sets
 */
export interface WorkoutExercise {
  /** The exercise ID from the exercises collection */
  exerciseId: string;
  /** Denormalised exercise name */
  exerciseName: string;
  sets: WorkoutSet[];
}

/**
 * Saved position inside a workout that is being tracked
 */
export interface WorkoutProgress {
  currentExerciseIndex: number;
  currentSetIndex: number;
  /** completedSets[exercise][set] */
  completedSets: boolean[][];
  /** Sets as the user adjusted them while tracking */
  modifiedSets: WorkoutSet[][];
  /** ISO timestamp of the last save */
  lastSavedAt?: string;
}

export interface Workout {
  /** Empty until the workout has been persisted */
  id: string;
  /** Owner; empty when the workout has no owner yet */
  userId: string;
  name: string;
  description: string;
  /** ISO timestamp */
  scheduledDate?: string;
  exercises: WorkoutExercise[];
  isCompleted: boolean;
  /** ISO timestamp */
  completedDate?: string;
  isInProgress: boolean;
  progress?: WorkoutProgress;
  created?: string;
  updated?: string;
}

export type CreateWorkoutInput = Pick<Workout, 'name' | 'exercises'> &
  Partial<
    Pick<
      Workout,
      | 'description'
      | 'scheduledDate'
      | 'isCompleted'
      | 'completedDate'
      | 'isInProgress'
      | 'progress'
    >
  >;

export type UpdateWorkoutInput = CreateWorkoutInput;

export function countWorkoutSets(workout: Pick<Workout, 'exercises'>): number {
  return workout.exercises.reduce((total, exercise) => total + exercise.sets.length, 0);
}
