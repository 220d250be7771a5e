/**
 * Workout history: the record of a workout as it was actually performed.
 */

export const WORKOUT_HISTORY_STATUSES = ['planned', 'in_progress', 'completed'] as const;

export type WorkoutHistoryStatus = (typeof WORKOUT_HISTORY_STATUSES)[number];

export interface WorkoutHistorySet {
  reps: number;
  weight: number;
  /** Rest after this set, in seconds */
  restTimeSeconds?: number;
  completed: boolean;
}

export interface WorkoutHistoryExercise {
  exerciseId: string;
  exerciseName: string;
  sets: WorkoutHistorySet[];
}

export interface WorkoutHistoryEntry {
  id: string;
  userId: string;
  name: string;
  status: WorkoutHistoryStatus;
  /** ISO timestamps */
  scheduledDate?: string;
  startedAt?: string;
  completedAt?: string;
  durationSeconds?: number;
  exercises: WorkoutHistoryExercise[];
  /** All sets, completed or not */
  totalSets: number;
  /** Reps of completed sets */
  totalReps: number;
  /** Sum of weight x reps over completed sets */
  totalWeightLifted: number;
  notes: string;
  created?: string;
  updated?: string;
}

export type WorkoutHistoryInput = Omit<WorkoutHistoryEntry, 'id' | 'userId' | 'created' | 'updated'>;

/**
 * Per-exercise aggregate used by progress charts
 */
export interface ExerciseProgressMetrics {
  exerciseId: string;
  exerciseName: string;
  maxWeight: number;
  avgWeight: number;
  totalReps: number;
  totalVolume: number;
  /** ISO timestamp of the workout the metrics came from */
  date: string;
}

export interface WorkoutHistoryStats {
  userId: string;
  periodStart: string;
  periodEnd: string;
  totalWorkouts: number;
  completedWorkouts: number;
  totalDurationSeconds: number;
  totalWeightLifted: number;
  /** Exercise name to number of completed workouts containing it */
  exerciseFrequency: Record<string, number>;
  /** Percentage of workouts completed, 0..100 */
  completionRate: number;
  /** Average over entries that recorded a duration */
  averageDurationSeconds: number;
}

export function parseHistoryStatus(value: string | null | undefined): WorkoutHistoryStatus {
  switch (value?.toLowerCase()) {
    case 'in_progress':
    case 'inprogress':
      return 'in_progress';
    case 'completed':
      return 'completed';
    default:
      return 'planned';
  }
}

export function setVolume(set: WorkoutHistorySet): number {
  return set.completed ? set.weight * set.reps : 0;
}

export function exerciseCompletedSets(exercise: WorkoutHistoryExercise): number {
  return exercise.sets.filter((set) => set.completed).length;
}

export function exerciseVolume(exercise: WorkoutHistoryExercise): number {
  return exercise.sets.reduce((sum, set) => sum + setVolume(set), 0);
}

export function exerciseMaxWeight(exercise: WorkoutHistoryExercise): number {
  return exercise.sets.reduce(
    (max, set) => (set.completed && set.weight > max ? set.weight : max),
    0
  );
}

export function exerciseAverageWeight(exercise: WorkoutHistoryExercise): number {
  const weights = exercise.sets.filter((set) => set.completed).map((set) => set.weight);
  if (weights.length === 0) {
    return 0;
  }
  return weights.reduce((sum, weight) => sum + weight, 0) / weights.length;
}

export function calculateTotalSets(exercises: WorkoutHistoryExercise[]): number {
  return exercises.reduce((sum, exercise) => sum + exercise.sets.length, 0);
}

export function calculateTotalReps(exercises: WorkoutHistoryExercise[]): number {
  return exercises.reduce(
    (sum, exercise) =>
      sum +
      exercise.sets.filter((set) => set.completed).reduce((reps, set) => reps + set.reps, 0),
    0
  );
}

export function calculateTotalWeightLifted(exercises: WorkoutHistoryExercise[]): number {
  return exercises.reduce((sum, exercise) => sum + exerciseVolume(exercise), 0);
}

export function historyCompletionPercentage(entry: Pick<WorkoutHistoryEntry, 'exercises'>): number {
  const total = calculateTotalSets(entry.exercises);
  if (total === 0) {
    return 0;
  }
  const completed = entry.exercises.reduce(
    (sum, exercise) => sum + exerciseCompletedSets(exercise),
    0
  );
  return (completed / total) * 100;
}

export function historyExerciseMetrics(entry: WorkoutHistoryEntry): ExerciseProgressMetrics[] {
  const date = entry.completedAt ?? entry.startedAt ?? entry.created ?? '';
  return entry.exercises.map((exercise) => ({
    exerciseId: exercise.exerciseId,
    exerciseName: exercise.exerciseName,
    maxWeight: exerciseMaxWeight(exercise),
    avgWeight: exerciseAverageWeight(exercise),
    totalReps: exercise.sets
      .filter((set) => set.completed)
      .reduce((sum, set) => sum + set.reps, 0),
    totalVolume: exerciseVolume(exercise),
    date,
  }));
}

/**
 * Aggregates entries into period statistics. Duration covers every entry
 * that recorded one; weight and exercise frequency only count completed
 * entries.
 */
export function buildWorkoutHistoryStats(
  userId: string,
  entries: WorkoutHistoryEntry[],
  periodStart: Date,
  periodEnd: Date
): WorkoutHistoryStats {
  const completed = entries.filter((entry) => entry.status === 'completed');
  const timed = entries.filter((entry) => entry.durationSeconds !== undefined);
  const totalDurationSeconds = timed.reduce((sum, entry) => sum + (entry.durationSeconds ?? 0), 0);
  const exerciseFrequency: Record<string, number> = {};
  let totalWeightLifted = 0;

  for (const entry of completed) {
    totalWeightLifted += entry.totalWeightLifted;
    for (const exercise of entry.exercises) {
      exerciseFrequency[exercise.exerciseName] =
        (exerciseFrequency[exercise.exerciseName] ?? 0) + 1;
    }
  }

  return {
    userId,
    periodStart: periodStart.toISOString(),
    periodEnd: periodEnd.toISOString(),
    totalWorkouts: entries.length,
    completedWorkouts: completed.length,
    totalDurationSeconds,
    totalWeightLifted,
    exerciseFrequency,
    completionRate: entries.length === 0 ? 0 : (completed.length / entries.length) * 100,
    averageDurationSeconds: timed.length === 0 ? 0 : totalDurationSeconds / timed.length,
  };
}
