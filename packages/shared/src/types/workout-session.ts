/**
 * Workout sessions: a scheduled or running instance of a workout with
 * target and actual values per set.
 */
import type { WorkoutHistoryStatus } from './workout-history.js';

export type WorkoutSessionStatus = WorkoutHistoryStatus;

export interface WorkoutSessionSet {
  setId: string;
  /** 1-based position within the exercise */
  setNumber: number;
  targetReps: number;
  targetWeight: number;
  actualReps?: number;
  actualWeight?: number;
  completed: boolean;
  restTimeSeconds?: number;
}

export interface WorkoutSessionExercise {
  exerciseId: string;
  exerciseName: string;
  sets: WorkoutSessionSet[];
  targetSets?: number;
  targetReps?: number;
  targetWeight?: number;
}

export interface WorkoutSession {
  id: string;
  userId: string;
  name: string;
  description: string;
  status: WorkoutSessionStatus;
  exercises: WorkoutSessionExercise[];
  /** ISO timestamps */
  scheduledDate?: string;
  startedAt?: string;
  completedAt?: string;
  created?: string;
  updated?: string;
}

export type WorkoutSessionInput = Pick<WorkoutSession, 'name'> &
  Partial<
    Pick<
      WorkoutSession,
      'description' | 'status' | 'exercises' | 'scheduledDate' | 'startedAt' | 'completedAt'
    >
  >;

export interface WorkoutSessionStats {
  totalSessions: number;
  completedSessions: number;
  /** Whole minutes summed per completed session */
  totalWorkoutMinutes: number;
  /** Completed sets that carry actual reps and weight */
  totalSets: number;
  totalWeightLifted: number;
  periodStart: string;
  periodEnd: string;
}

export function sessionTotalSets(session: Pick<WorkoutSession, 'exercises'>): number {
  return session.exercises.reduce((sum, exercise) => sum + exercise.sets.length, 0);
}

export function sessionCompletedSets(session: Pick<WorkoutSession, 'exercises'>): number {
  return session.exercises.reduce(
    (sum, exercise) => sum + exercise.sets.filter((set) => set.completed).length,
    0
  );
}

export function sessionProgressPercentage(session: Pick<WorkoutSession, 'exercises'>): number {
  const total = sessionTotalSets(session);
  return total === 0 ? 0 : (sessionCompletedSets(session) / total) * 100;
}

/**
 * Elapsed milliseconds; running sessions are measured against `now`.
 */
export function sessionDurationMs(
  session: Pick<WorkoutSession, 'startedAt' | 'completedAt' | 'status'>,
  now: Date = new Date()
): number | null {
  if (session.startedAt === undefined) {
    return null;
  }
  const started = Date.parse(session.startedAt);
  if (session.completedAt !== undefined) {
    return Date.parse(session.completedAt) - started;
  }
  if (session.status === 'in_progress') {
    return now.getTime() - started;
  }
  return null;
}

export function buildWorkoutSessionStats(
  sessions: WorkoutSession[],
  periodStart: Date,
  periodEnd: Date
): WorkoutSessionStats {
  const completed = sessions.filter((session) => session.status === 'completed');
  let totalWorkoutMinutes = 0;
  let totalSets = 0;
  let totalWeightLifted = 0;

  for (const session of completed) {
    const duration = sessionDurationMs(session);
    if (duration !== null) {
      totalWorkoutMinutes += Math.floor(duration / 60000);
    }
    for (const exercise of session.exercises) {
      for (const set of exercise.sets) {
        if (set.completed && set.actualWeight !== undefined && set.actualReps !== undefined) {
          totalSets += 1;
          totalWeightLifted += set.actualWeight * set.actualReps;
        }
      }
    }
  }

  return {
    totalSessions: sessions.length,
    completedSessions: completed.length,
    totalWorkoutMinutes,
    totalSets,
    totalWeightLifted,
    periodStart: periodStart.toISOString(),
    periodEnd: periodEnd.toISOString(),
  };
}
