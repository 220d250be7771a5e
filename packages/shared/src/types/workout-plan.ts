/**
 * Workout plans map calendar days to the workouts scheduled on them.
 */
import { formatDateKey, parseDateKey } from '../utils/date-key.js';

/** "YYYY-MM-DD" -> workout ids */
export type WorkoutPlanSchedule = Record<string, string[]>;

export interface WorkoutPlan {
  id: string;
  userId: string;
  name: string;
  description: string;
  /** ISO timestamp */
  startDate: string;
  schedule: WorkoutPlanSchedule;
  isActive: boolean;
  created?: string;
  updated?: string;
}

export type WorkoutPlanInput = Pick<WorkoutPlan, 'name'> &
  Partial<Pick<WorkoutPlan, 'description' | 'startDate' | 'schedule' | 'isActive'>>;

export interface ScheduleDateRange {
  earliest: Date | null;
  latest: Date | null;
}

export function getWorkoutsForDate(plan: Pick<WorkoutPlan, 'schedule'>, date: Date): string[] {
  return plan.schedule[formatDateKey(date)] ?? [];
}

export function addWorkoutToDate<P extends Pick<WorkoutPlan, 'schedule'>>(
  plan: P,
  date: Date,
  workoutId: string
): P {
  const key = formatDateKey(date);
  const existing = plan.schedule[key] ?? [];
  if (existing.includes(workoutId)) {
    return plan;
  }
  return { ...plan, schedule: { ...plan.schedule, [key]: [...existing, workoutId] } };
}

export function removeWorkoutFromDate<P extends Pick<WorkoutPlan, 'schedule'>>(
  plan: P,
  date: Date,
  workoutId: string
): P {
  const key = formatDateKey(date);
  const existing = plan.schedule[key];
  if (existing === undefined) {
    return plan;
  }
  const schedule = { ...plan.schedule };
  const remaining = existing.filter((id) => id !== workoutId);
  if (remaining.length === 0) {
    delete schedule[key];
  } else {
    schedule[key] = remaining;
  }
  return { ...plan, schedule };
}

export function hasScheduledWorkouts(plan: Pick<WorkoutPlan, 'schedule'>): boolean {
  return Object.keys(plan.schedule).length > 0;
}

export function allWorkoutIds(plan: Pick<WorkoutPlan, 'schedule'>): Set<string> {
  return new Set(Object.values(plan.schedule).flat());
}

export function scheduleDateRange(plan: Pick<WorkoutPlan, 'schedule'>): ScheduleDateRange {
  const dates = Object.keys(plan.schedule)
    .map((key) => parseDateKey(key))
    .filter((date): date is Date => date !== null)
    .sort((a, b) => a.getTime() - b.getTime());

  return {
    earliest: dates[0] ?? null,
    latest: dates[dates.length - 1] ?? null,
  };
}

/**
 * True when any schedule key names a day after `today`.
 */
export function hasFutureWorkouts(plan: Pick<WorkoutPlan, 'schedule'>, today: Date): boolean {
  const todayKey = formatDateKey(today);
  return Object.entries(plan.schedule).some(
    ([key, workoutIds]) => key > todayKey && workoutIds.length > 0
  );
}

export function activatePlan<P extends Pick<WorkoutPlan, 'isActive'>>(plan: P): P {
  return { ...plan, isActive: true };
}

export function deactivatePlan<P extends Pick<WorkoutPlan, 'isActive'>>(plan: P): P {
  return { ...plan, isActive: false };
}
