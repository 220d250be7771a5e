import {
  parseHistoryStatus,
  calculateTotalReps,
  calculateTotalSets,
  calculateTotalWeightLifted,
  type CalendarEvent,
  type Exercise,
  type User,
  type Workout,
  type WorkoutExercise,
  type WorkoutHistoryEntry,
  type WorkoutHistoryExercise,
  type WorkoutHistoryInput,
  type WorkoutHistorySet,
  type WorkoutPlan,
  type WorkoutPlanSchedule,
  type WorkoutProgress,
  type WorkoutSession,
  type WorkoutSessionExercise,
  type WorkoutSessionInput,
  type WorkoutSessionSet,
  type WorkoutSet,
  type CreateWorkoutInput,
} from '@periolifts/shared';
import {
  decodeJson,
  isRecord,
  readBoolean,
  readNumber,
  readOptionalString,
  readString,
} from './type-guards.js';

/**
 * Identity and timestamps as each backend names them.
 */
export interface RecordMeta {
  id: string;
  created?: string;
  updated?: string;
}

/**
 * Lists whose items may each be a JSON string or an object.
 */
function decodeList(value: unknown): Record<string, unknown>[] {
  const decoded = decodeJson(value);
  if (!Array.isArray(decoded)) {
    return [];
  }
  return decoded.map((item) => decodeJson(item)).filter(isRecord);
}

function parseWorkoutSet(data: Record<string, unknown>): WorkoutSet | null {
  const reps = readNumber(data, 'reps');
  const weight = readNumber(data, 'weight');
  if (reps === null || weight === null) {
    return null;
  }
  const restTime = readNumber(data, 'restTime');
  return { reps, weight, ...(restTime !== null && { restTimeSeconds: restTime }) };
}

function serializeWorkoutSet(set: WorkoutSet): Record<string, unknown> {
  return { reps: set.reps, weight: set.weight, restTime: set.restTimeSeconds ?? null };
}

export function parseWorkoutExercises(value: unknown): WorkoutExercise[] {
  return decodeList(value)
    .map((data): WorkoutExercise | null => {
      const exerciseId = readString(data, 'exerciseId');
      const exerciseName = readString(data, 'exerciseName');
      if (exerciseId === null || exerciseName === null) {
        return null;
      }
      const sets = decodeList(data['sets'])
        .map(parseWorkoutSet)
        .filter((set): set is WorkoutSet => set !== null);
      return { exerciseId, exerciseName, sets };
    })
    .filter((exercise): exercise is WorkoutExercise => exercise !== null);
}

export function serializeWorkoutExercise(exercise: WorkoutExercise): Record<string, unknown> {
  return {
    exerciseId: exercise.exerciseId,
    exerciseName: exercise.exerciseName,
    sets: exercise.sets.map(serializeWorkoutSet),
  };
}

export function parseWorkoutProgress(value: unknown): WorkoutProgress | undefined {
  const data = decodeJson(value);
  if (!isRecord(data)) {
    return undefined;
  }
  const currentExerciseIndex = readNumber(data, 'currentExerciseIndex');
  const currentSetIndex = readNumber(data, 'currentSetIndex');
  const completed = data['completedSets'];
  const modified = data['modifiedSets'];
  if (
    currentExerciseIndex === null ||
    currentSetIndex === null ||
    !Array.isArray(completed) ||
    !Array.isArray(modified)
  ) {
    return undefined;
  }

  const completedSets = completed.map((row) =>
    Array.isArray(row) ? row.map((flag) => flag === true) : []
  );
  const modifiedSets = modified.map((row) =>
    decodeList(row)
      .map(parseWorkoutSet)
      .filter((set): set is WorkoutSet => set !== null)
  );
  const lastSavedAt = readOptionalString(data, 'lastSavedAt');

  return {
    currentExerciseIndex,
    currentSetIndex,
    completedSets,
    modifiedSets,
    ...(lastSavedAt !== undefined && { lastSavedAt }),
  };
}

export function serializeWorkoutProgress(progress: WorkoutProgress): string {
  return JSON.stringify({
    currentExerciseIndex: progress.currentExerciseIndex,
    currentSetIndex: progress.currentSetIndex,
    completedSets: progress.completedSets,
    modifiedSets: progress.modifiedSets.map((row) => row.map(serializeWorkoutSet)),
    lastSavedAt: progress.lastSavedAt ?? null,
  });
}

export function parseWorkout(meta: RecordMeta, data: Record<string, unknown>): Workout | null {
  const name = readString(data, 'name');
  if (name === null) {
    return null;
  }
  const scheduledDate = readOptionalString(data, 'scheduled_date');
  const completedDate = readOptionalString(data, 'completed_date');
  const isInProgress = readBoolean(data, 'is_in_progress') ?? false;
  const progress = isInProgress ? parseWorkoutProgress(data['progress']) : undefined;

  return {
    ...meta,
    userId: readString(data, 'user_id') ?? '',
    name,
    description: readString(data, 'description') ?? '',
    ...(scheduledDate !== undefined && { scheduledDate }),
    exercises: parseWorkoutExercises(data['exercises']),
    isCompleted: readBoolean(data, 'is_completed') ?? false,
    ...(completedDate !== undefined && { completedDate }),
    isInProgress,
    ...(progress !== undefined && { progress }),
  };
}

/**
 * Progress is only written while the workout is in progress.
 */
export function serializeWorkout(userId: string, input: CreateWorkoutInput): Record<string, unknown> {
  const isInProgress = input.isInProgress ?? false;
  return {
    user_id: userId,
    name: input.name.trim(),
    description: input.description ?? '',
    scheduled_date: input.scheduledDate ?? '',
    exercises: input.exercises.map(serializeWorkoutExercise),
    is_completed: input.isCompleted ?? false,
    completed_date: input.completedDate ?? '',
    is_in_progress: isInProgress,
    progress:
      isInProgress && input.progress !== undefined ? serializeWorkoutProgress(input.progress) : '',
  };
}

function parseHistorySet(data: Record<string, unknown>): WorkoutHistorySet | null {
  const set = parseWorkoutSet(data);
  if (set === null) {
    return null;
  }
  return { ...set, completed: readBoolean(data, 'completed') ?? false };
}

export function parseHistoryExercises(value: unknown): WorkoutHistoryExercise[] {
  return decodeList(value)
    .map((data): WorkoutHistoryExercise | null => {
      const exerciseId = readString(data, 'exerciseId');
      const exerciseName = readString(data, 'exerciseName');
      if (exerciseId === null || exerciseName === null) {
        return null;
      }
      const sets = decodeList(data['sets'])
        .map(parseHistorySet)
        .filter((set): set is WorkoutHistorySet => set !== null);
      return { exerciseId, exerciseName, sets };
    })
    .filter((exercise): exercise is WorkoutHistoryExercise => exercise !== null);
}

export function serializeHistoryExercise(exercise: WorkoutHistoryExercise): Record<string, unknown> {
  return {
    exerciseId: exercise.exerciseId,
    exerciseName: exercise.exerciseName,
    sets: exercise.sets.map((set) => ({ ...serializeWorkoutSet(set), completed: set.completed })),
  };
}

/**
 * Totals missing from the record are computed from its exercises.
 */
export function parseWorkoutHistory(
  meta: RecordMeta,
  data: Record<string, unknown>
): WorkoutHistoryEntry | null {
  const name = readString(data, 'name');
  if (name === null) {
    return null;
  }
  const exercises = parseHistoryExercises(data['exercises']);
  const scheduledDate = readOptionalString(data, 'scheduled_date');
  const startedAt = readOptionalString(data, 'started_at');
  const completedAt = readOptionalString(data, 'completed_at');
  const durationSeconds = readNumber(data, 'duration');

  return {
    ...meta,
    userId: readString(data, 'user_id') ?? '',
    name,
    status: parseHistoryStatus(readString(data, 'status')),
    ...(scheduledDate !== undefined && { scheduledDate }),
    ...(startedAt !== undefined && { startedAt }),
    ...(completedAt !== undefined && { completedAt }),
    ...(durationSeconds !== null && { durationSeconds }),
    exercises,
    totalSets: readNumber(data, 'total_sets') ?? calculateTotalSets(exercises),
    totalReps: readNumber(data, 'total_reps') ?? calculateTotalReps(exercises),
    totalWeightLifted:
      readNumber(data, 'total_weight_lifted') ?? calculateTotalWeightLifted(exercises),
    notes: readString(data, 'notes') ?? '',
  };
}

export function serializeWorkoutHistory(
  userId: string,
  entry: WorkoutHistoryInput
): Record<string, unknown> {
  return {
    user_id: userId,
    name: entry.name.trim(),
    status: entry.status,
    scheduled_date: entry.scheduledDate ?? '',
    started_at: entry.startedAt ?? '',
    completed_at: entry.completedAt ?? '',
    duration: entry.durationSeconds ?? null,
    exercises: entry.exercises.map(serializeHistoryExercise),
    total_sets: entry.totalSets,
    total_reps: entry.totalReps,
    total_weight_lifted: entry.totalWeightLifted,
    notes: entry.notes,
  };
}

function parseSessionSet(data: Record<string, unknown>): WorkoutSessionSet | null {
  const setId = readString(data, 'setId');
  const setNumber = readNumber(data, 'setNumber');
  const targetReps = readNumber(data, 'targetReps');
  const targetWeight = readNumber(data, 'targetWeight');
  if (setId === null || setNumber === null || targetReps === null || targetWeight === null) {
    return null;
  }
  const actualReps = readNumber(data, 'actualReps');
  const actualWeight = readNumber(data, 'actualWeight');
  const restTime = readNumber(data, 'restTime');
  return {
    setId,
    setNumber,
    targetReps,
    targetWeight,
    ...(actualReps !== null && { actualReps }),
    ...(actualWeight !== null && { actualWeight }),
    completed: readBoolean(data, 'completed') ?? false,
    ...(restTime !== null && { restTimeSeconds: restTime }),
  };
}

export function serializeSessionSet(set: WorkoutSessionSet): Record<string, unknown> {
  return {
    setId: set.setId,
    setNumber: set.setNumber,
    targetReps: set.targetReps,
    targetWeight: set.targetWeight,
    actualReps: set.actualReps ?? null,
    actualWeight: set.actualWeight ?? null,
    completed: set.completed,
    restTime: set.restTimeSeconds ?? null,
  };
}

export function parseSessionExercises(value: unknown): WorkoutSessionExercise[] {
  return decodeList(value)
    .map((data): WorkoutSessionExercise | null => {
      const exerciseId = readString(data, 'exerciseId');
      const exerciseName = readString(data, 'exerciseName');
      if (exerciseId === null || exerciseName === null) {
        return null;
      }
      const targetSets = readNumber(data, 'targetSets');
      const targetReps = readNumber(data, 'targetReps');
      const targetWeight = readNumber(data, 'targetWeight');
      return {
        exerciseId,
        exerciseName,
        sets: decodeList(data['sets'])
          .map(parseSessionSet)
          .filter((set): set is WorkoutSessionSet => set !== null),
        ...(targetSets !== null && { targetSets }),
        ...(targetReps !== null && { targetReps }),
        ...(targetWeight !== null && { targetWeight }),
      };
    })
    .filter((exercise): exercise is WorkoutSessionExercise => exercise !== null);
}

export function serializeSessionExercise(exercise: WorkoutSessionExercise): Record<string, unknown> {
  return {
    exerciseId: exercise.exerciseId,
    exerciseName: exercise.exerciseName,
    sets: exercise.sets.map(serializeSessionSet),
    targetSets: exercise.targetSets ?? null,
    targetReps: exercise.targetReps ?? null,
    targetWeight: exercise.targetWeight ?? null,
  };
}

export function parseWorkoutSession(
  meta: RecordMeta,
  data: Record<string, unknown>
): WorkoutSession | null {
  const name = readString(data, 'name');
  if (name === null) {
    return null;
  }
  const scheduledDate = readOptionalString(data, 'scheduled_date');
  const startedAt = readOptionalString(data, 'started_at');
  const completedAt = readOptionalString(data, 'completed_at');

  return {
    ...meta,
    userId: readString(data, 'user_id') ?? '',
    name,
    description: readString(data, 'description') ?? '',
    status: parseHistoryStatus(readString(data, 'status')),
    exercises: parseSessionExercises(data['exercises']),
    ...(scheduledDate !== undefined && { scheduledDate }),
    ...(startedAt !== undefined && { startedAt }),
    ...(completedAt !== undefined && { completedAt }),
  };
}

/**
 * Unset optional dates are left out so updates do not clear them.
 */
export function serializeWorkoutSession(
  userId: string,
  input: WorkoutSessionInput
): Record<string, unknown> {
  return {
    user_id: userId,
    name: input.name.trim(),
    description: input.description ?? '',
    status: input.status ?? 'planned',
    exercises: (input.exercises ?? []).map(serializeSessionExercise),
    ...(input.scheduledDate !== undefined && { scheduled_date: input.scheduledDate }),
    ...(input.startedAt !== undefined && { started_at: input.startedAt }),
    ...(input.completedAt !== undefined && { completed_at: input.completedAt }),
  };
}

/**
 * Accepts the schedule as a JSON string or an object, and the legacy
 * `workoutDays` key. Unreadable schedules are empty.
 */
export function parseSchedule(value: unknown): WorkoutPlanSchedule {
  const decoded = decodeJson(value);
  if (!isRecord(decoded)) {
    return {};
  }
  const schedule: WorkoutPlanSchedule = {};
  for (const [key, workoutIds] of Object.entries(decoded)) {
    if (Array.isArray(workoutIds)) {
      schedule[key] = workoutIds.filter((id): id is string => typeof id === 'string');
    }
  }
  return schedule;
}

export function parseWorkoutPlan(meta: RecordMeta, data: Record<string, unknown>): WorkoutPlan | null {
  const name = readString(data, 'name');
  if (name === null) {
    return null;
  }
  const schedule = data['schedule'] ?? data['workoutDays'];
  return {
    ...meta,
    userId: readString(data, 'user_id') ?? '',
    name,
    description: readString(data, 'description') ?? '',
    startDate: readOptionalString(data, 'start_date') ?? meta.created ?? new Date().toISOString(),
    schedule: parseSchedule(schedule),
    isActive: readBoolean(data, 'is_active') ?? true,
  };
}

export function serializeWorkoutPlan(plan: Omit<WorkoutPlan, 'id' | 'created' | 'updated'>): Record<string, unknown> {
  return {
    user_id: plan.userId,
    name: plan.name.trim(),
    description: plan.description,
    start_date: plan.startDate,
    schedule: JSON.stringify(plan.schedule),
    is_active: plan.isActive,
  };
}

export function parseMuscleGroups(value: unknown): string[] {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((group) => group.trim())
      .filter((group) => group !== '');
  }
  if (Array.isArray(value)) {
    return value.map((group) => String(group));
  }
  return [];
}

export function parseExercise(meta: RecordMeta, data: Record<string, unknown>): Exercise | null {
  const name = readString(data, 'name');
  if (name === null) {
    return null;
  }
  const imageUrl = readOptionalString(data, 'image_url');
  const videoUrl = readOptionalString(data, 'video_url');
  return {
    ...meta,
    name,
    category: readString(data, 'category') ?? '',
    description: readString(data, 'description') ?? '',
    muscleGroups: parseMuscleGroups(data['muscle_groups']),
    ...(imageUrl !== undefined && { imageUrl }),
    ...(videoUrl !== undefined && { videoUrl }),
    isCustom: data['is_custom'] === true,
    userId: readString(data, 'user_id') ?? '',
  };
}

export function serializeExercise(exercise: Omit<Exercise, 'id' | 'created' | 'updated'>): Record<string, unknown> {
  return {
    name: exercise.name.trim(),
    category: exercise.category,
    description: exercise.description,
    muscle_groups: exercise.muscleGroups,
    image_url: exercise.imageUrl ?? '',
    video_url: exercise.videoUrl ?? '',
    is_custom: exercise.isCustom,
    user_id: exercise.userId,
  };
}

function expandedPlanField(data: Record<string, unknown>, field: string): string | undefined {
  const expand = data['expand'];
  if (!isRecord(expand)) {
    return undefined;
  }
  const plan = expand['plan_id'];
  if (!isRecord(plan)) {
    return undefined;
  }
  return readOptionalString(plan, field);
}

export function parseCalendarEvent(
  meta: RecordMeta,
  data: Record<string, unknown>
): CalendarEvent | null {
  const scheduledDate = readOptionalString(data, 'scheduled_date');
  if (scheduledDate === undefined) {
    return null;
  }
  const notes = readOptionalString(data, 'notes');
  const calendarColor = readOptionalString(data, 'calendar_color');
  const isCompleted = readBoolean(data, 'is_completed');
  const completionDate = readOptionalString(data, 'completion_date');
  const planName = expandedPlanField(data, 'name');
  const planDescription = expandedPlanField(data, 'description');

  return {
    ...meta,
    planId: readString(data, 'plan_id') ?? '',
    workoutId: readString(data, 'workout_id') ?? '',
    scheduledDate,
    dayOfWeek: readString(data, 'day_of_week') ?? '',
    sortOrder: readNumber(data, 'sort_order') ?? 0,
    isRestDay: readBoolean(data, 'is_rest_day') ?? false,
    ...(notes !== undefined && { notes }),
    ...(calendarColor !== undefined && { calendarColor }),
    ...(isCompleted !== null && { isCompleted }),
    ...(completionDate !== undefined && { completionDate }),
    ...(planName !== undefined && { planName }),
    ...(planDescription !== undefined && { planDescription }),
  };
}

export function serializeCalendarEvent(
  event: Omit<CalendarEvent, 'id' | 'created' | 'updated' | 'planName' | 'planDescription'>
): Record<string, unknown> {
  return {
    plan_id: event.planId,
    workout_id: event.workoutId,
    scheduled_date: event.scheduledDate,
    day_of_week: event.dayOfWeek.toLowerCase(),
    sort_order: event.sortOrder,
    is_rest_day: event.isRestDay,
    ...(event.notes !== undefined && { notes: event.notes }),
    ...(event.calendarColor !== undefined && { calendar_color: event.calendarColor }),
    ...(event.isCompleted !== undefined && { is_completed: event.isCompleted }),
    ...(event.completionDate !== undefined && { completion_date: event.completionDate }),
  };
}

export function parseUser(meta: RecordMeta, data: Record<string, unknown>): User {
  const avatarUrl = readOptionalString(data, 'avatar');
  const units = readString(data, 'preferredUnits');
  return {
    ...meta,
    email: readString(data, 'email') ?? '',
    name: readString(data, 'name') ?? '',
    username: readString(data, 'username') ?? '',
    ...(avatarUrl !== undefined && { avatarUrl }),
    emailVerified: readBoolean(data, 'verified') ?? readBoolean(data, 'emailVerification') ?? false,
    preferredUnits: units === 'imperial' ? 'imperial' : 'metric',
    timezone: readString(data, 'timezone') ?? 'UTC',
  };
}

