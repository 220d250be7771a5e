import type {
  CreateWorkoutInput,
  Result,
  UpdateWorkoutInput,
  User,
  Workout,
  WorkoutHistoryEntry,
  WorkoutHistoryInput,
  WorkoutHistoryStats,
  WorkoutHistoryStatus,
  WorkoutSession,
  WorkoutSessionExercise,
  WorkoutSessionInput,
  WorkoutSessionSet,
  WorkoutSessionStats,
  WorkoutSessionStatus,
} from '@periolifts/shared';

/**
 * Who is signed in. Services consult it before user-scoped calls.
 */
export interface AuthSession {
  currentUserId(): string | null;
  isAuthenticated(): boolean;
}

export interface PageQuery {
  page?: number;
  perPage?: number;
}

export interface DateRange {
  startDate?: Date;
  endDate?: Date;
}

export interface WorkoutHistoryQuery extends PageQuery, DateRange {
  status?: WorkoutHistoryStatus;
  exerciseName?: string;
  workoutName?: string;
}

export interface WorkoutSessionQuery extends PageQuery, DateRange {
  status?: WorkoutSessionStatus;
}

export interface CreateSessionFromTemplateInput {
  templateName: string;
  templateDescription: string;
  exercises: WorkoutSessionExercise[];
  scheduledDate?: string;
}

/**
 * Workout history operations every backend provides.
 */
export interface WorkoutHistoryBackend {
  getWorkoutHistory(query?: WorkoutHistoryQuery): Promise<Result<WorkoutHistoryEntry[]>>;
  getWorkoutHistoryById(id: string): Promise<Result<WorkoutHistoryEntry>>;
  createWorkoutHistory(entry: WorkoutHistoryInput): Promise<Result<WorkoutHistoryEntry>>;
  updateWorkoutHistory(id: string, entry: WorkoutHistoryInput): Promise<Result<WorkoutHistoryEntry>>;
  deleteWorkoutHistory(id: string): Promise<Result<void>>;
  getUserWorkoutStats(range?: DateRange): Promise<Result<WorkoutHistoryStats>>;
  getRecentWorkouts(limit?: number): Promise<Result<WorkoutHistoryEntry[]>>;
}

/**
 * Workout session operations every backend provides.
 */
export interface WorkoutSessionBackend {
  getWorkoutSessions(query?: WorkoutSessionQuery): Promise<Result<WorkoutSession[]>>;
  getWorkoutSession(id: string): Promise<Result<WorkoutSession>>;
  createWorkoutSession(input: WorkoutSessionInput): Promise<Result<WorkoutSession>>;
  updateWorkoutSession(id: string, input: WorkoutSessionInput): Promise<Result<WorkoutSession>>;
  deleteWorkoutSession(id: string): Promise<Result<void>>;
  startWorkoutSession(id: string): Promise<Result<WorkoutSession>>;
  completeWorkoutSession(id: string): Promise<Result<WorkoutSession>>;
  updateSetData(
    sessionId: string,
    exerciseId: string,
    setId: string,
    set: WorkoutSessionSet
  ): Promise<Result<WorkoutSession>>;
  getWorkoutStats(range?: DateRange): Promise<Result<WorkoutSessionStats>>;
  getCompletedSessions(query?: PageQuery & DateRange): Promise<Result<WorkoutSession[]>>;
  createSessionFromTemplate(input: CreateSessionFromTemplateInput): Promise<Result<WorkoutSession>>;
  getActiveWorkoutSession(): Promise<Result<WorkoutSession | null>>;
  resumeWorkoutSession(id: string): Promise<Result<WorkoutSession>>;
}

/**
 * Persistence for tracked workouts, used by the tracking controller.
 */
export interface WorkoutStore {
  createWorkout(input: CreateWorkoutInput): Promise<Result<Workout>>;
  updateWorkout(id: string, input: UpdateWorkoutInput): Promise<Result<Workout>>;
}

export type AuthChangeListener = (user: User | null) => void;

export interface AuthBackend extends AuthSession {
  signIn(email: string, password: string): Promise<Result<User>>;
  signUp(email: string, password: string, name: string): Promise<Result<User>>;
  signOut(): Promise<Result<void>>;
  /** Picks up a session left by an earlier run; null when signed out. */
  restoreSession(): Promise<Result<User | null>>;
  currentUser(): User | null;
  onAuthChange(listener: AuthChangeListener): () => void;
}
