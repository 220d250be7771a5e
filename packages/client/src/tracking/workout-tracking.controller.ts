import { Subject, type Observable } from 'rxjs';
import { info, warn } from 'firebase-functions/logger';
import {
  fail,
  ok,
  type AppError,
  type CreateWorkoutInput,
  type Failure,
  type Result,
  type Workout,
  type WorkoutHistoryEntry,
  type WorkoutHistoryInput,
  type WorkoutSet,
} from '@periolifts/shared';
import type { WorkoutHistoryBackend, WorkoutStore } from '../backends/types.js';
import { StateNotifier } from '../state/state-notifier.js';
import { trackingStateToHistoryEntry } from './workout-converter.js';
import {
  areAllExercisesCompleted,
  calculateExerciseStatuses,
  createTrackingState,
  currentSet,
  toWorkoutProgress,
  trackedExercises,
  workoutDurationSeconds,
  type WorkoutTrackingState,
} from './workout-tracking.state.js';

export interface SetCompletedEvent {
  exerciseIndex: number;
  setIndex: number;
  /** The set as it was completed */
  set: WorkoutSet;
  /** Rest the program asks for after this set */
  restTimeSeconds?: number;
  /** True when this set finished the whole workout */
  finishesWorkout: boolean;
}

export interface WorkoutTrackingDependencies {
  workouts: WorkoutStore;
  history: WorkoutHistoryBackend;
  clock?: () => Date;
}

const MAX_WEIGHT = 999;
const MAX_REPS = 999;
// Entries started this long before the tracked workout still count as the same session.
const HISTORY_MATCH_WINDOW_MS = 60 * 60 * 1000;

const systemClock = (): Date => new Date();

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function parseWeight(value: string): number | null {
  const parsed = Number.parseFloat(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

function parseReps(value: string): number | null {
  const trimmed = value.trim();
  return /^[+-]?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

/**
 * Drives one workout from exercise selection to completion and persists
 * it through the injected stores. Completed sets are announced on
 * `setCompleted$`.
 */
export class WorkoutTrackingController extends StateNotifier<WorkoutTrackingState> {
  private readonly setCompletedSubject = new Subject<SetCompletedEvent>();
  private readonly clock: () => Date;

  constructor(
    workout: Workout,
    private readonly deps: WorkoutTrackingDependencies
  ) {
    super(createTrackingState(workout, (deps.clock ?? systemClock)()));
    this.clock = deps.clock ?? systemClock;
  }

  get setCompleted$(): Observable<SetCompletedEvent> {
    return this.setCompletedSubject.asObservable();
  }

  get durationSeconds(): number {
    return workoutDurationSeconds(this.getState(), this.clock());
  }

  selectExercise(exerciseIndex: number): void {
    const state = this.getState();
    if (exerciseIndex < 0 || exerciseIndex >= state.workout.exercises.length) {
      warn('Ignoring invalid exercise index', {
        exerciseIndex,
        exerciseCount: state.workout.exercises.length,
      });
      return;
    }
    this.setState({
      ...state,
      view: 'exerciseTracking',
      selectedExerciseIndex: exerciseIndex,
      currentExerciseIndex: exerciseIndex,
      currentSetIndex: this.firstOpenSet(exerciseIndex),
      selectedSetIndex: null,
    });
  }

  returnToExerciseSelection(): void {
    this.setState({ ...this.getState(), view: 'exerciseSelection', selectedExerciseIndex: null });
  }

  /** Selects a set for editing, or clears the selection when it is already selected. */
  selectSet(setIndex: number): void {
    const state = this.getState();
    this.setState({
      ...state,
      selectedSetIndex: state.selectedSetIndex === setIndex ? null : setIndex,
    });
  }

  /**
   * Moves to another exercise without leaving the tracking view.
   */
  goToExercise(exerciseIndex: number): void {
    const state = this.getState();
    if (exerciseIndex < 0 || exerciseIndex >= state.workout.exercises.length) {
      return;
    }
    this.setState({
      ...state,
      currentExerciseIndex: exerciseIndex,
      currentSetIndex: this.firstOpenSet(exerciseIndex),
      selectedSetIndex: null,
    });
  }

  updateWeight(value: string, setIndex?: number, exerciseIndex?: number): void {
    const weight = parseWeight(value);
    if (weight !== null) {
      this.patchSet({ weight }, setIndex, exerciseIndex);
    }
  }

  updateReps(value: string, setIndex?: number, exerciseIndex?: number): void {
    const reps = parseReps(value);
    if (reps !== null) {
      this.patchSet({ reps }, setIndex, exerciseIndex);
    }
  }

  adjustWeight(delta: number): void {
    const set = currentSet(this.getState());
    if (set !== undefined) {
      this.patchSet({ weight: clamp(set.weight + delta, 0, MAX_WEIGHT) });
    }
  }

  adjustReps(delta: number): void {
    const set = currentSet(this.getState());
    if (set !== undefined) {
      this.patchSet({ reps: clamp(set.reps + delta, 1, MAX_REPS) });
    }
  }

  /**
   * Marks the current set done and moves on: to the next set, back to the
   * exercise list, or to completing the workout after its last set.
   */
  async completeSet(): Promise<Result<void>> {
    const state = this.getState();
    const exerciseIndex = state.currentExerciseIndex;
    const setIndex = state.currentSetIndex;
    const completedRow = state.completedSets[exerciseIndex];
    const set = currentSet(state);
    if (completedRow === undefined || set === undefined || setIndex >= completedRow.length) {
      return ok(undefined);
    }

    const completedSets = state.completedSets.map((row, index) =>
      index === exerciseIndex ? row.map((done, i) => done || i === setIndex) : row
    );
    const marked: WorkoutTrackingState = {
      ...state,
      completedSets,
      exerciseStatuses: calculateExerciseStatuses(state.workout.exercises.length, completedSets),
    };
    this.setState(marked);

    const isLastSet = setIndex >= completedRow.length - 1;
    const finishesWorkout = isLastSet && areAllExercisesCompleted(marked);
    this.setCompletedSubject.next({
      exerciseIndex,
      setIndex,
      set,
      ...(set.restTimeSeconds !== undefined && { restTimeSeconds: set.restTimeSeconds }),
      finishesWorkout,
    });

    if (!isLastSet) {
      this.prefillNextSet(exerciseIndex, setIndex + 1, set);
      return ok(undefined);
    }
    if (finishesWorkout) {
      const completed = await this.completeWorkout();
      return completed.success ? ok(undefined) : completed;
    }
    this.returnToExerciseSelection();
    return ok(undefined);
  }

  /**
   * Saves the workout as in progress, with its position and tracked sets,
   * and mirrors it into workout history.
   */
  async saveProgress(): Promise<Result<Workout>> {
    const state = this.getState();
    const now = this.clock();
    const saved = await this.persist(
      {
        ...this.baseInput(state),
        isCompleted: false,
        isInProgress: true,
        progress: toWorkoutProgress(state, now),
      },
      'Error saving progress'
    );
    if (saved.success) {
      const recorded = await this.recordHistory(this.getState());
      if (!recorded.success) {
        warn('Failed to record workout progress in history', {
          workout: state.workout.name,
          code: recorded.error.code,
        });
      }
      this.setState({ ...this.getState(), isLoading: false });
    }
    return saved;
  }

  /**
   * Saves the workout as completed and records it in workout history.
   */
  async completeWorkout(): Promise<Result<WorkoutHistoryEntry>> {
    const state = this.getState();
    const now = this.clock();
    const saved = await this.persist(
      {
        ...this.baseInput(state),
        isCompleted: true,
        completedDate: now.toISOString(),
        isInProgress: false,
      },
      'Error saving workout'
    );
    if (!saved.success) {
      return saved;
    }

    const completedState: WorkoutTrackingState = { ...this.getState(), isWorkoutCompleted: true };
    const recorded = await this.recordHistory(completedState);
    if (!recorded.success) {
      return this.failWith(recorded.error);
    }
    this.setState({ ...completedState, isLoading: false, error: null });
    info('Workout completed', {
      workout: state.workout.name,
      durationSeconds: recorded.data.durationSeconds,
    });
    return recorded;
  }

  clearError(): void {
    this.setState({ ...this.getState(), error: null });
  }

  override dispose(): void {
    this.setCompletedSubject.complete();
    super.dispose();
  }

  private firstOpenSet(exerciseIndex: number): number {
    const row = this.getState().completedSets[exerciseIndex] ?? [];
    const open = row.findIndex((done) => !done);
    return open === -1 ? Math.max(0, row.length - 1) : open;
  }

  private patchSet(
    patch: Partial<Pick<WorkoutSet, 'reps' | 'weight'>>,
    setIndex?: number,
    exerciseIndex?: number
  ): void {
    const state = this.getState();
    const targetExercise = exerciseIndex ?? state.currentExerciseIndex;
    const targetSet = setIndex ?? state.currentSetIndex;
    const existing = state.modifiedSets[targetExercise]?.[targetSet];
    if (existing === undefined) {
      return;
    }
    this.setState({
      ...state,
      modifiedSets: state.modifiedSets.map((row, index) =>
        index === targetExercise
          ? row.map((set, i) => (i === targetSet ? { ...set, ...patch } : set))
          : row
      ),
    });
  }

  private prefillNextSet(exerciseIndex: number, nextSetIndex: number, from: WorkoutSet): void {
    this.patchSet({ reps: from.reps, weight: from.weight }, nextSetIndex, exerciseIndex);
    this.setState({ ...this.getState(), currentSetIndex: nextSetIndex });
  }

  private baseInput(state: WorkoutTrackingState): CreateWorkoutInput {
    return {
      name: state.workout.name,
      description: state.workout.description,
      ...(state.workout.scheduledDate !== undefined && {
        scheduledDate: state.workout.scheduledDate,
      }),
      exercises: trackedExercises(state),
    };
  }

  /**
   * Updates the stored workout, or creates it when it has no owner yet or
   * no longer exists.
   */
  private async persist(input: CreateWorkoutInput, errorContext: string): Promise<Result<Workout>> {
    this.setState({ ...this.getState(), isLoading: true, error: null });
    const { workout } = this.getState();

    let result: Result<Workout>;
    if (workout.id === '' || workout.userId === '') {
      result = await this.deps.workouts.createWorkout(input);
    } else {
      result = await this.deps.workouts.updateWorkout(workout.id, input);
      if (!result.success && result.error.code === 'NOT_FOUND') {
        result = await this.deps.workouts.createWorkout(input);
      }
    }

    if (!result.success) {
      warn(errorContext, { workout: workout.name, code: result.error.code });
      return this.failWith(result.error);
    }
    this.setState({ ...this.getState(), workout: result.data });
    return result;
  }

  /**
   * Writes the tracked workout to history, updating a matching in-progress
   * entry of the same workout when there is one.
   */
  private async recordHistory(state: WorkoutTrackingState): Promise<Result<WorkoutHistoryEntry>> {
    const now = this.clock();
    const entry = trackingStateToHistoryEntry(state, workoutDurationSeconds(state, now), now);

    const existing = await this.deps.history.getWorkoutHistory({
      workoutName: state.workout.name,
      status: 'in_progress',
      startDate: new Date(state.startedAt.getTime() - HISTORY_MATCH_WINDOW_MS),
      page: 1,
      perPage: 1,
    });
    if (!existing.success) {
      return existing;
    }
    const match = existing.data.find((candidate) => candidate.name === state.workout.name);
    if (match === undefined) {
      return this.deps.history.createWorkoutHistory(entry);
    }
    const update: WorkoutHistoryInput = {
      ...entry,
      ...(match.scheduledDate !== undefined && { scheduledDate: match.scheduledDate }),
      ...(match.startedAt !== undefined && { startedAt: match.startedAt }),
      notes: match.notes,
    };
    return this.deps.history.updateWorkoutHistory(match.id, update);
  }

  private failWith(error: AppError): Failure {
    this.setState({ ...this.getState(), isLoading: false, error });
    return fail(error);
  }
}
