import {
  EMPTY,
  catchError,
  concatMap,
  distinctUntilChanged,
  filter,
  from,
  map,
  merge,
  skip,
  type Subscription,
} from 'rxjs';
import { error as logError } from 'firebase-functions/logger';
import type { RestTimeSettingsService } from '../settings/rest-time-settings.service.js';
import {
  calculateElapsedSeconds,
  clearTimerState,
  loadTimerState,
  saveTimerState,
} from '../settings/rest-timer-storage.js';
import type { SettingsStore } from '../settings/settings-store.js';
import type { RestTimer } from './rest-timer.js';
import type { SetCompletedEvent, WorkoutTrackingController } from './workout-tracking.controller.js';

export interface RestTimerAutoStartOptions {
  /** Where the running timer is kept so it survives a restart */
  store?: SettingsStore;
  clock?: () => Date;
}

/**
 * Starts the rest timer after each completed set, for the rest time the
 * settings make effective. Sets that finish the workout start nothing.
 */
export class RestTimerAutoStart {
  private readonly subscription: Subscription;
  private readonly clock: () => Date;

  constructor(
    controller: Pick<WorkoutTrackingController, 'setCompleted$'>,
    private readonly timer: RestTimer,
    private readonly settings: RestTimeSettingsService,
    private readonly options: RestTimerAutoStartOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    // Saved state is dropped once the rest ends, whether it ran out or was skipped.
    const restEnded$ = timer.state$.pipe(
      map((state) => state.isResting),
      distinctUntilChanged(),
      skip(1),
      filter((isResting) => !isResting),
      map(() => null)
    );
    this.subscription = merge(controller.setCompleted$, restEnded$)
      .pipe(
        concatMap((event) =>
          from(event === null ? this.forget() : this.handle(event)).pipe(
            // A failed job is logged and the next event still runs.
            catchError((error: unknown) => {
              logError('Rest timer auto-start failed', { error });
              return EMPTY;
            })
          )
        )
      )
      .subscribe();
  }

  /**
   * Resumes a timer saved by an earlier run, if it has time left.
   */
  async restore(): Promise<boolean> {
    const store = this.options.store;
    if (store === undefined) {
      return false;
    }
    const saved = await loadTimerState(store);
    if (saved === null) {
      return false;
    }
    const elapsed = calculateElapsedSeconds(saved.startedAt, this.clock().getTime());
    if (elapsed >= saved.targetSeconds) {
      await clearTimerState(store);
      return false;
    }
    this.timer.start(saved.targetSeconds, elapsed);
    return true;
  }

  dispose(): void {
    this.subscription.unsubscribe();
  }

  private async handle(event: SetCompletedEvent): Promise<void> {
    if (event.finishesWorkout) {
      return;
    }
    const seconds = await this.settings.getEffectiveRestTime(event.restTimeSeconds);
    if (seconds <= 0) {
      return;
    }
    this.timer.start(seconds);
    if (this.options.store !== undefined) {
      await saveTimerState(this.options.store, {
        startedAt: this.clock().getTime(),
        targetSeconds: seconds,
        exerciseIndex: event.exerciseIndex,
        setIndex: event.setIndex,
      });
    }
  }

  private async forget(): Promise<void> {
    if (this.options.store !== undefined) {
      await clearTimerState(this.options.store);
    }
  }
}
