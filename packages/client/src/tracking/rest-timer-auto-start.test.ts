import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { Subject } from 'rxjs';
import { error as logError } from 'firebase-functions/logger';
import { RestTimeSettingsService } from '../settings/rest-time-settings.service.js';
import { loadTimerState, saveTimerState } from '../settings/rest-timer-storage.js';
import { MemorySettingsStore } from '../settings/settings-store.js';
import { flushPromises } from '../test-utils/flush.js';
import { RestTimer } from './rest-timer.js';
import { RestTimerAutoStart } from './rest-timer-auto-start.js';
import type { SetCompletedEvent } from './workout-tracking.controller.js';

const NOW = new Date('2026-04-01T10:00:00.000Z');

function completed(overrides: Partial<SetCompletedEvent> = {}): SetCompletedEvent {
  return {
    exerciseIndex: 0,
    setIndex: 0,
    set: { reps: 8, weight: 60, restTimeSeconds: 90 },
    restTimeSeconds: 90,
    finishesWorkout: false,
    ...overrides,
  };
}

describe('RestTimerAutoStart', () => {
  let events: Subject<SetCompletedEvent>;
  let timer: RestTimer;
  let store: MemorySettingsStore;
  let autoStart: RestTimerAutoStart;

  function create(initial: Record<string, string | number | boolean> = {}) {
    store = new MemorySettingsStore(initial);
    autoStart = new RestTimerAutoStart(
      { setCompleted$: events },
      timer,
      new RestTimeSettingsService(store),
      { store, clock: () => NOW }
    );
  }

  beforeEach(() => {
    // Only the countdown is faked; promise flushing still needs setImmediate.
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    events = new Subject();
    timer = new RestTimer();
  });

  afterEach(() => {
    autoStart.dispose();
    timer.dispose();
    vi.useRealTimers();
  });

  it('should start the program rest after a set and save it', async () => {
    create();

    events.next(completed({ exerciseIndex: 1, setIndex: 2 }));
    await flushPromises();

    expect(timer.getState()).toEqual({ isResting: true, remainingSeconds: 90, originalSeconds: 90 });
    await expect(loadTimerState(store)).resolves.toEqual({
      startedAt: NOW.getTime(),
      targetSeconds: 90,
      exerciseIndex: 1,
      setIndex: 2,
    });
  });

  it('should use the default rest when the set has none', async () => {
    create();

    events.next(completed({ restTimeSeconds: undefined }));
    await flushPromises();

    expect(timer.getState().remainingSeconds).toBe(120);
  });

  it('should prefer the user default when it overrides the program', async () => {
    create({ useDefaultRestTime: true, defaultRestTimeSeconds: 45 });

    events.next(completed());
    await flushPromises();

    expect(timer.getState().remainingSeconds).toBe(45);
  });

  it('should not start after the set that finishes the workout', async () => {
    create();

    events.next(completed({ finishesWorkout: true }));
    await flushPromises();

    expect(timer.getState().isResting).toBe(false);
    await expect(loadTimerState(store)).resolves.toBeNull();
  });

  it('should forget the saved timer once the rest runs out', async () => {
    create();
    events.next(completed({ restTimeSeconds: 2 }));
    await flushPromises();

    vi.advanceTimersByTime(2000);
    await flushPromises();

    expect(timer.getState().isResting).toBe(false);
    await expect(loadTimerState(store)).resolves.toBeNull();
  });

  it('should forget the saved timer when the rest is skipped', async () => {
    create();
    events.next(completed());
    await flushPromises();

    timer.skip();
    await flushPromises();

    await expect(loadTimerState(store)).resolves.toBeNull();
  });

  it('should keep starting the timer after a save fails', async () => {
    create();
    vi.spyOn(store, 'setString').mockRejectedValueOnce(new Error('disk full'));

    events.next(completed({ setIndex: 0 }));
    await flushPromises();
    timer.skip();
    await flushPromises();
    events.next(completed({ setIndex: 1 }));
    await flushPromises();

    expect(logError).toHaveBeenCalledWith('Rest timer auto-start failed', {
      error: new Error('disk full'),
    });
    expect(timer.getState().isResting).toBe(true);
    await expect(loadTimerState(store)).resolves.toEqual({
      startedAt: NOW.getTime(),
      targetSeconds: 90,
      exerciseIndex: 0,
      setIndex: 1,
    });
  });

  it('should stop reacting after dispose', async () => {
    create();
    autoStart.dispose();

    events.next(completed());
    await flushPromises();

    expect(timer.getState().isResting).toBe(false);
  });

  describe('restore', () => {
    it('should resume a saved timer with the elapsed time removed', async () => {
      create();
      await saveTimerState(store, {
        startedAt: NOW.getTime() - 30_000,
        targetSeconds: 90,
        exerciseIndex: 0,
        setIndex: 1,
      });

      await expect(autoStart.restore()).resolves.toBe(true);

      expect(timer.getState()).toEqual({ isResting: true, remainingSeconds: 60, originalSeconds: 90 });
    });

    it('should drop a saved timer that has already run out', async () => {
      create();
      await saveTimerState(store, {
        startedAt: NOW.getTime() - 120_000,
        targetSeconds: 90,
        exerciseIndex: 0,
        setIndex: 1,
      });

      await expect(autoStart.restore()).resolves.toBe(false);

      expect(timer.getState().isResting).toBe(false);
      await expect(loadTimerState(store)).resolves.toBeNull();
    });

    it('should report nothing to restore without a store', async () => {
      autoStart = new RestTimerAutoStart(
        { setCompleted$: events },
        timer,
        new RestTimeSettingsService(new MemorySettingsStore())
      );

      await expect(autoStart.restore()).resolves.toBe(false);
    });
  });
});
