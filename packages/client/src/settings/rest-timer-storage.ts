import { warn } from 'firebase-functions/logger';
import { z } from 'zod';
import type { SettingsStore } from './settings-store.js';

const STORAGE_KEY = 'rest-timer-state';

const timerStateSchema = z.object({
  startedAt: z.number(),
  targetSeconds: z.number().int().positive(),
  exerciseIndex: z.number().int().min(0),
  setIndex: z.number().int().min(0),
});

/**
 * A running rest timer as persisted between launches.
 */
export interface TimerState {
  /** Epoch milliseconds when the timer was started */
  startedAt: number;
  targetSeconds: number;
  /** Exercise and set that triggered the timer (0-based) */
  exerciseIndex: number;
  setIndex: number;
}

export async function saveTimerState(store: SettingsStore, state: TimerState): Promise<void> {
  await store.setString(STORAGE_KEY, JSON.stringify(state));
}

/**
 * Returns the stored timer, or null when none is stored or it cannot be
 * read back.
 */
export async function loadTimerState(store: SettingsStore): Promise<TimerState | null> {
  const stored = await store.getString(STORAGE_KEY);
  if (stored === null || stored === '') {
    return null;
  }
  try {
    const parsed = timerStateSchema.safeParse(JSON.parse(stored));
    if (parsed.success) {
      return parsed.data;
    }
    warn('Discarding invalid rest timer state', { issues: parsed.error.issues.length });
  } catch (error) {
    warn('Failed to load rest timer state', { error });
  }
  return null;
}

export async function clearTimerState(store: SettingsStore): Promise<void> {
  await store.remove(STORAGE_KEY);
}

/**
 * Whole seconds since `startedAt`, never negative.
 */
export function calculateElapsedSeconds(startedAt: number, now: number = Date.now()): number {
  return Math.max(0, Math.floor((now - startedAt) / 1000));
}
