import { describe, it, expect } from 'vitest';
import {
  activatePlan,
  addWorkoutToDate,
  allWorkoutIds,
  deactivatePlan,
  getWorkoutsForDate,
  hasFutureWorkouts,
  removeWorkoutFromDate,
  scheduleDateRange,
} from './workout-plan.js';

const monday = new Date('2026-05-04T08:00:00.000Z');

describe('workout plan schedule helpers', () => {
  it('should add a workout once per date', () => {
    const once = addWorkoutToDate({ schedule: {} }, monday, 'w-1');
    const twice = addWorkoutToDate(once, monday, 'w-1');

    expect(twice.schedule).toEqual({ '2026-05-04': ['w-1'] });
    expect(getWorkoutsForDate(twice, monday)).toEqual(['w-1']);
  });

  it('should drop the date key when its last workout is removed', () => {
    const plan = { schedule: { '2026-05-04': ['w-1'], '2026-05-06': ['w-2'] } };

    const updated = removeWorkoutFromDate(plan, monday, 'w-1');

    expect(updated.schedule).toEqual({ '2026-05-06': ['w-2'] });
    expect(plan.schedule['2026-05-04']).toEqual(['w-1']);
  });

  it('should return the plan unchanged when removing from an empty date', () => {
    const plan = { schedule: {} };
    expect(removeWorkoutFromDate(plan, monday, 'w-1')).toBe(plan);
  });

  it('should collect unique workout ids and the date range', () => {
    const plan = {
      schedule: { '2026-05-06': ['w-2', 'w-1'], '2026-05-04': ['w-1'], junk: ['w-3'] },
    };

    expect([...allWorkoutIds(plan)].sort()).toEqual(['w-1', 'w-2', 'w-3']);
    expect(scheduleDateRange(plan)).toEqual({
      earliest: new Date('2026-05-04T00:00:00.000Z'),
      latest: new Date('2026-05-06T00:00:00.000Z'),
    });
    expect(scheduleDateRange({ schedule: {} })).toEqual({ earliest: null, latest: null });
  });

  it('should detect workouts after today only', () => {
    const plan = { schedule: { '2026-05-04': ['w-1'] } };

    expect(hasFutureWorkouts(plan, new Date('2026-05-03T23:00:00.000Z'))).toBe(true);
    expect(hasFutureWorkouts(plan, monday)).toBe(false);
  });

  it('should toggle the active flag', () => {
    expect(deactivatePlan({ isActive: true }).isActive).toBe(false);
    expect(activatePlan({ isActive: false }).isActive).toBe(true);
  });
});
