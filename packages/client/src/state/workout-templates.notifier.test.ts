import { describe, it, expect } from 'vitest';
import type { CreateWorkoutInput } from '@periolifts/shared';
import { PocketBaseWorkoutService } from '../backends/pocketbase/workout.service.js';
import {
  asPocketBase,
  createMockListResult,
  createMockRecord,
  createPocketBaseMocks,
} from '../test-utils/pocketbase-mock.js';
import { flushPromises } from '../test-utils/flush.js';
import {
  WorkoutTemplatesNotifier,
  workoutTemplatesFamily,
  workoutTemplatesFilter,
} from './workout-templates.notifier.js';

const legDay: CreateWorkoutInput = {
  name: 'Leg Day',
  description: '',
  exercises: [{ exerciseId: 'ex-3', exerciseName: 'Squat', sets: [{ reps: 5, weight: 120 }] }],
};

async function setup() {
  const mocks = createPocketBaseMocks();
  const workouts = mocks.collection('workouts');
  workouts.getList.mockResolvedValueOnce(
    createMockListResult([
      createMockRecord('w1', { user_id: 'user-1', name: 'Push Day', exercises: '[]' }),
      createMockRecord('w2', { user_id: 'user-1', name: 'Pull Day', exercises: '[]' }),
    ])
  );
  const notifier = new WorkoutTemplatesNotifier(
    new PocketBaseWorkoutService(asPocketBase(mocks)),
    workoutTemplatesFilter()
  );
  await flushPromises();
  return { notifier, workouts };
}

describe('WorkoutTemplatesNotifier', () => {
  it('should fetch the first page of the user templates', async () => {
    const { notifier, workouts } = await setup();

    expect(workouts.getList).toHaveBeenCalledWith(1, 50, {
      filter: 'user_id = "user-1"',
      sort: '-created',
    });
    expect(notifier.items.map((workout) => workout.name)).toEqual(['Push Day', 'Pull Day']);
    expect(notifier.hasMore).toBe(false);
  });

  it('should append a created template with a persisted id', async () => {
    const { notifier } = await setup();

    const result = await notifier.create(legDay);

    expect(result.success).toBe(true);
    expect(notifier.items).toHaveLength(3);
    expect(notifier.items[2]?.id).toBe('generated-id');
    expect(notifier.items[2]?.name).toBe('Leg Day');
  });

  it('should keep the list when the name is empty', async () => {
    const { notifier, workouts } = await setup();

    const result = await notifier.create({ ...legDay, name: '' });

    expect(result.success).toBe(false);
    const state = notifier.getState();
    expect(state.status).toBe('error');
    if (state.status === 'error') {
      expect(state.error.code).toBe('VALIDATION_ERROR');
      expect(state.error.message).toContain('cannot be empty');
    }
    expect(state.items).toHaveLength(2);
    expect(workouts.create).not.toHaveBeenCalled();
  });

  it('should remove a deleted template', async () => {
    const { notifier } = await setup();

    await notifier.delete('w1');

    expect(notifier.items.map((workout) => workout.id)).toEqual(['w2']);
  });
});

describe('workoutTemplatesFilter', () => {
  it('should apply the defaults', () => {
    expect(workoutTemplatesFilter({ searchQuery: 'legs' })).toEqual({
      searchQuery: 'legs',
      userOnly: true,
      perPage: 50,
    });
  });

  it('should back a family keyed by filter contents', () => {
    const mocks = createPocketBaseMocks();
    const family = workoutTemplatesFamily(new PocketBaseWorkoutService(asPocketBase(mocks)));

    const first = family.get(workoutTemplatesFilter());
    const second = family.get(workoutTemplatesFilter({ userOnly: true }));

    expect(second).toBe(first);
    family.disposeAll();
    expect(first.isDisposed).toBe(true);
  });
});
