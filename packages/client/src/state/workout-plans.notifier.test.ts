import { describe, it, expect } from 'vitest';
import { PocketBaseWorkoutPlanService } from '../backends/pocketbase/workout-plan.service.js';
import {
  asPocketBase,
  createMockListResult,
  createMockRecord,
  createPocketBaseMocks,
} from '../test-utils/pocketbase-mock.js';
import { flushPromises } from '../test-utils/flush.js';
import { WorkoutPlansNotifier, workoutPlansFilter } from './workout-plans.notifier.js';

const planRecord = (id: string, isActive: boolean) =>
  createMockRecord(
    id,
    {
      user_id: 'user-1',
      name: `Block ${id}`,
      description: '',
      start_date: new Date().toISOString(),
      schedule: '{}',
      is_active: isActive,
    },
    'workout_plans'
  );

async function setup() {
  const mocks = createPocketBaseMocks();
  const plans = mocks.collection('workout_plans');
  plans.getList.mockResolvedValueOnce(
    createMockListResult([planRecord('p1', false), planRecord('p2', true)])
  );
  const notifier = new WorkoutPlansNotifier(
    new PocketBaseWorkoutPlanService(asPocketBase(mocks)),
    workoutPlansFilter()
  );
  await flushPromises();
  return { notifier, plans };
}

describe('WorkoutPlansNotifier', () => {
  it('should request plans without the active filter by default', async () => {
    const { plans } = await setup();

    expect(plans.getList).toHaveBeenCalledWith(1, 50, {
      filter: 'user_id = "user-1"',
      sort: '-created',
    });
  });

  it('should insert a new plan at the head', async () => {
    const { notifier } = await setup();

    await notifier.create({ name: 'Hypertrophy Block' });

    expect(notifier.items.map((plan) => plan.id)).toEqual(['generated-id', 'p1', 'p2']);
  });

  it('should activate a plan in place', async () => {
    const { notifier, plans } = await setup();
    plans.getOne.mockResolvedValueOnce(planRecord('p1', false));

    const result = await notifier.activate('p1');

    expect(result.success).toBe(true);
    expect(notifier.items.map((plan) => [plan.id, plan.isActive])).toEqual([
      ['p1', true],
      ['p2', true],
    ]);
  });

  it('should deactivate a plan in place', async () => {
    const { notifier, plans } = await setup();
    plans.getOne.mockResolvedValueOnce(planRecord('p2', true));

    await notifier.deactivate('p2');

    expect(notifier.items.map((plan) => plan.isActive)).toEqual([false, false]);
  });

  it('should keep the list when activation fails', async () => {
    const { notifier } = await setup();

    const result = await notifier.activate('missing');

    expect(result.success).toBe(false);
    const state = notifier.getState();
    expect(state.status).toBe('error');
    if (state.status === 'error') {
      expect(state.error.code).toBe('NOT_FOUND');
    }
    expect(state.items.map((plan) => plan.id)).toEqual(['p1', 'p2']);
  });
});
