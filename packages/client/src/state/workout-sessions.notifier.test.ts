import { describe, it, expect } from 'vitest';
import { AuthenticationError, fail, ok } from '@periolifts/shared';
import { createFakeSessionBackend, workoutSession } from '../test-utils/fake-backends.js';
import { flushPromises } from '../test-utils/flush.js';
import { WorkoutSessionsNotifier, workoutSessionsFilter } from './workout-sessions.notifier.js';

describe('WorkoutSessionsNotifier', () => {
  it('should request sessions for the filter', async () => {
    const backend = createFakeSessionBackend();
    const notifier = new WorkoutSessionsNotifier(
      backend,
      workoutSessionsFilter({ status: 'in_progress' })
    );
    await flushPromises();

    expect(notifier.getState()).toEqual({ status: 'data', items: [] });

    expect(backend.getWorkoutSessions).toHaveBeenCalledWith({
      page: 1,
      perPage: 20,
      status: 'in_progress',
      startDate: undefined,
      endDate: undefined,
    });
  });

  it('should insert a new session at the head and rename in place', async () => {
    const backend = createFakeSessionBackend();
    backend.getWorkoutSessions.mockResolvedValueOnce(ok([workoutSession('s1')]));
    const notifier = new WorkoutSessionsNotifier(backend, workoutSessionsFilter());
    await flushPromises();

    await notifier.create({ name: 'Upper Body' });
    await notifier.update('s1', { name: 'Lower Body' });

    expect(notifier.items.map((session) => [session.id, session.name])).toEqual([
      ['generated-id', 'Upper Body'],
      ['s1', 'Lower Body'],
    ]);
  });

  it('should surface a signed-out error with an empty list', async () => {
    const backend = createFakeSessionBackend();
    const error = new AuthenticationError('Authentication required');
    backend.getWorkoutSessions.mockResolvedValueOnce(fail(error));
    const notifier = new WorkoutSessionsNotifier(backend, workoutSessionsFilter());
    await flushPromises();

    expect(notifier.getState()).toEqual({ status: 'error', error, items: [] });
  });
});
