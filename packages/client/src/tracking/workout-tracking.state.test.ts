import { describe, it, expect } from 'vitest';
import { START, trackedWorkout } from '../test-utils/workout-fixtures.js';
import {
  areAllExercisesCompleted,
  calculateExerciseStatuses,
  completedSetsCount,
  createTrackingState,
  currentSet,
  initialTrackingState,
  toWorkoutProgress,
  totalSetsCount,
  trackedExercises,
  trackingStateFromProgress,
  workoutDurationSeconds,
  workoutProgress,
} from './workout-tracking.state.js';

describe('workout tracking state', () => {
  describe('calculateExerciseStatuses', () => {
    it('should classify each exercise by its completed sets', () => {
      expect(calculateExerciseStatuses(3, [[true, true], [true, false], [false]])).toEqual([
        'completed',
        'inProgress',
        'notStarted',
      ]);
    });

    it('should treat missing and empty rows as not started', () => {
      expect(calculateExerciseStatuses(2, [[]])).toEqual(['notStarted', 'notStarted']);
    });
  });

  describe('initialTrackingState', () => {
    it('should start on exercise selection with nothing completed', () => {
      const state = initialTrackingState(trackedWorkout(), START);

      expect(state.view).toBe('exerciseSelection');
      expect(state.completedSets).toEqual([[false, false], [false]]);
      expect(state.modifiedSets).toEqual([
        [
          { reps: 8, weight: 60, restTimeSeconds: 90 },
          { reps: 8, weight: 60, restTimeSeconds: 90 },
        ],
        [{ reps: 5, weight: 100 }],
      ]);
      expect(state.exerciseStatuses).toEqual(['notStarted', 'notStarted']);
      expect(state.startedAt).toBe(START);
      expect(state.error).toBeNull();
    });

    it('should copy the planned sets', () => {
      const workout = trackedWorkout();
      const state = initialTrackingState(workout, START);

      expect(state.modifiedSets[0]?.[0]).not.toBe(workout.exercises[0]?.sets[0]);
    });
  });

  describe('trackingStateFromProgress', () => {
    it('should resume at the saved position', () => {
      const state = trackingStateFromProgress(
        trackedWorkout(),
        {
          currentExerciseIndex: 0,
          currentSetIndex: 1,
          completedSets: [[true, false], [false]],
          modifiedSets: [
            [
              { reps: 10, weight: 62.5 },
              { reps: 8, weight: 60 },
            ],
            [{ reps: 5, weight: 100 }],
          ],
        },
        START
      );

      expect(state.view).toBe('exerciseTracking');
      expect(state.selectedExerciseIndex).toBe(0);
      expect(state.currentSetIndex).toBe(1);
      expect(state.modifiedSets[0]?.[0]).toEqual({ reps: 10, weight: 62.5 });
      expect(state.exerciseStatuses).toEqual(['inProgress', 'notStarted']);
    });

    it('should clamp indexes and ignore rows that no longer fit', () => {
      const state = trackingStateFromProgress(
        trackedWorkout(),
        {
          currentExerciseIndex: 7,
          currentSetIndex: 4,
          completedSets: [[true]],
          modifiedSets: [],
        },
        START
      );

      expect(state.currentExerciseIndex).toBe(1);
      expect(state.currentSetIndex).toBe(0);
      expect(state.completedSets).toEqual([[false, false], [false]]);
      expect(state.modifiedSets[1]).toEqual([{ reps: 5, weight: 100 }]);
    });
  });

  describe('createTrackingState', () => {
    const progress = {
      currentExerciseIndex: 1,
      currentSetIndex: 0,
      completedSets: [[true, true], [false]],
      modifiedSets: [
        [
          { reps: 8, weight: 60 },
          { reps: 8, weight: 60 },
        ],
        [{ reps: 5, weight: 100 }],
      ],
    };

    it('should resume an in-progress workout with progress', () => {
      const state = createTrackingState(trackedWorkout({ isInProgress: true, progress }), START);

      expect(state.currentExerciseIndex).toBe(1);
      expect(state.view).toBe('exerciseTracking');
    });

    it('should start fresh when the workout is not in progress', () => {
      const state = createTrackingState(trackedWorkout({ progress }), START);

      expect(state.currentExerciseIndex).toBe(0);
      expect(state.view).toBe('exerciseSelection');
    });
  });

  describe('derived values', () => {
    it('should count sets and progress', () => {
      const state = {
        ...initialTrackingState(trackedWorkout(), START),
        completedSets: [[true, false], [true]],
      };

      expect(totalSetsCount(state)).toBe(3);
      expect(completedSetsCount(state)).toBe(2);
      expect(workoutProgress(state)).toBeCloseTo(2 / 3);
    });

    it('should report zero progress for a workout without sets', () => {
      const state = initialTrackingState(trackedWorkout({ exercises: [] }), START);

      expect(workoutProgress(state)).toBe(0);
    });

    it('should return the current modified set', () => {
      const state = { ...initialTrackingState(trackedWorkout(), START), currentExerciseIndex: 1 };

      expect(currentSet(state)).toEqual({ reps: 5, weight: 100 });
    });

    it('should know when every exercise is completed', () => {
      const initial = initialTrackingState(trackedWorkout(), START);
      const done = {
        ...initial,
        completedSets: [[true, true], [true]],
        exerciseStatuses: calculateExerciseStatuses(2, [[true, true], [true]]),
      };

      expect(areAllExercisesCompleted(initial)).toBe(false);
      expect(areAllExercisesCompleted(done)).toBe(true);
    });

    it('should measure whole seconds since the start and never go negative', () => {
      const state = initialTrackingState(trackedWorkout(), START);

      expect(workoutDurationSeconds(state, new Date('2026-04-01T10:02:05.900Z'))).toBe(125);
      expect(workoutDurationSeconds(state, new Date('2026-04-01T09:59:00.000Z'))).toBe(0);
    });

    it('should carry modified sets into the tracked exercises', () => {
      const state = initialTrackingState(trackedWorkout(), START);
      const tracked = trackedExercises({
        ...state,
        modifiedSets: [state.modifiedSets[0] ?? [], [{ reps: 3, weight: 110 }]],
      });

      expect(tracked[1]).toEqual({
        exerciseId: 'squat',
        exerciseName: 'Squat',
        sets: [{ reps: 3, weight: 110 }],
      });
    });

    it('should snapshot progress with the save time', () => {
      const state = { ...initialTrackingState(trackedWorkout(), START), currentSetIndex: 1 };

      expect(toWorkoutProgress(state, new Date('2026-04-01T10:30:00.000Z'))).toEqual({
        currentExerciseIndex: 0,
        currentSetIndex: 1,
        completedSets: [[false, false], [false]],
        modifiedSets: state.modifiedSets,
        lastSavedAt: '2026-04-01T10:30:00.000Z',
      });
    });
  });
});
