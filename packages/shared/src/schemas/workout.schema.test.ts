import { describe, it, expect } from 'vitest';
import { workoutSchema } from './workout.schema.js';
import { validateFirst, validateId } from './validation.js';

const validWorkout = {
  name: 'Push Day',
  exercises: [
    {
      exerciseId: 'ex-bench',
      exerciseName: 'Bench Press',
      sets: [{ reps: 8, weight: 60, restTimeSeconds: 90 }],
    },
  ],
};

describe('workoutSchema', () => {
  it('should accept a workout with one exercise', () => {
    expect(workoutSchema.safeParse(validWorkout).success).toBe(true);
  });

  it('should report an empty name first', () => {
    const result = validateFirst(workoutSchema, { ...validWorkout, name: '   ' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(result.error.message).toBe('Workout name cannot be empty');
      expect(result.error.details).toEqual({ field: 'name' });
    }
  });

  it('should reject names longer than 100 characters', () => {
    const result = validateFirst(workoutSchema, { ...validWorkout, name: 'x'.repeat(101) });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Workout name cannot exceed 100 characters');
    }
  });

  it('should require at least one exercise', () => {
    const result = validateFirst(workoutSchema, { ...validWorkout, exercises: [] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Workout must contain at least one exercise');
    }
  });

  it('should reject negative set weight', () => {
    const result = validateFirst(workoutSchema, {
      ...validWorkout,
      exercises: [{ exerciseId: 'a', exerciseName: 'A', sets: [{ reps: 5, weight: -1 }] }],
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Set weight cannot be negative');
      expect(result.error.details).toEqual({ field: 'exercises.0.sets.0.weight' });
    }
  });
});

describe('validateId', () => {
  it('should reject blank ids with the resource label', () => {
    const result = validateId(' ', 'History ID');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('History ID cannot be empty');
    }
  });

  it('should pass through non-blank ids', () => {
    expect(validateId('abc', 'History ID')).toEqual({ success: true, data: 'abc' });
  });
});
