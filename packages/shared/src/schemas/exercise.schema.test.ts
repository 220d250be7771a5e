import { describe, it, expect } from 'vitest';
import { exerciseSchema } from './exercise.schema.js';
import { validateFirst } from './validation.js';

const validExercise = {
  name: 'Goblet Squat',
  category: 'legs',
  muscleGroups: ['quadriceps', 'glutes'],
};

function messageOf(value: unknown): string | null {
  const result = validateFirst(exerciseSchema, value);
  return result.success ? null : result.error.message;
}

describe('exerciseSchema', () => {
  it('should accept a minimal exercise', () => {
    expect(messageOf(validExercise)).toBeNull();
  });

  it('should require a category', () => {
    expect(messageOf({ ...validExercise, category: '' })).toBe('Exercise category cannot be empty');
  });

  it('should require a muscle group', () => {
    expect(messageOf({ ...validExercise, muscleGroups: [] })).toBe(
      'At least one muscle group must be specified'
    );
  });

  it('should reject long descriptions', () => {
    expect(messageOf({ ...validExercise, description: 'd'.repeat(1001) })).toBe(
      'Exercise description is too long'
    );
  });

  it('should only accept http and https media urls', () => {
    expect(messageOf({ ...validExercise, imageUrl: 'ftp://example.com/a.png' })).toBe(
      'Invalid image URL format'
    );
    expect(messageOf({ ...validExercise, videoUrl: 'not a url' })).toBe('Invalid video URL format');
    expect(messageOf({ ...validExercise, imageUrl: 'https://example.com/a.png' })).toBeNull();
  });
});
