import { describe, it, expect } from 'vitest';
import { NotFoundError, ValidationError } from './errors.js';
import {
  fail,
  flatMapResult,
  getOrDefault,
  getOrElse,
  getOrThrow,
  mapResult,
  ok,
} from './result.js';

describe('Result', () => {
  it('should map only successful results', () => {
    expect(mapResult(ok(2), (n) => n * 3)).toEqual(ok(6));

    const failure = fail(new ValidationError('bad'));
    expect(mapResult(failure, (n: number) => n * 3)).toBe(failure);
  });

  it('should chain async steps', async () => {
    const chained = await flatMapResult(ok('a'), async (value) => ok(`${value}b`));
    expect(chained).toEqual(ok('ab'));
  });

  it('should unwrap with fallbacks', () => {
    const failure = fail(NotFoundError.forResource('Workout', 'w-1'));

    expect(getOrDefault(failure, 5)).toBe(5);
    expect(getOrElse(failure, (error) => error.message)).toBe('Workout with id w-1 not found');
    expect(() => getOrThrow(failure)).toThrow('Workout with id w-1 not found');
    expect(getOrThrow(ok(1))).toBe(1);
  });

  it('should carry status codes on error subclasses', () => {
    const error = NotFoundError.forResource('Workout', 'w-1');

    expect(error.code).toBe('NOT_FOUND');
    expect(error.statusCode).toBe(404);
    expect(error.name).toBe('NotFoundError');
  });
});
