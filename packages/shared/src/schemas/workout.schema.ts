import { z } from 'zod';
import { requiredText } from './common.schema.js';

export const workoutSetSchema = z.object({
  reps: z
    .number()
    .int()
    .min(0, 'Set reps must be between 0 and 1000')
    .max(1000, 'Set reps must be between 0 and 1000'),
  weight: z.number().min(0, 'Set weight cannot be negative'),
  restTimeSeconds: z.number().int().nonnegative().optional(),
});

export const workoutExerciseSchema = z.object({
  exerciseId: requiredText('Exercise ID cannot be empty'),
  exerciseName: requiredText('Exercise name cannot be empty'),
  sets: z.array(workoutSetSchema),
});

export const workoutNameSchema = requiredText('Workout name cannot be empty', {
  length: 100,
  message: 'Workout name cannot exceed 100 characters',
});

export const workoutSchema = z.object({
  name: workoutNameSchema,
  description: z
    .string()
    .max(1000, 'Workout description cannot exceed 1000 characters')
    .optional(),
  exercises: z
    .array(workoutExerciseSchema)
    .min(1, 'Workout must contain at least one exercise'),
});

export type WorkoutSchemaInput = z.infer<typeof workoutSchema>;
