import { z } from 'zod';
import { isMoreThanOneYearAgo } from '../utils/date-key.js';
import { workoutNameSchema, workoutSetSchema } from './workout.schema.js';
import { requiredText } from './common.schema.js';

export const workoutHistorySetSchema = workoutSetSchema.extend({
  completed: z.boolean(),
});

export const workoutHistoryExerciseSchema = z.object({
  exerciseId: requiredText('Exercise ID cannot be empty'),
  exerciseName: requiredText('Exercise name cannot be empty'),
  sets: z.array(workoutHistorySetSchema),
});

export const workoutHistoryEntrySchema = z
  .object({
    name: workoutNameSchema,
    notes: z.string().max(1000, 'Notes cannot exceed 1000 characters'),
    exercises: z.array(workoutHistoryExerciseSchema),
    startedAt: z.string().optional(),
    completedAt: z.string().optional(),
    scheduledDate: z.string().optional(),
  })
  .superRefine((entry, ctx) => {
    if (entry.startedAt !== undefined && entry.completedAt !== undefined) {
      if (Date.parse(entry.completedAt) < Date.parse(entry.startedAt)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['completedAt'],
          message: 'Completion time cannot be before start time',
        });
      }
    }
    if (entry.scheduledDate !== undefined) {
      const scheduled = Date.parse(entry.scheduledDate);
      if (!Number.isNaN(scheduled) && isMoreThanOneYearAgo(new Date(scheduled))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['scheduledDate'],
          message: 'Scheduled date cannot be more than one year in the past',
        });
      }
    }
  });
