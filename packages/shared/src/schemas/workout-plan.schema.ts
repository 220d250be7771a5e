import { z } from 'zod';
import { isMoreThanOneYearAgo, isValidDateKey } from '../utils/date-key.js';

const planNameSchema = z.string().superRefine((value, ctx) => {
  const name = value.trim();
  if (name.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Plan name cannot be empty' });
  } else if (name.length < 2) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Plan name must be at least 2 characters long',
    });
  } else if (name.length > 100) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Plan name cannot exceed 100 characters' });
  }
});

export const workoutPlanScheduleSchema = z
  .record(z.string(), z.array(z.string()))
  .superRefine((schedule, ctx) => {
    for (const [key, workoutIds] of Object.entries(schedule)) {
      if (!isValidDateKey(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Invalid date format in schedule: ${key}`,
        });
      }
      if (workoutIds.some((id) => id.trim() === '')) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Empty workout ID found in schedule for date: ${key}`,
        });
      }
    }
  });

export const workoutPlanSchema = z.object({
  name: planNameSchema,
  description: z.string().max(1000, 'Plan description cannot exceed 1000 characters'),
  userId: z.string().trim().min(1, 'User ID cannot be empty'),
  startDate: z.string().refine(
    (value) => {
      const parsed = Date.parse(value);
      return Number.isNaN(parsed) || !isMoreThanOneYearAgo(new Date(parsed));
    },
    { message: 'Start date cannot be more than one year in the past' }
  ),
  schedule: workoutPlanScheduleSchema,
});
