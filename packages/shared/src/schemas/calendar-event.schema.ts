import { z } from 'zod';
import { isDayOfWeek } from '../types/calendar-event.js';

const dayOfWeekSchema = z.string().superRefine((value, ctx) => {
  if (value.trim() === '') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Day of week cannot be empty' });
  } else if (!isDayOfWeek(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid day of week: ${value}` });
  }
});

export const calendarEventSchema = z.object({
  planId: z.string().trim().min(1, 'Plan ID cannot be empty'),
  workoutId: z.string().trim().min(1, 'Workout ID cannot be empty'),
  dayOfWeek: dayOfWeekSchema,
  sortOrder: z.number().int().min(0, 'Sort order cannot be negative'),
  notes: z.string().max(1000, 'Notes cannot exceed 1000 characters').optional(),
  calendarColor: z
    .string()
    .regex(/^#[0-9A-Fa-f]{6}$/, 'Calendar color must be in format #RRGGBB')
    .optional(),
});
