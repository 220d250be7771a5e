import { z } from 'zod';
import { isHttpUrl, requiredText } from './common.schema.js';

export const exerciseSchema = z.object({
  name: requiredText('Exercise name cannot be empty', {
    length: 100,
    message: 'Exercise name cannot exceed 100 characters',
  }),
  category: requiredText('Exercise category cannot be empty'),
  muscleGroups: z.array(z.string()).min(1, 'At least one muscle group must be specified'),
  description: z.string().max(1000, 'Exercise description is too long').optional(),
  imageUrl: z.string().refine(isHttpUrl, { message: 'Invalid image URL format' }).optional(),
  videoUrl: z.string().refine(isHttpUrl, { message: 'Invalid video URL format' }).optional(),
});
