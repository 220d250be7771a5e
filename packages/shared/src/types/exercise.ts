/**
 * Exercises are either built in (no owner) or custom to one user.
 */
export interface Exercise {
  id: string;
  name: string;
  category: string;
  description: string;
  muscleGroups: string[];
  imageUrl?: string;
  videoUrl?: string;
  isCustom: boolean;
  /** Empty for built-in exercises */
  userId: string;
  created?: string;
  updated?: string;
}

export type ExerciseInput = Pick<Exercise, 'name' | 'category' | 'muscleGroups'> &
  Partial<Pick<Exercise, 'description' | 'imageUrl' | 'videoUrl'>>;

export function isBuiltInExercise(exercise: Pick<Exercise, 'isCustom' | 'userId'>): boolean {
  return !exercise.isCustom || exercise.userId === '';
}
