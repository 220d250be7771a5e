import { describe, it, expect } from 'vitest';
import type { ExerciseInput } from '@periolifts/shared';
import {
  asPocketBase,
  createMockListResult,
  createMockRecord,
  createPocketBaseMocks,
} from '../../test-utils/pocketbase-mock.js';
import { PocketBaseExerciseService } from './exercise.service.js';

const exerciseRecord = (id: string, overrides: Record<string, unknown> = {}) =>
  createMockRecord(
    id,
    {
      name: 'Bench Press',
      category: 'Chest',
      description: '',
      muscle_groups: ['chest', 'triceps'],
      is_custom: false,
      user_id: '',
      ...overrides,
    },
    'exercises'
  );

const cableFly: ExerciseInput = {
  name: 'Cable Fly',
  category: 'Chest',
  muscleGroups: ['chest'],
  imageUrl: '',
};

function setup(userId: string | null = 'user-1') {
  const mocks = createPocketBaseMocks(userId);
  const service = new PocketBaseExerciseService(asPocketBase(mocks));
  return { service, exercises: mocks.collection('exercises') };
}

describe('PocketBaseExerciseService', () => {
  describe('getExercises', () => {
    it('should list built-in exercises when isCustom is false', async () => {
      const { service, exercises } = setup(null);

      await service.getExercises({ isCustom: false, category: 'Chest' });

      expect(exercises.getList).toHaveBeenCalledWith(1, 50, {
        filter: '(category = "Chest") && (user_id = "")',
        sort: 'name',
      });
    });

    it('should require authentication for custom exercises', async () => {
      const { service, exercises } = setup(null);

      const result = await service.getExercises({ isCustom: true });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('User must be authenticated to view custom exercises');
      }
      expect(exercises.getList).not.toHaveBeenCalled();
    });

    it('should read muscle groups stored as a comma separated string', async () => {
      const { service, exercises } = setup();
      exercises.getList.mockResolvedValue(
        createMockListResult([exerciseRecord('e1', { muscle_groups: 'quads, glutes,' })])
      );

      const result = await service.getExercises();

      expect(result.success && result.data[0]?.muscleGroups).toEqual(['quads', 'glutes']);
    });
  });

  describe('getExercisesBatch', () => {
    it('should key exercises by id', async () => {
      const { service, exercises } = setup();
      exercises.getList.mockResolvedValue(
        createMockListResult([exerciseRecord('e1'), exerciseRecord('e2', { name: 'Squat' })])
      );

      const result = await service.getExercisesBatch(['e1', 'e2', 'e1']);

      expect(exercises.getList).toHaveBeenCalledWith(1, 2, { filter: '(id = "e1" || id = "e2")' });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.get('e2')?.name).toBe('Squat');
        expect(result.data.size).toBe(2);
      }
    });

    it('should not query for an empty list', async () => {
      const { service, exercises } = setup();

      const result = await service.getExercisesBatch([]);

      expect(result.success && result.data.size).toBe(0);
      expect(exercises.getList).not.toHaveBeenCalled();
    });
  });

  describe('createExercise', () => {
    it('should force custom ownership', async () => {
      const { service, exercises } = setup();

      const result = await service.createExercise(cableFly);

      expect(exercises.create).toHaveBeenCalledWith({
        name: 'Cable Fly',
        category: 'Chest',
        description: '',
        muscle_groups: ['chest'],
        image_url: '',
        video_url: '',
        is_custom: true,
        user_id: 'user-1',
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.isCustom).toBe(true);
        expect(result.data.imageUrl).toBeUndefined();
      }
    });

    it('should reject an invalid video URL', async () => {
      const { service } = setup();

      const result = await service.createExercise({ ...cableFly, videoUrl: 'ftp://example.com/v' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Invalid video URL format');
      }
    });

    it('should validate the exercise before checking the session', async () => {
      const { service, exercises } = setup(null);

      const result = await service.createExercise({ ...cableFly, videoUrl: 'ftp://example.com/v' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('VALIDATION_ERROR');
      }
      expect(exercises.create).not.toHaveBeenCalled();
    });

    it('should require a muscle group', async () => {
      const { service } = setup();

      const result = await service.createExercise({ ...cableFly, muscleGroups: [] });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('At least one muscle group must be specified');
      }
    });
  });

  describe('updateExercise and deleteExercise', () => {
    it('should refuse to update built-in exercises', async () => {
      const { service, exercises } = setup();
      exercises.getOne.mockResolvedValue(exerciseRecord('e1'));

      const result = await service.updateExercise('e1', cableFly);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('PERMISSION_ERROR');
        expect(result.error.message).toBe('Built-in exercises cannot be updated');
      }
      expect(exercises.update).not.toHaveBeenCalled();
    });

    it('should refuse to delete another user custom exercise', async () => {
      const { service, exercises } = setup();
      exercises.getOne.mockResolvedValue(
        exerciseRecord('e1', { is_custom: true, user_id: 'user-2' })
      );

      const result = await service.deleteExercise('e1');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('You can only delete your own custom exercises');
      }
      expect(exercises.delete).not.toHaveBeenCalled();
    });

    it('should delete the user custom exercise', async () => {
      const { service, exercises } = setup();
      exercises.getOne.mockResolvedValue(
        exerciseRecord('e1', { is_custom: true, user_id: 'user-1' })
      );

      const result = await service.deleteExercise('e1');

      expect(result.success).toBe(true);
      expect(exercises.delete).toHaveBeenCalledWith('e1');
    });
  });

  describe('lookups', () => {
    it('should include built-in and own exercises by category', async () => {
      const { service, exercises } = setup();

      await service.getExercisesByCategory('Legs');

      expect(exercises.getList).toHaveBeenCalledWith(1, 50, {
        filter: '(category = "Legs") && ((user_id = "" || user_id = "user-1"))',
        sort: 'name',
      });
    });

    it('should return sorted unique categories and muscle groups', async () => {
      const { service, exercises } = setup();
      exercises.getList.mockResolvedValue(
        createMockListResult([
          exerciseRecord('e1'),
          exerciseRecord('e2', { category: 'Back', muscle_groups: ['lats', 'biceps'] }),
          exerciseRecord('e3', { category: '', muscle_groups: ['chest'] }),
        ])
      );

      const categories = await service.getExerciseCategories();
      const muscles = await service.getMuscleGroups();

      expect(categories).toEqual({ success: true, data: ['Back', 'Chest'] });
      expect(muscles).toEqual({
        success: true,
        data: ['biceps', 'chest', 'lats', 'triceps'],
      });
    });

    it('should reject an empty search', async () => {
      const { service } = setup();

      const result = await service.searchExercises('   ');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Search query cannot be empty');
      }
    });
  });
});
