import type PocketBase from 'pocketbase';
import {
  ValidationError,
  buildWorkoutSessionStats,
  fail,
  ok,
  oneMonthBefore,
  paginationSchema,
  validateFirst,
  validateId,
  workoutNameSchema,
  type Result,
  type WorkoutSession,
  type WorkoutSessionInput,
  type WorkoutSessionSet,
  type WorkoutSessionStats,
} from '@periolifts/shared';
import { COLLECTIONS } from '../../config/app-config.js';
import { parseWorkoutSession, serializeWorkoutSession, type RecordMeta } from '../parsers.js';
import type {
  AuthSession,
  CreateSessionFromTemplateInput,
  DateRange,
  PageQuery,
  WorkoutSessionBackend,
  WorkoutSessionQuery,
} from '../types.js';
import { replaceSessionSet, toSessionInput } from '../session-updates.js';
import { BasePocketBaseService } from './base-pocketbase.service.js';
import { combineFilters, compare, eq } from './filter.js';

export class PocketBaseWorkoutSessionService
  extends BasePocketBaseService<WorkoutSession>
  implements WorkoutSessionBackend
{
  constructor(pb: PocketBase, session?: AuthSession) {
    super(pb, COLLECTIONS.workoutSessions, session);
  }

  protected parseRecord(meta: RecordMeta, data: Record<string, unknown>): WorkoutSession | null {
    return parseWorkoutSession(meta, data);
  }

  private sessionFilter(userId: string, query: WorkoutSessionQuery): string {
    return combineFilters([
      this.userFilter(userId),
      query.status && eq('status', query.status),
      query.startDate && compare('scheduled_date', '>=', query.startDate),
      query.endDate && compare('scheduled_date', '<=', query.endDate),
    ]);
  }

  async getWorkoutSessions(query: WorkoutSessionQuery = {}): Promise<Result<WorkoutSession[]>> {
    const page = validateFirst(paginationSchema, {
      page: query.page ?? 1,
      perPage: query.perPage ?? 20,
    });
    if (!page.success) {
      return page;
    }
    const user = this.requireUser('Authentication required to access workout sessions');
    if (!user.success) {
      return user;
    }

    return this.execute('getWorkoutSessions', 'Failed to load workout sessions', () =>
      this.list({ ...page.data, filter: this.sessionFilter(user.data, query), sort: '-created' })
    );
  }

  async getWorkoutSession(id: string): Promise<Result<WorkoutSession>> {
    const validId = validateId(id, 'Session ID');
    if (!validId.success) {
      return validId;
    }

    return this.execute('getWorkoutSession', 'Failed to load workout session', () =>
      this.fetchOne(id)
    );
  }

  async createWorkoutSession(input: WorkoutSessionInput): Promise<Result<WorkoutSession>> {
    const validName = validateFirst(workoutNameSchema, input.name);
    if (!validName.success) {
      return validName;
    }
    const user = this.requireUser('Authentication required to create workout sessions');
    if (!user.success) {
      return user;
    }

    return this.execute('createWorkoutSession', 'Failed to create workout session', async () =>
      this.requireEntity(await this.collection.create(serializeWorkoutSession(user.data, input)))
    );
  }

  async updateWorkoutSession(
    id: string,
    input: WorkoutSessionInput
  ): Promise<Result<WorkoutSession>> {
    const validId = validateId(id, 'Session ID');
    if (!validId.success) {
      return validId;
    }
    const validName = validateFirst(workoutNameSchema, input.name);
    if (!validName.success) {
      return validName;
    }
    const user = this.requireUser('Authentication required to update workout sessions');
    if (!user.success) {
      return user;
    }

    return this.execute('updateWorkoutSession', 'Failed to update workout session', async () =>
      this.requireEntity(await this.collection.update(id, serializeWorkoutSession(user.data, input)))
    );
  }

  async deleteWorkoutSession(id: string): Promise<Result<void>> {
    const validId = validateId(id, 'Session ID');
    if (!validId.success) {
      return validId;
    }

    return this.execute('deleteWorkoutSession', 'Failed to delete workout session', async () => {
      await this.collection.delete(id);
    });
  }

  async startWorkoutSession(id: string): Promise<Result<WorkoutSession>> {
    return this.transition(id, 'startWorkoutSession', (session) => {
      if (session.status === 'completed') {
        throw new ValidationError('Cannot start a completed workout session');
      }
      return {
        ...toSessionInput(session),
        status: 'in_progress',
        startedAt: new Date().toISOString(),
      };
    });
  }

  async completeWorkoutSession(id: string): Promise<Result<WorkoutSession>> {
    return this.transition(id, 'completeWorkoutSession', (session) => {
      if (session.status === 'completed') {
        throw new ValidationError('Workout session is already completed');
      }
      const now = new Date().toISOString();
      return {
        ...toSessionInput(session),
        status: 'completed',
        completedAt: now,
        startedAt: session.startedAt ?? now,
      };
    });
  }

  async updateSetData(
    sessionId: string,
    exerciseId: string,
    setId: string,
    set: WorkoutSessionSet
  ): Promise<Result<WorkoutSession>> {
    return this.transition(sessionId, 'updateSetData', (session) =>
      toSessionInput(replaceSessionSet(session, exerciseId, setId, set))
    );
  }

  async getWorkoutStats(range: DateRange = {}): Promise<Result<WorkoutSessionStats>> {
    const user = this.requireUser('Authentication required to access workout statistics');
    if (!user.success) {
      return user;
    }
    const now = new Date();
    const startDate = range.startDate ?? oneMonthBefore(now);
    const endDate = range.endDate ?? now;

    return this.execute('getWorkoutStats', 'Failed to load workout statistics', async () => {
      const sessions = await this.listAll({
        filter: this.sessionFilter(user.data, { startDate, endDate }),
        sort: '-created',
      });
      return buildWorkoutSessionStats(sessions, startDate, endDate);
    });
  }

  async getCompletedSessions(query: PageQuery & DateRange = {}): Promise<Result<WorkoutSession[]>> {
    return this.getWorkoutSessions({ ...query, status: 'completed' });
  }

  async createSessionFromTemplate(
    input: CreateSessionFromTemplateInput
  ): Promise<Result<WorkoutSession>> {
    return this.createWorkoutSession({
      name: input.templateName,
      description: input.templateDescription,
      status: 'planned',
      exercises: input.exercises,
      ...(input.scheduledDate !== undefined && { scheduledDate: input.scheduledDate }),
    });
  }

  async getActiveWorkoutSession(): Promise<Result<WorkoutSession | null>> {
    const sessions = await this.getWorkoutSessions({ perPage: 1, status: 'in_progress' });
    if (!sessions.success) {
      return sessions;
    }
    return ok(sessions.data[0] ?? null);
  }

  async resumeWorkoutSession(id: string): Promise<Result<WorkoutSession>> {
    const session = await this.getWorkoutSession(id);
    if (session.success && session.data.status !== 'in_progress') {
      return fail(new ValidationError('Cannot resume a workout that is not in progress'));
    }
    return session;
  }

  /**
   * Reads a session, derives the next state and writes it back.
   */
  private async transition(
    id: string,
    operation: string,
    next: (session: WorkoutSession) => WorkoutSessionInput
  ): Promise<Result<WorkoutSession>> {
    const validId = validateId(id, 'Session ID');
    if (!validId.success) {
      return validId;
    }
    const user = this.requireUser('Authentication required to update workout sessions');
    if (!user.success) {
      return user;
    }

    return this.execute(operation, 'Failed to update workout session', async () => {
      const session = await this.fetchOne(id);
      const input = next(session);
      return this.requireEntity(
        await this.collection.update(id, serializeWorkoutSession(user.data, input))
      );
    });
  }
}
