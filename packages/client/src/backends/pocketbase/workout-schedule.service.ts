import type PocketBase from 'pocketbase';
import {
  ValidationError,
  calendarEventSchema,
  calendarPaginationSchema,
  endOfUtcDay,
  fail,
  isDayOfWeek,
  startOfUtcDay,
  validateAll,
  validateFirst,
  validateId,
  type CalendarEvent,
  type CalendarEventInput,
  type CalendarEventStatusUpdate,
  type Result,
} from '@periolifts/shared';
import { COLLECTIONS } from '../../config/app-config.js';
import { parseCalendarEvent, serializeCalendarEvent, type RecordMeta } from '../parsers.js';
import type { AuthSession, DateRange, PageQuery } from '../types.js';
import { BasePocketBaseService } from './base-pocketbase.service.js';
import { combineFilters, compare, eq } from './filter.js';

export interface CalendarQuery extends PageQuery {
  startDate: Date;
  endDate: Date;
  planId?: string;
}

export interface DayOfWeekQuery extends DateRange {
  planId?: string;
}

const PLAN_EXPAND = 'plan_id';
const CALENDAR_SORT = 'scheduled_date,sort_order';

/**
 * Calendar entries of the user's active plans. Ownership is enforced
 * through the plan relation.
 */
export class PocketBaseWorkoutScheduleService extends BasePocketBaseService<CalendarEvent> {
  constructor(pb: PocketBase, session?: AuthSession) {
    super(pb, COLLECTIONS.workoutPlanSchedules, session);
  }

  protected parseRecord(meta: RecordMeta, data: Record<string, unknown>): CalendarEvent | null {
    return parseCalendarEvent(meta, data);
  }

  private scopeFilter(userId: string, range: DateRange, planId?: string): string {
    return combineFilters([
      eq('plan_id.user_id', userId),
      eq('plan_id.is_active', true),
      range.startDate && compare('scheduled_date', '>=', startOfUtcDay(range.startDate)),
      range.endDate && compare('scheduled_date', '<=', endOfUtcDay(range.endDate)),
      planId?.trim() ? eq('plan_id', planId.trim()) : undefined,
    ]);
  }

  async getCalendarEvents(query: CalendarQuery): Promise<Result<CalendarEvent[]>> {
    const user = this.requireUser('Authentication required');
    if (!user.success) {
      return user;
    }
    if (query.endDate.getTime() < query.startDate.getTime()) {
      return fail(
        new ValidationError('End date must be after or equal to start date', {
          startDate: query.startDate.toISOString(),
          endDate: query.endDate.toISOString(),
        })
      );
    }
    const page = validateFirst(calendarPaginationSchema, {
      page: query.page ?? 1,
      perPage: query.perPage ?? 100,
    });
    if (!page.success) {
      return page;
    }

    return this.execute('getCalendarEvents', 'Failed to fetch calendar events', () =>
      this.list({
        ...page.data,
        filter: this.scopeFilter(user.data, query, query.planId),
        expand: PLAN_EXPAND,
        sort: CALENDAR_SORT,
      })
    );
  }

  async getEventsForDate(date: Date, planId?: string): Promise<Result<CalendarEvent[]>> {
    const user = this.requireUser('Authentication required');
    if (!user.success) {
      return user;
    }

    return this.execute('getEventsForDate', 'Failed to fetch calendar events', () =>
      this.listAll({
        filter: this.scopeFilter(user.data, { startDate: date, endDate: date }, planId),
        expand: PLAN_EXPAND,
        sort: 'sort_order',
      })
    );
  }

  async updateEventStatus(
    id: string,
    update: CalendarEventStatusUpdate
  ): Promise<Result<CalendarEvent>> {
    const validId = validateId(id, 'Schedule ID');
    if (!validId.success) {
      return validId;
    }

    const body: Record<string, unknown> = {
      ...(update.isCompleted !== undefined && { is_completed: update.isCompleted }),
      ...(update.completionDate !== undefined && { completion_date: update.completionDate }),
      ...(update.notes !== undefined && { notes: update.notes }),
      ...(update.calendarColor !== undefined && { calendar_color: update.calendarColor }),
    };
    if (Object.keys(body).length === 0) {
      return fail(new ValidationError('No update fields provided', { scheduleId: id }));
    }
    const user = this.requireUser('Authentication required');
    if (!user.success) {
      return user;
    }

    return this.execute('updateEventStatus', 'Failed to update calendar event', async () =>
      this.requireEntity(await this.collection.update(id, body, { expand: PLAN_EXPAND }))
    );
  }

  async createCalendarEvent(event: CalendarEventInput): Promise<Result<CalendarEvent>> {
    const valid = validateAll(calendarEventSchema, event, 'Calendar event validation failed');
    if (!valid.success) {
      return valid;
    }
    const user = this.requireUser('Authentication required');
    if (!user.success) {
      return user;
    }

    return this.execute('createCalendarEvent', 'Failed to create calendar event', async () =>
      this.requireEntity(
        await this.collection.create(serializeCalendarEvent(event), { expand: PLAN_EXPAND })
      )
    );
  }

  async deleteCalendarEvent(id: string): Promise<Result<void>> {
    const validId = validateId(id, 'Schedule ID');
    if (!validId.success) {
      return validId;
    }
    const user = this.requireUser('Authentication required');
    if (!user.success) {
      return user;
    }

    return this.execute('deleteCalendarEvent', 'Failed to delete calendar event', async () => {
      await this.collection.delete(id);
    });
  }

  async getEventsByDayOfWeek(
    dayOfWeek: string,
    query: DayOfWeekQuery = {}
  ): Promise<Result<CalendarEvent[]>> {
    const user = this.requireUser('Authentication required');
    if (!user.success) {
      return user;
    }
    if (!isDayOfWeek(dayOfWeek)) {
      return fail(new ValidationError('Invalid day of week', { dayOfWeek }));
    }

    const filter = combineFilters([
      this.scopeFilter(user.data, query, query.planId),
      eq('day_of_week', dayOfWeek.toLowerCase()),
    ]);

    return this.execute('getEventsByDayOfWeek', 'Failed to fetch calendar events', () =>
      this.listAll({ filter, expand: PLAN_EXPAND, sort: CALENDAR_SORT })
    );
  }
}
