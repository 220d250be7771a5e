export * from './types/errors.js';
export * from './types/result.js';
export * from './types/workout.js';
export * from './types/workout-history.js';
export * from './types/workout-session.js';
export * from './types/workout-plan.js';
export * from './types/exercise.js';
export * from './types/calendar-event.js';
export * from './types/user.js';
export * from './schemas/validation.js';
export * from './schemas/common.schema.js';
export * from './schemas/pagination.schema.js';
export * from './schemas/workout.schema.js';
export * from './schemas/workout-history.schema.js';
export * from './schemas/workout-plan.schema.js';
export * from './schemas/exercise.schema.js';
export * from './schemas/calendar-event.schema.js';
export * from './schemas/auth.schema.js';
export * from './utils/date-key.js';
