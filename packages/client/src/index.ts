export * from './config/app-config.js';
export * from './errors/error-mapper.js';
export * from './errors/auth-messages.js';
export * from './backends/types.js';
export * from './backends/create-backend.js';
export * from './backends/pocketbase/pocketbase-client.js';
export * from './backends/pocketbase/auth.service.js';
export * from './backends/pocketbase/workout.service.js';
export * from './backends/pocketbase/workout-plan.service.js';
export * from './backends/pocketbase/workout-history.service.js';
export * from './backends/pocketbase/workout-session.service.js';
export * from './backends/pocketbase/workout-schedule.service.js';
export * from './backends/pocketbase/exercise.service.js';
export * from './backends/appwrite/appwrite-client.js';
export * from './backends/appwrite/auth.service.js';
export * from './backends/appwrite/workout-history.service.js';
export * from './backends/appwrite/workout-session.service.js';
export * from './settings/settings-store.js';
export * from './settings/units.service.js';
export * from './settings/rest-time-settings.service.js';
export * from './settings/rest-timer-storage.js';
export * from './state/state-notifier.js';
export * from './state/resource-list-state.js';
export * from './state/resource-list.notifier.js';
export * from './state/notifier-family.js';
export * from './state/filter-key.js';
export * from './state/auth.notifier.js';
export * from './state/workout-templates.notifier.js';
export * from './state/workout-plans.notifier.js';
export * from './state/workout-sessions.notifier.js';
export * from './state/workout-history.notifier.js';
export * from './state/exercises.notifier.js';
export * from './tracking/workout-tracking.state.js';
export * from './tracking/workout-converter.js';
export * from './tracking/workout-tracking.controller.js';
export * from './tracking/rest-timer.js';
export * from './tracking/rest-timer-auto-start.js';
