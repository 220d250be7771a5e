import type PocketBase from 'pocketbase';
import { info } from 'firebase-functions/logger';
import { ValidationError } from '@periolifts/shared';
import type { AppConfig, BackendKind } from '../config/app-config.js';
import type { SettingsStore } from '../settings/settings-store.js';
import { createAppwriteContext, type AppwriteContext } from './appwrite/appwrite-client.js';
import { AppwriteAuthService } from './appwrite/auth.service.js';
import { AppwriteWorkoutHistoryService } from './appwrite/workout-history.service.js';
import { AppwriteWorkoutSessionService } from './appwrite/workout-session.service.js';
import { PocketBaseAuthService } from './pocketbase/auth.service.js';
import { PocketBaseExerciseService } from './pocketbase/exercise.service.js';
import {
  createPersistentAuthStore,
  createPocketBaseClient,
} from './pocketbase/pocketbase-client.js';
import { PocketBaseWorkoutHistoryService } from './pocketbase/workout-history.service.js';
import { PocketBaseWorkoutPlanService } from './pocketbase/workout-plan.service.js';
import { PocketBaseWorkoutScheduleService } from './pocketbase/workout-schedule.service.js';
import { PocketBaseWorkoutSessionService } from './pocketbase/workout-session.service.js';
import { PocketBaseWorkoutService } from './pocketbase/workout.service.js';
import type { AuthBackend, WorkoutHistoryBackend, WorkoutSessionBackend } from './types.js';

/**
 * Templates, plans, exercises and the calendar. These live in PocketBase
 * whichever backend serves history and sessions.
 */
export interface CatalogServices {
  workouts: PocketBaseWorkoutService;
  plans: PocketBaseWorkoutPlanService;
  exercises: PocketBaseExerciseService;
  schedule: PocketBaseWorkoutScheduleService;
}

export interface Backends {
  kind: BackendKind;
  auth: AuthBackend;
  history: WorkoutHistoryBackend;
  sessions: WorkoutSessionBackend;
  catalog: CatalogServices;
}

export interface BackendDependencies {
  settings: SettingsStore;
  /** Prebuilt clients; created from the config when absent. */
  pocketBase?: PocketBase;
  appwrite?: AppwriteContext;
}

function createCatalog(pb: PocketBase): CatalogServices {
  return {
    workouts: new PocketBaseWorkoutService(pb),
    plans: new PocketBaseWorkoutPlanService(pb),
    exercises: new PocketBaseExerciseService(pb),
    schedule: new PocketBaseWorkoutScheduleService(pb),
  };
}

/**
 * Composition root: builds the service set for the configured backend.
 */
export async function createBackends(
  config: AppConfig,
  deps: BackendDependencies
): Promise<Backends> {
  const pb =
    deps.pocketBase ??
    createPocketBaseClient(config, await createPersistentAuthStore(deps.settings));
  const catalog = createCatalog(pb);

  if (config.backend === 'appwrite') {
    const appwrite =
      deps.appwrite ??
      (config.appwrite === undefined ? undefined : createAppwriteContext(config.appwrite));
    if (appwrite === undefined) {
      throw new ValidationError('Appwrite configuration is missing');
    }
    const auth = new AppwriteAuthService(appwrite);
    info('Backend selected', { backend: 'appwrite' });
    return {
      kind: 'appwrite',
      auth,
      history: new AppwriteWorkoutHistoryService(appwrite, auth),
      sessions: new AppwriteWorkoutSessionService(appwrite, auth),
      catalog,
    };
  }

  info('Backend selected', { backend: 'pocketbase' });
  return {
    kind: 'pocketbase',
    auth: new PocketBaseAuthService(pb),
    history: new PocketBaseWorkoutHistoryService(pb),
    sessions: new PocketBaseWorkoutSessionService(pb),
    catalog,
  };
}
