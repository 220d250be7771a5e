import { z } from 'zod';
import { ValidationError } from '@periolifts/shared';

export const COLLECTIONS = {
  users: 'users',
  exercises: 'exercises',
  workouts: 'workouts',
  workoutSessions: 'workout_sessions',
  workoutPlans: 'workout_plans',
  workoutHistory: 'workout_history',
  workoutPlanSchedules: 'workout_plan_schedules',
} as const;

export type CollectionName = (typeof COLLECTIONS)[keyof typeof COLLECTIONS];

export const API_TIMEOUT_MS = 30_000;
export const DEFAULT_POCKETBASE_URL = 'http://localhost:8090';
export const DEFAULT_SETTINGS_FILE = '.periolifts/settings.json';

const backendSchema = z.enum(['pocketbase', 'appwrite']);

const envSchema = z
  .object({
    PERIOLIFTS_BACKEND: backendSchema.default('pocketbase'),
    POCKETBASE_URL: z.string().url().default(DEFAULT_POCKETBASE_URL),
    APPWRITE_ENDPOINT: z.string().url().optional(),
    APPWRITE_PROJECT_ID: z.string().min(1).optional(),
    APPWRITE_DATABASE_ID: z.string().min(1).optional(),
    APPWRITE_API_KEY: z.string().min(1).optional(),
    PERIOLIFTS_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(API_TIMEOUT_MS),
    PERIOLIFTS_SETTINGS_FILE: z.string().min(1).default(DEFAULT_SETTINGS_FILE),
  })
  .superRefine((env, ctx) => {
    if (env.PERIOLIFTS_BACKEND !== 'appwrite') {
      return;
    }
    const required = ['APPWRITE_ENDPOINT', 'APPWRITE_PROJECT_ID', 'APPWRITE_DATABASE_ID'] as const;
    for (const key of required) {
      if (env[key] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when PERIOLIFTS_BACKEND is appwrite`,
        });
      }
    }
  });

export type BackendKind = z.infer<typeof backendSchema>;

export interface AppwriteConfig {
  endpoint: string;
  projectId: string;
  databaseId: string;
  apiKey?: string;
}

export interface AppConfig {
  backend: BackendKind;
  pocketbaseUrl: string;
  appwrite?: AppwriteConfig;
  requestTimeoutMs: number;
  settingsFile: string;
}

/**
 * Reads configuration from environment variables.
 * Throws ValidationError listing each invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError('Invalid configuration', {
      errors: parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const values = parsed.data;
  const appwrite =
    values.APPWRITE_ENDPOINT !== undefined &&
    values.APPWRITE_PROJECT_ID !== undefined &&
    values.APPWRITE_DATABASE_ID !== undefined
      ? {
          endpoint: values.APPWRITE_ENDPOINT,
          projectId: values.APPWRITE_PROJECT_ID,
          databaseId: values.APPWRITE_DATABASE_ID,
          ...(values.APPWRITE_API_KEY !== undefined && { apiKey: values.APPWRITE_API_KEY }),
        }
      : undefined;

  return {
    backend: values.PERIOLIFTS_BACKEND,
    pocketbaseUrl: values.POCKETBASE_URL,
    ...(appwrite !== undefined && { appwrite }),
    requestTimeoutMs: values.PERIOLIFTS_REQUEST_TIMEOUT_MS,
    settingsFile: values.PERIOLIFTS_SETTINGS_FILE,
  };
}
