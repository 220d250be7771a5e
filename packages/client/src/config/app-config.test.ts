import { describe, it, expect } from 'vitest';
import { AppError } from '@periolifts/shared';
import { loadConfig } from './app-config.js';

describe('loadConfig', () => {
  it('should default to the local PocketBase server', () => {
    expect(loadConfig({})).toEqual({
      backend: 'pocketbase',
      pocketbaseUrl: 'http://localhost:8090',
      requestTimeoutMs: 30000,
      settingsFile: '.periolifts/settings.json',
    });
  });

  it('should read Appwrite settings when selected', () => {
    const config = loadConfig({
      PERIOLIFTS_BACKEND: 'appwrite',
      APPWRITE_ENDPOINT: 'https://appwrite.example.com/v1',
      APPWRITE_PROJECT_ID: 'project-1',
      APPWRITE_DATABASE_ID: 'db-1',
      PERIOLIFTS_REQUEST_TIMEOUT_MS: '5000',
    });

    expect(config.backend).toBe('appwrite');
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.appwrite).toEqual({
      endpoint: 'https://appwrite.example.com/v1',
      projectId: 'project-1',
      databaseId: 'db-1',
    });
  });

  it('should list every missing Appwrite variable', () => {
    let thrown: unknown;
    try {
      loadConfig({ PERIOLIFTS_BACKEND: 'appwrite', APPWRITE_PROJECT_ID: 'project-1' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(AppError);
    if (thrown instanceof AppError) {
      expect(thrown.code).toBe('VALIDATION_ERROR');
      expect(thrown.details).toEqual({
        errors: [
          'APPWRITE_ENDPOINT: APPWRITE_ENDPOINT is required when PERIOLIFTS_BACKEND is appwrite',
          'APPWRITE_DATABASE_ID: APPWRITE_DATABASE_ID is required when PERIOLIFTS_BACKEND is appwrite',
        ],
      });
    }
  });

  it('should reject an unknown backend', () => {
    expect(() => loadConfig({ PERIOLIFTS_BACKEND: 'firebase' })).toThrow('Invalid configuration');
  });
});
