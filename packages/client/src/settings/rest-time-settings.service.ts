import type { SettingsStore } from './settings-store.js';

const USE_DEFAULT_REST_TIME_KEY = 'useDefaultRestTime';
const DEFAULT_REST_TIME_SECONDS_KEY = 'defaultRestTimeSeconds';

export const DEFAULT_REST_TIME_SECONDS = 120;

/**
 * Rest time between sets: either the program's value or a user default
 * that can override it.
 */
export class RestTimeSettingsService {
  private useDefault: boolean | null = null;
  private defaultSeconds: number | null = null;

  constructor(private readonly store: SettingsStore) {}

  async getUseDefaultRestTime(): Promise<boolean> {
    if (this.useDefault === null) {
      this.useDefault = (await this.store.getBoolean(USE_DEFAULT_REST_TIME_KEY)) ?? false;
    }
    return this.useDefault;
  }

  async setUseDefaultRestTime(useDefault: boolean): Promise<void> {
    await this.store.setBoolean(USE_DEFAULT_REST_TIME_KEY, useDefault);
    this.useDefault = useDefault;
  }

  async getDefaultRestTimeSeconds(): Promise<number> {
    if (this.defaultSeconds === null) {
      this.defaultSeconds =
        (await this.store.getNumber(DEFAULT_REST_TIME_SECONDS_KEY)) ?? DEFAULT_REST_TIME_SECONDS;
    }
    return this.defaultSeconds;
  }

  async setDefaultRestTimeSeconds(seconds: number): Promise<void> {
    await this.store.setNumber(DEFAULT_REST_TIME_SECONDS_KEY, seconds);
    this.defaultSeconds = seconds;
  }

  /**
   * Seconds to rest after a set whose program asks for `programSeconds`.
   */
  async getEffectiveRestTime(programSeconds?: number): Promise<number> {
    if (await this.getUseDefaultRestTime()) {
      return this.getDefaultRestTimeSeconds();
    }
    if (programSeconds !== undefined && programSeconds > 0) {
      return programSeconds;
    }
    return this.getDefaultRestTimeSeconds();
  }

  clearCache(): void {
    this.useDefault = null;
    this.defaultSeconds = null;
  }
}
