import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { warn } from 'firebase-functions/logger';
import { isRecord } from '../backends/type-guards.js';

export type SettingValue = string | number | boolean;

/**
 * Local key-value preferences. Reads of a missing key, or of a key holding
 * another type, return null.
 */
export interface SettingsStore {
  getString(key: string): Promise<string | null>;
  getNumber(key: string): Promise<number | null>;
  getBoolean(key: string): Promise<boolean | null>;
  setString(key: string, value: string): Promise<void>;
  setNumber(key: string, value: number): Promise<void>;
  setBoolean(key: string, value: boolean): Promise<void>;
  remove(key: string): Promise<void>;
}

abstract class ValueSettingsStore implements SettingsStore {
  protected abstract read(key: string): Promise<SettingValue | undefined>;
  protected abstract write(key: string, value: SettingValue | undefined): Promise<void>;

  async getString(key: string): Promise<string | null> {
    const value = await this.read(key);
    return typeof value === 'string' ? value : null;
  }

  async getNumber(key: string): Promise<number | null> {
    const value = await this.read(key);
    return typeof value === 'number' ? value : null;
  }

  async getBoolean(key: string): Promise<boolean | null> {
    const value = await this.read(key);
    return typeof value === 'boolean' ? value : null;
  }

  setString(key: string, value: string): Promise<void> {
    return this.write(key, value);
  }

  setNumber(key: string, value: number): Promise<void> {
    return this.write(key, value);
  }

  setBoolean(key: string, value: boolean): Promise<void> {
    return this.write(key, value);
  }

  remove(key: string): Promise<void> {
    return this.write(key, undefined);
  }
}

export class MemorySettingsStore extends ValueSettingsStore {
  private readonly values = new Map<string, SettingValue>();

  constructor(initial: Record<string, SettingValue> = {}) {
    super();
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  protected async read(key: string): Promise<SettingValue | undefined> {
    return this.values.get(key);
  }

  protected async write(key: string, value: SettingValue | undefined): Promise<void> {
    if (value === undefined) {
      this.values.delete(key);
    } else {
      this.values.set(key, value);
    }
  }
}

function isSettingValue(value: unknown): value is SettingValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Settings persisted as one JSON object on disk. A missing or unreadable
 * file starts empty.
 */
export class JsonFileSettingsStore extends ValueSettingsStore {
  private loading: Promise<Map<string, SettingValue>> | null = null;
  // Writes run one at a time so the last file written holds every change.
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {
    super();
  }

  protected async read(key: string): Promise<SettingValue | undefined> {
    const values = await this.load();
    return values.get(key);
  }

  protected write(key: string, value: SettingValue | undefined): Promise<void> {
    const next = this.writes.then(() => this.persist(key, value));
    // The caller sees a failure through `next`; later writes still run.
    this.writes = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  private async persist(key: string, value: SettingValue | undefined): Promise<void> {
    const values = await this.load();
    if (value === undefined) {
      values.delete(key);
    } else {
      values.set(key, value);
    }
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(Object.fromEntries(values), null, 2), 'utf8');
  }

  private load(): Promise<Map<string, SettingValue>> {
    this.loading ??= this.readValues();
    return this.loading;
  }

  private async readValues(): Promise<Map<string, SettingValue>> {
    const values = new Map<string, SettingValue>();
    try {
      const parsed: unknown = JSON.parse(await readFile(this.filePath, 'utf8'));
      if (isRecord(parsed)) {
        for (const [key, value] of Object.entries(parsed)) {
          if (isSettingValue(value)) {
            values.set(key, value);
          }
        }
      }
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        warn('Failed to read settings file, starting empty', { filePath: this.filePath, error });
      }
    }
    return values;
  }
}
