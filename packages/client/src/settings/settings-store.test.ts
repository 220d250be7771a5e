import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { warn } from 'firebase-functions/logger';
import { JsonFileSettingsStore, MemorySettingsStore } from './settings-store.js';

describe('MemorySettingsStore', () => {
  it('should return null for missing keys and mismatched types', async () => {
    const store = new MemorySettingsStore({ useMetricSystem: true });

    expect(await store.getBoolean('useMetricSystem')).toBe(true);
    expect(await store.getString('useMetricSystem')).toBeNull();
    expect(await store.getNumber('missing')).toBeNull();
  });

  it('should remove keys', async () => {
    const store = new MemorySettingsStore();
    await store.setNumber('defaultRestTimeSeconds', 90);
    await store.remove('defaultRestTimeSeconds');

    expect(await store.getNumber('defaultRestTimeSeconds')).toBeNull();
  });
});

describe('JsonFileSettingsStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'periolifts-settings-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should persist values to a JSON file', async () => {
    const filePath = join(dir, 'nested', 'settings.json');
    const store = new JsonFileSettingsStore(filePath);

    await store.setBoolean('useDefaultRestTime', true);
    await store.setNumber('defaultRestTimeSeconds', 75);

    const written: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    expect(written).toEqual({ useDefaultRestTime: true, defaultRestTimeSeconds: 75 });

    const reopened = new JsonFileSettingsStore(filePath);
    expect(await reopened.getNumber('defaultRestTimeSeconds')).toBe(75);
  });

  it('should keep every value when writes overlap', async () => {
    const filePath = join(dir, 'settings.json');
    const store = new JsonFileSettingsStore(filePath);

    await Promise.all([
      store.setBoolean('useMetricSystem', true),
      store.setNumber('defaultRestTimeSeconds', 90),
    ]);

    const written: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    expect(written).toEqual({ useMetricSystem: true, defaultRestTimeSeconds: 90 });

    const reopened = new JsonFileSettingsStore(filePath);
    expect(await reopened.getBoolean('useMetricSystem')).toBe(true);
    expect(await reopened.getNumber('defaultRestTimeSeconds')).toBe(90);
  });

  it('should read the file once for concurrent first reads', async () => {
    const filePath = join(dir, 'settings.json');
    await writeFile(filePath, '{not json', 'utf8');
    const store = new JsonFileSettingsStore(filePath);

    await Promise.all([store.getBoolean('useMetricSystem'), store.getNumber('defaultRestTimeSeconds')]);

    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should start empty without warning when the file does not exist', async () => {
    const store = new JsonFileSettingsStore(join(dir, 'missing.json'));

    expect(await store.getBoolean('useMetricSystem')).toBeNull();
    expect(warn).not.toHaveBeenCalled();
  });

  it('should warn and start empty when the file is corrupt', async () => {
    const filePath = join(dir, 'settings.json');
    await writeFile(filePath, '{not json', 'utf8');
    const store = new JsonFileSettingsStore(filePath);

    expect(await store.getBoolean('useMetricSystem')).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
