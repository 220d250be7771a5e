import type { SettingsStore } from './settings-store.js';

const USE_METRIC_SYSTEM_KEY = 'useMetricSystem';

export const KG_TO_LBS = 2.20462;
export const CM_TO_IN = 0.393701;

/**
 * Converts and labels weights and lengths for the preferred unit system.
 * `fromMetric` names the unit of the input; when omitted the value is
 * taken to be in the preferred unit already.
 */
export class UnitsService {
  private useMetric: boolean | null = null;

  constructor(private readonly store: SettingsStore) {}

  async getUseMetricSystem(): Promise<boolean> {
    if (this.useMetric === null) {
      this.useMetric = (await this.store.getBoolean(USE_METRIC_SYSTEM_KEY)) ?? false;
    }
    return this.useMetric;
  }

  async setUseMetricSystem(useMetric: boolean): Promise<void> {
    await this.store.setBoolean(USE_METRIC_SYSTEM_KEY, useMetric);
    this.useMetric = useMetric;
  }

  async convertWeight(weight: number, fromMetric?: boolean): Promise<number> {
    return convert(weight, await this.getUseMetricSystem(), fromMetric, KG_TO_LBS);
  }

  async convertLength(length: number, fromMetric?: boolean): Promise<number> {
    return convert(length, await this.getUseMetricSystem(), fromMetric, CM_TO_IN);
  }

  async getWeightUnit(): Promise<'kg' | 'lbs'> {
    return (await this.getUseMetricSystem()) ? 'kg' : 'lbs';
  }

  async getLengthUnit(): Promise<'cm' | 'in'> {
    return (await this.getUseMetricSystem()) ? 'cm' : 'in';
  }

  async formatWeight(weight: number, decimals = 1, fromMetric?: boolean): Promise<string> {
    const value = await this.convertWeight(weight, fromMetric);
    return `${value.toFixed(decimals)} ${await this.getWeightUnit()}`;
  }

  async formatLength(length: number, decimals = 1, fromMetric?: boolean): Promise<string> {
    const value = await this.convertLength(length, fromMetric);
    return `${value.toFixed(decimals)} ${await this.getLengthUnit()}`;
  }

  /** Forgets the cached preference so the next read goes to the store. */
  clearCache(): void {
    this.useMetric = null;
  }
}

// `factor` turns the metric unit into the imperial one.
function convert(
  value: number,
  toMetric: boolean,
  fromMetric: boolean | undefined,
  factor: number
): number {
  if (toMetric) {
    return fromMetric === false ? value / factor : value;
  }
  return fromMetric === true ? value * factor : value;
}
