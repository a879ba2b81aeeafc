import {
  ENERGY_USAGE_INTERVALS,
  HEAT_MODES,
  SECONDARY_FILTRATION_MODES,
  TEMPERATURE_FORMATS,
} from '../settings.js';
import type { EnergyUsageInterval, HeatMode, SecondaryFiltrationMode, TemperatureFormat } from '../settings.js';
import type { Account } from './account.js';
import type { SmartTubClient } from './client.js';
import { SpaLight } from './light.js';
import { SpaPump } from './pump.js';
import { SpaReminder } from './reminder.js';
import type {
  EnergyUsageBucket,
  HttpMethod,
  LightRecord,
  PumpRecord,
  ReminderRecord,
  SpaDebugStatus,
  SpaError,
  SpaRecord,
  SpaStatus,
} from './types.js';
import { ApiError, InvalidArgumentError, assertOneOf, isRecord } from './types.js';

/**
 * A single hot tub registered to an account
 *
 * Holds the record it was fetched with; nothing here is refreshed after a
 * mutation, re-fetch to observe the new state.
 */
export class Spa {
  readonly id: string;
  readonly brand: string;
  readonly model: string;
  readonly properties: Readonly<SpaRecord>;

  constructor(
    private readonly client: SmartTubClient,
    readonly account: Account,
    record: SpaRecord,
  ) {
    this.id = record.id;
    this.brand = record.brand;
    this.model = record.model;
    this.properties = record;
  }

  /**
   * Issue a request scoped to this spa
   *
   * @param resource - path below `spas/{id}/`
   */
  async request<T = unknown>(method: HttpMethod, resource: string, body?: unknown): Promise<T> {
    const data = await this.client.request<T>(method, `spas/${encodeURIComponent(this.id)}/${resource}`, body);
    this.client.log.debug(`${method} ${resource} successful: ${JSON.stringify(data)}`);
    return data;
  }

  async getStatus(): Promise<SpaStatus> {
    const status = await this.request<SpaStatus | undefined>('GET', 'status');
    if (!isRecord(status)) {
      throw new ApiError('Unexpected response for status');
    }
    return status;
  }

  async getDebugStatus(): Promise<SpaDebugStatus> {
    const data = await this.request('GET', 'debugStatus');
    const debugStatus: unknown = isRecord(data) ? data.debugStatus : undefined;
    if (!isRecord(debugStatus)) {
      throw new ApiError('Unexpected response for debugStatus: missing the debugStatus object');
    }
    return debugStatus;
  }

  async getErrors(): Promise<SpaError[]> {
    return this.fetchCollection<SpaError>('errors', 'content');
  }

  async getPumps(): Promise<SpaPump[]> {
    const records = await this.fetchCollection<PumpRecord>('pumps', 'pumps');
    return records.map((record) => new SpaPump(this, record));
  }

  async getLights(): Promise<SpaLight[]> {
    const records = await this.fetchCollection<LightRecord>('lights', 'lights');
    return records.map((record) => new SpaLight(this, record));
  }

  async getReminders(): Promise<SpaReminder[]> {
    // The response carries both 'reminders' and 'filters'; they hold the same entries
    const records = await this.fetchCollection<ReminderRecord>('reminders', 'reminders');
    return records.map((record) => new SpaReminder(this, record));
  }

  /**
   * Energy consumption between two calendar dates, bucketed per day or per month
   */
  async getEnergyUsage(interval: EnergyUsageInterval, startDate: Date, endDate: Date): Promise<EnergyUsageBucket[]> {
    assertOneOf(ENERGY_USAGE_INTERVALS, interval, 'energy usage interval');
    const body = {
      start: formatDate(startDate, 'start date'),
      end: formatDate(endDate, 'end date'),
      interval,
    };
    const data = await this.request('POST', 'energyUsage', body);
    const buckets: unknown = isRecord(data) ? data.buckets : undefined;
    if (!Array.isArray(buckets) || !buckets.every(isRecord)) {
      throw new ApiError('Unexpected response for energyUsage: missing the buckets array');
    }
    return buckets;
  }

  async setSecondaryFiltrationMode(mode: SecondaryFiltrationMode): Promise<void> {
    assertOneOf(SECONDARY_FILTRATION_MODES, mode, 'secondary filtration mode');
    this.client.log.info(`Setting secondary filtration mode to ${mode}`);
    await this.request('PATCH', 'config', { secondaryFiltrationConfig: mode });
  }

  async setHeatMode(mode: HeatMode): Promise<void> {
    assertOneOf(HEAT_MODES, mode, 'heat mode');
    this.client.log.info(`Setting heat mode to ${mode}`);
    await this.request('PATCH', 'config', { heatMode: mode });
  }

  /**
   * Set the target water temperature, in the spa's display format
   */
  async setTemperature(temperature: number): Promise<void> {
    if (typeof temperature !== 'number' || !Number.isFinite(temperature)) {
      throw new InvalidArgumentError(`Invalid temperature: ${String(temperature)}`);
    }
    this.client.log.info(`Setting temperature to ${temperature}`);
    await this.request('PATCH', 'config', { setTemperature: temperature });
  }

  async toggleClearray(): Promise<void> {
    this.client.log.info('Toggling ClearRay');
    await this.request('POST', 'clearray/toggle');
  }

  async setTemperatureFormat(format: TemperatureFormat): Promise<void> {
    assertOneOf(TEMPERATURE_FORMATS, format, 'temperature format');
    this.client.log.info(`Setting temperature format to ${format}`);
    await this.request('PATCH', 'config', { displayTemperatureFormat: format });
  }

  /**
   * Set the spa's date, time, or both
   * Only the calendar date of `date` and the hours and minutes of `time` are sent
   */
  async setDateTime(date?: Date, time?: Date): Promise<void> {
    if (date === undefined && time === undefined) {
      throw new InvalidArgumentError('At least one of date or time is required');
    }

    const dateTimeConfig: { date?: string; time?: string } = {};
    if (date !== undefined) {
      dateTimeConfig.date = formatDate(date, 'date');
    }
    if (time !== undefined) {
      dateTimeConfig.time = formatTime(time);
    }

    this.client.log.info(`Setting date/time to ${JSON.stringify(dateTimeConfig)}`);
    await this.request('PATCH', 'config', { dateTimeConfig });
  }

  toString(): string {
    return `<Spa ${this.id}>`;
  }

  private async fetchCollection<T>(resource: string, key: string): Promise<T[]> {
    const data = await this.request<Record<string, unknown> | undefined>('GET', resource);
    const items = data?.[key];
    if (!Array.isArray(items)) {
      this.client.log.warn(`Response for ${resource} is missing the ${key} array`);
      return [];
    }
    return items;
  }
}

function assertValidDate(value: Date, label: string): void {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new InvalidArgumentError(`Invalid ${label}`);
  }
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Local calendar date as YYYY-MM-DD
 */
function formatDate(value: Date, label: string): string {
  assertValidDate(value, label);
  return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
}

/**
 * Local time of day as HH:MM
 */
function formatTime(value: Date): string {
  assertValidDate(value, 'time');
  return `${pad(value.getHours())}:${pad(value.getMinutes())}`;
}
