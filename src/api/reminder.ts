import type { Spa } from './spa.js';
import type { ReminderRecord } from './types.js';
import { ApiError } from './types.js';

/**
 * Maintenance reminder (filter cleaning, water change, ...)
 */
export class SpaReminder {
  readonly id: string;
  readonly lastUpdated: Date;
  readonly name: string;
  readonly remainingDays: number;
  readonly snoozed: boolean;
  readonly state: string;
  readonly properties: Readonly<ReminderRecord>;

  constructor(
    readonly spa: Spa,
    record: ReminderRecord,
  ) {
    this.id = record.id;
    this.lastUpdated = new Date(record.lastUpdated);
    if (Number.isNaN(this.lastUpdated.getTime())) {
      throw new ApiError(`Reminder ${record.id} has an invalid lastUpdated timestamp: ${String(record.lastUpdated)}`);
    }
    this.name = record.name;
    this.remainingDays = record.remainingDuration;
    this.snoozed = record.snoozed;
    this.state = record.state;
    this.properties = record;
  }

  // TODO: snoozing, once the snooze endpoint's request body is known

  toString(): string {
    return `<SpaReminder ${this.id}>`;
  }
}
