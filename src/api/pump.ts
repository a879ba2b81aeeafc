import type { Spa } from './spa.js';
import type { PumpRecord } from './types.js';

export class SpaPump {
  readonly id: string;
  readonly speed: string;
  readonly state: string;
  readonly type: string;
  readonly properties: Readonly<PumpRecord>;

  constructor(
    readonly spa: Spa,
    record: PumpRecord,
  ) {
    this.id = record.id;
    this.speed = record.speed;
    this.state = record.state;
    this.type = record.type;
    this.properties = record;
  }

  async toggle(): Promise<void> {
    await this.spa.request('POST', `pumps/${encodeURIComponent(this.id)}/toggle`);
  }

  toString(): string {
    return `<SpaPump ${this.id}>`;
  }
}
