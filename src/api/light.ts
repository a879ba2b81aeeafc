import { LIGHT_MODES } from '../settings.js';
import type { LightMode } from '../settings.js';
import type { Spa } from './spa.js';
import type { LightColor, LightRecord } from './types.js';
import { InvalidArgumentError, assertOneOf } from './types.js';

/**
 * One light zone of a spa
 */
export class SpaLight {
  readonly zone: number;
  readonly color: LightColor;
  readonly intensity: number;
  readonly mode: LightMode;
  readonly properties: Readonly<LightRecord>;

  constructor(
    readonly spa: Spa,
    record: LightRecord,
  ) {
    this.zone = record.zone;
    this.color = record.color;
    this.intensity = record.intensity;
    this.mode = record.mode;
    this.properties = record;
  }

  /**
   * Change mode and intensity of this zone
   * OFF is only valid with intensity 0, and intensity 0 only with OFF
   */
  async set(intensity: number, mode: LightMode): Promise<void> {
    assertOneOf(LIGHT_MODES, mode, 'light mode');
    if (typeof intensity !== 'number' || !Number.isFinite(intensity)) {
      throw new InvalidArgumentError(`Invalid light intensity: ${String(intensity)}`);
    }
    if ((intensity === 0) !== (mode === 'OFF')) {
      throw new InvalidArgumentError(`Light intensity ${intensity} does not match mode ${mode}`);
    }

    await this.spa.request('PATCH', `lights/${this.zone}`, { intensity, mode });
  }

  async turnOff(): Promise<void> {
    await this.set(0, 'OFF');
  }

  toString(): string {
    return `<SpaLight ${this.zone}>`;
  }
}
