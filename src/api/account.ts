import type { SmartTubClient } from './client.js';
import { Spa } from './spa.js';
import type { AccountRecord } from './types.js';
import { ApiError, isRecord, isSpaRecord } from './types.js';

/**
 * The logged-in user's SmartTub account
 */
export class Account {
  readonly id: string;
  readonly email: string;
  readonly properties: Readonly<AccountRecord>;

  constructor(
    private readonly client: SmartTubClient,
    record: AccountRecord,
  ) {
    this.id = record.id;
    this.email = record.email;
    this.properties = record;
  }

  /**
   * List every spa owned by this account
   * The list endpoint only returns summaries, so each spa is fetched again in full
   */
  async getSpas(): Promise<Spa[]> {
    const list = await this.client.request('GET', `spas?ownerId=${encodeURIComponent(this.id)}`);
    const summaries: unknown = isRecord(list) ? list.content : undefined;
    if (!Array.isArray(summaries)) {
      throw new ApiError('Unexpected response for spa list: missing the content array');
    }

    const spas: Spa[] = [];
    for (const summary of summaries) {
      if (!isRecord(summary) || typeof summary.id !== 'string') {
        throw new ApiError('Unexpected response for spa list: entry without an id');
      }
      spas.push(await this.getSpa(summary.id));
    }
    return spas;
  }

  async getSpa(spaId: string): Promise<Spa> {
    const record = await this.client.request('GET', `spas/${encodeURIComponent(spaId)}`);
    if (!isSpaRecord(record)) {
      throw new ApiError(`Unexpected response for spa ${spaId}`);
    }
    return new Spa(this.client, this, record);
  }

  toString(): string {
    return `<Account ${this.id}>`;
  }
}
