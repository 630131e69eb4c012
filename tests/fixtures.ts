import type { City } from '../src/config.js';
import { SendError } from '../src/errors.js';
import type { Listing } from '../src/store/types.js';
import type { MessagingGateway, SendOptions } from '../src/telegram.js';

export const NOW = new Date('2026-03-10T12:00:00.000Z');

export function daysAgo(days: number, from: Date = NOW): string {
  return new Date(from.getTime() - days * 24 * 60 * 60 * 1000).toISOString();
}

export function makeListing(overrides: Partial<Listing> & { id: number }): Listing {
  return {
    source: 'hh',
    external_id: `ext-${overrides.id}`,
    city_slug: 'msk',
    title: `Курьер ${overrides.id}`,
    employer: `Employer ${overrides.id}`,
    external_url: `https://hh.ru/vacancy/${overrides.id}`,
    salary_from_net: null,
    salary_to_net: null,
    currency: 'RUR',
    salary_period_name: null,
    salary_frequency_name: null,
    schedule_name: null,
    experience_name: null,
    published_at: daysAgo(2),
    created_at: daysAgo(1),
    is_posted: false,
    posted_at: null,
    channel_id: null,
    ...overrides,
  };
}

export function makeCity(slug: string, overrides: Partial<City> = {}): City {
  return { slug, name: slug.toUpperCase(), channel: `@jobs_${slug}`, areaId: 1, ...overrides };
}

export interface SentMessage {
  chatId: string;
  text: string;
  options: SendOptions | undefined;
}

/** Records messages; rejects for chats listed in `failFor`. */
export class RecordingGateway implements MessagingGateway {
  sent: SentMessage[] = [];

  constructor(private readonly failFor: Set<string> = new Set()) {}

  async sendMessage(chatId: string, text: string, options?: SendOptions): Promise<void> {
    if (this.failFor.has(chatId)) {
      throw new SendError(`channel ${chatId} unavailable`);
    }
    this.sent.push({ chatId, text, options });
  }
}
