import type { ScrapedVacancy } from '../scrapers/types.js';
import {
  matchesEligibility,
  type EligibilityFilter,
  type Listing,
  type ListingStore,
  type UpsertResult,
} from './types.js';

/** In-process ListingStore with the same upsert and marking semantics as the table. */
export class MemoryListingStore implements ListingStore {
  private rows = new Map<number, Listing>();
  private nextId = 1;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  setListing(listing: Listing): void {
    this.rows.set(listing.id, { ...listing });
    this.nextId = Math.max(this.nextId, listing.id + 1);
  }

  getListing(id: number): Listing | undefined {
    const row = this.rows.get(id);
    return row ? { ...row } : undefined;
  }

  all(): Listing[] {
    return [...this.rows.values()].map((r) => ({ ...r }));
  }

  async fetchEligible(filter: EligibilityFilter): Promise<Listing[]> {
    return this.all()
      .filter((l) => matchesEligibility(l, filter))
      .sort((a, b) => Date.parse(b.created_at) - Date.parse(a.created_at));
  }

  async markPosted(ids: number[], channelId: string, postedAt: Date): Promise<void> {
    for (const id of ids) {
      const row = this.rows.get(id);
      if (!row) continue;
      row.is_posted = true;
      row.posted_at = postedAt.toISOString();
      row.channel_id = channelId;
    }
  }

  async upsertVacancies(vacancies: ScrapedVacancy[]): Promise<UpsertResult> {
    for (const v of vacancies) {
      const existing = [...this.rows.values()].find(
        (r) => r.source === v.source && r.external_id === v.external_id
      );

      const fields = {
        source: v.source,
        external_id: v.external_id,
        city_slug: v.city_slug,
        title: v.title,
        employer: v.employer,
        external_url: v.external_url,
        salary_from_net: v.salary_from_net,
        salary_to_net: v.salary_to_net,
        currency: v.currency,
        salary_period_name: v.salary_period_name,
        salary_frequency_name: v.salary_frequency_name,
        schedule_name: v.schedule_name,
        experience_name: v.experience_name,
        published_at: v.published_at,
      };

      if (existing) {
        Object.assign(existing, fields);
      } else {
        const id = this.nextId++;
        this.rows.set(id, {
          ...fields,
          id,
          created_at: this.clock().toISOString(),
          is_posted: false,
          posted_at: null,
          channel_id: null,
        });
      }
    }
    return { stored: vacancies.length };
  }

  async countListings(): Promise<number> {
    return this.rows.size;
  }
}
