import { z } from 'zod';
import type { ScrapedVacancy } from '../scrapers/types.js';

// ---------- Rows ----------

const nullableText = z.string().nullable().optional().transform((v) => v ?? null);
const nullableAmount = z.coerce.number().nonnegative().nullable().optional().transform((v) => v ?? null);

export const ListingSchema = z.object({
  id: z.number().int(),
  source: z.string(),
  external_id: z.string(),
  city_slug: z.string(),
  title: z.string(),
  employer: nullableText,
  external_url: z.string(),
  salary_from_net: nullableAmount,
  salary_to_net: nullableAmount,
  currency: nullableText,
  salary_period_name: nullableText,
  salary_frequency_name: nullableText,
  schedule_name: nullableText,
  experience_name: nullableText,
  published_at: z.string(),
  created_at: z.string(),
  is_posted: z.boolean(),
  posted_at: nullableText,
  channel_id: nullableText,
});

export type Listing = z.infer<typeof ListingSchema>;

// ---------- Eligibility ----------

export interface EligibilityCriteria {
  currency: string;
  /** Upstream publish date window. */
  maxVacancyAgeDays: number;
  /** Window on when we first stored the vacancy. */
  maxParsedAgeDays: number;
}

export interface EligibilityFilter {
  citySlug: string;
  currency: string;
  publishedSince: string;
  firstSeenSince: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function buildEligibilityFilter(
  citySlug: string,
  criteria: EligibilityCriteria,
  now: Date
): EligibilityFilter {
  return {
    citySlug,
    currency: criteria.currency,
    publishedSince: new Date(now.getTime() - criteria.maxVacancyAgeDays * DAY_MS).toISOString(),
    firstSeenSince: new Date(now.getTime() - criteria.maxParsedAgeDays * DAY_MS).toISOString(),
  };
}

/** In-memory twin of the query the Supabase store issues for a filter. */
export function matchesEligibility(listing: Listing, filter: EligibilityFilter): boolean {
  return (
    listing.city_slug === filter.citySlug &&
    !listing.is_posted &&
    listing.currency === filter.currency &&
    Date.parse(listing.published_at) >= Date.parse(filter.publishedSince) &&
    Date.parse(listing.created_at) >= Date.parse(filter.firstSeenSince)
  );
}

// ---------- Store contract ----------

export interface UpsertResult {
  stored: number;
}

export interface ListingStore {
  fetchEligible(filter: EligibilityFilter): Promise<Listing[]>;
  /** Flips is_posted and stamps posted_at/channel_id. Safe to repeat. */
  markPosted(ids: number[], channelId: string, postedAt: Date): Promise<void>;
  /** Inserts new vacancies or updates existing ones by (source, external_id). */
  upsertVacancies(vacancies: ScrapedVacancy[]): Promise<UpsertResult>;
  countListings(): Promise<number>;
}
