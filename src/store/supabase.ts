import { createClient, SupabaseClient } from '@supabase/supabase-js';
import type { StoreConfig } from '../config.js';
import { StoreQueryError, StoreUpdateError } from '../errors.js';
import type { ScrapedVacancy } from '../scrapers/types.js';
import {
  ListingSchema,
  type EligibilityFilter,
  type Listing,
  type ListingStore,
  type UpsertResult,
} from './types.js';

const TABLE = 'vacancies';

// ---------- Client ----------

export function createSupabase(config: StoreConfig, fetchImpl: typeof fetch = fetch): SupabaseClient {
  const timedFetch: typeof fetch = (input, init) =>
    fetchImpl(input, { ...init, signal: init?.signal ?? AbortSignal.timeout(config.timeoutMs) });

  return createClient(config.supabaseUrl, config.supabaseKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: timedFetch },
  });
}

// ---------- Store ----------

export class SupabaseListingStore implements ListingStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async fetchEligible(filter: EligibilityFilter): Promise<Listing[]> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .select('*')
      .eq('city_slug', filter.citySlug)
      .eq('is_posted', false)
      .eq('currency', filter.currency)
      .gte('published_at', filter.publishedSince)
      .gte('created_at', filter.firstSeenSince)
      .order('created_at', { ascending: false });

    if (error) {
      throw new StoreQueryError(`Failed to fetch vacancies for ${filter.citySlug}: ${error.message}`);
    }

    const listings: Listing[] = [];
    for (const row of data ?? []) {
      const parsed = ListingSchema.safeParse(row);
      if (parsed.success) {
        listings.push(parsed.data);
      } else {
        console.warn(`[store] Skipping malformed vacancy row: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }
    }
    return listings;
  }

  async markPosted(ids: number[], channelId: string, postedAt: Date): Promise<void> {
    if (ids.length === 0) return;

    const stamp = postedAt.toISOString();
    const { error } = await this.supabase
      .from(TABLE)
      .update({
        is_posted: true,
        posted_at: stamp,
        channel_id: channelId,
        updated_at: stamp,
      })
      .in('id', ids);

    if (error) {
      throw new StoreUpdateError(`Failed to mark ${ids.length} vacancies as posted: ${error.message}`);
    }
  }

  async upsertVacancies(vacancies: ScrapedVacancy[]): Promise<UpsertResult> {
    if (vacancies.length === 0) return { stored: 0 };

    // is_posted and created_at are left to column defaults so re-ingestion
    // never un-posts a vacancy or moves its first-seen time.
    const now = new Date().toISOString();
    const rows = vacancies.map((v) => ({ ...v, updated_at: now }));

    const { data, error } = await this.supabase
      .from(TABLE)
      .upsert(rows, { onConflict: 'source,external_id', ignoreDuplicates: false })
      .select('id');

    if (error) {
      throw new StoreUpdateError(`Failed to upsert vacancies: ${error.message}`);
    }
    return { stored: data?.length ?? 0 };
  }

  async countListings(): Promise<number> {
    const { count, error } = await this.supabase
      .from(TABLE)
      .select('id', { count: 'exact', head: true });

    if (error) {
      throw new StoreQueryError(`Failed to count vacancies: ${error.message}`);
    }
    return count ?? 0;
  }
}
