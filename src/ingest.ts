import type { City } from './config.js';
import { errorMessage } from './errors.js';
import { fetchHhPage, searchHh, toScrapedVacancy, type HhPageFetcher } from './scrapers/hh.js';
import type { ListingStore } from './store/types.js';

function ts(): string {
  return new Date().toISOString();
}

export interface CityIngestResult {
  citySlug: string;
  scraped: number;
  stored: number;
  skipped: number;
  error?: string;
}

export interface IngestSummary {
  success: boolean;
  cities: CityIngestResult[];
  totalScraped: number;
  totalStored: number;
}

export interface IngestDeps {
  store: ListingStore;
  fetchPage?: HhPageFetcher;
  now?: () => Date;
}

function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export async function runIngest(
  cities: City[],
  deps: IngestDeps,
  opts: { dryRun: boolean }
): Promise<IngestSummary> {
  const now = (deps.now ?? (() => new Date()))();
  const window = {
    dateFrom: isoDate(new Date(now.getTime() - 24 * 60 * 60 * 1000)),
    dateTo: isoDate(now),
  };

  console.log(`[${ts()}] Ingest starting for ${cities.length} cities, window ${window.dateFrom}..${window.dateTo}`);
  console.log(`[${ts()}] Dry run: ${opts.dryRun}`);

  const results: CityIngestResult[] = [];

  for (const city of cities) {
    console.log(`[${ts()}] Scraping ${city.name} (area ${city.areaId})...`);
    try {
      const found = await searchHh(city.areaId, window, deps.fetchPage ?? fetchHhPage);
      const rows = found.items.map((item) => toScrapedVacancy(item, city.slug));
      if (found.skipped > 0) {
        console.warn(`[${ts()}] ${city.slug}: skipped ${found.skipped} malformed items`);
      }
      console.log(`[${ts()}] ${city.slug}: found ${rows.length} vacancies on ${found.pages} pages`);

      const stored = opts.dryRun ? 0 : (await deps.store.upsertVacancies(rows)).stored;
      console.log(`[${ts()}] ${city.slug}: stored ${stored} vacancies`);

      results.push({ citySlug: city.slug, scraped: rows.length, stored, skipped: found.skipped });
    } catch (err) {
      const msg = errorMessage(err);
      console.error(`[${ts()}] ${city.slug}: ingest failed: ${msg}`);
      results.push({ citySlug: city.slug, scraped: 0, stored: 0, skipped: 0, error: msg });
    }
  }

  const summary: IngestSummary = {
    success: results.every((r) => r.error === undefined),
    cities: results,
    totalScraped: results.reduce((sum, r) => sum + r.scraped, 0),
    totalStored: results.reduce((sum, r) => sum + r.stored, 0),
  };

  console.log(`[${ts()}] Ingest done: ${summary.totalScraped} scraped, ${summary.totalStored} stored`);
  return summary;
}
