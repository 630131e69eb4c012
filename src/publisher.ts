import type { City, Emojis } from './config.js';
import { errorMessage } from './errors.js';
import type { RandomSource } from './random.js';
import { renderPost, type RenderedPost } from './renderer.js';
import { selectListings } from './selector.js';
import { buildEligibilityFilter, type EligibilityCriteria, type Listing, type ListingStore } from './store/types.js';
import type { MessagingGateway } from './telegram.js';

export const CTA_BUTTON_TEXT = '🚀 Работать на себя';

export type CityStatus =
  | 'PENDING'
  | 'FETCHED'
  | 'SELECTED'
  | 'RENDERED'
  | 'SENT'
  | 'MARKED'
  | 'SKIPPED'
  | 'FAILED';

export interface CityOutcome {
  citySlug: string;
  status: CityStatus;
  /** Vacancies delivered (or rendered, in a dry run). 0 when skipped or failed. */
  count: number;
  message: string;
  error?: string;
}

export interface RunSummary {
  success: boolean;
  results: Record<string, number>;
  outcomes: CityOutcome[];
  totalPublished: number;
}

export interface PublisherOptions {
  criteria: EligibilityCriteria;
  targetCount: number;
  referralLink: string | null;
  emojis?: Emojis;
  dryRun?: boolean;
  cityDelayMs?: number;
}

export interface PublisherDeps {
  store: ListingStore;
  gateway: MessagingGateway;
  random: RandomSource;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

function ts(): string {
  return new Date().toISOString();
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function countByEmployer(listings: Listing[]): [string, number][] {
  const counts = new Map<string, number>();
  for (const l of listings) {
    const employer = l.employer?.trim() || 'Не указано';
    counts.set(employer, (counts.get(employer) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

export async function publishCity(
  city: City,
  deps: PublisherDeps,
  opts: PublisherOptions
): Promise<CityOutcome> {
  const now = deps.now ?? (() => new Date());
  let status: CityStatus = 'PENDING';

  const advance = (next: CityStatus) => {
    console.log(`[${ts()}] [${city.slug}] ${status} -> ${next}`);
    status = next;
  };

  const fail = (stage: string, err: unknown): CityOutcome => {
    const msg = errorMessage(err);
    console.error(`[${ts()}] [${city.slug}] ${stage} failed: ${msg}`);
    advance('FAILED');
    return { citySlug: city.slug, status, count: 0, message: `${stage} failed for ${city.name}`, error: msg };
  };

  // Step 1: Fetch eligible vacancies
  const filter = buildEligibilityFilter(city.slug, opts.criteria, now());
  let eligible: Listing[];
  try {
    eligible = await deps.store.fetchEligible(filter);
  } catch (err) {
    return fail('Fetch', err);
  }
  advance('FETCHED');
  console.log(`[${ts()}] [${city.slug}] ${eligible.length} eligible vacancies`);

  if (eligible.length === 0) {
    advance('SKIPPED');
    return { citySlug: city.slug, status, count: 0, message: `No new vacancies for ${city.name}` };
  }

  // Step 2: Select
  const selection = selectListings(eligible, opts.targetCount, deps.random);
  advance('SELECTED');

  // Step 3: Render
  let post: RenderedPost;
  try {
    post = renderPost(selection, city.name, { referralLink: opts.referralLink, emojis: opts.emojis });
  } catch (err) {
    return fail('Render', err);
  }
  advance('RENDERED');
  console.log(
    `[${ts()}] [${city.slug}] Rendered ${post.listings.length}/${selection.length} vacancies, ${post.text.length} characters`
  );

  if (opts.dryRun) {
    console.log(`[${ts()}] [${city.slug}] DRY RUN, not sending to ${city.channel}:\n${post.text}`);
    return {
      citySlug: city.slug,
      status,
      count: post.listings.length,
      message: `Dry run: ${post.listings.length} vacancies rendered for ${city.name}`,
    };
  }

  // Step 4: Send
  try {
    await deps.gateway.sendMessage(city.channel, post.text, {
      parseMode: 'HTML',
      disablePreview: true,
      button: post.ctaUrl ? { text: CTA_BUTTON_TEXT, url: post.ctaUrl } : null,
    });
  } catch (err) {
    return fail('Send', err);
  }
  advance('SENT');

  // Step 5: Mark as posted. The message is already out, so a failure here
  // only leaves stale flags behind.
  const count = post.listings.length;
  const ids = post.listings.map((l) => l.id);
  try {
    await deps.store.markPosted(ids, city.channel, now());
    advance('MARKED');
  } catch (err) {
    console.warn(`[${ts()}] [${city.slug}] Posted but not marked in the store: ${errorMessage(err)}`);
  }

  for (const [employer, n] of countByEmployer(post.listings)) {
    console.log(`[${ts()}] [${city.slug}]   ${employer}: ${n}`);
  }

  return { citySlug: city.slug, status, count, message: `Published ${count} vacancies to ${city.channel}` };
}

export async function runPublisher(
  cities: City[],
  deps: PublisherDeps,
  opts: PublisherOptions
): Promise<RunSummary> {
  const sleep = deps.sleep ?? defaultSleep;
  const delay = opts.cityDelayMs ?? 0;

  console.log(`[${ts()}] Publishing for ${cities.length} cities (target ${opts.targetCount} per post)`);

  const outcomes: CityOutcome[] = [];
  for (const [i, city] of cities.entries()) {
    console.log(`[${ts()}] City: ${city.name} (${city.slug}) -> ${city.channel}`);

    let outcome: CityOutcome;
    try {
      outcome = await publishCity(city, deps, opts);
    } catch (err) {
      // publishCity reports its own failures; anything reaching here is unexpected
      const msg = errorMessage(err);
      console.error(`[${ts()}] [${city.slug}] Unexpected error: ${msg}`);
      outcome = { citySlug: city.slug, status: 'FAILED', count: 0, message: `Unexpected error for ${city.name}`, error: msg };
    }
    outcomes.push(outcome);

    if (delay > 0 && i < cities.length - 1) {
      await sleep(delay);
    }
  }

  const results: Record<string, number> = {};
  for (const o of outcomes) {
    results[o.citySlug] = o.count;
  }
  const totalPublished = outcomes.reduce((sum, o) => sum + o.count, 0);
  const success = outcomes.every((o) => o.status !== 'FAILED');

  for (const o of outcomes) {
    const mark = o.status === 'FAILED' ? '❌' : o.count > 0 ? '✅' : 'ℹ️';
    console.log(`[${ts()}] ${mark} ${o.citySlug}: ${o.status}, ${o.count} vacancies${o.error ? ` (${o.error})` : ''}`);
  }
  console.log(`[${ts()}] Total published: ${totalPublished}`);
  if (!success) {
    console.error(`[${ts()}] Publishing finished with errors in one or more cities`);
  }

  return { success, results, outcomes, totalPublished };
}
