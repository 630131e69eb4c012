import { beforeEach, describe, expect, it, vi } from 'vitest';
import { StoreQueryError, StoreUpdateError } from '../src/errors.js';
import { CTA_BUTTON_TEXT, publishCity, runPublisher, type PublisherOptions } from '../src/publisher.js';
import { seededRandom } from '../src/random.js';
import { MemoryListingStore } from '../src/store/memory.js';
import { NOW, RecordingGateway, makeCity, makeListing } from './fixtures.js';

const options: PublisherOptions = {
  criteria: { currency: 'RUR', maxVacancyAgeDays: 30, maxParsedAgeDays: 14 },
  targetCount: 10,
  referralLink: null,
};

describe('publishCity', () => {
  let store: MemoryListingStore;
  let gateway: RecordingGateway;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    store = new MemoryListingStore();
    gateway = new RecordingGateway();
  });

  const deps = () => ({ store, gateway, random: seededRandom(1), now: () => NOW });

  it('sends the post and marks every rendered vacancy', async () => {
    store.setListing(makeListing({ id: 1, salary_to_net: 60_000 }));
    store.setListing(makeListing({ id: 2 }));

    const outcome = await publishCity(makeCity('msk'), deps(), options);

    expect(outcome).toEqual({
      citySlug: 'msk',
      status: 'MARKED',
      count: 2,
      message: 'Published 2 vacancies to @jobs_msk',
    });
    expect(gateway.sent).toHaveLength(1);
    expect(gateway.sent[0]?.chatId).toBe('@jobs_msk');
    expect(gateway.sent[0]?.options).toEqual({ parseMode: 'HTML', disablePreview: true, button: null });
    expect(store.getListing(1)).toMatchObject({ is_posted: true, channel_id: '@jobs_msk', posted_at: NOW.toISOString() });
    expect(store.getListing(2)?.is_posted).toBe(true);
  });

  it('attaches the CTA button when a referral link is configured', async () => {
    store.setListing(makeListing({ id: 1 }));

    await publishCity(makeCity('msk'), deps(), { ...options, referralLink: 'https://example.com/ref' });

    expect(gateway.sent[0]?.options?.button).toEqual({ text: CTA_BUTTON_TEXT, url: 'https://example.com/ref' });
  });

  it('skips a city with no eligible vacancies', async () => {
    store.setListing(makeListing({ id: 1, is_posted: true }));
    store.setListing(makeListing({ id: 2, currency: 'USD' }));

    const outcome = await publishCity(makeCity('msk'), deps(), options);

    expect(outcome.status).toBe('SKIPPED');
    expect(outcome.count).toBe(0);
    expect(gateway.sent).toEqual([]);
  });

  it('fails on a store query error without sending', async () => {
    vi.spyOn(store, 'fetchEligible').mockRejectedValueOnce(new StoreQueryError('connection reset'));

    const outcome = await publishCity(makeCity('msk'), deps(), options);

    expect(outcome).toMatchObject({ status: 'FAILED', count: 0, error: 'connection reset' });
    expect(gateway.sent).toEqual([]);
  });

  it('fails on a send error and leaves the vacancies unposted', async () => {
    store.setListing(makeListing({ id: 1 }));
    gateway = new RecordingGateway(new Set(['@jobs_msk']));

    const outcome = await publishCity(makeCity('msk'), deps(), options);

    expect(outcome).toMatchObject({ status: 'FAILED', count: 0, error: 'channel @jobs_msk unavailable' });
    expect(store.getListing(1)?.is_posted).toBe(false);
  });

  it('still counts the city as published when marking fails after the send', async () => {
    store.setListing(makeListing({ id: 1 }));
    store.setListing(makeListing({ id: 2 }));
    vi.spyOn(store, 'markPosted').mockRejectedValueOnce(new StoreUpdateError('timeout'));

    const outcome = await publishCity(makeCity('msk'), deps(), options);

    expect(outcome.status).toBe('SENT');
    expect(outcome.count).toBe(2);
    expect(gateway.sent).toHaveLength(1);
  });

  it('fails when the post cannot be brought under the size limit', async () => {
    store.setListing(makeListing({ id: 1, title: 'x'.repeat(5_000) }));

    const outcome = await publishCity(makeCity('msk'), deps(), options);

    expect(outcome.status).toBe('FAILED');
    expect(gateway.sent).toEqual([]);
    expect(store.getListing(1)?.is_posted).toBe(false);
  });

  it('only marks the vacancies that survived truncation', async () => {
    for (let id = 1; id <= 10; id++) {
      store.setListing(makeListing({ id, title: `Курьер ${'x'.repeat(600)}`, salary_to_net: 50_000 + id }));
    }

    const outcome = await publishCity(makeCity('msk'), deps(), options);

    expect(outcome.count).toBe(5);
    expect(store.all().filter((l) => l.is_posted).map((l) => l.id).sort((a, b) => a - b)).toEqual([6, 7, 8, 9, 10]);
  });

  it('renders but neither sends nor marks in a dry run', async () => {
    store.setListing(makeListing({ id: 1 }));

    const outcome = await publishCity(makeCity('msk'), deps(), { ...options, dryRun: true });

    expect(outcome.status).toBe('RENDERED');
    expect(outcome.count).toBe(1);
    expect(gateway.sent).toEqual([]);
    expect(store.getListing(1)?.is_posted).toBe(false);
  });

  it('does not publish the same vacancy twice across runs', async () => {
    store.setListing(makeListing({ id: 1 }));

    await publishCity(makeCity('msk'), deps(), options);
    const second = await publishCity(makeCity('msk'), deps(), options);

    expect(second.status).toBe('SKIPPED');
    expect(gateway.sent).toHaveLength(1);
  });
});

describe('runPublisher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('isolates a failing city from the others', async () => {
    const store = new MemoryListingStore();
    store.setListing(makeListing({ id: 1, city_slug: 'aaa' }));
    store.setListing(makeListing({ id: 2, city_slug: 'aaa' }));
    store.setListing(makeListing({ id: 3, city_slug: 'bbb' }));
    const gateway = new RecordingGateway(new Set(['@jobs_bbb']));
    const cities = [makeCity('aaa'), makeCity('bbb'), makeCity('ccc')];

    const summary = await runPublisher(cities, { store, gateway, random: seededRandom(9), now: () => NOW }, options);

    expect(summary.success).toBe(false);
    expect(summary.results).toEqual({ aaa: 2, bbb: 0, ccc: 0 });
    expect(summary.outcomes.map((o) => o.status)).toEqual(['MARKED', 'FAILED', 'SKIPPED']);
    expect(summary.totalPublished).toBe(2);
    expect(store.getListing(3)?.is_posted).toBe(false);
  });

  it('treats a run where every city is skipped as a success', async () => {
    const summary = await runPublisher(
      [makeCity('aaa'), makeCity('bbb')],
      { store: new MemoryListingStore(), gateway: new RecordingGateway(), random: seededRandom(1), now: () => NOW },
      options
    );

    expect(summary).toMatchObject({ success: true, results: { aaa: 0, bbb: 0 }, totalPublished: 0 });
  });

  it('keeps going after a city whose store call throws synchronously', async () => {
    const store = new MemoryListingStore();
    store.setListing(makeListing({ id: 1, city_slug: 'bbb' }));
    const gateway = new RecordingGateway();
    const random = seededRandom(4);
    const cities = [makeCity('aaa'), makeCity('bbb')];
    vi.spyOn(store, 'fetchEligible').mockImplementationOnce(() => {
      throw new TypeError('boom');
    });

    const summary = await runPublisher(cities, { store, gateway, random, now: () => NOW }, options);

    expect(summary.outcomes.map((o) => o.status)).toEqual(['FAILED', 'MARKED']);
    expect(summary.results).toEqual({ aaa: 0, bbb: 1 });
  });

  it('pauses between cities but not after the last one', async () => {
    const sleep = vi.fn(async (_ms: number) => {});

    await runPublisher(
      [makeCity('aaa'), makeCity('bbb'), makeCity('ccc')],
      { store: new MemoryListingStore(), gateway: new RecordingGateway(), random: seededRandom(1), sleep },
      { ...options, cityDelayMs: 1000 }
    );

    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });
});
