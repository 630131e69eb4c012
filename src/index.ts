import 'dotenv/config';
import { sendAlert } from './alerts.js';
import { loadIngestConfig, loadPublisherConfig } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { runIngest } from './ingest.js';
import { runPublisher } from './publisher.js';
import { defaultRandom } from './random.js';
import { shouldPublishNow } from './schedule.js';
import { createSupabase, SupabaseListingStore } from './store/supabase.js';
import { TelegramGateway } from './telegram.js';

function ts(): string {
  return new Date().toISOString();
}

async function publish(): Promise<number> {
  const config = loadPublisherConfig();

  console.log(`[${ts()}] Publisher starting (dry run: ${config.dryRun}, automation: ${config.automation})`);

  if (!config.force && !shouldPublishNow(new Date(), { postTimes: config.postTimesMsk, automation: config.automation })) {
    console.log(`[${ts()}] Not a scheduled publishing time (${config.postTimesMsk.join(', ')} MSK), exiting`);
    return 0;
  }

  const store = new SupabaseListingStore(createSupabase(config.store));
  const total = await store.countListings();
  console.log(`[${ts()}] Connected to Supabase, ${total} vacancies stored`);

  const summary = await runPublisher(
    config.cities,
    { store, gateway: new TelegramGateway(config.botToken), random: defaultRandom },
    {
      criteria: config.criteria,
      targetCount: config.targetCount,
      referralLink: config.referralLink,
      emojis: config.emojis,
      dryRun: config.dryRun,
      cityDelayMs: config.cityDelayMs,
    }
  );

  const failed = summary.outcomes.filter((o) => o.status === 'FAILED');
  await sendAlert(config.alerts, {
    message: summary.success ? 'Публикация завершена' : 'Публикация завершена с ошибками',
    type: summary.success ? 'success' : 'error',
    context: 'publisher',
    details: failed.length > 0 ? failed.map((o) => `${o.citySlug}: ${o.error ?? o.message}`).join('\n') : undefined,
    stats: { ...summary.results, total: summary.totalPublished },
  });

  return summary.success ? 0 : 1;
}

async function ingest(): Promise<number> {
  const config = loadIngestConfig();
  const store = new SupabaseListingStore(createSupabase(config.store));
  const total = await store.countListings();
  console.log(`[${ts()}] Connected to Supabase, ${total} vacancies stored`);

  const summary = await runIngest(config.cities, { store }, { dryRun: config.dryRun });

  const failed = summary.cities.filter((c) => c.error !== undefined);
  await sendAlert(config.alerts, {
    message: summary.success ? 'Парсинг завершён' : 'Парсинг завершён с ошибками',
    type: summary.success ? 'success' : 'error',
    context: 'parser',
    details: failed.length > 0 ? failed.map((c) => `${c.citySlug}: ${c.error}`).join('\n') : undefined,
    stats: { scraped: summary.totalScraped, stored: summary.totalStored },
  });

  return summary.success ? 0 : 1;
}

const command = process.argv.slice(2).find((arg) => !arg.startsWith('--')) ?? 'publish';

try {
  if (command === 'publish') {
    process.exit(await publish());
  } else if (command === 'ingest') {
    process.exit(await ingest());
  } else {
    console.error(`Unknown command "${command}". Usage: index.js [publish|ingest] [--dry-run] [--force]`);
    process.exit(1);
  }
} catch (err) {
  const kind = err instanceof ConfigurationError ? 'Configuration error' : 'Fatal error';
  console.error(`[${ts()}] ${kind}: ${errorMessage(err)}`);
  process.exit(1);
}
