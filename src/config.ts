import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';
import type { EligibilityCriteria } from './store/types.js';

// ---------- Types ----------

export interface City {
  slug: string;
  name: string;
  channel: string;
  /** hh.ru area id */
  areaId: number;
}

export interface Emojis {
  salary: string;
  company: string;
  schedule: string;
  experience: string;
  divider: string;
}

export interface StoreConfig {
  supabaseUrl: string;
  supabaseKey: string;
  timeoutMs: number;
}

export interface AlertConfig {
  botToken: string;
  chatId: string;
}

export interface PublisherConfig {
  store: StoreConfig;
  botToken: string;
  cities: City[];
  criteria: EligibilityCriteria;
  targetCount: number;
  postTimesMsk: string[];
  cityDelayMs: number;
  referralLink: string | null;
  emojis: Emojis;
  alerts: AlertConfig | null;
  dryRun: boolean;
  force: boolean;
  automation: boolean;
}

export interface IngestConfig {
  store: StoreConfig;
  cities: City[];
  alerts: AlertConfig | null;
  dryRun: boolean;
}

type Env = Record<string, string | undefined>;

// ---------- Defaults ----------

export const DEFAULT_CITIES: readonly City[] = [
  { slug: 'msk', name: 'Москва', channel: '@courier_jobs_msk', areaId: 1 },
  { slug: 'spb', name: 'Санкт-Петербург', channel: '@courier_jobs_spb', areaId: 2 },
  { slug: 'nsk', name: 'Новосибирск', channel: '@courier_jobs_nsk', areaId: 4 },
  { slug: 'ekb', name: 'Екатеринбург', channel: '@courier_jobs_ekb', areaId: 3 },
  { slug: 'kzn', name: 'Казань', channel: '@courier_jobs_kzn', areaId: 88 },
];

export const DEFAULT_EMOJIS: Emojis = {
  salary: '💰',
  company: '🏢',
  schedule: '🕒',
  experience: '📊',
  divider: '---',
};

const DEFAULT_POST_TIMES = ['09:00', '13:00', '19:00', '21:00'];

// ---------- Parsing ----------

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const SettingsSchema = z.object({
  PUBLISH_TARGET_COUNT: positiveInt(10),
  MAX_VACANCY_AGE_DAYS: positiveInt(30),
  MAX_PARSED_AGE_DAYS: positiveInt(14),
  PUBLISH_CURRENCY: z.string().min(1).default('RUR'),
  CITY_DELAY_MS: nonNegativeInt(1000),
  STORE_TIMEOUT_MS: positiveInt(30_000),
});

const ChannelOverridesSchema = z.record(z.string().min(1));

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function assertPresent(env: Env, names: string[]): void {
  const missing = names.filter((name) => readEnv(env, name) === undefined);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`);
  }
}

function requireEnv(env: Env, name: string): string {
  const value = readEnv(env, name);
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`);
  }
  return value;
}

function loadStoreConfig(env: Env, timeoutMs: number): StoreConfig {
  return {
    supabaseUrl: requireEnv(env, 'SUPABASE_URL'),
    supabaseKey: requireEnv(env, 'SUPABASE_KEY'),
    timeoutMs,
  };
}

function parseSettings(env: Env): z.infer<typeof SettingsSchema> {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(SettingsSchema.shape)) {
    const value = readEnv(env, key);
    if (value !== undefined) raw[key] = value;
  }

  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid settings: ${issues}`);
  }
  return result.data;
}

export function parseCities(env: Env): City[] {
  const raw = readEnv(env, 'CITY_CHANNELS');
  if (!raw) return DEFAULT_CITIES.map((c) => ({ ...c }));

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`CITY_CHANNELS is not valid JSON: ${errorMessage(err)}`);
  }

  const parsed = ChannelOverridesSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError('CITY_CHANNELS must be an object of city slug -> channel');
  }

  const unknown = Object.keys(parsed.data).filter((slug) => !DEFAULT_CITIES.some((c) => c.slug === slug));
  if (unknown.length > 0) {
    throw new ConfigurationError(`CITY_CHANNELS has unknown cities: ${unknown.join(', ')}`);
  }

  return DEFAULT_CITIES.map((c) => ({ ...c, channel: parsed.data[c.slug] ?? c.channel }));
}

export function parsePostTimes(raw: string | undefined): string[] {
  if (!raw) return [...DEFAULT_POST_TIMES];
  return raw
    .split(',')
    .map((t) => t.trim())
    .filter(Boolean);
}

function parseAlerts(env: Env): AlertConfig | null {
  const botToken = readEnv(env, 'TG_ALERT_BOT_TOKEN');
  const chatId = readEnv(env, 'TG_ALERT_CHAT_ID');
  return botToken && chatId ? { botToken, chatId } : null;
}

function isAutomation(env: Env): boolean {
  return 'GITHUB_ACTIONS' in env || readEnv(env, 'CI') !== undefined;
}

// ---------- Loaders ----------

export function loadPublisherConfig(env: Env = process.env, argv: string[] = process.argv): PublisherConfig {
  const dryRun = argv.includes('--dry-run');
  assertPresent(env, dryRun ? ['SUPABASE_URL', 'SUPABASE_KEY'] : ['SUPABASE_URL', 'SUPABASE_KEY', 'TG_BOT_TOKEN']);
  const settings = parseSettings(env);

  return {
    store: loadStoreConfig(env, settings.STORE_TIMEOUT_MS),
    // Dry runs never talk to Telegram
    botToken: readEnv(env, 'TG_BOT_TOKEN') ?? '',
    cities: parseCities(env),
    criteria: {
      currency: settings.PUBLISH_CURRENCY,
      maxVacancyAgeDays: settings.MAX_VACANCY_AGE_DAYS,
      maxParsedAgeDays: settings.MAX_PARSED_AGE_DAYS,
    },
    targetCount: settings.PUBLISH_TARGET_COUNT,
    postTimesMsk: parsePostTimes(readEnv(env, 'POST_TIMES_MSK')),
    cityDelayMs: settings.CITY_DELAY_MS,
    referralLink: readEnv(env, 'REFERRAL_LINK') ?? null,
    emojis: { ...DEFAULT_EMOJIS },
    alerts: parseAlerts(env),
    dryRun,
    force: argv.includes('--force'),
    automation: isAutomation(env),
  };
}

export function loadIngestConfig(env: Env = process.env, argv: string[] = process.argv): IngestConfig {
  assertPresent(env, ['SUPABASE_URL', 'SUPABASE_KEY']);
  const settings = parseSettings(env);

  return {
    store: loadStoreConfig(env, settings.STORE_TIMEOUT_MS),
    cities: parseCities(env),
    alerts: parseAlerts(env),
    dryRun: argv.includes('--dry-run'),
  };
}
