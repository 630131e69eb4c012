import { DEFAULT_EMOJIS, type Emojis } from './config.js';
import { RenderOverflowError } from './errors.js';
import type { Listing } from './store/types.js';

export const TELEGRAM_MESSAGE_LIMIT = 4096;
export const EMPTY_POST_TEXT = 'Нет новых вакансий для публикации';

/** Entries kept on the first truncation pass. */
const TRUNCATED_COUNT = 5;
const NOT_SPECIFIED = 'не указано';

export interface RenderOptions {
  referralLink?: string | null;
  emojis?: Emojis;
  maxLength?: number;
}

export interface RenderedPost {
  text: string;
  ctaUrl: string | null;
  /** The vacancies that made it into `text`, in order. */
  listings: Listing[];
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function escapeAttr(text: string): string {
  return escapeHtml(text).replace(/"/g, '&quot;').replace(/'/g, '&#39;');
}

/** 1234567 -> "1 234 567" */
export function formatAmount(amount: number): string {
  return String(Math.round(amount)).replace(/\B(?=(\d{3})+(?!\d))/g, ' ');
}

function hasText(value: string | null | undefined): value is string {
  return value != null && value.trim() !== '';
}

export function formatSalary(
  listing: Pick<Listing, 'salary_from_net' | 'salary_to_net' | 'salary_period_name' | 'salary_frequency_name'>
): string {
  const from = listing.salary_from_net;
  const to = listing.salary_to_net;

  let display: string;
  if (from != null && to != null) {
    display = from === to ? `${formatAmount(from)} ₽` : `от ${formatAmount(from)} до ${formatAmount(to)} ₽`;
  } else if (from != null) {
    display = `от ${formatAmount(from)} ₽`;
  } else if (to != null) {
    display = `${formatAmount(to)} ₽`;
  } else {
    return 'не указана';
  }

  const period = listing.salary_period_name;
  if (hasText(period)) {
    display += ` (${period}`;
    const frequency = listing.salary_frequency_name;
    if (frequency != null) {
      if (frequency.trim() === '') {
        display += `, ${NOT_SPECIFIED}`;
      } else if (frequency.trim().toLowerCase() !== NOT_SPECIFIED) {
        display += `, ${frequency}`;
      }
    }
    display += ')';
  }

  return display;
}

function renderCta(referralLink: string): string {
  let cta = `\n💡 <b>Хочешь работать на себя?</b>\n`;
  cta += '✅ Работай на себя — сам выбираешь график\n';
  cta += '✅ Заработок от 5000₽ в день с первого дня\n';
  cta += '✅ Выплаты ежедневно на карту\n';
  cta += '✅ Работаешь в своём районе — без долгих поездок\n';
  cta += '✅ Бонусы для новичков\n\n';
  cta += `🚀 <a href="${escapeAttr(referralLink)}"><b>Начать работать на себя →</b></a>\n`;
  cta += `<i>Начни зарабатывать уже завтра!</i>\n\n`;
  return cta;
}

function renderEntry(listing: Listing, index: number, total: number, emojis: Emojis): string {
  let text = `<b>${index}. <a href="${escapeAttr(listing.external_url)}">${escapeHtml(listing.title)}</a></b>\n\n`;

  if (hasText(listing.employer)) {
    text += `${emojis.company} ${escapeHtml(listing.employer)}\n`;
  }

  text += `${emojis.salary} ${escapeHtml(formatSalary(listing))}\n`;

  if (hasText(listing.schedule_name)) {
    text += `${emojis.schedule} ${escapeHtml(listing.schedule_name)}\n`;
  }
  if (hasText(listing.experience_name)) {
    text += `${emojis.experience} ${escapeHtml(listing.experience_name)}\n`;
  }

  if (index < total) {
    text += `\n${emojis.divider}\n\n`;
  }

  return text;
}

function renderText(selection: readonly Listing[], cityName: string, referralLink: string | null, emojis: Emojis): string {
  let text = `<b>🚀 Новые вакансии курьеров в г. ${escapeHtml(cityName)}</b>\n\n`;
  if (referralLink) {
    text += renderCta(referralLink);
  }
  selection.forEach((listing, i) => {
    text += renderEntry(listing, i + 1, selection.length, emojis);
  });
  return text;
}

/**
 * Renders one channel post. When the text is over the limit the tail is
 * dropped (first down to 5 entries, then one at a time) and the post is
 * rendered again. Throws RenderOverflowError if a single entry doesn't fit.
 */
export function renderPost(
  selection: readonly Listing[],
  cityName: string,
  options: RenderOptions = {}
): RenderedPost {
  if (selection.length === 0) {
    return { text: EMPTY_POST_TEXT, ctaUrl: null, listings: [] };
  }

  const referralLink = options.referralLink || null;
  const emojis = options.emojis ?? DEFAULT_EMOJIS;
  const limit = options.maxLength ?? TELEGRAM_MESSAGE_LIMIT;

  const text = renderText(selection, cityName, referralLink, emojis);
  if (text.length <= limit) {
    return { text, ctaUrl: referralLink, listings: [...selection] };
  }

  if (selection.length === 1) {
    throw new RenderOverflowError(
      `Post for ${cityName} is ${text.length} characters with a single vacancy (limit ${limit})`,
      text.length,
      limit
    );
  }

  const keep = selection.length > TRUNCATED_COUNT ? TRUNCATED_COUNT : selection.length - 1;
  console.warn(`[renderer] Post for ${cityName} too long (${text.length}/${limit}), keeping ${keep} vacancies`);
  return renderPost(selection.slice(0, keep), cityName, options);
}
