import type { AlertConfig } from './config.js';
import { errorMessage } from './errors.js';
import { escapeHtml, formatAmount } from './renderer.js';
import { TelegramGateway, type MessagingGateway } from './telegram.js';

export const PROJECT_NAME = 'Courier Jobs';
export const ALERT_MAX_LENGTH = 4000;
const DETAILS_CUT_MARK = '\n…';

export type AlertType = 'info' | 'success' | 'warning' | 'error';
export type AlertContext = 'parser' | 'publisher' | 'system';

const EMOJI: Record<AlertType | AlertContext, string> = {
  info: 'ℹ️',
  success: '✅',
  warning: '⚠️',
  error: '❌',
  parser: '🔍',
  publisher: '📢',
  system: '⚙️',
};

export interface Alert {
  message: string;
  type?: AlertType;
  context?: AlertContext;
  details?: string;
  stats?: Record<string, string | number>;
}

/** "dd.mm.yyyy HH:MM:SS" at UTC+3 */
export function formatTimestamp(date: Date): string {
  const msk = new Date(date.getTime() + 3 * 60 * 60 * 1000);
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${pad(msk.getUTCDate())}.${pad(msk.getUTCMonth() + 1)}.${msk.getUTCFullYear()} ` +
    `${pad(msk.getUTCHours())}:${pad(msk.getUTCMinutes())}:${pad(msk.getUTCSeconds())}`
  );
}

export function formatStats(stats: Record<string, string | number>): string {
  return Object.entries(stats)
    .map(([key, value]) => `  • ${key}: ${typeof value === 'number' ? formatAmount(value) : value}`)
    .join('\n');
}

// Escapes char by char so a cut never splits an entity.
function clipEscaped(text: string, budget: number): string {
  let out = '';
  for (const ch of text) {
    const next = escapeHtml(ch);
    if (out.length + next.length > budget) break;
    out += next;
  }
  return out;
}

export function formatAlert(alert: Alert, at: Date = new Date()): string {
  const type = alert.type ?? 'info';
  const header = alert.context ? `${EMOJI[alert.context]} ${PROJECT_NAME}` : PROJECT_NAME;
  const detailsBlock = (body: string) => `\n📝 <b>Детали:</b>\n${body}`;

  const title = [
    `<b>${header}</b>`,
    `<i>🕐 ${formatTimestamp(at)}</i>`,
    `\n${EMOJI[type]} <b>${escapeHtml(alert.message)}</b>`,
  ];
  const head = alert.details ? [...title, detailsBlock(escapeHtml(alert.details))] : title;

  const stats = alert.stats && Object.keys(alert.stats).length > 0 ? formatStats(alert.stats) : '';
  const full = stats ? [...head, `\n📊 <b>Статистика:</b>\n${escapeHtml(stats)}`].join('\n') : head.join('\n');
  if (full.length <= ALERT_MAX_LENGTH) return full;

  const note = stats ? `\n\n⚠️ <i>Статистика обрезана (${full.length}/${ALERT_MAX_LENGTH} символов)</i>` : '';
  const short = head.join('\n') + note;
  if (short.length <= ALERT_MAX_LENGTH || !alert.details) return short;

  const skeleton = [...title, detailsBlock('')].join('\n') + DETAILS_CUT_MARK + note;
  const body = clipEscaped(alert.details, ALERT_MAX_LENGTH - skeleton.length);
  return [...title, detailsBlock(body + DETAILS_CUT_MARK)].join('\n') + note;
}

/** Best effort: never throws, returns whether the alert went out. */
export async function sendAlert(
  config: AlertConfig | null,
  alert: Alert,
  gateway: MessagingGateway | null = config ? new TelegramGateway(config.botToken, 10_000) : null
): Promise<boolean> {
  if (!config || !gateway) {
    console.log(`[alerts] Alerts not configured, skipping: ${alert.message}`);
    return false;
  }

  try {
    await gateway.sendMessage(config.chatId, formatAlert(alert), { parseMode: 'HTML', disablePreview: true });
    return true;
  } catch (err) {
    console.error(`[alerts] Failed to send alert: ${errorMessage(err)}`);
    return false;
  }
}
