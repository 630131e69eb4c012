import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ALERT_MAX_LENGTH, formatAlert, formatStats, formatTimestamp, sendAlert } from '../src/alerts.js';
import { RecordingGateway } from './fixtures.js';

const at = new Date('2026-03-10T06:05:09.000Z');

describe('formatTimestamp', () => {
  it('prints Moscow time', () => {
    expect(formatTimestamp(at)).toBe('10.03.2026 09:05:09');
  });
});

describe('formatStats', () => {
  it('lists one stat per line with grouped numbers', () => {
    expect(formatStats({ msk: 10, total: 1500, mode: 'cron' })).toBe('  • msk: 10\n  • total: 1 500\n  • mode: cron');
  });
});

describe('formatAlert', () => {
  it('builds header, timestamp, message, details and stats', () => {
    const text = formatAlert(
      { message: 'Публикация завершена', type: 'success', context: 'publisher', details: 'spb: <timeout>', stats: { msk: 10 } },
      at
    );

    expect(text).toBe(
      '<b>📢 Courier Jobs</b>\n' +
        '<i>🕐 10.03.2026 09:05:09</i>\n' +
        '\n✅ <b>Публикация завершена</b>\n' +
        '\n📝 <b>Детали:</b>\nspb: &lt;timeout&gt;\n' +
        '\n📊 <b>Статистика:</b>\n  • msk: 10'
    );
  });

  it('drops the stats block when the alert is too long', () => {
    const stats: Record<string, number> = {};
    for (let i = 0; i < 400; i++) stats[`city_${i}`] = i;

    const text = formatAlert({ message: 'Done', stats }, at);

    expect(text.length).toBeLessThanOrEqual(ALERT_MAX_LENGTH);
    expect(text).not.toContain('Статистика:');
    expect(text.startsWith('<b>Courier Jobs</b>\n<i>🕐 10.03.2026 09:05:09</i>\n\nℹ️ <b>Done</b>\n\n⚠️ <i>Статистика обрезана (')).toBe(
      true
    );
  });

  it('cuts long details to fit without splitting an entity', () => {
    const text = formatAlert({ message: 'Done', details: 'x<y\n'.repeat(1500) }, at);

    expect(text.length).toBeLessThanOrEqual(ALERT_MAX_LENGTH);
    expect(text.length).toBeGreaterThan(ALERT_MAX_LENGTH - 5);
    expect(text.startsWith('<b>Courier Jobs</b>\n<i>🕐 10.03.2026 09:05:09</i>\n\nℹ️ <b>Done</b>\n\n📝 <b>Детали:</b>\nx&lt;y\nx&lt;y\n')).toBe(true);
    expect(text.endsWith('\n…')).toBe(true);
    expect(text.slice(0, -2)).not.toMatch(/&[a-z]*$/);
  });

  it('drops the stats and cuts the details when both are long', () => {
    const stats: Record<string, number> = {};
    for (let i = 0; i < 400; i++) stats[`city_${i}`] = i;

    const text = formatAlert({ message: 'Done', details: 'spb: timeout\n'.repeat(400), stats }, at);

    expect(text.length).toBeLessThanOrEqual(ALERT_MAX_LENGTH);
    expect(text).not.toContain('Статистика:');
    expect(text).toMatch(/\n…\n\n⚠️ <i>Статистика обрезана \(\d+\/4000 символов\)<\/i>$/);
  });
});

describe('sendAlert', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('skips when alerts are not configured', async () => {
    expect(await sendAlert(null, { message: 'Done' })).toBe(false);
  });

  it('sends to the admin chat', async () => {
    const gateway = new RecordingGateway();

    const sent = await sendAlert({ botToken: 'test-secret', chatId: '12345' }, { message: 'Done' }, gateway);

    expect(sent).toBe(true);
    expect(gateway.sent[0]?.chatId).toBe('12345');
    expect(gateway.sent[0]?.options).toEqual({ parseMode: 'HTML', disablePreview: true });
  });

  it('reports a delivery failure without throwing', async () => {
    const gateway = new RecordingGateway(new Set(['12345']));

    expect(await sendAlert({ botToken: 'test-secret', chatId: '12345' }, { message: 'Done' }, gateway)).toBe(false);
  });
});
