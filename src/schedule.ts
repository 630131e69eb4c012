export const MSK_OFFSET_HOURS = 3;
export const WINDOW_MINUTES = 10;

const MINUTES_PER_DAY = 24 * 60;

export interface ScheduleOptions {
  postTimes: string[];
  /** Set under CI / scheduled workflows, where the trigger already encodes the time. */
  automation?: boolean;
  offsetHours?: number;
  windowMinutes?: number;
}

export function parseClock(value: string): number | null {
  const match = value.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

/** Minute of the day at the given UTC offset. */
export function minuteOfDay(now: Date, offsetHours: number): number {
  const utcMinutes = now.getUTCHours() * 60 + now.getUTCMinutes();
  return (((utcMinutes + offsetHours * 60) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
}

export function shouldPublishNow(now: Date, options: ScheduleOptions): boolean {
  if (options.automation) return true;

  const current = minuteOfDay(now, options.offsetHours ?? MSK_OFFSET_HOURS);
  const window = options.windowMinutes ?? WINDOW_MINUTES;

  return options.postTimes.some((entry) => {
    const scheduled = parseClock(entry);
    if (scheduled === null) return false;
    const diff = Math.abs(current - scheduled);
    return Math.min(diff, MINUTES_PER_DAY - diff) <= window;
  });
}
