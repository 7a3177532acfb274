import { DateTime } from 'luxon';

export const SEOUL_ZONE = 'Asia/Seoul';

export function seoulTime(now: Date): DateTime {
  return DateTime.fromJSDate(now).setZone(SEOUL_ZONE);
}

export function seoulHour(now: Date): number {
  return seoulTime(now).hour;
}

/** yyyyMMdd in Asia/Seoul, optionally shifted by whole days. */
export function seoulDateString(now: Date, dayOffset = 0): string {
  return seoulTime(now).plus({ days: dayOffset }).toFormat('yyyyMMdd');
}

/** yyyy-MM-dd in Asia/Seoul. */
export function seoulIsoDate(now: Date): string {
  return seoulTime(now).toFormat('yyyy-MM-dd');
}

/** "yyyy-MM-dd HH:00" in Asia/Seoul, shifted by whole hours. */
export function seoulHourLabel(now: Date, hourOffset = 0): string {
  return seoulTime(now).plus({ hours: hourOffset }).toFormat("yyyy-MM-dd HH':00'");
}

/** ISO timestamp for a provider's "yyyyMMddHHmmss" Seoul local time, or null when unparseable. */
export function seoulTimestampToIso(value: string | undefined): string | null {
  if (!value) {
    return null;
  }
  const time = DateTime.fromFormat(value, 'yyyyMMddHHmmss', { zone: SEOUL_ZONE });
  return time.isValid ? time.toISO() : null;
}
