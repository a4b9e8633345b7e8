import { DateTime } from 'luxon';

export function isValidTimeZone(tz: string): boolean {
  if (!tz.trim()) return false;
  return DateTime.now().setZone(tz).isValid;
}

export function systemTimeZone(): string {
  return DateTime.local().zoneName ?? 'UTC';
}

export function formatTimestamp(dt: DateTime, tz: string): string {
  return dt.setZone(tz).toFormat('yyyy-MM-dd HH:mm ZZZZ');
}
