import { DateTime } from 'luxon';

export function nowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) throw new Error('Failed to format current time as ISO');
  return iso;
}

/**
 * Local calendar day as yyyyLLdd, e.g. 20261019
 */
export function dayStamp(at: DateTime = DateTime.local()): string {
  if (!at.isValid) throw new Error('Invalid date for day stamp');
  return at.toFormat('yyyyLLdd');
}
