/**
 * Date helpers for execution records and diagnostics (dayjs based).
 */

import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import timezone from 'dayjs/plugin/timezone.js';

dayjs.extend(utc);
dayjs.extend(timezone);

/** Collector timestamp layout: fixed width, millisecond precision. */
export const LOG_TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss.SSS';

/**
 * Format an epoch-millisecond value for the wire.
 * @param ms epoch milliseconds
 * @param tz IANA zone (e.g. 'UTC', 'Asia/Tokyo'); process local time when omitted
 * @returns e.g. "2025-01-15 14:30:00.007"
 */
export function formatLogTimestamp(ms: number, tz?: string): string {
	const d = tz ? dayjs(ms).tz(tz) : dayjs(ms);
	return d.format(LOG_TIMESTAMP_FORMAT);
}

/** Returns true when dayjs can format in the given IANA zone. */
export function isValidTimeZone(tz: string): boolean {
	try {
		return dayjs().tz(tz).isValid();
	} catch {
		return false;
	}
}

export function nowIso(): string {
	return dayjs().toISOString();
}
