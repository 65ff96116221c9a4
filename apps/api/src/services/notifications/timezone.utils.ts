// =====================================================
// Timezone Utilities for Reminder Scheduling
// =====================================================
// "Today" for the sweep is the calendar date in the
// configured timezone, not the server's local date.
//
// Uses Intl.DateTimeFormat; no external deps.
// Functions accept an explicit `date` for deterministic tests.

/**
 * Get the local date string (YYYY-MM-DD) in a given timezone.
 *
 * @param timezone - IANA timezone string
 * @returns Date string in YYYY-MM-DD format (en-CA locale produces this natively)
 */
export function getLocalDate(timezone: string, date: Date): string {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  return formatter.format(date);
}

/**
 * Validate and resolve an IANA timezone string.
 * Returns the original timezone if valid, or the fallback if not,
 * so a bad setting never stops the sweep.
 */
export function resolveTimezone(
  timezone: string | null | undefined,
  fallback: string = 'UTC',
): string {
  if (!timezone) return fallback;
  try {
    Intl.DateTimeFormat(undefined, { timeZone: timezone });
    return timezone;
  } catch {
    return fallback;
  }
}
