/**
 * Date helpers. Calendar dates travel as YYYY-MM-DD strings (the `date`
 * columns); instants travel as Date objects.
 */

/**
 * Formats a Date object to YYYY-MM-DD format (UTC)
 */
export function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

/**
 * Gets current date in YYYY-MM-DD format - UTC
 */
export function getCurrentDate(): string {
  return formatDate(new Date());
}

/**
 * Validates that a date string is a real calendar day in YYYY-MM-DD format
 */
export function isValidDateFormat(dateString: string): boolean {
  const dateRegex = /^\d{4}-\d{2}-\d{2}$/;
  if (!dateRegex.test(dateString)) return false;

  const date = new Date(dateString);
  return !Number.isNaN(date.getTime()) && formatDate(date) === dateString;
}
