/**
 * Date/time formatting for the status card, log viewer and migration timeline
 */

export function isValidDate(date: Date | null | undefined): date is Date {
  return date instanceof Date && !isNaN(date.getTime());
}

/**
 * Format a timestamp (Date or string) to ISO-like format without timezone
 * Output: "YYYY-MM-DD HH:mm:ss.mmm" (UTC)
 */
export function formatTimestamp(date: Date | string | undefined): string {
  if (!date) return 'Unknown time';
  const d = new Date(date);
  if (isNaN(d.getTime())) return typeof date === 'string' ? date : 'Unknown time';
  return d.toISOString().replace('T', ' ').replace('Z', '');
}

/**
 * Get relative time string (e.g., "2 hours ago", "5 minutes ago") as seen at `now`
 */
export function getRelativeTime(date: Date | string, now: Date): string {
  const d = new Date(date);
  if (isNaN(d.getTime())) return '';

  const diffMs = now.getTime() - d.getTime();
  const diffSeconds = Math.floor(diffMs / 1000);
  const diffMinutes = Math.floor(diffSeconds / 60);
  const diffHours = Math.floor(diffMinutes / 60);
  const diffDays = Math.floor(diffHours / 24);

  if (diffDays > 0) {
    return `${diffDays} day${diffDays !== 1 ? 's' : ''} ago`;
  }
  if (diffHours > 0) {
    return `${diffHours} hour${diffHours !== 1 ? 's' : ''} ago`;
  }
  if (diffMinutes > 0) {
    return `${diffMinutes} minute${diffMinutes !== 1 ? 's' : ''} ago`;
  }
  if (diffSeconds > 0) {
    return `${diffSeconds} second${diffSeconds !== 1 ? 's' : ''} ago`;
  }
  return 'just now';
}

/**
 * Countdown text: "1h 2m 3s", "2m 3s" or "3s"
 */
export function formatCountdown(totalSeconds: number): string {
  const s = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(s / 3600);
  const minutes = Math.floor((s % 3600) / 60);
  const seconds = s % 60;

  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

/**
 * Task duration between two dates; "Running..." while the task has no end
 */
export function formatDuration(start: Date, end: Date | undefined): string {
  if (!end) return 'Running...';
  return formatCountdown((end.getTime() - start.getTime()) / 1000);
}
