/**
 * Calendar-day keys (YYYYMMDD, local time) used to partition file sinks and
 * the daily stats hash.
 */
export function dayKey(date: Date): string {
    const y = date.getFullYear();
    const m = String(date.getMonth() + 1).padStart(2, '0');
    const d = String(date.getDate()).padStart(2, '0');
    return `${y}${m}${d}`;
}
