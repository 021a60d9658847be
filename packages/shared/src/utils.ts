const MS_PER_DAY = 86400000;

function parseIsoDate(date: string): number {
    const time = Date.parse(`${date.slice(0, 10)}T00:00:00Z`);
    if (Number.isNaN(time)) throw new RangeError(`Invalid date: ${date}`);
    return time;
}

/**
 * Whole days between two YYYY-MM-DD dates, never less than 1 so a video
 * observed on its publish day still yields a finite rate.
 */
export function elapsedDays(from: string, to: string): number {
    const days = Math.floor((parseIsoDate(to) - parseIsoDate(from)) / MS_PER_DAY);
    return Math.max(1, days);
}

export function viewsPerDay(viewCount: number, publishedAt: string, observedAt: string): number {
    return viewCount / elapsedDays(publishedAt, observedAt);
}

/** Today's date in UTC as YYYY-MM-DD */
export function isoToday(now: Date = new Date()): string {
    return now.toISOString().slice(0, 10);
}

/** "+12" / "-50" / "+0" */
export function formatSigned(value: number, digits = 0): string {
    const fixed = value.toFixed(digits);
    return value < 0 ? fixed : `+${fixed}`;
}

export function formatPercent(value: number): string {
    return `${value.toFixed(0)}%`;
}
