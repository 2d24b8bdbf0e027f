import { Timeframe } from '../types';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Local calendar day, e.g. `2024-03-07`. */
export function dayKey(date: Date): string {
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${date.getFullYear()}-${month}-${day}`;
}

export function windowStart(timeframe: Timeframe, now: Date): Date {
    switch (timeframe) {
        case 'daily':
            return new Date(now.getFullYear(), now.getMonth(), now.getDate());
        case 'weekly':
            return new Date(now.getTime() - 7 * DAY_MS);
        case 'monthly':
            return new Date(now.getTime() - 30 * DAY_MS);
    }
}

/** The last `count` local days ending with today, oldest first. */
export function recentDays(count: number, now: Date): string[] {
    const days: string[] = [];
    for (let back = count - 1; back >= 0; back--) {
        days.push(dayKey(new Date(now.getFullYear(), now.getMonth(), now.getDate() - back)));
    }
    return days;
}
