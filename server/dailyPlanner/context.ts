/**
 * Context gathering for the daily planner
 *
 * Reduces a user's log history into the trend statistics the prompt needs.
 * Pure code, no AI usage.
 */

import type { DailyLog, TrendSummary } from "../types";

export const RECENT_WINDOW_SIZE = 7;

/**
 * Most recent logs by timestamp, oldest first.
 * Stored order is insertion order and is not trusted to be chronological.
 */
export function getRecentLogs(logs: readonly DailyLog[], windowSize: number = RECENT_WINDOW_SIZE): DailyLog[] {
    const sorted = [...logs].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    return sorted.slice(Math.max(sorted.length - windowSize, 0));
}

/**
 * Average calories and activity level over the recent window
 */
export function summarizeTrend(logs: readonly DailyLog[]): TrendSummary {
    const recent = getRecentLogs(logs);

    if (recent.length === 0) {
        return { averageCalories: 0, averageActivity: 0 };
    }

    const totals = recent.reduce(
        (acc, log) => ({
            calories: acc.calories + log.calories,
            activity: acc.activity + log.activityLevel,
        }),
        { calories: 0, activity: 0 }
    );

    return {
        averageCalories: totals.calories / recent.length,
        averageActivity: totals.activity / recent.length,
    };
}
