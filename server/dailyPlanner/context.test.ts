import { describe, expect, it } from "vitest";
import type { DailyLog } from "../types";
import { getRecentLogs, RECENT_WINDOW_SIZE, summarizeTrend } from "./context";

const day = (n: number) => new Date(Date.UTC(2026, 0, n, 18));

const log = (n: number, calories: number, activityLevel: number): DailyLog => ({
    logId: `log-${n}`,
    calories,
    activityLevel,
    timestamp: day(n),
});

describe("summarizeTrend", () => {
    it("returns zeros for an empty history", () => {
        expect(summarizeTrend([])).toEqual({ averageCalories: 0, averageActivity: 0 });
    });

    it("averages every log when there are at most seven", () => {
        const logs = [log(1, 2000, 3), log(2, 2200, 4), log(3, 2400, 5)];

        expect(summarizeTrend(logs)).toEqual({ averageCalories: 2200, averageActivity: 4 });
    });

    it("keeps fractional averages", () => {
        const logs = [log(1, 2000, 3), log(2, 2001, 4)];

        expect(summarizeTrend(logs)).toEqual({ averageCalories: 2000.5, averageActivity: 3.5 });
    });

    it("only uses the seven most recent logs of a longer history", () => {
        const logs = Array.from({ length: 9 }, (_, i) => log(i + 1, (i + 1) * 100, i + 1));

        // days 3..9
        expect(summarizeTrend(logs)).toEqual({ averageCalories: 600, averageActivity: 6 });
    });

    it("sorts by timestamp before picking the window", () => {
        const logs = [
            ...Array.from({ length: 7 }, (_, i) => log(i + 2, 1000, 2)),
            // oldest entry stored last
            log(1, 9000, 9),
        ];

        expect(summarizeTrend(logs)).toEqual({ averageCalories: 1000, averageActivity: 2 });
    });
});

describe("getRecentLogs", () => {
    it("returns the window oldest first without touching the input", () => {
        const logs = [log(3, 1, 1), log(1, 1, 1), log(2, 1, 1)];

        expect(getRecentLogs(logs, 2).map((l) => l.logId)).toEqual(["log-2", "log-3"]);
        expect(logs.map((l) => l.logId)).toEqual(["log-3", "log-1", "log-2"]);
    });

    it("defaults to a seven entry window", () => {
        const logs = Array.from({ length: 10 }, (_, i) => log(i + 1, 1, 1));

        expect(getRecentLogs(logs)).toHaveLength(RECENT_WINDOW_SIZE);
        expect(getRecentLogs(logs)[0].logId).toBe("log-4");
    });
});
