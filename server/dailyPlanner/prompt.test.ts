import { describe, expect, it } from "vitest";
import type { DailyLog, User } from "../types";
import { composeNextDayPrompt, OUTPUT_FORMAT_INSTRUCTION } from "./prompt";

const user: User = {
    id: "000000000000000000000001",
    weight: 72.5,
    height: 178,
    age: 31,
    geography: "Oslo",
    dailyLogs: [],
};

const today: DailyLog = {
    logId: "log-today",
    calories: 1800,
    activityLevel: 4,
    timestamp: new Date("2026-03-01T20:00:00.000Z"),
};

describe("composeNextDayPrompt", () => {
    it("includes the profile and today's activity", () => {
        const prompt = composeNextDayPrompt(user, today, { averageCalories: 0, averageActivity: 0 });

        expect(prompt).toContain("- Age: 31\n- Weight: 72.5\n- Height: 178\n- Location: Oslo");
        expect(prompt).toContain("- Calories: 1800\n- Activity Level: 4");
    });

    it("renders an empty trend as whole calories and one decimal of activity", () => {
        const prompt = composeNextDayPrompt(user, today, { averageCalories: 0, averageActivity: 0 });

        expect(prompt).toContain("Average Calories: 0\n");
        expect(prompt).toContain("Average Activity Level: 0.0\n");
    });

    it("rounds the averages", () => {
        const prompt = composeNextDayPrompt(user, today, { averageCalories: 2150.6, averageActivity: 3.46 });

        expect(prompt).toContain("Average Calories: 2151\n");
        expect(prompt).toContain("Average Activity Level: 3.5\n");
    });

    it("asks for pipe-delimited tasks with the exercise and nutrition rules", () => {
        const prompt = composeNextDayPrompt(user, today, { averageCalories: 2000, averageActivity: 3 });

        expect(prompt).toContain(OUTPUT_FORMAT_INSTRUCTION);
        expect(prompt).toContain("Generate 3-4 specific, actionable tasks for tomorrow.");
        expect(prompt).toContain("- Include at least one exercise task");
        expect(prompt).toContain("- Include at least one nutrition task");
        expect(prompt).toContain("- Every task must be achievable within 24 hours");
    });

    it("is deterministic", () => {
        const trend = { averageCalories: 1999.5, averageActivity: 2.25 };

        expect(composeNextDayPrompt(user, today, trend)).toBe(composeNextDayPrompt(user, today, trend));
    });
});
