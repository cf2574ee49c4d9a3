import { Types } from "mongoose";
import { describe, expect, it } from "vitest";
import { legacyLogId, toRecommendation, toUser } from "./schema";

const userId = "65f0a1b2c3d4e5f601234567";

describe("toUser", () => {
    it("defaults missing geography and log history", () => {
        expect(toUser(userId, { weight: 70, height: 175, age: 30 })).toEqual({
            id: userId,
            weight: 70,
            height: 175,
            age: 30,
            geography: "",
            dailyLogs: [],
        });
    });

    it("maps stored logs and derives ids for logs written without one", () => {
        const user = toUser(userId, {
            weight: 70,
            height: 175,
            age: 30,
            geography: "Oslo",
            daily_logs: [
                { calories: 2000, activity_level: 3, date: new Date("2026-02-27T20:00:00.000Z") },
                { logId: "abc", calories: 2500, activity_level: 5, date: "2026-02-28T20:00:00.000Z" },
            ],
        });

        expect(user.dailyLogs).toEqual([
            {
                logId: legacyLogId(userId, 0),
                calories: 2000,
                activityLevel: 3,
                timestamp: new Date("2026-02-27T20:00:00.000Z"),
            },
            { logId: "abc", calories: 2500, activityLevel: 5, timestamp: new Date("2026-02-28T20:00:00.000Z") },
        ]);
    });

    it("rejects documents without the required profile fields", () => {
        expect(() => toUser(userId, { height: 175, age: 30 })).toThrow();
    });
});

describe("toRecommendation", () => {
    it("converts ObjectIds to hex strings and defaults the done flag", () => {
        const id = new Types.ObjectId("65f0a1b2c3d4e5f60123ffff");

        expect(
            toRecommendation({
                _id: id,
                user_id: new Types.ObjectId(userId),
                task: "Jog 20 min",
                due_date: new Date("2026-03-02T08:00:00.000Z"),
                source_log_id: "log-1",
            })
        ).toEqual({
            id: "65f0a1b2c3d4e5f60123ffff",
            userId,
            task: "Jog 20 min",
            dueDate: new Date("2026-03-02T08:00:00.000Z"),
            done: false,
            sourceLogId: "log-1",
        });
    });
});
