import { randomUUID } from "node:crypto";
import type { ServiceContext } from "./context";
import { generateDailyPlan } from "./dailyPlanner/generateDailyPlan";
import type { DailyLog, Recommendation } from "./types";
import type { DailyLogSubmission } from "./validation";

/**
 * Record today's log and the recommendations generated for tomorrow.
 * Both are written only after the whole planner pipeline succeeded.
 */
export async function submitDailyLog(ctx: ServiceContext, args: DailyLogSubmission): Promise<Recommendation[]> {
    const log: DailyLog = {
        logId: randomUUID(),
        calories: args.calories,
        activityLevel: args.activityLevel,
        timestamp: args.timestamp ?? ctx.now(),
    };

    const drafts = await generateDailyPlan(ctx, { userId: args.userId, log });
    const saved = await ctx.store.saveSubmission(args.userId, log, drafts);

    console.log(`[submitDailyLog] Stored log ${log.logId} and ${saved.length} recommendations for user ${args.userId}`);
    return saved;
}
