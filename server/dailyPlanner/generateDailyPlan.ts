/**
 * Daily plan generation using AI
 *
 * Runs Fetch -> Summarize -> Compose & Generate -> Parse for one submitted log.
 * Nothing is persisted here; submitDailyLog stores the result.
 */

import type { ServiceContext } from "../context";
import { GenerationFailedError, UserNotFoundError } from "../errors";
import type { DailyLog, RecommendationDraft } from "../types";
import { summarizeTrend } from "./context";
import { parsePlanToRecommendations } from "./parsePlanToRecommendations";
import { composeNextDayPrompt } from "./prompt";

export async function generateDailyPlan(
    ctx: ServiceContext,
    args: { userId: string; log: DailyLog }
): Promise<RecommendationDraft[]> {
    const invokedAt = ctx.now();

    const user = await ctx.store.getUser(args.userId);
    if (!user) {
        throw new UserNotFoundError(args.userId);
    }

    const trend = summarizeTrend(user.dailyLogs);
    const prompt = composeNextDayPrompt(user, args.log, trend);

    let reply: string;
    try {
        reply = await ctx.generator.generate(prompt, ctx.generation);
    } catch (error) {
        console.error(`[generateDailyPlan] Generation failed for user ${user.id}:`, error);
        throw new GenerationFailedError(error);
    }

    return parsePlanToRecommendations(reply, { userId: user.id, invokedAt });
}
