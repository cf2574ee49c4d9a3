import type { ServiceContext } from "./context";
import type { Recommendation } from "./types";

/**
 * All stored recommendations for a user, in insertion order
 */
export async function listRecommendations(ctx: ServiceContext, args: { userId: string }): Promise<Recommendation[]> {
    return await ctx.store.listRecommendations(args.userId);
}
