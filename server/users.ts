import type { ServiceContext } from "./context";
import { UserNotFoundError } from "./errors";
import type { User } from "./types";
import type { OnboardingInput } from "./validation";

/**
 * Create a user with an empty log history
 */
export async function onboardUser(ctx: ServiceContext, args: OnboardingInput): Promise<string> {
    const userId = await ctx.store.createUser({
        weight: args.weight,
        height: args.height,
        age: args.age,
        geography: args.geography,
    });
    console.log(`[onboardUser] Created user ${userId}`);
    return userId;
}

export async function getUserProfile(ctx: ServiceContext, args: { userId: string }): Promise<User> {
    const user = await ctx.store.getUser(args.userId);
    if (!user) {
        throw new UserNotFoundError(args.userId);
    }
    return user;
}
