import type { DailyLog, Recommendation, RecommendationDraft, User, UserProfile } from "./types";

/**
 * Persistence used by the services. MongoActivityStore in production,
 * MemoryActivityStore in tests.
 */
export interface ActivityStore {
    /** Whether the string has the shape of an id this store hands out */
    isValidId(id: string): boolean;

    createUser(profile: UserProfile): Promise<string>;

    getUser(userId: string): Promise<User | null>;

    /**
     * Store the recommendations produced for a submission and append its log.
     * Appending the same logId twice is a no-op. If the append fails, no
     * recommendations from this call are left behind.
     */
    saveSubmission(userId: string, log: DailyLog, drafts: RecommendationDraft[]): Promise<Recommendation[]>;

    listRecommendations(userId: string): Promise<Recommendation[]>;
}

/**
 * Run insert then append; if either throws, undo the insert and rethrow the
 * original error. A failing undo is logged, the original error still wins.
 */
export async function insertThenAppend<T>({
    logId,
    insert,
    append,
    compensate,
}: {
    logId: string;
    insert: () => Promise<T>;
    append: () => Promise<void>;
    compensate: () => Promise<unknown>;
}): Promise<T> {
    try {
        const inserted = await insert();
        await append();
        return inserted;
    } catch (error) {
        console.error(`[saveSubmission] Storing log ${logId} failed, removing its recommendations:`, error);
        try {
            await compensate();
        } catch (cleanupError) {
            console.error(`[saveSubmission] Could not remove recommendations for log ${logId}:`, cleanupError);
        }
        throw error;
    }
}
