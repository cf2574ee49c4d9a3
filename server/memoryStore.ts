import { UserNotFoundError } from "./errors";
import { insertThenAppend, type ActivityStore } from "./store";
import type { DailyLog, Recommendation, RecommendationDraft, User, UserProfile } from "./types";

/**
 * In-process ActivityStore used by tests. Ids look like Mongo ObjectIds so
 * the HTTP id checks behave the same way.
 */
export class MemoryActivityStore implements ActivityStore {
    readonly users = new Map<string, User>();
    readonly recommendations: Recommendation[] = [];
    private nextId = 1;

    private newId(): string {
        return (this.nextId++).toString(16).padStart(24, "0");
    }

    isValidId(id: string): boolean {
        return /^[0-9a-fA-F]{24}$/.test(id);
    }

    async createUser(profile: UserProfile): Promise<string> {
        const id = this.newId();
        this.users.set(id, { ...profile, id, dailyLogs: [] });
        return id;
    }

    async getUser(userId: string): Promise<User | null> {
        const user = this.users.get(userId);
        return user ? structuredClone(user) : null;
    }

    async saveSubmission(userId: string, log: DailyLog, drafts: RecommendationDraft[]): Promise<Recommendation[]> {
        return insertThenAppend({
            logId: log.logId,
            insert: async () => {
                const saved = drafts.map((draft) => ({ ...draft, id: this.newId(), sourceLogId: log.logId }));
                this.recommendations.push(...saved);
                return saved;
            },
            append: () => this.appendLog(userId, log),
            compensate: async () => {
                const kept = this.recommendations.filter((rec) => rec.sourceLogId !== log.logId);
                this.recommendations.splice(0, this.recommendations.length, ...kept);
            },
        });
    }

    protected async appendLog(userId: string, log: DailyLog): Promise<void> {
        const user = this.users.get(userId);
        if (!user) {
            throw new UserNotFoundError(userId);
        }
        if (!user.dailyLogs.some((existing) => existing.logId === log.logId)) {
            user.dailyLogs.push({ ...log });
        }
    }

    async listRecommendations(userId: string): Promise<Recommendation[]> {
        return this.recommendations.filter((rec) => rec.userId === userId);
    }
}
