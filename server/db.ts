import mongoose, { Types, type ClientSession, type Connection, type Model } from "mongoose";
import { UserNotFoundError } from "./errors";
import {
    RecommendationSchema,
    UserSchema,
    toRecommendation,
    toUser,
    type RecommendationDocument,
    type UserDocument,
} from "./schema";
import { insertThenAppend, type ActivityStore } from "./store";
import type { DailyLog, Recommendation, RecommendationDraft, User, UserProfile } from "./types";

export async function connectDatabase({ uri, dbName }: { uri: string; dbName: string }): Promise<Connection> {
    const connection = await mongoose.createConnection(uri, { dbName }).asPromise();
    console.log(`[connectDatabase] Connected to database ${dbName}`);
    return connection;
}

/**
 * ActivityStore on MongoDB.
 *
 * With useTransactions the recommendation insert and the log append commit
 * together (needs a replica set). Without it the log append is idempotent and
 * a failed append deletes the recommendations inserted just before it.
 */
export class MongoActivityStore implements ActivityStore {
    private readonly users: Model<UserDocument>;
    private readonly recommendations: Model<RecommendationDocument>;

    constructor(
        private readonly connection: Connection,
        private readonly options: { useTransactions: boolean } = { useTransactions: false }
    ) {
        this.users = connection.model<UserDocument>("User", UserSchema);
        this.recommendations = connection.model<RecommendationDocument>("Recommendation", RecommendationSchema);
    }

    isValidId(id: string): boolean {
        return mongoose.isObjectIdOrHexString(id);
    }

    async createUser(profile: UserProfile): Promise<string> {
        const doc = await this.users.create({ ...profile, daily_logs: [] });
        return doc._id.toHexString();
    }

    async getUser(userId: string): Promise<User | null> {
        if (!this.isValidId(userId)) {
            return null;
        }
        const raw = await this.users.findById(userId).lean();
        return raw ? toUser(userId, raw) : null;
    }

    async saveSubmission(userId: string, log: DailyLog, drafts: RecommendationDraft[]): Promise<Recommendation[]> {
        const docs = drafts.map((draft) => ({
            _id: new Types.ObjectId(),
            user_id: new Types.ObjectId(userId),
            task: draft.task,
            due_date: draft.dueDate,
            is_done: draft.done,
            source_log_id: log.logId,
        }));

        if (this.options.useTransactions) {
            await this.connection.transaction(async (session) => {
                await this.recommendations.insertMany(docs, { session });
                await this.appendLog(userId, log, session);
            });
        } else {
            await insertThenAppend({
                logId: log.logId,
                insert: async () => {
                    await this.recommendations.insertMany(docs);
                },
                append: () => this.appendLog(userId, log),
                compensate: async () => {
                    await this.recommendations.deleteMany({ source_log_id: log.logId });
                },
            });
        }

        return docs.map((doc) => toRecommendation(doc));
    }

    async listRecommendations(userId: string): Promise<Recommendation[]> {
        if (!this.isValidId(userId)) {
            return [];
        }
        const docs = await this.recommendations
            .find({ user_id: new Types.ObjectId(userId) })
            .sort({ _id: 1 })
            .lean();
        return docs.map((doc) => toRecommendation(doc));
    }

    private async appendLog(userId: string, log: DailyLog, session?: ClientSession): Promise<void> {
        const _id = new Types.ObjectId(userId);
        const result = await this.users.updateOne(
            { _id, "daily_logs.logId": { $ne: log.logId } },
            {
                $push: {
                    daily_logs: {
                        logId: log.logId,
                        calories: log.calories,
                        activity_level: log.activityLevel,
                        date: log.timestamp,
                    },
                },
            },
            { session }
        );

        if (result.matchedCount === 0) {
            // Either the user is gone or this log was already appended
            const exists = await this.users.exists({ _id }).session(session ?? null);
            if (!exists) {
                throw new UserNotFoundError(userId);
            }
        }
    }
}
