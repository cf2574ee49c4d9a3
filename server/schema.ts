/**
 * Document shapes for the users and recommendations collections, and the
 * conversion from stored documents into domain values.
 *
 * Field names match the documents already in the fitness_app database.
 */

import { Schema, Types } from "mongoose";
import { z } from "zod";
import type { Recommendation, User } from "./types";

export interface DailyLogDocument {
    logId?: string;
    calories: number;
    activity_level: number;
    date: Date;
}

export interface UserDocument {
    weight: number;
    height: number;
    age: number;
    geography: string;
    daily_logs: DailyLogDocument[];
}

export interface RecommendationDocument {
    user_id: Types.ObjectId;
    task: string;
    due_date: Date;
    is_done: boolean;
    source_log_id: string;
}

export const DailyLogSchema = new Schema<DailyLogDocument>(
    {
        logId: { type: String },
        calories: { type: Number, required: true },
        activity_level: { type: Number, required: true },
        date: { type: Date, default: () => new Date() },
    },
    { _id: false }
);

export const UserSchema = new Schema<UserDocument>(
    {
        weight: { type: Number, required: true },
        height: { type: Number, required: true },
        age: { type: Number, required: true },
        geography: { type: String, default: "" },
        daily_logs: { type: [DailyLogSchema], default: [] },
    },
    { collection: "users", versionKey: false }
);

export const RecommendationSchema = new Schema<RecommendationDocument>(
    {
        user_id: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
        task: { type: String, required: true },
        due_date: { type: Date, required: true },
        is_done: { type: Boolean, default: false },
        source_log_id: { type: String, required: true, index: true },
    },
    { collection: "recommendations", versionKey: false }
);

const ObjectIdString = z.union([
    z.string(),
    z.instanceof(Types.ObjectId).transform((id) => id.toHexString()),
]);

const StoredDailyLogSchema = z.object({
    logId: z.string().optional(),
    calories: z.number(),
    activity_level: z.number(),
    date: z.coerce.date(),
});

const StoredUserSchema = z.object({
    weight: z.number(),
    height: z.number(),
    age: z.number(),
    geography: z.string().default(""),
    daily_logs: z.array(StoredDailyLogSchema).default([]),
});

const StoredRecommendationSchema = z.object({
    _id: ObjectIdString,
    user_id: ObjectIdString,
    task: z.string(),
    due_date: z.coerce.date(),
    is_done: z.boolean().default(false),
    source_log_id: z.string().default(""),
});

/**
 * Logs written before log ids existed get one derived from their position,
 * which is stable because the history is append-only.
 */
export function legacyLogId(userId: string, index: number): string {
    return `${userId}-log-${index}`;
}

export function toUser(userId: string, raw: unknown): User {
    const doc = StoredUserSchema.parse(raw);
    return {
        id: userId,
        weight: doc.weight,
        height: doc.height,
        age: doc.age,
        geography: doc.geography,
        dailyLogs: doc.daily_logs.map((log, index) => ({
            logId: log.logId ?? legacyLogId(userId, index),
            calories: log.calories,
            activityLevel: log.activity_level,
            timestamp: log.date,
        })),
    };
}

export function toRecommendation(raw: unknown): Recommendation {
    const doc = StoredRecommendationSchema.parse(raw);
    return {
        id: doc._id,
        userId: doc.user_id,
        task: doc.task,
        dueDate: doc.due_date,
        done: doc.is_done,
        sourceLogId: doc.source_log_id,
    };
}
