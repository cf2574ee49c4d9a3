/**
 * Domain types shared by the store, the daily planner and the HTTP layer.
 * Storage documents are converted into these at the store boundary.
 */

export interface DailyLog {
    logId: string;
    calories: number;
    activityLevel: number;
    timestamp: Date;
}

export interface UserProfile {
    weight: number;
    height: number;
    age: number;
    geography: string;
}

export interface User extends UserProfile {
    id: string;
    dailyLogs: DailyLog[];
}

/**
 * A recommendation produced by the planner that has not been stored yet
 */
export interface RecommendationDraft {
    userId: string;
    task: string;
    dueDate: Date;
    done: boolean;
}

export interface Recommendation extends RecommendationDraft {
    id: string;
    sourceLogId: string;
}

export interface TrendSummary {
    averageCalories: number;
    averageActivity: number;
}

export type MessageRole = "system" | "user";

export type Message = { role: MessageRole; content: string };
