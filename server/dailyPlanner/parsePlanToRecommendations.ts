/**
 * Parse AI output into recommendations
 *
 * The model is asked to answer with pipe-delimited tasks (see prompt.ts).
 * Every task becomes one recommendation due exactly 24 hours after the pipeline ran.
 */

import { ParseAmbiguityError } from "../errors";
import type { RecommendationDraft } from "../types";
import { TASK_DELIMITER } from "./prompt";

export const DUE_OFFSET_MS = 24 * 60 * 60 * 1000;

export function computeDueDate(invokedAt: Date): Date {
    return new Date(invokedAt.getTime() + DUE_OFFSET_MS);
}

/**
 * Split raw model text into trimmed, non-empty tasks
 */
export function splitTasks(rawText: string): string[] {
    return rawText
        .split(TASK_DELIMITER)
        .map((segment) => segment.trim())
        .filter((segment) => segment.length > 0);
}

export function parsePlanToRecommendations(
    rawText: string,
    { userId, invokedAt }: { userId: string; invokedAt: Date }
): RecommendationDraft[] {
    const tasks = splitTasks(rawText);

    if (tasks.length === 0) {
        throw new ParseAmbiguityError(rawText);
    }

    if (!rawText.includes(TASK_DELIMITER)) {
        console.warn("[parsePlanToRecommendations] ParseAmbiguity: reply has no task delimiter, keeping it as a single task", {
            userId,
            length: rawText.length,
        });
    }

    const dueDate = computeDueDate(invokedAt);

    return tasks.map((task) => ({
        userId,
        task,
        dueDate: new Date(dueDate.getTime()),
        done: false,
    }));
}
