/**
 * Request validation
 *
 * zod schemas for every request body the HTTP layer accepts.
 */

import { z } from "zod";
import { InvalidRequestError } from "./errors";

export const OnboardingSchema = z.object({
    weight: z.number(),
    height: z.number(),
    age: z.number().int(),
    geography: z.string(),
});

export const DailyLogSubmissionSchema = z.object({
    userId: z.string(),
    calories: z.number().int(),
    activityLevel: z.number().int(),
    // ISO-8601 string or epoch milliseconds; null or absent means "now"
    timestamp: z
        .union([z.string().datetime({ offset: true }), z.number()])
        .pipe(z.coerce.date())
        .nullish(),
});

export type OnboardingInput = z.infer<typeof OnboardingSchema>;
export type DailyLogSubmission = z.infer<typeof DailyLogSubmissionSchema>;

/**
 * Parse a request body or throw InvalidRequestError listing every issue
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
    const result = schema.safeParse(body);
    if (!result.success) {
        throw new InvalidRequestError(
            "Invalid request body",
            result.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
        );
    }
    return result.data;
}
