import express, { type NextFunction, type Request, type Response } from "express";
import type { ServiceContext } from "./context";
import { submitDailyLog } from "./dailyLogs";
import {
    AppError,
    GenerationFailedError,
    InvalidRequestError,
    ParseAmbiguityError,
    UserNotFoundError,
} from "./errors";
import { listRecommendations } from "./recommendations";
import { getUserProfile, onboardUser } from "./users";
import { DailyLogSubmissionSchema, OnboardingSchema, parseBody } from "./validation";

type Handler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware
const route = (handler: Handler) => (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
};

function requireValidId(ctx: ServiceContext, id: string | undefined): string {
    if (!id || !ctx.store.isValidId(id)) {
        throw new InvalidRequestError("Invalid user ID");
    }
    return id;
}

/**
 * Client errors raised by express.json() (too large, bad charset, ...) carry their own status
 */
function bodyParserStatus(error: unknown): number | undefined {
    if (
        typeof error === "object" &&
        error !== null &&
        "type" in error &&
        "status" in error &&
        typeof error.type === "string" &&
        typeof error.status === "number" &&
        error.status >= 400 &&
        error.status < 500
    ) {
        return error.status;
    }
    return undefined;
}

const BODY_ERROR_MESSAGES: Record<number, string> = {
    413: "Request body too large",
    415: "Unsupported request body encoding",
};

function statusFor(error: unknown): number {
    if (error instanceof InvalidRequestError) return 400;
    if (error instanceof UserNotFoundError) return 404;
    if (error instanceof GenerationFailedError || error instanceof ParseAmbiguityError) return 502;
    return 500;
}

export function createApp(ctx: ServiceContext) {
    const app = express();
    app.use(express.json());

    app.post(
        "/api/onboarding",
        route(async (req, res) => {
            const profile = parseBody(OnboardingSchema, req.body);
            const userId = await onboardUser(ctx, profile);
            res.json({ message: "User onboarded successfully", userId });
        })
    );

    app.post(
        "/api/log",
        route(async (req, res) => {
            const submission = parseBody(DailyLogSubmissionSchema, req.body);
            requireValidId(ctx, submission.userId);

            const recommendations = await submitDailyLog(ctx, submission);
            res.json({
                message: "Daily log recorded",
                recommendations: recommendations.map((rec) => ({
                    id: rec.id,
                    task: rec.task,
                    dueDate: rec.dueDate.toISOString(),
                })),
            });
        })
    );

    app.get(
        "/api/recommendations/:userId",
        route(async (req, res) => {
            const userId = requireValidId(ctx, req.params.userId);
            const recommendations = await listRecommendations(ctx, { userId });
            res.json({
                recommendations: recommendations.map((rec) => ({
                    task: rec.task,
                    dueDate: rec.dueDate.toISOString(),
                })),
            });
        })
    );

    app.get(
        "/api/profile/:userId",
        route(async (req, res) => {
            const userId = requireValidId(ctx, req.params.userId);
            const user = await getUserProfile(ctx, { userId });
            res.json({
                user: {
                    id: user.id,
                    weight: user.weight,
                    height: user.height,
                    age: user.age,
                    geography: user.geography,
                    dailyLogs: user.dailyLogs.map((log) => ({
                        calories: log.calories,
                        activityLevel: log.activityLevel,
                        date: log.timestamp.toISOString(),
                    })),
                },
            });
        })
    );

    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        // Malformed JSON from express.json()
        if (error instanceof SyntaxError) {
            res.status(400).json({ error: "Malformed JSON body" });
            return;
        }

        const bodyStatus = bodyParserStatus(error);
        if (bodyStatus !== undefined) {
            res.status(bodyStatus).json({ error: BODY_ERROR_MESSAGES[bodyStatus] ?? "Invalid request body" });
            return;
        }

        const status = statusFor(error);
        if (status >= 500) {
            console.error(`[http] ${req.method} ${req.path} failed:`, error);
        }

        if (status === 500 || !(error instanceof AppError)) {
            res.status(500).json({ error: "Internal server error" });
            return;
        }

        res.status(status).json({
            error: error.message,
            ...(error instanceof InvalidRequestError && error.details.length > 0 ? { details: error.details } : {}),
        });
    });

    return app;
}
