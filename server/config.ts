import { z } from "zod";
import { ConfigurationError } from "./errors";
import { DEFAULT_MODEL_ID, DEFAULT_TEMPERATURE, DEFAULT_TIMEOUT_MS } from "./llm";
import type { RetryPolicy } from "./retry";

const EnvSchema = z.object({
    GEMINI_API_KEY: z.string().trim().min(1),
    GEMINI_MODEL: z.string().min(1).default(DEFAULT_MODEL_ID),
    GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
    GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    GENERATION_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(0),
    GENERATION_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
    MONGO_URI: z.string().min(1).optional(),
    MONGO_USERNAME: z.string().min(1).optional(),
    MONGO_PASSWORD: z.string().min(1).optional(),
    MONGO_HOST: z.string().min(1).optional(),
    MONGO_PORT: z.string().min(1).optional(),
    MONGO_DB_NAME: z.string().min(1).default("fitness_app"),
    MONGO_USE_TRANSACTIONS: z
        .enum(["true", "false"])
        .default("false")
        .transform((value) => value === "true"),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
});

export interface AppConfig {
    port: number;
    mongo: {
        uri: string;
        dbName: string;
        useTransactions: boolean;
    };
    generation: {
        apiKey: string;
        modelId: string;
        temperature: number;
        timeoutMs: number;
        retry: RetryPolicy;
    };
}

const MONGO_PARTS = ["MONGO_USERNAME", "MONGO_PASSWORD", "MONGO_HOST", "MONGO_PORT"] as const;

/**
 * Read and validate configuration from the environment.
 * Throws ConfigurationError naming every missing or invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join(".")))];
        throw new ConfigurationError(`Missing or invalid environment variables: ${keys.join(", ")}`);
    }
    const vars = parsed.data;

    let uri = vars.MONGO_URI;
    if (!uri) {
        const missing = MONGO_PARTS.filter((key) => !vars[key]);
        if (missing.length > 0) {
            throw new ConfigurationError(`Missing MongoDB environment variables: ${missing.join(", ")}`);
        }
        const username = encodeURIComponent(vars.MONGO_USERNAME ?? "");
        const password = encodeURIComponent(vars.MONGO_PASSWORD ?? "");
        uri = `mongodb://${username}:${password}@${vars.MONGO_HOST}:${vars.MONGO_PORT}`;
    }

    return {
        port: vars.PORT,
        mongo: {
            uri,
            dbName: vars.MONGO_DB_NAME,
            useTransactions: vars.MONGO_USE_TRANSACTIONS,
        },
        generation: {
            apiKey: vars.GEMINI_API_KEY,
            modelId: vars.GEMINI_MODEL,
            temperature: vars.GENERATION_TEMPERATURE,
            timeoutMs: vars.GENERATION_TIMEOUT_MS,
            retry: {
                maxRetries: vars.GENERATION_MAX_RETRIES,
                baseDelayMs: vars.GENERATION_RETRY_BASE_DELAY_MS,
            },
        },
    };
}
