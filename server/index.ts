import { loadConfig } from "./config";
import { connectDatabase, MongoActivityStore } from "./db";
import { COACH_SYSTEM_PROMPT } from "./dailyPlanner/prompt";
import { createApp } from "./http";
import { createGeminiClient } from "./llm";

async function main() {
    const config = loadConfig();

    const generator = createGeminiClient({
        apiKey: config.generation.apiKey,
        timeoutMs: config.generation.timeoutMs,
        retry: config.generation.retry,
        systemPrompt: COACH_SYSTEM_PROMPT,
    });

    const connection = await connectDatabase(config.mongo);
    const store = new MongoActivityStore(connection, { useTransactions: config.mongo.useTransactions });

    const app = createApp({
        store,
        generator,
        generation: { modelId: config.generation.modelId, temperature: config.generation.temperature },
        now: () => new Date(),
    });

    const server = app.listen(config.port, () => {
        console.log(`[server] Listening on port ${config.port}`);
    });

    const shutdown = (signal: string) => {
        console.log(`[server] ${signal} received, shutting down`);
        server.close(() => {
            connection
                .close()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    console.error("[server] Failed to close database connection:", error);
                    process.exit(1);
                });
        });
    };

    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
    console.error("[server] Failed to start:", error);
    process.exit(1);
});
