import { GoogleGenerativeAI } from "@google/generative-ai";
import { ConfigurationError } from "./errors";
import { NO_RETRY, withRetry, type RetryPolicy } from "./retry";
import type { Message } from "./types";

export const DEFAULT_MODEL_ID = "gemini-2.0-flash-001";
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_TIMEOUT_MS = 30 * 1000;

export interface GenerationOptions {
    modelId: string;
    temperature: number;
}

/**
 * Opaque text completion. Rejects on any failure; callers decide how to wrap it.
 */
export interface GenerationClient {
    generate(prompt: string, options: GenerationOptions): Promise<string>;
}

export interface GeminiClientConfig {
    apiKey: string;
    timeoutMs?: number;
    retry?: RetryPolicy;
    /** Prepended to every prompt as a system message */
    systemPrompt?: string;
}

/**
 * Flatten role-tagged messages into one prompt string, system messages first
 */
export function buildPrompt(messages: Message[]): string {
    const systemMessages = messages
        .filter((msg) => msg.role === "system")
        .map((msg) => msg.content);

    const userMessages = messages
        .filter((msg) => msg.role === "user")
        .map((msg) => msg.content);

    let prompt = userMessages.join("\n\n");

    if (systemMessages.length > 0) {
        prompt = `${systemMessages.join("\n\n")}\n\n${prompt}`;
    }

    return prompt;
}

/**
 * Generation client backed by Gemini.
 * Throws ConfigurationError right away when no API key is given.
 */
export function createGeminiClient({
    apiKey,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    retry = NO_RETRY,
    systemPrompt,
}: GeminiClientConfig): GenerationClient {
    if (!apiKey.trim()) {
        throw new ConfigurationError("GEMINI_API_KEY is not set");
    }

    const genAI = new GoogleGenerativeAI(apiKey);

    async function generateText({
        messages,
        modelId,
        temperature,
    }: GenerationOptions & { messages: Message[] }): Promise<string> {
        const model = genAI.getGenerativeModel(
            {
                model: modelId,
                generationConfig: {
                    temperature,
                    responseMimeType: "text/plain",
                },
            },
            { timeout: timeoutMs }
        );

        const result = await model.generateContent(buildPrompt(messages));
        return result.response.text();
    }

    return {
        generate: (prompt, options) => {
            const messages: Message[] = systemPrompt
                ? [
                      { role: "system", content: systemPrompt },
                      { role: "user", content: prompt },
                  ]
                : [{ role: "user", content: prompt }];

            return withRetry(() => generateText({ messages, ...options }), retry, { label: "generateText" });
        },
    };
}
