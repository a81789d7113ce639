/**
 * Study Forge — Configuration
 *
 * Validates environment-style input with zod. Core classes receive the result
 * through their constructors and never read `process.env` directly.
 */

import * as dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";

const DEFAULT_MODEL = "gpt-4o-mini";

/** 50 MB in bytes */
const DEFAULT_MAX_DOCUMENT_BYTES = 50 * 1024 * 1024;

const booleanString = z
    .enum(["true", "false", "1", "0"])
    .transform((value) => value === "true" || value === "1");

const apiKey = z
    .string()
    .trim()
    .min(1)
    .refine((key) => !key.includes("your_openai_api_key_here") && !key.startsWith("your_"), {
        message: "is still a placeholder",
    });

const EnvSchema = z.object({
    OPENAI_API_KEY: apiKey.optional(),
    OPENAI_MODEL: z.string().min(1).default(DEFAULT_MODEL),
    OPENAI_BASE_URL: z.string().url().optional(),
    OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    MAX_DOCUMENT_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_DOCUMENT_BYTES),
    GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
    MIN_TEXT_LENGTH: z.coerce.number().int().nonnegative().default(100),
    LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
    LOG_PRETTY: booleanString.default("false"),
});

export interface StudyForgeConfig {
    openai: {
        apiKey?: string;
        model: string;
        baseUrl?: string;
        temperature: number;
    };
    fetch: {
        timeoutMs: number;
        maxDocumentBytes: number;
    };
    generation: {
        timeoutMs: number;
    };
    minTextLength: number;
    logging: {
        level: z.infer<typeof EnvSchema>["LOG_LEVEL"];
        pretty: boolean;
    };
}

/**
 * Build a config from an environment record. Empty strings count as unset.
 * @throws ConfigError listing every invalid key
 */
export function loadConfig(env: Record<string, string | undefined>): StudyForgeConfig {
    const cleaned = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
    );

    const parsed = EnvSchema.safeParse(cleaned);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        );
    }

    const values = parsed.data;
    return Object.freeze({
        openai: {
            apiKey: values.OPENAI_API_KEY,
            model: values.OPENAI_MODEL,
            baseUrl: values.OPENAI_BASE_URL,
            temperature: values.OPENAI_TEMPERATURE,
        },
        fetch: {
            timeoutMs: values.FETCH_TIMEOUT_MS,
            maxDocumentBytes: values.MAX_DOCUMENT_BYTES,
        },
        generation: {
            timeoutMs: values.GENERATION_TIMEOUT_MS,
        },
        minTextLength: values.MIN_TEXT_LENGTH,
        logging: {
            level: values.LOG_LEVEL,
            pretty: values.LOG_PRETTY,
        },
    });
}

/** Load `.env` into the process environment, then validate it */
export function loadConfigFromEnvironment(): StudyForgeConfig {
    dotenv.config();
    return loadConfig(process.env);
}
