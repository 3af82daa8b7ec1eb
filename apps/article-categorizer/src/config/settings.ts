/**
 * @fileoverview Runtime settings
 *
 * Reads service credentials, model names and file locations from the
 * environment. A missing credential disables the capability that needs
 * it; nothing here is mandatory.
 *
 * @module config/settings
 */

import { fileURLToPath } from "url";
import { z } from "zod";
import type { LogLevel } from "@rubricator/engine";
import { kDefaultStrategyTimeoutMs } from "@rubricator/engine";

/**
 * Default location of `categories.yaml`, next to the package sources.
 */
export const kDefaultTaxonomyPath = fileURLToPath(new URL("../../config/categories.yaml", import.meta.url));

/**
 * Default location of `rules.yaml`.
 */
export const kDefaultRulesPath = fileURLToPath(new URL("../../config/rules.yaml", import.meta.url));

const optionalString = z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.string().trim().optional()
);

const SettingsSchema = z.object({
    OPENAI_API_KEY    : optionalString,
    OPENAI_BASE_URL   : optionalString.pipe(z.string().url().optional()),
    OPENAI_CHAT_MODEL : optionalString.transform((value) => value ?? "gpt-4o-mini"),
    OPENAI_EMBED_MODEL: optionalString.transform((value) => value ?? "text-embedding-3-small"),
    HUGGINGFACE_TOKEN : optionalString,
    ZERO_SHOT_MODEL   : optionalString.transform((value) => value ?? "facebook/bart-large-mnli"),
    SERVICE_TIMEOUT_MS: optionalString.pipe(
        z.coerce.number().int().positive().default(kDefaultStrategyTimeoutMs)
    ),
    LABEL_CLASSIFIER: optionalString.pipe(z.enum(["on", "off"]).default("on")),
    TAXONOMY_PATH   : optionalString.transform((value) => value ?? kDefaultTaxonomyPath),
    RULES_PATH      : optionalString.transform((value) => value ?? kDefaultRulesPath),
    LOG_LEVEL       : optionalString.pipe(
        z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
    ),
});

/**
 * Validated runtime settings.
 */
export interface Settings {
    readonly openai: {
        readonly apiKey: string | null;
        readonly baseURL: string | null;
        readonly chatModel: string;
        readonly embeddingModel: string;
    };
    readonly zeroShot: {
        readonly token: string | null;
        readonly model: string;
    };
    readonly serviceTimeoutMs: number;
    readonly labelClassifierEnabled: boolean;
    readonly taxonomyPath: string;
    readonly rulesPath: string;
    readonly logLevel: LogLevel;
}

/**
 * Parse settings from an environment map.
 *
 * @throws Error naming the first invalid variable
 *
 * @example
 * ```typescript
 * const settings = loadSettings({ OPENAI_API_KEY: "test-secret", LOG_LEVEL: "debug" });
 * settings.openai.chatModel; // "gpt-4o-mini"
 * settings.zeroShot.token;   // null
 * ```
 */
export function loadSettings(env: Readonly<Record<string, string | undefined>> = process.env): Settings {
    const parsed = SettingsSchema.safeParse(env);

    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(
            `Invalid environment: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown error"}`
        );
    }

    const values = parsed.data;
    return Object.freeze({
        openai: Object.freeze({
            apiKey        : values.OPENAI_API_KEY ?? null,
            baseURL       : values.OPENAI_BASE_URL ?? null,
            chatModel     : values.OPENAI_CHAT_MODEL,
            embeddingModel: values.OPENAI_EMBED_MODEL,
        }),
        zeroShot: Object.freeze({
            token: values.HUGGINGFACE_TOKEN ?? null,
            model: values.ZERO_SHOT_MODEL,
        }),
        serviceTimeoutMs      : values.SERVICE_TIMEOUT_MS,
        labelClassifierEnabled: values.LABEL_CLASSIFIER === "on",
        taxonomyPath          : values.TAXONOMY_PATH,
        rulesPath             : values.RULES_PATH,
        logLevel              : values.LOG_LEVEL,
    });
}
