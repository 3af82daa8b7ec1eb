/**
 * @fileoverview Article Categorizer - CLI Entry Point
 *
 * Categorizes text files and prints one JSON record per file. With
 * several files the batch topic clustering is printed as well.
 *
 * Usage:
 *   article-categorizer <file...> [--title T] [--lang auto|ru|en]
 *
 * @module cli
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { readFile } from "fs/promises";
import { basename, extname } from "path";
import { fileURLToPath } from "url";
import type { EventPayload, Logger } from "@rubricator/engine";
import { createConsoleLogger, describeError } from "@rubricator/engine";
import type { ArticleInput } from "./domain/ArticleDocument.js";
import { toCategorizationRecord, toTopicRecord } from "./domain/serialization.js";
import { loadSettings } from "./config/settings.js";
import { createCategorizer } from "./createCategorizer.js";

const kLanguages = ["auto", "ru", "en"] as const;
type LanguageOption = (typeof kLanguages)[number];

export interface CliArguments {
    readonly files: readonly string[];
    readonly title: string | null;
    readonly language: LanguageOption;
}

function isLanguageOption(value: string): value is LanguageOption {
    return kLanguages.some((language) => language === value);
}

/**
 * Parse command-line arguments.
 *
 * @throws Error on a missing option value, an unknown option or no files
 */
export function parseArguments(argv: readonly string[]): CliArguments {
    const files: string[] = [];
    let title: string | null = null;
    let language: LanguageOption = "auto";

    for (let index = 0; index < argv.length; index++) {
        const arg = argv[index];
        if (arg === undefined) {
            continue;
        }

        if (arg === "--title" || arg === "--lang") {
            const value = argv[index + 1];
            if (value === undefined) {
                throw new Error(`Missing value for ${arg}`);
            }
            index++;

            if (arg === "--title") {
                title = value;
            }
            else if (isLanguageOption(value)) {
                language = value;
            }
            else {
                throw new Error(`Unsupported language: ${value} (expected auto, ru or en)`);
            }
        }
        else if (arg.startsWith("--")) {
            throw new Error(`Unknown option: ${arg}`);
        }
        else {
            files.push(arg);
        }
    }

    if (files.length === 0) {
        throw new Error("Usage: article-categorizer <file...> [--title T] [--lang auto|ru|en]");
    }

    return { files, title, language };
}

/**
 * Log categorizer events at debug level, failures at warn.
 */
function logEvent(logger: Logger, event: EventPayload): void {
    const data = { traceId: event.traceId, ...event.data };
    if (event.type === "strategy:failed" || event.type === "categorization:rejected") {
        logger.warn(`[EVENT] ${event.type}`, data);
    }
    else {
        logger.debug(`[EVENT] ${event.type}`, data);
    }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const args = parseArguments(process.argv.slice(2));
    const settings = loadSettings();
    const logger = createConsoleLogger(settings.logLevel);

    const categorizer = createCategorizer({ settings, logger });
    categorizer.eventBus.subscribe("*", (event) => logEvent(logger, event));

    const inputs: ArticleInput[] = [];
    for (const file of args.files) {
        const text = await readFile(file, "utf-8");
        inputs.push({
            id      : basename(file, extname(file)),
            text,
            title   : args.files.length === 1 ? args.title : null,
            language: args.language,
        });
    }

    for (const input of inputs) {
        try {
            const result = await categorizer.categorize(input);
            console.log(JSON.stringify(toCategorizationRecord(result), null, 2));
        }
        catch (error) {
            logger.error("Categorization failed", { id: input.id, error: describeError(error) });
            process.exitCode = 1;
        }
    }

    if (inputs.length > 1) {
        const topics = categorizer.clusterTopics(inputs);
        console.log(JSON.stringify({
            topics: topics.map((topic, index) => ({ id: inputs[index]?.id, ...toTopicRecord(topic) })),
        }, null, 2));
    }
}

// Run if this is the main module
if (process.argv[1] === fileURLToPath(import.meta.url)) {
    main().catch((error: unknown) => {
        console.error("[FATAL]", describeError(error));
        process.exit(1);
    });
}
