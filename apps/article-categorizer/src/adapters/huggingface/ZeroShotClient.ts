/**
 * @fileoverview Hugging Face zero-shot adapter
 *
 * Calls the hosted inference API for an NLI model (bart-large-mnli by
 * default) in multi-label mode. Both response shapes the API produces
 * are accepted: the pipeline object `{ labels, scores }` and a list of
 * `{ label, score }` pairs.
 *
 * @module adapters/huggingface/ZeroShotClient
 */

import { z } from "zod";
import type { RequestOptions, ZeroShotModel, ZeroShotPrediction } from "../../domain/ports.js";
import { ModelResponseError } from "../../domain/errors.js";

export const kDefaultInferenceEndpoint = "https://router.huggingface.co/hf-inference/models";

const PipelineResponseSchema = z.object({
    labels: z.array(z.string()),
    scores: z.array(z.number()),
});

const PairListResponseSchema = z.array(z.object({
    label: z.string(),
    score: z.number(),
}));

const ZeroShotResponseSchema = z.union([
    PipelineResponseSchema,
    PairListResponseSchema,
    z.array(PipelineResponseSchema).length(1),
]);

export interface ZeroShotClientConfig {
    /** Hugging Face access token */
    token: string;

    /** Model ID (default: facebook/bart-large-mnli) */
    model?: string;

    /** Inference endpoint prefix; the model ID is appended */
    endpoint?: string;

    timeoutMs?: number;
}

type LabelScore = { label: string; score: number };

function zipScores(payload: z.infer<typeof PipelineResponseSchema>): LabelScore[] {
    return payload.labels.map((label, index) => ({ label, score: payload.scores[index] ?? 0 }));
}

/**
 * Normalize any accepted response to labels and scores sorted best first.
 */
function toPrediction(payload: z.infer<typeof ZeroShotResponseSchema>): ZeroShotPrediction {
    const pairs: LabelScore[] = [];

    if (!Array.isArray(payload)) {
        pairs.push(...zipScores(payload));
    }
    else {
        for (const item of payload) {
            if ("labels" in item) {
                pairs.push(...zipScores(item));
            }
            else {
                pairs.push({ label: item.label, score: item.score });
            }
        }
    }

    pairs.sort((a, b) => b.score - a.score);
    return Object.freeze({
        labels: Object.freeze(pairs.map((pair) => pair.label)),
        scores: Object.freeze(pairs.map((pair) => pair.score)),
    });
}

export class ZeroShotClient implements ZeroShotModel {
    private readonly token: string;
    private readonly url: string;
    private readonly timeoutMs: number;

    constructor(config: ZeroShotClientConfig) {
        this.token = config.token;
        this.url = `${config.endpoint ?? kDefaultInferenceEndpoint}/${config.model ?? "facebook/bart-large-mnli"}`;
        this.timeoutMs = config.timeoutMs ?? 30_000;
    }

    async classify(
        text: string,
        candidateLabels: readonly string[],
        options: RequestOptions = {}
    ): Promise<ZeroShotPrediction> {
        const deadline = AbortSignal.timeout(this.timeoutMs);
        const signal = options.signal ? AbortSignal.any([options.signal, deadline]) : deadline;

        const response = await fetch(this.url, {
            method : "POST",
            headers: {
                "Authorization": `Bearer ${this.token}`,
                "Content-Type" : "application/json",
            },
            body: JSON.stringify({
                inputs    : text,
                parameters: {
                    candidate_labels: [...candidateLabels],
                    multi_label     : true,
                },
            }),
            signal,
        });

        if (!response.ok) {
            throw new ModelResponseError("huggingface", `Zero-shot request failed: ${response.status} ${response.statusText}`);
        }

        const parsed = ZeroShotResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new ModelResponseError("huggingface", "Unexpected zero-shot response shape");
        }

        return toPrediction(parsed.data);
    }
}
