import OpenAI from "openai";
import { z } from "zod";
import type { TitleAndSummary } from "../types";
import type { InferenceClient } from "./types";

export const SUMMARY_SYSTEM_PROMPT = `You extract titles and summaries from fragments of web pages about academic conferences.
Return a JSON object with exactly two keys, "title" and "summary".
For the title: if the fragment looks like the start of a page, use the page's own title; otherwise write a short descriptive title for the fragment. If the fragment is only code, the title names what the code is about.
For the summary: write 2-3 sentences on the main points of the fragment, keeping any conference names, dates and locations.
Keep both concise but informative.`;

const TitleAndSummarySchema = z.object({
    title: z.string().trim().min(1),
    summary: z.string().trim().min(1),
});

export interface OpenAIInferenceOptions {
    apiKey: string;
    llmModel: string;
    embeddingModel: string;
    /** Requested embedding size; only sent for models that accept it */
    dimensions?: number;
}

/**
 * Parse the model's JSON reply into a title and summary.
 *
 * @throws when the reply is not JSON or lacks either field
 */
export function parseTitleAndSummary(raw: string | null | undefined): TitleAndSummary {
    if (raw === null || raw === undefined || raw.trim() === "") {
        throw new Error("Empty completion");
    }
    const parsed = TitleAndSummarySchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
        throw new Error(`Malformed title/summary: ${parsed.error.issues.map(i => i.message).join(", ")}`);
    }
    return parsed.data;
}

/**
 * InferenceClient backed by the OpenAI API: chat completions in JSON mode
 * for titles/summaries and the embeddings endpoint for vectors.
 */
export class OpenAIInferenceClient implements InferenceClient {
    private readonly client: OpenAI;
    private readonly options: OpenAIInferenceOptions;

    constructor(options: OpenAIInferenceOptions, client?: OpenAI) {
        this.options = options;
        this.client = client ?? new OpenAI({ apiKey: options.apiKey });
    }

    async embed(text: string): Promise<number[]> {
        const supportsDimensions = this.options.embeddingModel.startsWith("text-embedding-3");
        const response = await this.client.embeddings.create({
            model: this.options.embeddingModel,
            input: text,
            ...(supportsDimensions && this.options.dimensions !== undefined && { dimensions: this.options.dimensions }),
        });

        const embedding = response.data[0]?.embedding;
        if (!embedding) {
            throw new Error("Embedding response contained no vector");
        }
        return embedding;
    }

    async summarize(input: string): Promise<TitleAndSummary> {
        const completion = await this.client.chat.completions.create({
            model: this.options.llmModel,
            messages: [
                { role: "system", content: SUMMARY_SYSTEM_PROMPT },
                { role: "user", content: input },
            ],
            response_format: { type: "json_object" },
        });

        return parseTitleAndSummary(completion.choices[0]?.message.content);
    }
}
