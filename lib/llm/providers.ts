// ============================================================
// LLM Provider Clients — OpenAI + Anthropic raw callers
// ============================================================

import "server-only";
import OpenAI from "openai";
import { z } from "zod/v4";
import { getAnthropicApiKey, getOpenAIEnv } from "@/lib/config/env";
import type { ModelConfig, LLMMessage, RawLLMResponse } from "./types";
import { OPENAI_CHAT_MODEL_PLACEHOLDER } from "./types";

// ---- OpenAI --------------------------------------------------

let openaiClient: OpenAI | null = null;

function getOpenAI(): OpenAI {
    if (!openaiClient) {
        const { apiKey } = getOpenAIEnv("llm/providers");
        openaiClient = new OpenAI({ apiKey });
    }
    return openaiClient;
}

function resolveOpenAIModel(model: string): string {
    return model === OPENAI_CHAT_MODEL_PLACEHOLDER
        ? getOpenAIEnv("llm/providers").chatModel
        : model;
}

export async function callOpenAI(
    config: ModelConfig,
    messages: LLMMessage[]
): Promise<RawLLMResponse> {
    const client = getOpenAI();
    const model = resolveOpenAIModel(config.model);
    const start = Date.now();

    const completion = await client.chat.completions.create({
        model,
        messages,
        temperature: config.temperature ?? 0.7,
        max_tokens: config.maxTokens ?? 1024,
    });

    return {
        content: completion.choices[0]?.message?.content ?? "",
        model,
        provider: "openai",
        inputTokens: completion.usage?.prompt_tokens ?? 0,
        outputTokens: completion.usage?.completion_tokens ?? 0,
        latencyMs: Date.now() - start,
    };
}

// ---- OpenAI embeddings ---------------------------------------

const EMBEDDING_BATCH_SIZE = 100;

/**
 * Embeds texts in batches; the result is index-aligned with the input.
 */
export async function embedWithOpenAI(texts: string[]): Promise<number[][]> {
    const client = getOpenAI();
    const { embeddingModel } = getOpenAIEnv("llm/providers");
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += EMBEDDING_BATCH_SIZE) {
        const batch = texts.slice(i, i + EMBEDDING_BATCH_SIZE);
        const response = await client.embeddings.create({
            model: embeddingModel,
            input: batch,
        });
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        for (const item of ordered) {
            vectors.push(item.embedding);
        }
    }

    if (vectors.length !== texts.length) {
        throw new Error(
            `OpenAI embeddings returned ${vectors.length} vectors for ${texts.length} inputs`
        );
    }
    return vectors;
}

// ---- Anthropic -----------------------------------------------

const AnthropicResponseSchema = z.object({
    content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
    usage: z
        .object({
            input_tokens: z.number().optional(),
            output_tokens: z.number().optional(),
        })
        .optional(),
});

export async function callAnthropic(
    config: ModelConfig,
    messages: LLMMessage[]
): Promise<RawLLMResponse> {
    const apiKey = getAnthropicApiKey();
    if (!apiKey) {
        throw new Error("ANTHROPIC_API_KEY is not set");
    }

    const start = Date.now();
    const systemMessage = messages.find((m) => m.role === "system");
    const otherMessages = messages.filter((m) => m.role !== "system");

    const response = await fetch("https://api.anthropic.com/v1/messages", {
        method: "POST",
        headers: {
            "Content-Type": "application/json",
            "x-api-key": apiKey,
            "anthropic-version": "2023-06-01",
        },
        body: JSON.stringify({
            model: config.model,
            max_tokens: config.maxTokens ?? 1024,
            temperature: config.temperature ?? 0.7,
            ...(systemMessage ? { system: systemMessage.content } : {}),
            messages: otherMessages.map((m) => ({
                role: m.role,
                content: m.content,
            })),
        }),
    });

    if (!response.ok) {
        const body = await response.text();
        throw new Error(`Anthropic ${response.status}: ${body}`);
    }

    const data = AnthropicResponseSchema.parse(await response.json());

    return {
        content: data.content[0]?.text ?? "",
        model: config.model,
        provider: "anthropic",
        inputTokens: data.usage?.input_tokens ?? 0,
        outputTokens: data.usage?.output_tokens ?? 0,
        latencyMs: Date.now() - start,
    };
}

// ---- Dispatcher ----------------------------------------------

export async function callProvider(
    config: ModelConfig,
    messages: LLMMessage[]
): Promise<RawLLMResponse> {
    switch (config.provider) {
        case "openai":
            return callOpenAI(config, messages);
        case "anthropic":
            return callAnthropic(config, messages);
        default: {
            const unknownProvider: never = config.provider;
            throw new Error(`Unknown provider: ${String(unknownProvider)}`);
        }
    }
}
