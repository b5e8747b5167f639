// ============================================================
// Prompt: Retrieval QA v1
// "Stuff" strategy: every retrieved chunk goes into one prompt.
// ============================================================

import type { LLMMessage } from "@/lib/llm/types";

export const PROMPT_VERSION = "retrieval-qa.v1";

export function buildPrompt(question: string, context: string[]): LLMMessage[] {
    return [
        {
            role: "system",
            content: [
                `Use the following pieces of context to answer the user's question.`,
                `If you don't know the answer, just say that you don't know, don't try to make up an answer.`,
                `----------------`,
                context.join("\n\n"),
            ].join("\n"),
        },
        {
            role: "user",
            content: question,
        },
    ];
}
