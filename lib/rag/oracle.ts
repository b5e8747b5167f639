// ============================================================
// Retrieval-augmented answering oracle over a DocumentIndex.
// ============================================================

import { callLLM } from "@/lib/llm/client";
import { embedWithOpenAI } from "@/lib/llm/providers";
import type { CallLLMInput, CallLLMResult } from "@/lib/llm/types";
import { buildPrompt, PROMPT_VERSION } from "@/lib/prompts/retrieval-qa.v1";
import { OracleError } from "@/lib/quiz/errors";
import type { AnsweringOracle, OracleCall } from "@/lib/quiz/synthesizer";
import type { DocumentIndex, Embedder } from "./vector-index";

export const RETRIEVAL_TOP_K = 4;

export interface OracleDeps {
    embed?: Embedder;
    complete?: (input: CallLLMInput) => Promise<CallLLMResult<string>>;
    topK?: number;
}

export function createRetrievalOracle(
    index: DocumentIndex,
    deps: OracleDeps = {}
): AnsweringOracle {
    const embed = deps.embed ?? embedWithOpenAI;
    const complete = deps.complete ?? callLLM;
    const topK = deps.topK ?? RETRIEVAL_TOP_K;

    return {
        async answer(prompt: string, call: OracleCall = {}): Promise<string> {
            try {
                const [queryVector] = await embed([prompt]);
                if (!queryVector) {
                    throw new Error("Embedding provider returned no vector for the prompt");
                }
                const context = index.search(queryVector, topK).map((chunk) => chunk.text);
                const result = await complete({
                    task: "retrieval_qa",
                    promptVersion: PROMPT_VERSION,
                    messages: buildPrompt(prompt, context),
                    ...(call.requestId ? { requestId: call.requestId } : {}),
                });
                return result.data;
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                throw new OracleError(`Answering oracle failed: ${message}`, { cause: error });
            }
        },
    };
}
