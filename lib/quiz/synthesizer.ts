// ============================================================
// MCQ Synthesizer
//
// Builds a fixed-size quiz by querying the answering oracle:
// question text → correct answer → distractors until 4 distinct
// options exist → shuffle. Every oracle slot has a bounded number
// of attempts; exhaustion raises GenerationError and no partial
// quiz is returned.
// ============================================================

import {
    QUESTION_INSTRUCTION,
    buildCorrectAnswerPrompt,
    buildDistractorPrompt,
} from "@/lib/prompts/quiz-synthesis.v1";
import { QuestionSchema, type Question } from "@/lib/schemas/quiz";
import {
    MAX_ATTEMPTS_PER_SLOT,
    OPTIONS_PER_QUESTION,
    QUIZ_QUESTION_COUNT,
} from "./constants";
import { GenerationError, OracleError } from "./errors";

export interface OracleCall {
    /** Correlates the oracle's LLM call logs with the request that caused them. */
    requestId?: string;
}

export interface AnsweringOracle {
    answer(prompt: string, call?: OracleCall): Promise<string>;
}

export interface SynthesizeOptions {
    count?: number;
    maxAttemptsPerSlot?: number;
    /** Uniform [0, 1) source used for shuffling. */
    random?: () => number;
    onQuestion?: (completed: number, total: number) => void;
    requestId?: string;
}

/**
 * In-place Fisher–Yates shuffle.
 */
export function shuffleInPlace<T>(items: T[], random: () => number = Math.random): T[] {
    for (let i = items.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        const tmp = items[i];
        items[i] = items[j];
        items[j] = tmp;
    }
    return items;
}

interface SlotRequest {
    questionNumber: number;
    slot: string;
    maxAttempts: number;
    buildPrompt: () => string;
    /** Returns the value to keep, or null to reject the reply. */
    accept: (reply: string) => string | null;
}

async function fillSlot(oracle: AnsweringOracle, req: SlotRequest): Promise<string> {
    let lastError: OracleError | null = null;

    for (let attempt = 1; attempt <= req.maxAttempts; attempt++) {
        let reply: string;
        try {
            reply = await oracle.answer(req.buildPrompt());
        } catch (error) {
            if (!(error instanceof OracleError)) {
                throw error;
            }
            lastError = error;
            console.warn(
                `[quiz] Question ${req.questionNumber} ${req.slot} attempt ${attempt}/${req.maxAttempts}: ${error.message}`
            );
            continue;
        }

        const accepted = req.accept(reply);
        if (accepted !== null) {
            return accepted;
        }
    }

    throw new GenerationError(
        `Could not generate ${req.slot} for question ${req.questionNumber} after ${req.maxAttempts} attempts.`,
        lastError ? { cause: lastError } : undefined
    );
}

function nonBlank(reply: string): string | null {
    const trimmed = reply.trim();
    return trimmed.length > 0 ? trimmed : null;
}

async function synthesizeQuestion(
    oracle: AnsweringOracle,
    questionNumber: number,
    maxAttempts: number,
    random: () => number
): Promise<Question> {
    const prompt = await fillSlot(oracle, {
        questionNumber,
        slot: "question text",
        maxAttempts,
        buildPrompt: () => QUESTION_INSTRUCTION,
        accept: nonBlank,
    });

    const correctAnswer = await fillSlot(oracle, {
        questionNumber,
        slot: "correct answer",
        maxAttempts,
        buildPrompt: () => buildCorrectAnswerPrompt(prompt),
        accept: nonBlank,
    });

    const options = [correctAnswer];
    while (options.length < OPTIONS_PER_QUESTION) {
        const distractor = await fillSlot(oracle, {
            questionNumber,
            slot: `distractor ${options.length}`,
            maxAttempts,
            buildPrompt: () => buildDistractorPrompt(prompt, options),
            accept: (reply) => {
                const candidate = nonBlank(reply);
                return candidate !== null && !options.includes(candidate) ? candidate : null;
            },
        });
        options.push(distractor);
    }

    const question: Question = {
        prompt,
        options: shuffleInPlace(options, random),
        correctAnswer,
    };

    const checked = QuestionSchema.safeParse(question);
    if (!checked.success) {
        throw new GenerationError(
            `Question ${questionNumber} is malformed: ${checked.error.issues.map((i) => i.message).join(", ")}`
        );
    }

    return Object.freeze({ ...question, options: Object.freeze([...question.options]) });
}

/**
 * Produce `count` well-formed questions, one after another.
 */
export async function synthesizeQuiz(
    oracle: AnsweringOracle,
    options: SynthesizeOptions = {}
): Promise<Question[]> {
    const count = options.count ?? QUIZ_QUESTION_COUNT;
    const maxAttempts = options.maxAttemptsPerSlot ?? MAX_ATTEMPTS_PER_SLOT;
    const random = options.random ?? Math.random;
    const { requestId } = options;
    const ask: AnsweringOracle = requestId
        ? { answer: (prompt) => oracle.answer(prompt, { requestId }) }
        : oracle;

    const questions: Question[] = [];
    for (let i = 1; i <= count; i++) {
        questions.push(await synthesizeQuestion(ask, i, maxAttempts, random));
        options.onQuestion?.(i, count);
    }
    return questions;
}
