// ============================================================
// Zod schemas for generated questions and quiz API bodies
// ============================================================

import { z } from "zod/v4";
import { OPTIONS_PER_QUESTION } from "@/lib/quiz/constants";

const NonBlankString = z.string().refine((s) => s.trim().length > 0, {
    message: "Must not be blank",
});

export const QuestionSchema = z
    .object({
        prompt: NonBlankString,
        options: z.array(NonBlankString).length(OPTIONS_PER_QUESTION),
        correctAnswer: NonBlankString,
    })
    .refine((q) => new Set(q.options).size === q.options.length, {
        message: "Options must be distinct",
        path: ["options"],
    })
    .refine((q) => q.options.filter((o) => o === q.correctAnswer).length === 1, {
        message: "Correct answer must appear exactly once in options",
        path: ["correctAnswer"],
    });

/** A generated question; frozen once built. */
export type Question = Readonly<{
    prompt: string;
    options: readonly string[];
    correctAnswer: string;
}>;

export const AnswerBodySchema = z.object({
    option: z.string().min(1).max(2000),
});

export type AnswerBody = z.infer<typeof AnswerBodySchema>;
