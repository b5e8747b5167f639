// ============================================================
// Prompt: Quiz Synthesis v1
// Instructions sent to the answering oracle while building one
// multiple-choice question. Each reply is free text.
// ============================================================

export const PROMPT_VERSION = "quiz-synthesis.v1";

export const QUESTION_INSTRUCTION =
    "Create a multiple-choice question based on the document content. Provide only the question.";

export function buildCorrectAnswerPrompt(question: string): string {
    return (
        `Provide the correct answer for this question: ${question}. ` +
        "Provide only the correct answer."
    );
}

export function buildDistractorPrompt(question: string, previousOptions: string[]): string {
    return [
        `Provide a plausible but incorrect answer for this question: ${question}. ` +
            "Avoid repeating previous options.",
        `Previous options: ${previousOptions.join(" | ")}`,
    ].join("\n");
}
