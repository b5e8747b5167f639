import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
    QUESTION_INSTRUCTION,
    buildCorrectAnswerPrompt,
    buildDistractorPrompt,
} from "@/lib/prompts/quiz-synthesis.v1";
import { GenerationError, OracleError } from "./errors";
import { shuffleInPlace, synthesizeQuiz, type AnsweringOracle } from "./synthesizer";

function scriptedOracle(replies: string[]): AnsweringOracle & { prompts: string[] } {
    const prompts: string[] = [];
    let next = 0;
    return {
        prompts,
        async answer(prompt: string) {
            prompts.push(prompt);
            if (next >= replies.length) {
                throw new Error(`Unexpected oracle call #${next + 1}: ${prompt}`);
            }
            return replies[next++];
        },
    };
}

function respondingOracle(
    respond: (prompt: string, call: number) => string
): AnsweringOracle & { prompts: string[] } {
    const prompts: string[] = [];
    return {
        prompts,
        async answer(prompt: string) {
            prompts.push(prompt);
            return respond(prompt, prompts.length);
        },
    };
}

describe("shuffleInPlace", () => {
    it("walks the array backwards swapping with the drawn index", () => {
        expect(shuffleInPlace(["a", "b", "c", "d"], () => 0)).toEqual(["b", "c", "d", "a"]);
    });

    it("leaves the order alone when every draw picks the current slot", () => {
        expect(shuffleInPlace(["a", "b", "c", "d"], () => 0.999)).toEqual(["a", "b", "c", "d"]);
    });
});

describe("synthesizeQuiz", () => {
    beforeEach(() => {
        vi.spyOn(console, "warn").mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("discards duplicate distractors and asks again", async () => {
        const oracle = scriptedOracle([
            "What is the capital of France?",
            "Paris",
            "Paris",
            "Paris",
            "London",
            "Berlin",
            "Madrid",
        ]);

        const [question] = await synthesizeQuiz(oracle, { count: 1, random: () => 0 });

        expect(oracle.prompts).toHaveLength(7);
        expect(question.prompt).toBe("What is the capital of France?");
        expect(question.correctAnswer).toBe("Paris");
        expect(question.options).toEqual(["London", "Berlin", "Madrid", "Paris"]);
    });

    it("sends the fixed instruction, the answer prompt and the distractor prompt", async () => {
        const oracle = scriptedOracle(["Q?", "A", "B", "C", "D"]);

        await synthesizeQuiz(oracle, { count: 1 });

        expect(oracle.prompts).toEqual([
            QUESTION_INSTRUCTION,
            buildCorrectAnswerPrompt("Q?"),
            buildDistractorPrompt("Q?", ["A"]),
            buildDistractorPrompt("Q?", ["A", "B"]),
            buildDistractorPrompt("Q?", ["A", "B", "C"]),
        ]);
        expect(oracle.prompts[4]).toBe(
            "Provide a plausible but incorrect answer for this question: Q?. Avoid repeating previous options.\n" +
                "Previous options: A | B | C"
        );
    });

    it("trims replies and rejects blank or repeated distractors", async () => {
        const oracle = scriptedOracle(["  Q?  ", " A ", "A", "", "   ", "B\n", "C", "D"]);

        const [question] = await synthesizeQuiz(oracle, { count: 1, random: () => 0.999 });

        expect(question.prompt).toBe("Q?");
        expect(question.correctAnswer).toBe("A");
        expect(question.options).toEqual(["A", "B", "C", "D"]);
    });

    it("treats distractors as distinct when only their case differs", async () => {
        const oracle = scriptedOracle(["Q?", "Paris", "paris", "PARIS", "Rome"]);

        const [question] = await synthesizeQuiz(oracle, { count: 1, random: () => 0.999 });

        expect(question.options).toEqual(["Paris", "paris", "PARIS", "Rome"]);
    });

    it("produces four well-formed questions by default", async () => {
        let questionNumber = 0;
        let wrongNumber = 0;
        const oracle = respondingOracle((prompt) => {
            if (prompt === QUESTION_INSTRUCTION) return `Question ${++questionNumber}`;
            if (prompt.startsWith("Provide the correct answer")) return "Right";
            return `Wrong ${++wrongNumber}`;
        });
        const onQuestion = vi.fn();

        const questions = await synthesizeQuiz(oracle, { onQuestion });

        expect(questions.map((q) => q.prompt)).toEqual([
            "Question 1",
            "Question 2",
            "Question 3",
            "Question 4",
        ]);
        for (const question of questions) {
            expect(new Set(question.options).size).toBe(4);
            expect(question.options.filter((o) => o === "Right")).toHaveLength(1);
            expect(Object.isFrozen(question)).toBe(true);
        }
        expect(oracle.prompts).toHaveLength(20);
        expect(onQuestion.mock.calls).toEqual([
            [1, 4],
            [2, 4],
            [3, 4],
            [4, 4],
        ]);
    });

    it("gives up on a degenerate oracle after the attempt bound", async () => {
        const oracle = respondingOracle((prompt) => {
            if (prompt === QUESTION_INSTRUCTION) return "Q?";
            if (prompt.startsWith("Provide the correct answer")) return "A";
            return "B";
        });

        const result = synthesizeQuiz(oracle, { count: 1, maxAttemptsPerSlot: 3 });

        await expect(result).rejects.toThrow(
            new GenerationError("Could not generate distractor 2 for question 1 after 3 attempts.")
        );
        // question + answer + first distractor + 3 rejected attempts
        expect(oracle.prompts).toHaveLength(6);
    });

    it("counts oracle failures against the slot and keeps the last one as cause", async () => {
        const failure = new OracleError("upstream timeout");
        const oracle = respondingOracle(() => {
            throw failure;
        });

        const error = await synthesizeQuiz(oracle, { count: 1, maxAttemptsPerSlot: 2 }).catch(
            (e: unknown) => e
        );

        expect(error).toBeInstanceOf(GenerationError);
        expect(error).toMatchObject({
            message: "Could not generate question text for question 1 after 2 attempts.",
            cause: failure,
        });
        expect(oracle.prompts).toHaveLength(2);
    });

    it("recovers when an oracle failure is followed by a good reply", async () => {
        let calls = 0;
        const replies = ["Q?", "A", "B", "C", "D"];
        const oracle: AnsweringOracle = {
            async answer() {
                calls++;
                if (calls === 1) throw new OracleError("flaky");
                return replies[calls - 2];
            },
        };

        const [question] = await synthesizeQuiz(oracle, { count: 1, random: () => 0.999 });

        expect(question.options).toEqual(["A", "B", "C", "D"]);
    });

    it("passes the request id to every oracle call", async () => {
        const calls: Array<string | undefined> = [];
        const replies = ["Q?", "A", "B", "C", "D"];
        const oracle: AnsweringOracle = {
            async answer(_prompt, call) {
                calls.push(call?.requestId);
                return replies[calls.length - 1];
            },
        };

        await synthesizeQuiz(oracle, { count: 1, requestId: "req-1" });

        expect(calls).toEqual(["req-1", "req-1", "req-1", "req-1", "req-1"]);
    });

    it("propagates errors that are not oracle failures", async () => {
        const oracle: AnsweringOracle = {
            async answer() {
                throw new TypeError("bug");
            },
        };

        await expect(synthesizeQuiz(oracle, { count: 1 })).rejects.toThrow(TypeError);
    });

    it("returns nothing when a later question fails", async () => {
        let questionNumber = 0;
        let wrongNumber = 0;
        const oracle = respondingOracle((prompt) => {
            if (prompt === QUESTION_INSTRUCTION) {
                questionNumber++;
                return questionNumber === 3 ? "" : `Question ${questionNumber}`;
            }
            if (prompt.startsWith("Provide the correct answer")) return "Right";
            return `Wrong ${++wrongNumber}`;
        });
        const onQuestion = vi.fn();

        await expect(
            synthesizeQuiz(oracle, { maxAttemptsPerSlot: 1, onQuestion })
        ).rejects.toBeInstanceOf(GenerationError);
        expect(onQuestion).toHaveBeenCalledTimes(2);
    });
});
