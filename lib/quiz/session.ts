// ============================================================
// Quiz Session State Machine
//
//   idle ──start()──▶ in_progress ──advance() × N──▶ completed
//    ▲                                                  │
//    └──────────────────── reset() ◀────────────────────┘
//
// Every out-of-order transition throws InvalidStateError.
// ============================================================

import { QuestionSchema, type Question } from "@/lib/schemas/quiz";
import { InvalidStateError } from "./errors";

export type QuizState =
    | { status: "idle" }
    | {
          status: "in_progress";
          questions: readonly Question[];
          currentIndex: number;
          score: number;
          /** First submission for the current question, if any. */
          answered: AnswerResult | null;
      }
    | { status: "completed"; questions: readonly Question[]; score: number };

export type QuizStatus = QuizState["status"];

export interface AnswerResult {
    correct: boolean;
    correctAnswer: string;
    selected: string;
    /** False when the question had already been answered. */
    counted: boolean;
}

export interface CurrentQuestion {
    index: number;
    total: number;
    prompt: string;
    options: readonly string[];
    answered: AnswerResult | null;
}

export interface QuizSummary {
    score: number;
    total: number;
    percentage: number;
    review: { prompt: string; correctAnswer: string }[];
}

export type QuizView =
    | { status: "idle" }
    | { status: "in_progress"; score: number; question: CurrentQuestion }
    | { status: "completed"; score: number; total: number };

export class QuizSession {
    private state: QuizState = { status: "idle" };

    get status(): QuizStatus {
        return this.state.status;
    }

    get score(): number {
        return this.state.status === "idle" ? 0 : this.state.score;
    }

    start(questions: readonly Question[]): void {
        if (this.state.status !== "idle") {
            throw new InvalidStateError(
                `Cannot start a quiz while ${this.state.status}; reset the session first.`
            );
        }
        if (questions.length === 0) {
            throw new InvalidStateError("Cannot start a quiz without questions.");
        }
        questions.forEach((question, i) => {
            const checked = QuestionSchema.safeParse(question);
            if (!checked.success) {
                throw new InvalidStateError(
                    `Cannot start a quiz with malformed question ${i + 1}: ${checked.error.issues
                        .map((issue) => issue.message)
                        .join(", ")}`
                );
            }
        });

        this.state = {
            status: "in_progress",
            questions: [...questions],
            currentIndex: 0,
            score: 0,
            answered: null,
        };
    }

    submitAnswer(selected: string): AnswerResult {
        const state = this.state;
        if (state.status !== "in_progress") {
            throw new InvalidStateError(`Cannot submit an answer while ${state.status}.`);
        }

        const { correctAnswer } = state.questions[state.currentIndex];
        const correct = selected === correctAnswer;

        if (state.answered) {
            return { correct, correctAnswer, selected, counted: false };
        }

        const result: AnswerResult = { correct, correctAnswer, selected, counted: true };
        this.state = {
            ...state,
            score: correct ? state.score + 1 : state.score,
            answered: result,
        };
        return result;
    }

    advance(): void {
        const state = this.state;
        if (state.status !== "in_progress") {
            throw new InvalidStateError(`Cannot advance while ${state.status}.`);
        }

        const nextIndex = state.currentIndex + 1;
        this.state =
            nextIndex >= state.questions.length
                ? { status: "completed", questions: state.questions, score: state.score }
                : { ...state, currentIndex: nextIndex, answered: null };
    }

    currentQuestion(): CurrentQuestion {
        const state = this.state;
        if (state.status !== "in_progress") {
            throw new InvalidStateError(`No current question while ${state.status}.`);
        }
        const question = state.questions[state.currentIndex];
        return {
            index: state.currentIndex,
            total: state.questions.length,
            prompt: question.prompt,
            options: question.options,
            answered: state.answered,
        };
    }

    summary(): QuizSummary {
        const state = this.state;
        if (state.status !== "completed") {
            throw new InvalidStateError(`Summary is only available once completed, not ${state.status}.`);
        }
        const total = state.questions.length;
        return {
            score: state.score,
            total,
            percentage: (100 * state.score) / total,
            review: state.questions.map((q) => ({
                prompt: q.prompt,
                correctAnswer: q.correctAnswer,
            })),
        };
    }

    /** Correct answers stay hidden until the question has been answered. */
    view(): QuizView {
        const state = this.state;
        switch (state.status) {
            case "idle":
                return { status: "idle" };
            case "in_progress":
                return { status: "in_progress", score: state.score, question: this.currentQuestion() };
            case "completed":
                return { status: "completed", score: state.score, total: state.questions.length };
        }
    }

    reset(): void {
        this.state = { status: "idle" };
    }
}

export function formatPercentage(percentage: number): string {
    return `${percentage.toFixed(2)}%`;
}
