"use client";

import { useEffect, useState } from "react";
import {
    formatPercentage,
    type AnswerResult,
    type QuizSummary,
    type QuizView,
} from "@/lib/quiz/session";
import type { DocumentInfo } from "@/lib/quiz/session-store";

interface ApiError {
    error?: string;
}

async function readError(res: Response, fallback: string): Promise<string> {
    try {
        const data: ApiError = await res.json();
        return data.error ?? fallback;
    } catch {
        return fallback;
    }
}

export default function QuizPage() {
    const [document, setDocument] = useState<DocumentInfo | null>(null);
    const [quiz, setQuiz] = useState<QuizView>({ status: "idle" });
    const [selected, setSelected] = useState<string | null>(null);
    const [feedback, setFeedback] = useState<AnswerResult | null>(null);
    const [summary, setSummary] = useState<QuizSummary | null>(null);
    const [uploading, setUploading] = useState(false);
    const [generating, setGenerating] = useState(false);
    const [error, setError] = useState<string | null>(null);

    // Restore an existing session after a reload
    useEffect(() => {
        async function load() {
            try {
                const res = await fetch("/api/quiz");
                if (!res.ok) return;
                const data: { document: DocumentInfo | null; quiz: QuizView } = await res.json();
                setDocument(data.document);
                setQuiz(data.quiz);
                if (data.quiz.status === "in_progress") {
                    setFeedback(data.quiz.question.answered);
                }
            } catch {
                setError("Could not restore the previous session.");
            }
        }
        void load();
    }, []);

    // Fetch the review once the last question is done
    useEffect(() => {
        if (quiz.status !== "completed" || summary) return;
        async function loadSummary() {
            try {
                const res = await fetch("/api/quiz/summary");
                if (!res.ok) {
                    setError(await readError(res, "Could not load the summary."));
                    return;
                }
                const data: { summary: QuizSummary } = await res.json();
                setSummary(data.summary);
            } catch {
                setError("Could not load the summary.");
            }
        }
        void loadSummary();
    }, [quiz.status, summary]);

    async function handleUpload(file: File) {
        setUploading(true);
        setError(null);
        setQuiz({ status: "idle" });
        setSummary(null);
        setFeedback(null);
        setSelected(null);
        try {
            const form = new FormData();
            form.append("file", file);
            const res = await fetch("/api/documents", { method: "POST", body: form });
            if (!res.ok) {
                throw new Error(await readError(res, "Error saving file."));
            }
            const data: { document: DocumentInfo } = await res.json();
            setDocument(data.document);
        } catch (err) {
            setDocument(null);
            setError(err instanceof Error ? err.message : "Error saving file.");
        } finally {
            setUploading(false);
        }
    }

    async function handleGenerate() {
        setGenerating(true);
        setError(null);
        try {
            const res = await fetch("/api/quiz", { method: "POST" });
            if (!res.ok) {
                throw new Error(await readError(res, "Could not generate the quiz."));
            }
            const data: { quiz: QuizView } = await res.json();
            setQuiz(data.quiz);
        } catch (err) {
            setError(err instanceof Error ? err.message : "Could not generate the quiz.");
        } finally {
            setGenerating(false);
        }
    }

    async function handleSubmitAnswer() {
        if (selected === null) return;
        setError(null);
        try {
            const res = await fetch("/api/quiz/answer", {
                method: "POST",
                headers: { "Content-Type": "application/json" },
                body: JSON.stringify({ option: selected }),
            });
            if (!res.ok) {
                throw new Error(await readError(res, "Could not submit the answer."));
            }
            const data: { result: AnswerResult; quiz: QuizView } = await res.json();
            setFeedback(data.result);
            setQuiz(data.quiz);
        } catch (err) {
            setError(err instanceof Error ? err.message : "Could not submit the answer.");
        }
    }

    async function handleNext() {
        setError(null);
        try {
            const res = await fetch("/api/quiz/next", { method: "POST" });
            if (!res.ok) {
                throw new Error(await readError(res, "Could not move to the next question."));
            }
            const data: { quiz: QuizView } = await res.json();
            setQuiz(data.quiz);
            setFeedback(null);
            setSelected(null);
        } catch (err) {
            setError(err instanceof Error ? err.message : "Could not move to the next question.");
        }
    }

    async function handleReset() {
        try {
            await fetch("/api/quiz", { method: "DELETE" });
        } catch {
            setError("Could not reset the session.");
            return;
        }
        setDocument(null);
        setQuiz({ status: "idle" });
        setSummary(null);
        setFeedback(null);
        setSelected(null);
        setError(null);
    }

    return (
        <div className="mx-auto max-w-2xl p-6">
            <div className="rounded-xl bg-card p-6 shadow-lg">
                <h1 className="text-2xl font-bold">📚 MCQ Generator</h1>
                <p className="mt-2 text-muted-foreground">
                    Upload a PDF to generate an interactive MCQ based on its content.
                </p>

                {/* Upload */}
                <label className="mt-6 block rounded-xl border-2 border-dashed border-primary p-6 text-center text-primary">
                    {uploading ? "Uploading and processing your PDF..." : "Drop your PDF here or click to browse."}
                    <input
                        type="file"
                        accept="application/pdf"
                        className="hidden"
                        disabled={uploading || generating}
                        onChange={(e) => {
                            const file = e.target.files?.[0];
                            if (file) void handleUpload(file);
                        }}
                    />
                </label>

                {document && (
                    <p className="mt-3 text-sm text-muted-foreground">
                        {document.fileName}: {document.pageCount} pages, {document.chunkCount} passages indexed.
                    </p>
                )}

                {error && <p className="mt-3 text-sm text-destructive">{error}</p>}

                {/* Generate */}
                {document && quiz.status === "idle" && (
                    <button
                        onClick={() => void handleGenerate()}
                        disabled={generating}
                        className="mt-4 rounded-lg bg-primary px-5 py-2.5 text-sm font-medium text-primary-foreground transition hover:opacity-90 disabled:opacity-50"
                    >
                        {generating ? "Generating your MCQ... Please wait." : "Generate MCQ"}
                    </button>
                )}

                {/* Question */}
                {quiz.status === "in_progress" && (
                    <div className="mt-6">
                        <p className="mb-3 font-medium">
                            <span className="font-bold">Question {quiz.question.index + 1}:</span>{" "}
                            {quiz.question.prompt}
                        </p>
                        <div className="space-y-2">
                            {quiz.question.options.map((option) => (
                                <label
                                    key={option}
                                    className={`flex cursor-pointer items-center gap-3 rounded-lg border px-4 py-2.5 text-sm transition ${selected === option
                                            ? "border-primary bg-primary/10 font-medium"
                                            : "border-border hover:border-primary/50"
                                        }`}
                                >
                                    <input
                                        type="radio"
                                        name={`q${quiz.question.index}`}
                                        value={option}
                                        checked={selected === option}
                                        onChange={() => setSelected(option)}
                                    />
                                    {option}
                                </label>
                            ))}
                        </div>

                        {feedback && (
                            <p className={`mt-3 font-bold ${feedback.correct ? "text-green-500" : "text-red-500"}`}>
                                {feedback.correct ? "Correct!" : "Wrong!"}
                            </p>
                        )}

                        <div className="mt-4 flex justify-between">
                            <button
                                onClick={() => void handleSubmitAnswer()}
                                disabled={selected === null}
                                className="rounded-lg border border-border px-5 py-2.5 text-sm transition hover:border-primary disabled:opacity-50"
                            >
                                Submit Answer
                            </button>
                            <button
                                onClick={() => void handleNext()}
                                className="rounded-lg bg-primary px-5 py-2.5 text-sm font-medium text-primary-foreground transition hover:opacity-90"
                            >
                                Next
                            </button>
                        </div>
                    </div>
                )}

                {/* Summary */}
                {quiz.status === "completed" && summary && (
                    <div className="mt-6 text-center">
                        <p className="text-xl font-bold">Quiz Completed!</p>
                        <p className="mt-2 text-xl font-bold">
                            Your Score: {formatPercentage(summary.percentage)}
                        </p>
                        <p className="mt-6 text-lg font-bold">Review:</p>
                        <div className="mt-3 space-y-4 text-left">
                            {summary.review.map((item, i) => (
                                <div key={i} className="rounded-lg border border-border p-4">
                                    <p>
                                        <span className="font-bold">Question {i + 1}:</span> {item.prompt}
                                    </p>
                                    <p className="mt-1">
                                        <span className="font-bold">Correct Answer:</span> {item.correctAnswer}
                                    </p>
                                </div>
                            ))}
                        </div>
                        <button
                            onClick={() => void handleReset()}
                            className="mt-6 rounded-lg bg-primary px-5 py-2.5 text-sm font-medium text-primary-foreground transition hover:opacity-90"
                        >
                            Start over
                        </button>
                    </div>
                )}
            </div>
        </div>
    );
}
