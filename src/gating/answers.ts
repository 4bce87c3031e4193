import type { Question } from "./types.js";

/** Trim and case-fold. Independent of the host locale. */
export function normalizeAnswer(text: string): string {
  return text.trim().toLowerCase();
}

/** Exact match after normalization against any accepted answer. No fuzzy matching. */
export function validateAnswer(question: Question, submittedText: string): boolean {
  const submitted = normalizeAnswer(submittedText);
  if (!submitted) {
    return false;
  }
  return question.answers.some((answer) => normalizeAnswer(answer) === submitted);
}
