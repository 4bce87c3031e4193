import fs from "node:fs";
import { z } from "zod";
import type { Question } from "./types.js";
import { QuestionBankError, UnknownQuestionError } from "./errors.js";

const QuestionEntrySchema = z
  .object({
    id: z.string().trim().min(1).optional(),
    prompt: z.string().trim().min(1, "prompt must not be empty"),
    answers: z
      .array(z.string().trim().min(1, "answers must not be empty strings"))
      .min(1, "at least one accepted answer is required"),
  })
  .strict();

const QuestionFileSchema = z.array(z.unknown());

export type QuestionBank = {
  pick: (groupId: string, memberId?: string) => Question;
  lookup: (questionId: string) => Question;
  reload: (questions: Question[]) => void;
  size: () => number;
  list: () => Question[];
  historySize: () => number;
};

export function parseQuestions(raw: unknown): Question[] {
  const list = QuestionFileSchema.safeParse(raw);
  if (!list.success) {
    throw new QuestionBankError("Question file must contain a JSON array");
  }
  const seen = new Set<string>();
  const questions: Question[] = [];
  list.data.forEach((value, index) => {
    const parsed = QuestionEntrySchema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? `${issue.path.join(".")}: ` : "";
      throw new QuestionBankError(
        `Error while parsing question ${index + 1}: ${where}${issue?.message ?? "invalid"}`,
      );
    }
    const id = parsed.data.id ?? `q${index + 1}`;
    if (seen.has(id)) {
      throw new QuestionBankError(`Error while parsing question ${index + 1}: duplicate id ${id}`);
    }
    seen.add(id);
    questions.push(
      Object.freeze({
        id,
        prompt: parsed.data.prompt,
        answers: Object.freeze([...parsed.data.answers]),
      }),
    );
  });
  return questions;
}

export async function loadQuestionsFile(filePath: string): Promise<Question[]> {
  const raw = await fs.promises.readFile(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new QuestionBankError(`Invalid JSON in ${filePath}: ${String(err)}`);
  }
  return parseQuestions(parsed);
}

function indexQuestions(questions: Question[]): Map<string, Question> {
  if (questions.length === 0) {
    throw new QuestionBankError("Question bank is empty");
  }
  return new Map(questions.map((question) => [question.id, question]));
}

const DEFAULT_HISTORY_LIMIT = 10_000;

export function createQuestionBank(
  initial: Question[],
  options: { random?: () => number; historyLimit?: number } = {},
): QuestionBank {
  const random = options.random ?? Math.random;
  const historyLimit = Math.max(1, options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
  let byId = indexQuestions(initial);
  let ordered = Array.from(byId.values());
  // Last question handed to each group:member, so the next pick can avoid it.
  // Oldest entries are evicted first once the limit is reached.
  const lastPicked = new Map<string, string>();

  function remember(historyKey: string, questionId: string): void {
    lastPicked.delete(historyKey);
    lastPicked.set(historyKey, questionId);
    while (lastPicked.size > historyLimit) {
      const oldest = lastPicked.keys().next();
      if (oldest.done) {
        break;
      }
      lastPicked.delete(oldest.value);
    }
  }

  function pick(groupId: string, memberId?: string): Question {
    const historyKey = memberId === undefined ? groupId : `${groupId}:${memberId}`;
    const previous = lastPicked.get(historyKey);
    const candidates =
      ordered.length > 1 && previous !== undefined
        ? ordered.filter((question) => question.id !== previous)
        : ordered;
    const index = Math.min(candidates.length - 1, Math.floor(random() * candidates.length));
    const question = candidates[index] ?? ordered[0];
    remember(historyKey, question.id);
    return question;
  }

  function lookup(questionId: string): Question {
    const question = byId.get(questionId);
    if (!question) {
      throw new UnknownQuestionError(questionId);
    }
    return question;
  }

  function reload(questions: Question[]): void {
    const next = indexQuestions(questions);
    byId = next;
    ordered = Array.from(next.values());
  }

  return {
    pick,
    lookup,
    reload,
    size: () => ordered.length,
    list: () => [...ordered],
    historySize: () => lastPicked.size,
  };
}
