import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import type { Question } from "./types.js";
import { QuestionBankError, UnknownQuestionError } from "./errors.js";
import { createQuestionBank, loadQuestionsFile, parseQuestions } from "./questions.js";

const Q1: Question = { id: "q1", prompt: "2 + 2?", answers: ["4"] };
const Q2: Question = { id: "q2", prompt: "Capital of France?", answers: ["Paris"] };
const Q3: Question = { id: "q3", prompt: "Opposite of hot?", answers: ["cold"] };

function sequence(values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index += 1;
    return value;
  };
}

describe("parseQuestions", () => {
  it("assigns ids from position when missing", () => {
    const questions = parseQuestions([
      { prompt: "2 + 2?", answers: ["4"] },
      { id: "capital", prompt: "Capital of France?", answers: ["Paris", "paris, france"] },
    ]);
    expect(questions.map((question) => question.id)).toEqual(["q1", "capital"]);
    expect(questions[1].answers).toEqual(["Paris", "paris, france"]);
    expect(Object.isFrozen(questions[0])).toBe(true);
  });

  it("rejects entries without answers", () => {
    expect(() => parseQuestions([{ prompt: "2 + 2?", answers: [] }])).toThrow(
      "Error while parsing question 1: answers: at least one accepted answer is required",
    );
  });

  it("rejects duplicate ids", () => {
    expect(() =>
      parseQuestions([
        { id: "a", prompt: "one", answers: ["1"] },
        { id: "a", prompt: "two", answers: ["2"] },
      ]),
    ).toThrow("Error while parsing question 2: duplicate id a");
  });

  it("rejects a non-array document", () => {
    expect(() => parseQuestions({ questions: [] })).toThrow(QuestionBankError);
  });
});

describe("loadQuestionsFile", () => {
  it("reads questions from disk", async () => {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "joingate-questions-"));
    const filePath = path.join(tmp, "questions.json");
    await fs.writeFile(filePath, JSON.stringify([{ prompt: "2 + 2?", answers: ["4"] }]), "utf-8");
    const questions = await loadQuestionsFile(filePath);
    expect(questions).toEqual([{ id: "q1", prompt: "2 + 2?", answers: ["4"] }]);
    await fs.rm(tmp, { recursive: true, force: true });
  });

  it("accepts the example question file", async () => {
    const filePath = fileURLToPath(new URL("../../examples/questions.json", import.meta.url));
    const questions = await loadQuestionsFile(filePath);
    expect(questions.map((question) => question.id)).toEqual(["sky", "legs", "water", "q4"]);
  });

  it("reports invalid json", async () => {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "joingate-questions-"));
    const filePath = path.join(tmp, "questions.json");
    await fs.writeFile(filePath, "[{", "utf-8");
    await expect(loadQuestionsFile(filePath)).rejects.toThrow(QuestionBankError);
    await fs.rm(tmp, { recursive: true, force: true });
  });
});

describe("question bank", () => {
  it("refuses to start empty", () => {
    expect(() => createQuestionBank([])).toThrow("Question bank is empty");
  });

  it("does not repeat the previous question for the same member", () => {
    const bank = createQuestionBank([Q1, Q2, Q3], { random: () => 0 });
    expect(bank.pick("g1", "m1").id).toBe("q1");
    expect(bank.pick("g1", "m1").id).toBe("q2");
    expect(bank.pick("g1", "m1").id).toBe("q1");
    // Another member has no history yet.
    expect(bank.pick("g1", "m2").id).toBe("q1");
  });

  it("keeps history per group", () => {
    const bank = createQuestionBank([Q1, Q2], { random: () => 0 });
    expect(bank.pick("g1", "m1").id).toBe("q1");
    expect(bank.pick("g2", "m1").id).toBe("q1");
  });

  it("bounds the pick history and forgets the oldest member first", () => {
    const bank = createQuestionBank([Q1, Q2], { random: () => 0, historyLimit: 2 });
    expect(bank.pick("g1", "m1").id).toBe("q1");
    expect(bank.pick("g1", "m2").id).toBe("q1");
    expect(bank.pick("g1", "m3").id).toBe("q1");
    expect(bank.historySize()).toBe(2);
    // m1 was evicted, so q1 is not avoided for it any more.
    expect(bank.pick("g1", "m1").id).toBe("q1");
    // m3 is still remembered.
    expect(bank.pick("g1", "m3").id).toBe("q2");
  });

  it("falls back to the only question", () => {
    const bank = createQuestionBank([Q1], { random: () => 0.99 });
    expect(bank.pick("g1", "m1").id).toBe("q1");
    expect(bank.pick("g1", "m1").id).toBe("q1");
  });

  it("picks uniformly from the remaining candidates", () => {
    const bank = createQuestionBank([Q1, Q2, Q3], { random: sequence([0.99, 0.6]) });
    expect(bank.pick("g1", "m1").id).toBe("q3");
    // q3 excluded, candidates [q1, q2], floor(0.6 * 2) = 1
    expect(bank.pick("g1", "m1").id).toBe("q2");
  });

  it("looks up questions and fails for stale ids after reload", () => {
    const bank = createQuestionBank([Q1, Q2]);
    expect(bank.lookup("q2")).toBe(Q2);
    bank.reload([Q3]);
    expect(bank.size()).toBe(1);
    expect(bank.list()).toEqual([Q3]);
    expect(() => bank.lookup("q2")).toThrow(UnknownQuestionError);
  });

  it("keeps the current set when a reload is empty", () => {
    const bank = createQuestionBank([Q1]);
    expect(() => bank.reload([])).toThrow(QuestionBankError);
    expect(bank.lookup("q1")).toBe(Q1);
  });
});
