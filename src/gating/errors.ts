import type { GateMemberRef } from "./types.js";

export type GateErrorCode = "unknown-question" | "transport-action-failed" | "question-bank-invalid";

export type TransportAction = "restrict" | "unrestrict" | "remove" | "prompt" | "notify";

export class GateError extends Error {
  readonly code: GateErrorCode;

  constructor(code: GateErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GateError";
    this.code = code;
  }
}

export class UnknownQuestionError extends GateError {
  readonly questionId: string;

  constructor(questionId: string) {
    super("unknown-question", `Unknown question: ${questionId}`);
    this.name = "UnknownQuestionError";
    this.questionId = questionId;
  }
}

export class QuestionBankError extends GateError {
  constructor(message: string) {
    super("question-bank-invalid", message);
    this.name = "QuestionBankError";
  }
}

export class TransportActionFailedError extends GateError {
  readonly action: TransportAction;
  readonly member: GateMemberRef;

  constructor(action: TransportAction, member: GateMemberRef, cause: unknown) {
    super(
      "transport-action-failed",
      `${action} failed for ${member.memberId} in ${member.groupId}: ${describeError(cause)}`,
      { cause },
    );
    this.name = "TransportActionFailedError";
    this.action = action;
    this.member = member;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
