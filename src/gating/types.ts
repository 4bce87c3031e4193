import type { RemovalMode, WrongAnswerPolicy } from "../config/types.js";

export type Question = {
  readonly id: string;
  readonly prompt: string;
  readonly answers: readonly string[];
};

export type GatePhase = "pending" | "answering" | "resolved";

export type GateMemberRef = {
  groupId: string;
  memberId: string;
};

export type MemberGateRecord = GateMemberRef & {
  phase: GatePhase;
  questionId: string;
  attemptsRemaining: number;
  /** ISO timestamp; the record must be resolved at or after this instant. */
  deadline: string;
  createdAt: string;
};

export type GatePolicy = {
  attempts: number;
  timeoutMs: number;
  onWrongAnswer: WrongAnswerPolicy;
  removal: RemovalMode;
  removalRetries: number;
  /** How long a member removed for failing must wait before joining again. 0 disables it. */
  retryCooldownMs: number;
};

export type PassedMember = GateMemberRef & {
  passedAt: string;
};

export type GateOutcome =
  | "gated"
  | "reprompted"
  | "passed"
  | "failed"
  | "timed-out"
  | "unknown-question"
  | "left"
  | "revoked";

export type GateIgnoreReason =
  | "duplicate-join"
  | "already-passed"
  | "no-record"
  | "not-answering"
  | "stale-timeout"
  | "no-match"
  | "ambiguous-target";

export type GateEventResult = {
  handled: boolean;
  outcome?: GateOutcome;
  reason?: GateIgnoreReason;
  record?: MemberGateRecord;
};

export type GatePromptParams = GateMemberRef & {
  question: Question;
  text: string;
  retry: boolean;
};

export type GateNotice = GateMemberRef & {
  outcome: Extract<GateOutcome, "passed" | "failed" | "timed-out" | "unknown-question">;
  text: string;
};

export type GateRemovalOptions = {
  /** Keep the member out until this instant instead of letting them rejoin at once. */
  until?: Date;
};

export type GateTransport = {
  restrictMember: (member: GateMemberRef) => Promise<void>;
  unrestrictMember: (member: GateMemberRef) => Promise<void>;
  removeMember: (member: GateMemberRef, options?: GateRemovalOptions) => Promise<void>;
  sendPrompt: (params: GatePromptParams) => Promise<void>;
  /** Optional outcome notice to the member. */
  notify?: (notice: GateNotice) => Promise<void>;
};

export type GateRecordStore = {
  saveRecord: (record: MemberGateRecord) => Promise<void>;
  loadRecord: (groupId: string, memberId: string) => Promise<MemberGateRecord | null>;
  deleteRecord: (groupId: string, memberId: string) => Promise<void>;
  listRecords: () => Promise<MemberGateRecord[]>;
  savePassed: (entry: PassedMember) => Promise<void>;
  deletePassed: (groupId: string, memberId: string) => Promise<void>;
  listPassed: () => Promise<PassedMember[]>;
};

export function buildGateKey(member: GateMemberRef): string {
  return `${member.groupId}:${member.memberId}`;
}
